import type { TrackedArtist } from "../affinity";
import { daysBefore, parseReleaseDate } from "../lib/dates";
import { log } from "../lib/logger";
import type { CatalogService } from "../services/types";
import { rankFor, type RecencyScores } from "./recency";
import type { DetectionOptions, ReleaseCandidate, ReleaseType } from "./types";

export function classifyRelease(totalTracks: number): ReleaseType {
  if (totalTracks <= 3) return "single";
  if (totalTracks <= 6) return "ep";
  return "album";
}

export function relevanceScore(
  likedCount: number,
  recencyRank: number,
  recentArtistPlays: number
): number {
  return likedCount + recencyRank + recentArtistPlays;
}

/** Descending by score; Array.prototype.sort is stable, so ties keep discovery order. */
export function rankCandidates(candidates: ReleaseCandidate[]): ReleaseCandidate[] {
  return [...candidates].sort((a, b) => b.relevanceScore - a.relevanceScore);
}

/**
 * Scans the first page of each eligible artist's albums and singles for
 * releases inside the window, scoring each by artist affinity.
 */
export async function detectReleases(
  catalog: CatalogService,
  artists: TrackedArtist[],
  recency: RecencyScores,
  options: DetectionOptions
): Promise<ReleaseCandidate[]> {
  const cutoff = daysBefore(options.now, options.windowDays);
  const candidates: ReleaseCandidate[] = [];

  for (const artist of artists) {
    if (artist.liked_count <= options.likedThreshold) continue;

    log(`[releases] Checking ${artist.name}...`);
    const releases = await catalog.getArtistReleases(
      artist.id,
      options.releasesPerArtist
    );

    for (const release of releases) {
      if (release.totalTracks === 0) continue;
      const released = parseReleaseDate(release.releaseDate);
      if (!released || released < cutoff) continue;

      const recencyRank = rankFor(recency, artist.id);
      candidates.push({
        name: release.name,
        artist: artist.name,
        artistId: artist.id,
        albumId: release.id,
        type: classifyRelease(release.totalTracks),
        releaseDate: release.releaseDate,
        totalTracks: release.totalTracks,
        likedCount: artist.liked_count,
        recencyRank,
        recentArtistPlays: artist.recent_artist_plays,
        relevanceScore: relevanceScore(
          artist.liked_count,
          recencyRank,
          artist.recent_artist_plays
        ),
      });
    }
  }

  const ranked = rankCandidates(candidates);
  log(
    `[releases] Found ${ranked.length} new releases in the past ${options.windowDays} days`
  );
  return ranked;
}
