import fs from "fs";
import path from "path";
import { z } from "zod";
import type { ReleaseCandidate } from "./types";

export type OutputFormat = "json" | "text";

const candidateSchema = z.object({
  name: z.string(),
  artist: z.string(),
  artistId: z.string(),
  albumId: z.string(),
  type: z.enum(["single", "ep", "album"]),
  releaseDate: z.string(),
  totalTracks: z.number(),
  likedCount: z.number(),
  recencyRank: z.number(),
  recentArtistPlays: z.number(),
  relevanceScore: z.number(),
});

function formatLabel(value: string | null | undefined): string {
  if (!value) return "Unknown";
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : "Unknown";
}

function formatReleaseList(releases: ReleaseCandidate[]): string[] {
  return releases.map((release, index) => {
    const signals = `liked ${release.likedCount}, recency ${release.recencyRank}, plays ${release.recentArtistPlays}`;
    return `  ${index + 1}. ${formatLabel(release.name)} - ${formatLabel(release.artist)} (${release.type}, ${release.releaseDate}) [score ${release.relevanceScore}: ${signals}]`;
  });
}

export function formatReleasesAsText(releases: ReleaseCandidate[]): string {
  if (releases.length === 0) {
    return "No new releases in the last snapshot.";
  }
  return [
    `${releases.length} ranked releases.`,
    ...formatReleaseList(releases),
  ].join("\n");
}

export function formatReleasesAsJson(releases: ReleaseCandidate[]): string {
  return JSON.stringify({ count: releases.length, releases }, null, 2);
}

/** Inspection copy of the ranked list; the pipeline never reads it back. */
export function writeReleaseSnapshot(
  filePath: string,
  releases: ReleaseCandidate[]
): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(releases, null, 2));
}

export function readReleaseSnapshot(filePath: string): ReleaseCandidate[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`No release snapshot at ${filePath}. Run: release-tracker run`);
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const result = z.array(candidateSchema).safeParse(parsed);
  if (!result.success) {
    throw new Error(`Release snapshot ${filePath} is malformed.`);
  }
  return result.data;
}
