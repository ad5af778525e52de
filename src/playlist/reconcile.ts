import type { ReleaseCandidate } from "../discovery";
import { log } from "../lib/logger";
import { normalizeTitle } from "../lib/normalize";
import { trackUri } from "../services/spotify";
import type { CatalogService } from "../services/types";
import type { PlaylistGateway } from "./gateway";

type NamePair = { track: string; album: string };

type PlaylistItem = { trackId: string; uri: string };

/**
 * What the playlist holds right now, updated in place as the run adds
 * and removes tracks so later candidates see earlier decisions.
 */
export type PlaylistSnapshot = {
  trackIds: Set<string>;
  /** First track seen for each artist. */
  representative: Map<string, PlaylistItem>;
  pairs: Map<string, NamePair[]>;
};

export type SkipReason = "no-tracks" | "already-present" | "duplicate-title";

export type AddedRelease = ReleaseCandidate & {
  trackId: string;
  trackName: string;
  replaced: string | null;
};

export type ReconcileResult = {
  added: AddedRelease[];
  /** Subset of `added`: at most one per artist. */
  notify: AddedRelease[];
  removed: string[];
  skipped: Array<{ candidate: ReleaseCandidate; reason: SkipReason }>;
};

function addPair(snapshot: PlaylistSnapshot, artistId: string, pair: NamePair): void {
  const pairs = snapshot.pairs.get(artistId);
  if (pairs) {
    pairs.push(pair);
  } else {
    snapshot.pairs.set(artistId, [pair]);
  }
}

export async function buildSnapshot(
  gateway: PlaylistGateway
): Promise<PlaylistSnapshot> {
  const snapshot: PlaylistSnapshot = {
    trackIds: new Set(),
    representative: new Map(),
    pairs: new Map(),
  };

  for await (const page of gateway.entries()) {
    for (const entry of page) {
      if (entry.trackId) {
        snapshot.trackIds.add(entry.trackId);
      }
      const pair = {
        track: normalizeTitle(entry.trackName),
        album: normalizeTitle(entry.albumName),
      };
      for (const artistId of entry.artistIds) {
        if (entry.trackId && entry.uri && !snapshot.representative.has(artistId)) {
          snapshot.representative.set(artistId, { trackId: entry.trackId, uri: entry.uri });
        }
        addPair(snapshot, artistId, pair);
      }
    }
  }

  return snapshot;
}

function isDuplicateTitle(
  snapshot: PlaylistSnapshot,
  artistId: string,
  trackName: string
): boolean {
  const pairs = snapshot.pairs.get(artistId) ?? [];
  return pairs.some((pair) => pair.track === trackName);
}

/**
 * Brings the playlist in line with the ranked releases: one current
 * track per artist, no repeats of a title the artist already has.
 */
export async function reconcilePlaylist(
  gateway: PlaylistGateway,
  catalog: CatalogService,
  candidates: ReleaseCandidate[]
): Promise<ReconcileResult> {
  const snapshot = await buildSnapshot(gateway);
  log(
    `[playlist] ${snapshot.trackIds.size} tracks in '${gateway.playlist.name}'`
  );

  const result: ReconcileResult = { added: [], notify: [], removed: [], skipped: [] };
  const notified = new Set<string>();

  for (const candidate of candidates) {
    const [first] = await catalog.getReleaseTracks(candidate.albumId, 1);
    const trackId = first?.id;
    if (!first || !trackId) {
      result.skipped.push({ candidate, reason: "no-tracks" });
      continue;
    }

    if (snapshot.trackIds.has(trackId)) {
      log(
        `[playlist] Skipping '${candidate.name}' by ${candidate.artist} — exact track already in playlist`
      );
      result.skipped.push({ candidate, reason: "already-present" });
      continue;
    }

    const trackName = normalizeTitle(first.name);
    if (isDuplicateTitle(snapshot, candidate.artistId, trackName)) {
      log(
        `[playlist] Skipping '${candidate.name}' by ${candidate.artist} — '${first.name}' already in playlist`
      );
      result.skipped.push({ candidate, reason: "duplicate-title" });
      continue;
    }

    const previous = snapshot.representative.get(candidate.artistId) ?? null;
    if (previous && previous.trackId !== trackId) {
      await gateway.remove([previous.uri]);
      snapshot.trackIds.delete(previous.trackId);
      result.removed.push(previous.trackId);
      log(`[playlist] Removed old release by ${candidate.artist} (track ${previous.trackId})`);
    }

    await gateway.add([trackId]);
    snapshot.trackIds.add(trackId);
    snapshot.representative.set(candidate.artistId, { trackId, uri: trackUri(trackId) });
    addPair(snapshot, candidate.artistId, {
      track: trackName,
      album: normalizeTitle(candidate.name),
    });

    const added: AddedRelease = {
      ...candidate,
      trackId,
      trackName: first.name,
      replaced: previous?.trackId ?? null,
    };
    result.added.push(added);

    if (notified.has(candidate.artistId)) {
      log(
        `[playlist] Added '${candidate.name}' by ${candidate.artist} (already notified for this artist)`
      );
    } else {
      notified.add(candidate.artistId);
      result.notify.push(added);
      log(`[playlist] Added '${candidate.name}' by ${candidate.artist}`);
    }
  }

  return result;
}
