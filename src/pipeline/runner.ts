import { AffinityStore } from "../affinity";
import {
  detectReleases,
  fetchRecencyScores,
  writeReleaseSnapshot,
} from "../discovery";
import type { TrackerConfig } from "../lib/config";
import { log } from "../lib/logger";
import { buildDigest, deliverDigest, type DeliveryStatus } from "../notify";
import {
  CatalogPlaylistGateway,
  DryRunPlaylistGateway,
  expireEntries,
  reconcilePlaylist,
  resolvePlaylist,
  type AddedRelease,
  type PlaylistGateway,
  type ResolvedPlaylist,
} from "../playlist";
import type { PlayCountSource } from "../providers/lastfm";
import type { Messenger } from "../providers/selfping";
import type { CatalogService } from "../services/types";

export type PipelineDeps = {
  config: TrackerConfig;
  catalog: CatalogService;
  playCounts: PlayCountSource;
  messenger: Messenger | null;
  dryRun: boolean;
  now?: () => Date;
};

export type RunSummary = {
  tracksScanned: number;
  artistsTracked: number;
  artistsAdded: number;
  artistsRemoved: number;
  releasesFound: number;
  playlist: ResolvedPlaylist;
  added: AddedRelease[];
  replaced: number;
  expired: number;
  notification: DeliveryStatus;
  digest: string | null;
};

function createGateway(
  catalog: CatalogService,
  resolved: ResolvedPlaylist,
  dryRun: boolean
): PlaylistGateway {
  if (dryRun) {
    return new DryRunPlaylistGateway(
      catalog,
      resolved.playlist,
      resolved.source === "virtual"
    );
  }
  return new CatalogPlaylistGateway(catalog, resolved.playlist);
}

/**
 * One full batch run: refresh affinity, detect and rank releases,
 * reconcile the playlist, expire old entries, notify.
 * Dry runs read everything but write no files and mutate nothing remote.
 */
export async function runPipeline(deps: PipelineDeps): Promise<RunSummary> {
  const { config, catalog, dryRun } = deps;
  const now = deps.now ?? (() => new Date());
  const tracking = config.tracking;

  // 1. Affinity
  const store = new AffinityStore(config.state.artists_path, deps.playCounts);
  store.load();
  const rebuild = await store.rebuild(catalog.savedTracks());
  const removed = store.reconcile(rebuild.observed);
  log(
    `[artists] Scanned ${rebuild.tracksSeen} saved tracks. New artists: ${rebuild.added}. Removed: ${removed.length}`
  );
  if (!dryRun) store.save();

  // 2. Recency + detection
  const recency = await fetchRecencyScores(catalog, {
    timeRange: tracking.top_artists_time_range,
    limit: tracking.top_artists_limit,
  });
  const candidates = await detectReleases(
    catalog,
    store.eligible(tracking.liked_threshold),
    recency,
    {
      likedThreshold: tracking.liked_threshold,
      windowDays: tracking.release_window_days,
      releasesPerArtist: tracking.albums_per_artist,
      now: now(),
    }
  );
  if (!dryRun) writeReleaseSnapshot(config.state.releases_path, candidates);

  // 3. Playlist
  const resolved = await resolvePlaylist(catalog, {
    playlistId: config.spotify.playlist_id,
    playlistName: config.spotify.playlist_name,
    dryRun,
  });
  const gateway = createGateway(catalog, resolved, dryRun);
  const reconciled = await reconcilePlaylist(gateway, catalog, candidates);
  const expired = await expireEntries(gateway, {
    retentionDays: tracking.retention_days,
    now: now(),
  });

  // 4. Notify
  const digest = buildDigest(reconciled.notify, resolved.playlist.url, {
    limit: tracking.digest_size,
    date: now(),
  });
  const notification = await deliverDigest(digest, {
    messenger: deps.messenger,
    to: config.selfping.to,
    dryRun,
  });

  return {
    tracksScanned: rebuild.tracksSeen,
    artistsTracked: store.size,
    artistsAdded: rebuild.added,
    artistsRemoved: removed.length,
    releasesFound: candidates.length,
    playlist: resolved,
    added: reconciled.added,
    replaced: reconciled.removed.length,
    expired: expired.length,
    notification,
    digest,
  };
}

export function formatRunSummary(summary: RunSummary, dryRun: boolean): string {
  const lines = [
    `  OK Library: ${summary.tracksScanned} saved tracks, ${summary.artistsTracked} artists tracked (+${summary.artistsAdded}, -${summary.artistsRemoved})`,
    `  OK Releases: ${summary.releasesFound} in window`,
    `  OK Playlist '${summary.playlist.playlist.name}' (${summary.playlist.source}): ${summary.added.length} added, ${summary.replaced} replaced, ${summary.expired} expired`,
    `  OK Notification: ${summary.notification}`,
  ];
  if (dryRun) {
    lines.push("Dry run: no data written.");
  }
  return lines.join("\n");
}
