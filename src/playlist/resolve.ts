import { CatalogError } from "../lib/errors";
import { log, warn } from "../lib/logger";
import type { CatalogService, PlaylistInfo } from "../services/types";

export type PlaylistLookup =
  | { kind: "found"; playlist: PlaylistInfo }
  | { kind: "not-found" }
  | { kind: "unreachable"; reason: string };

export type ResolvedPlaylist = {
  playlist: PlaylistInfo;
  source: "configured" | "name" | "created" | "virtual";
};

export type ResolveOptions = {
  playlistId?: string | undefined;
  playlistName: string;
  dryRun?: boolean;
};

const PLAYLIST_DESCRIPTION = "New releases from artists in your library.";

// Statuses that mean "this id is not usable by this account".
const UNREACHABLE_STATUSES = new Set([400, 403, 404]);

export async function lookupPlaylistById(
  catalog: CatalogService,
  playlistId: string
): Promise<PlaylistLookup> {
  try {
    const playlist = await catalog.getPlaylist(playlistId);
    return { kind: "found", playlist };
  } catch (error) {
    if (error instanceof CatalogError && UNREACHABLE_STATUSES.has(error.status)) {
      return { kind: "unreachable", reason: error.message };
    }
    throw error;
  }
}

export async function lookupPlaylistByName(
  catalog: CatalogService,
  name: string
): Promise<PlaylistLookup> {
  for await (const page of catalog.userPlaylists()) {
    const match = page.find((playlist) => playlist.name === name);
    if (match) return { kind: "found", playlist: match };
  }
  return { kind: "not-found" };
}

/**
 * Configured id first, then an exact name match among the listener's
 * playlists, then a new private playlist.
 */
export async function resolvePlaylist(
  catalog: CatalogService,
  options: ResolveOptions
): Promise<ResolvedPlaylist> {
  if (options.playlistId) {
    const byId = await lookupPlaylistById(catalog, options.playlistId);
    if (byId.kind === "found") {
      return { playlist: byId.playlist, source: "configured" };
    }
    if (byId.kind === "unreachable") {
      warn(
        `Configured playlist ${options.playlistId} is not reachable (${byId.reason}); looking it up by name.`
      );
    }
  }

  const byName = await lookupPlaylistByName(catalog, options.playlistName);
  if (byName.kind === "found") {
    return { playlist: byName.playlist, source: "name" };
  }

  if (options.dryRun) {
    log(`[dry-run] Would create playlist '${options.playlistName}'`);
    return {
      playlist: { id: "", name: options.playlistName, url: "" },
      source: "virtual",
    };
  }

  const userId = await catalog.getCurrentUserId();
  const playlist = await catalog.createPlaylist(
    userId,
    options.playlistName,
    PLAYLIST_DESCRIPTION
  );
  log(`[playlist] Created new playlist '${playlist.name}'`);
  return { playlist, source: "created" };
}
