import type { TimeRange } from "../lib/config";

export interface ArtistRef {
  id: string;
  name: string;
}

export interface SavedTrack {
  id: string | null;
  name: string;
  artists: ArtistRef[];
}

export interface Release {
  id: string;
  name: string;
  releaseDate: string;
  totalTracks: number;
}

export interface ReleaseTrack {
  id: string | null;
  name: string;
}

export interface PlaylistInfo {
  id: string;
  name: string;
  url: string;
}

export interface PlaylistEntry {
  /** Null for local files. */
  trackId: string | null;
  /** The item's own URI (track, episode or local file); removals go by this. */
  uri: string | null;
  trackName: string;
  albumName: string;
  artistIds: string[];
  /** ISO timestamp; null for entries the service has no date for. */
  addedAt: string | null;
}

/**
 * Everything the tracker needs from the music catalog.
 * Paginated listings are exposed as async iterables of pages.
 */
export interface CatalogService {
  getCurrentUserId(): Promise<string>;
  savedTracks(): AsyncIterable<SavedTrack[]>;
  getTopArtists(timeRange: TimeRange, limit: number): Promise<ArtistRef[]>;
  getArtistReleases(artistId: string, limit: number): Promise<Release[]>;
  getReleaseTracks(releaseId: string, limit?: number): Promise<ReleaseTrack[]>;
  getPlaylist(playlistId: string): Promise<PlaylistInfo>;
  userPlaylists(): AsyncIterable<PlaylistInfo[]>;
  createPlaylist(
    userId: string,
    name: string,
    description?: string
  ): Promise<PlaylistInfo>;
  playlistEntries(playlistId: string): AsyncIterable<PlaylistEntry[]>;
  addTracks(playlistId: string, trackIds: string[]): Promise<void>;
  /** Drops every occurrence of each item. */
  removeTracks(playlistId: string, uris: string[]): Promise<void>;
}
