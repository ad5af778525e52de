import { CatalogError } from "../lib/errors";
import type { TimeRange } from "../lib/config";
import { withRetry, type RetryOptions } from "../lib/retry";
import type { TokenProvider } from "./spotifyAuth";
import type {
  SpotifyAlbumSimple,
  SpotifyPaging,
  SpotifyPlaylist,
  SpotifyPlaylistTrack,
  SpotifySavedTrack,
  SpotifyTrackObject,
  SpotifyUser,
} from "./spotifyTypes";
import type {
  ArtistRef,
  CatalogService,
  PlaylistEntry,
  PlaylistInfo,
  Release,
  ReleaseTrack,
  SavedTrack,
} from "./types";

export const API_BASE = "https://api.spotify.com/v1";

const SAVED_TRACKS_PAGE = 50;
const PLAYLISTS_PAGE = 50;
const PLAYLIST_ITEMS_PAGE = 100;
const PLAYLIST_ITEMS_BATCH = 100; // API max per request
const REQUEST_TIMEOUT_MS = 15000;

type Query = Record<string, string | number>;

type RequestOptions = {
  query?: Query;
  body?: unknown;
};

export type SpotifyClientOptions = {
  fetchImpl?: typeof fetch;
  baseUrl?: string;
  retry?: RetryOptions;
};

export function normalizeBaseUrl(input: string): string {
  return input.replace(/\/+$/, "");
}

export function trackUri(trackId: string): string {
  return `spotify:track:${trackId}`;
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number.parseInt(value, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function mapArtists(track: SpotifyTrackObject): ArtistRef[] {
  const artists: ArtistRef[] = [];
  for (const artist of track.artists ?? []) {
    if (artist.id) artists.push({ id: artist.id, name: artist.name });
  }
  return artists;
}

function mapPlaylist(playlist: SpotifyPlaylist): PlaylistInfo {
  return {
    id: playlist.id,
    name: playlist.name,
    url: playlist.external_urls?.spotify ?? "",
  };
}

function mapPlaylistEntry(item: SpotifyPlaylistTrack): PlaylistEntry | null {
  const track = item.track;
  if (!track) return null;
  return {
    trackId: track.id,
    uri: track.uri ?? (track.id ? trackUri(track.id) : null),
    trackName: track.name ?? "",
    albumName: track.album?.name ?? "",
    artistIds: mapArtists(track).map((artist) => artist.id),
    addedAt: item.added_at ?? null,
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Spotify Web API client. Every request goes through the rate-limit
 * retry wrapper; any other non-2xx response becomes a CatalogError.
 */
export class SpotifyClient implements CatalogService {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly retry: RetryOptions;

  constructor(
    private readonly tokens: TokenProvider,
    options: SpotifyClientOptions = {}
  ) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? API_BASE);
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retry = options.retry ?? {};
  }

  async getCurrentUserId(): Promise<string> {
    const user = await this.request<SpotifyUser>("GET", "/me");
    return user.id;
  }

  async *savedTracks(): AsyncIterable<SavedTrack[]> {
    for await (const items of this.paginate<SpotifySavedTrack>("/me/tracks", {
      limit: SAVED_TRACKS_PAGE,
    })) {
      const page: SavedTrack[] = [];
      for (const item of items) {
        if (!item.track) continue;
        page.push({
          id: item.track.id,
          name: item.track.name,
          artists: mapArtists(item.track),
        });
      }
      yield page;
    }
  }

  async getTopArtists(timeRange: TimeRange, limit: number): Promise<ArtistRef[]> {
    const data = await this.request<SpotifyPaging<{ id: string; name: string }>>(
      "GET",
      "/me/top/artists",
      { query: { limit, time_range: timeRange } }
    );
    return data.items.map((artist) => ({ id: artist.id, name: artist.name }));
  }

  async getArtistReleases(artistId: string, limit: number): Promise<Release[]> {
    const data = await this.request<SpotifyPaging<SpotifyAlbumSimple>>(
      "GET",
      `/artists/${encodeURIComponent(artistId)}/albums`,
      { query: { include_groups: "album,single", limit } }
    );
    return data.items.map((album) => ({
      id: album.id,
      name: album.name,
      releaseDate: album.release_date ?? "",
      totalTracks: album.total_tracks ?? 0,
    }));
  }

  async getReleaseTracks(releaseId: string, limit = 1): Promise<ReleaseTrack[]> {
    const data = await this.request<SpotifyPaging<SpotifyTrackObject>>(
      "GET",
      `/albums/${encodeURIComponent(releaseId)}/tracks`,
      { query: { limit } }
    );
    return data.items.map((track) => ({ id: track.id, name: track.name ?? "" }));
  }

  async getPlaylist(playlistId: string): Promise<PlaylistInfo> {
    const playlist = await this.request<SpotifyPlaylist>(
      "GET",
      `/playlists/${encodeURIComponent(playlistId)}`,
      { query: { fields: "id,name,external_urls" } }
    );
    return mapPlaylist(playlist);
  }

  async *userPlaylists(): AsyncIterable<PlaylistInfo[]> {
    for await (const items of this.paginate<SpotifyPlaylist>("/me/playlists", {
      limit: PLAYLISTS_PAGE,
    })) {
      yield items.map(mapPlaylist);
    }
  }

  async createPlaylist(
    userId: string,
    name: string,
    description?: string
  ): Promise<PlaylistInfo> {
    const playlist = await this.request<SpotifyPlaylist>(
      "POST",
      `/users/${encodeURIComponent(userId)}/playlists`,
      { body: { name, public: false, description: description ?? "" } }
    );
    return mapPlaylist(playlist);
  }

  async *playlistEntries(playlistId: string): AsyncIterable<PlaylistEntry[]> {
    for await (const items of this.paginate<SpotifyPlaylistTrack>(
      `/playlists/${encodeURIComponent(playlistId)}/tracks`,
      { limit: PLAYLIST_ITEMS_PAGE }
    )) {
      const page: PlaylistEntry[] = [];
      for (const item of items) {
        const entry = mapPlaylistEntry(item);
        if (entry) page.push(entry);
      }
      yield page;
    }
  }

  async addTracks(playlistId: string, trackIds: string[]): Promise<void> {
    for (const batch of chunk(trackIds, PLAYLIST_ITEMS_BATCH)) {
      await this.mutate("POST", `/playlists/${encodeURIComponent(playlistId)}/tracks`, {
        body: { uris: batch.map(trackUri) },
      });
    }
  }

  async removeTracks(playlistId: string, uris: string[]): Promise<void> {
    for (const batch of chunk(uris, PLAYLIST_ITEMS_BATCH)) {
      await this.mutate(
        "DELETE",
        `/playlists/${encodeURIComponent(playlistId)}/tracks`,
        { body: { tracks: batch.map((uri) => ({ uri })) } }
      );
    }
  }

  // --- HTTP ---

  private async *paginate<T>(path: string, query: Query): AsyncIterable<T[]> {
    let page = await this.request<SpotifyPaging<T>>("GET", path, { query });
    while (true) {
      yield page.items ?? [];
      if (!page.next || (page.items ?? []).length === 0) break;
      page = await this.request<SpotifyPaging<T>>("GET", page.next);
    }
  }

  private buildUrl(pathOrUrl: string, query?: Query): string {
    const url = new URL(
      pathOrUrl.startsWith("http") ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`
    );
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async request<T>(
    method: string,
    pathOrUrl: string,
    options: RequestOptions = {}
  ): Promise<T> {
    const response = await this.call(method, pathOrUrl, options);
    return (await response.json()) as T;
  }

  private async mutate(
    method: string,
    pathOrUrl: string,
    options: RequestOptions
  ): Promise<void> {
    await this.call(method, pathOrUrl, options);
  }

  private call(
    method: string,
    pathOrUrl: string,
    options: RequestOptions
  ): Promise<Response> {
    const label = `${method} ${pathOrUrl.replace(this.baseUrl, "")}`;
    return withRetry(() => this.send(method, pathOrUrl, options), {
      ...this.retry,
      label,
    });
  }

  private async send(
    method: string,
    pathOrUrl: string,
    options: RequestOptions
  ): Promise<Response> {
    const token = await this.tokens.getToken();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
    try {
      const headers: Record<string, string> = {
        Accept: "application/json",
        Authorization: `Bearer ${token}`,
      };
      if (options.body !== undefined) {
        headers["Content-Type"] = "application/json";
      }
      const response = await this.fetchImpl(this.buildUrl(pathOrUrl, options.query), {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });

      if (response.status === 429) {
        throw new CatalogError(
          `Spotify rate limit (${method} ${pathOrUrl})`,
          429,
          parseRetryAfter(response.headers.get("retry-after"))
        );
      }
      if (!response.ok) {
        throw new CatalogError(
          `Spotify API ${response.status} (${method} ${pathOrUrl})`,
          response.status
        );
      }
      return response;
    } finally {
      clearTimeout(timeout);
    }
  }
}
