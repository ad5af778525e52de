import { z } from "zod";
import { errorMessage } from "../lib/errors";
import { warn } from "../lib/logger";

type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}>;

/** Artist name → the listener's play count for that artist. */
export interface PlayCountSource {
  getPlayCount(artistName: string): Promise<number>;
}

export type LastFmClientOptions = {
  apiKey?: string | undefined;
  username?: string | undefined;
  fetchFn?: FetchLike;
  timeoutMs?: number;
};

const LASTFM_BASE_URL = "https://ws.audioscrobbler.com/2.0/";
const DEFAULT_TIMEOUT_MS = 8000;

export const zeroPlayCounts: PlayCountSource = {
  getPlayCount: async () => 0,
};

const artistInfoSchema = z.object({
  artist: z
    .object({
      stats: z
        .object({ userplaycount: z.union([z.string(), z.number()]).optional() })
        .optional(),
    })
    .optional(),
});

function parsePlayCount(payload: unknown): number {
  const parsed = artistInfoSchema.safeParse(payload);
  if (!parsed.success) return 0;
  const raw = parsed.data.artist?.stats?.userplaycount ?? 0;
  const count = typeof raw === "number" ? raw : Number.parseInt(raw, 10);
  return Number.isFinite(count) && count > 0 ? Math.floor(count) : 0;
}

/**
 * Last.fm artist.getInfo lookup scoped to one user.
 * Without credentials every lookup is 0; failed lookups are logged and count as 0.
 */
export function createLastFmClient(options: LastFmClientOptions = {}): PlayCountSource {
  const { apiKey, username } = options;
  if (!apiKey || !username) {
    warn("Last.fm credentials not set; artist play counts default to 0.");
    return zeroPlayCounts;
  }

  const fetchFn = options.fetchFn ?? (fetch as unknown as FetchLike);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  async function getPlayCount(artistName: string): Promise<number> {
    const params = new URLSearchParams({
      method: "artist.getinfo",
      artist: artistName,
      user: username ?? "",
      api_key: apiKey ?? "",
      format: "json",
    });
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetchFn(`${LASTFM_BASE_URL}?${params.toString()}`, {
        signal: controller.signal,
      });
      if (!response.ok) {
        warn(`Last.fm lookup for ${artistName} returned ${response.status}`);
        return 0;
      }
      return parsePlayCount(await response.json());
    } catch (error) {
      warn(`Failed to fetch Last.fm data for ${artistName}: ${errorMessage(error)}`);
      return 0;
    } finally {
      clearTimeout(timeout);
    }
  }

  return { getPlayCount };
}
