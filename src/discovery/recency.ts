import type { TimeRange } from "../lib/config";
import { log } from "../lib/logger";
import type { CatalogService } from "../services/types";

export type RecencyScores = Map<string, number>;

export type RecencyOptions = {
  timeRange: TimeRange;
  limit: number;
};

/**
 * Ranks the listener's top artists for one period: the first returned
 * gets N-1, the last gets 0, where N is how many came back.
 */
export async function fetchRecencyScores(
  catalog: CatalogService,
  options: RecencyOptions
): Promise<RecencyScores> {
  const artists = await catalog.getTopArtists(options.timeRange, options.limit);
  const scores: RecencyScores = new Map();
  const maxRank = Math.max(0, artists.length - 1);
  artists.forEach((artist, index) => {
    scores.set(artist.id, maxRank - index);
  });
  log(`[recency] ${artists.length} top artists (${options.timeRange})`);
  return scores;
}

export function rankFor(scores: RecencyScores, artistId: string): number {
  return scores.get(artistId) ?? 0;
}
