import { log } from "../lib/logger";
import type { PlaylistEntry } from "../services/types";
import type { PlaylistGateway } from "./gateway";

const DAY_MS = 24 * 60 * 60 * 1000;
const REMOVE_BATCH = 100;

export type ExpiryOptions = {
  retentionDays: number;
  now: Date;
};

export function isExpired(
  entry: PlaylistEntry,
  options: ExpiryOptions
): boolean {
  if (!entry.addedAt) return false;
  const addedMs = Date.parse(entry.addedAt);
  if (Number.isNaN(addedMs)) return false;
  return options.now.getTime() - addedMs > options.retentionDays * DAY_MS;
}

/**
 * Removes every item whose occurrences are all older than the retention
 * window. Removal is by URI and drops every occurrence, so an item that
 * also has a recent occurrence stays. Entries are collected first so
 * removals cannot shift the pages still being read.
 */
export async function expireEntries(
  gateway: PlaylistGateway,
  options: ExpiryOptions
): Promise<string[]> {
  const expired = new Set<string>();
  const current = new Set<string>();
  for await (const page of gateway.entries()) {
    for (const entry of page) {
      if (!entry.uri) continue;
      if (isExpired(entry, options)) {
        expired.add(entry.uri);
      } else {
        current.add(entry.uri);
      }
    }
  }

  const uris = [...expired].filter((uri) => !current.has(uri));
  for (let i = 0; i < uris.length; i += REMOVE_BATCH) {
    await gateway.remove(uris.slice(i, i + REMOVE_BATCH));
  }

  if (uris.length > 0) {
    log(`[playlist] Removed ${uris.length} items older than ${options.retentionDays} days`);
  } else {
    log("[playlist] No old tracks to remove");
  }
  return uris;
}
