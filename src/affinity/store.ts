import fs from "fs";
import path from "path";
import { z } from "zod";
import { errorMessage } from "../lib/errors";
import { log, warn } from "../lib/logger";
import type { PlayCountSource } from "../providers/lastfm";
import type { SavedTrack } from "../services/types";

export type ArtistRecord = {
  name: string;
  liked_count: number;
  recent_artist_plays: number;
};

export type TrackedArtist = ArtistRecord & { id: string };

export type RebuildResult = {
  tracksSeen: number;
  observed: Set<string>;
  added: number;
};

const count = z.number().int().nonnegative();

const snapshotSchema = z.object({
  artists: z.record(
    z.object({
      name: z.string(),
      liked_count: count,
      recent_artist_plays: count.default(0),
    })
  ),
});

/**
 * Durable artist → affinity mapping, persisted as a JSON snapshot.
 * The snapshot is the only state carried between runs.
 */
export class AffinityStore {
  private artists = new Map<string, ArtistRecord>();

  constructor(
    private readonly filePath: string,
    private readonly playCounts: PlayCountSource
  ) {}

  get size(): number {
    return this.artists.size;
  }

  get(artistId: string): ArtistRecord | undefined {
    return this.artists.get(artistId);
  }

  list(): TrackedArtist[] {
    return [...this.artists].map(([id, record]) => ({ id, ...record }));
  }

  /** Artists whose liked count is strictly above the threshold, in stored order. */
  eligible(threshold: number): TrackedArtist[] {
    return this.list().filter((artist) => artist.liked_count > threshold);
  }

  /**
   * Reads the snapshot. Missing or unreadable state starts empty.
   */
  load(): void {
    this.artists = new Map();
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    } catch (error) {
      warn(
        `Could not read artist state ${this.filePath} (${errorMessage(error)}); starting empty.`
      );
      return;
    }

    const result = snapshotSchema.safeParse(parsed);
    if (!result.success) {
      warn(`Artist state ${this.filePath} is malformed; starting empty.`);
      return;
    }
    for (const [id, record] of Object.entries(result.data.artists)) {
      this.artists.set(id, record);
    }
  }

  /**
   * Recounts liked tracks per artist over the whole saved library.
   * New artists get a single play-count lookup; known artists keep theirs.
   */
  async rebuild(pages: AsyncIterable<SavedTrack[]>): Promise<RebuildResult> {
    log("[artists] Scanning saved library...");
    const liked = new Map<string, { name: string; count: number }>();
    let tracksSeen = 0;

    for await (const page of pages) {
      for (const track of page) {
        tracksSeen += 1;
        for (const artist of track.artists) {
          if (!artist.id) continue;
          const entry = liked.get(artist.id);
          if (entry) {
            entry.name = artist.name;
            entry.count += 1;
          } else {
            liked.set(artist.id, { name: artist.name, count: 1 });
          }
        }
      }
    }

    let added = 0;
    for (const [id, info] of liked) {
      const existing = this.artists.get(id);
      if (existing) {
        existing.name = info.name;
        existing.liked_count = info.count;
        continue;
      }
      const plays = await this.playCounts.getPlayCount(info.name);
      this.artists.set(id, {
        name: info.name,
        liked_count: info.count,
        recent_artist_plays: plays,
      });
      added += 1;
    }

    return { tracksSeen, observed: new Set(liked.keys()), added };
  }

  /** Drops artists that no longer appear anywhere in the library. */
  reconcile(observed: Set<string>): string[] {
    const removed: string[] = [];
    for (const id of [...this.artists.keys()]) {
      if (!observed.has(id)) {
        this.artists.delete(id);
        removed.push(id);
      }
    }
    return removed;
  }

  /**
   * Writes to a sibling temp file, then renames it over the snapshot,
   * so an interrupted write leaves the previous snapshot intact.
   */
  save(): void {
    const directory = path.dirname(this.filePath);
    fs.mkdirSync(directory, { recursive: true });

    const artists: Record<string, ArtistRecord> = {};
    for (const [id, record] of this.artists) {
      artists[id] = record;
    }
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify({ artists }, null, 2));
    fs.renameSync(tmpPath, this.filePath);
  }
}
