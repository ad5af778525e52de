import { log } from "../lib/logger";
import type { CatalogService, PlaylistEntry, PlaylistInfo } from "../services/types";

/**
 * Read and mutate one target playlist. `add` takes track ids; `remove`
 * takes item URIs and drops every occurrence of each.
 */
export interface PlaylistGateway {
  readonly playlist: PlaylistInfo;
  entries(): AsyncIterable<PlaylistEntry[]>;
  add(trackIds: string[]): Promise<void>;
  remove(uris: string[]): Promise<void>;
}

export class CatalogPlaylistGateway implements PlaylistGateway {
  constructor(
    private readonly catalog: CatalogService,
    readonly playlist: PlaylistInfo
  ) {}

  entries(): AsyncIterable<PlaylistEntry[]> {
    return this.catalog.playlistEntries(this.playlist.id);
  }

  add(trackIds: string[]): Promise<void> {
    return this.catalog.addTracks(this.playlist.id, trackIds);
  }

  remove(uris: string[]): Promise<void> {
    return this.catalog.removeTracks(this.playlist.id, uris);
  }
}

async function* noEntries(): AsyncIterable<PlaylistEntry[]> {
  // A playlist that does not exist yet has nothing to read.
}

/**
 * Reads through to the catalog (unless the playlist is virtual) and logs
 * mutations instead of performing them.
 */
export class DryRunPlaylistGateway implements PlaylistGateway {
  readonly added: string[] = [];
  readonly removed: string[] = [];

  constructor(
    private readonly catalog: CatalogService,
    readonly playlist: PlaylistInfo,
    private readonly virtual: boolean
  ) {}

  entries(): AsyncIterable<PlaylistEntry[]> {
    if (this.virtual) return noEntries();
    return this.catalog.playlistEntries(this.playlist.id);
  }

  async add(trackIds: string[]): Promise<void> {
    this.added.push(...trackIds);
    log(`[dry-run] Would add ${trackIds.join(", ")} to ${this.playlist.name}`);
  }

  async remove(uris: string[]): Promise<void> {
    this.removed.push(...uris);
    log(`[dry-run] Would remove ${uris.join(", ")} from ${this.playlist.name}`);
  }
}
