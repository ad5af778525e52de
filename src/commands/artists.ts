import { Command } from "commander";
import { AffinityStore, type TrackedArtist } from "../affinity";
import { loadConfig } from "../lib/config";
import { zeroPlayCounts } from "../providers/lastfm";

type ArtistsOptions = {
  limit?: number;
  minLiked?: number;
  format?: string;
};

type ArtistsFormat = "text" | "json";

function normalizeFormat(value: string | undefined): ArtistsFormat {
  const normalized = (value ?? "text").toLowerCase();
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new Error("Unsupported format. Use text or json.");
}

function normalizeLimit(value: number | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return 50;
  }
  return Math.floor(value);
}

export function normalizeMinLiked(value: number | undefined): number {
  if (value === undefined) return 0;
  if (!Number.isFinite(value) || value < 0) {
    throw new Error("--min-liked must be a non-negative number.");
  }
  return Math.floor(value);
}

export function rankArtists(
  artists: TrackedArtist[],
  minLiked: number
): TrackedArtist[] {
  return artists
    .filter((artist) => artist.liked_count >= minLiked)
    .sort(
      (a, b) =>
        b.liked_count - a.liked_count ||
        b.recent_artist_plays - a.recent_artist_plays ||
        a.name.localeCompare(b.name)
    );
}

export function formatArtistsAsText(artists: TrackedArtist[], total: number): string {
  if (artists.length === 0) {
    return "No tracked artists found.";
  }
  const lines = artists.map(
    (artist) =>
      `${artist.name} — ${artist.liked_count} liked, ${artist.recent_artist_plays} plays`
  );
  lines.push(`\n${artists.length} of ${total} artists shown.`);
  return lines.join("\n");
}

export function runArtists(options: ArtistsOptions): void {
  const format = normalizeFormat(options.format);
  const limit = normalizeLimit(options.limit);
  const minLiked = normalizeMinLiked(options.minLiked);
  const config = loadConfig();

  const store = new AffinityStore(config.state.artists_path, zeroPlayCounts);
  store.load();
  const artists = rankArtists(store.list(), minLiked).slice(0, limit);

  if (format === "json") {
    console.log(JSON.stringify(artists, null, 2));
    return;
  }
  console.log(formatArtistsAsText(artists, store.size));
}

export function registerArtistsCommand(program: Command): void {
  program
    .command("artists")
    .description("List tracked artists and their affinity signals")
    .option("--limit <count>", "Max results (default: 50)", (v) => Number.parseInt(v, 10))
    .option("--min-liked <count>", "Only artists with at least this many liked tracks", (v) =>
      Number.parseInt(v, 10)
    )
    .option("--format <format>", "Output format (text|json)", "text")
    .action((options: ArtistsOptions) => runArtists(options));
}
