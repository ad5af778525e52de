import fs from "fs";
import path from "path";
import yaml from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors";
import { defaultConfigPath, defaultStateDir, expandHome } from "./paths";

export type TrackerConfig = {
  spotify: {
    client_id: string | undefined;
    client_secret: string | undefined;
    refresh_token: string | undefined;
    playlist_id: string | undefined;
    playlist_name: string;
  };
  lastfm: {
    api_key: string | undefined;
    username: string | undefined;
  };
  selfping: {
    api_key: string | undefined;
    endpoint: string;
    to: string | undefined;
  };
  tracking: {
    release_window_days: number;
    retention_days: number;
    liked_threshold: number;
    albums_per_artist: number;
    top_artists_limit: number;
    top_artists_time_range: TimeRange;
    digest_size: number;
  };
  state: {
    artists_path: string;
    releases_path: string;
  };
};

export type TimeRange = "short_term" | "medium_term" | "long_term";

export type CatalogCredentials = {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
};

const positiveInt = z.number().int().positive();

const fileSchema = z
  .object({
    spotify: z
      .object({
        client_id: z.string(),
        client_secret: z.string(),
        refresh_token: z.string(),
        playlist_id: z.string(),
        playlist_name: z.string().min(1),
      })
      .partial(),
    lastfm: z.object({ api_key: z.string(), username: z.string() }).partial(),
    selfping: z
      .object({
        api_key: z.string(),
        endpoint: z.string().url(),
        to: z.string(),
      })
      .partial(),
    tracking: z
      .object({
        release_window_days: positiveInt,
        retention_days: positiveInt,
        liked_threshold: z.number().int().nonnegative(),
        albums_per_artist: z.number().int().min(1).max(50),
        top_artists_limit: z.number().int().min(1).max(50),
        top_artists_time_range: z.enum(["short_term", "medium_term", "long_term"]),
        digest_size: positiveInt,
      })
      .partial(),
    state: z
      .object({ artists_path: z.string(), releases_path: z.string() })
      .partial(),
  })
  .partial();

type FileConfig = z.infer<typeof fileSchema>;

const DEFAULT_TRACKING: TrackerConfig["tracking"] = {
  release_window_days: 7,
  retention_days: 10,
  liked_threshold: 1,
  albums_per_artist: 10,
  top_artists_limit: 50,
  top_artists_time_range: "medium_term",
  digest_size: 5,
};

export const DEFAULT_PLAYLIST_NAME = "Enhanced Releases";
export const DEFAULT_SELFPING_ENDPOINT = "https://www.selfping.com/api/sms";

type Env = Record<string, string | undefined>;

function readConfigFile(configPath: string): FileConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  const raw = fs.readFileSync(configPath, "utf8");
  const parsed: unknown = yaml.parse(raw);
  if (parsed == null) {
    return {};
  }
  const result = fileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join(".") : "(root)";
    throw new ConfigError(
      `Invalid config file ${configPath}: ${where}: ${issue?.message ?? "invalid"}`
    );
  }
  return result.data;
}

function mergeTracking(
  overrides: FileConfig["tracking"]
): TrackerConfig["tracking"] {
  const merged = DEFAULT_TRACKING;
  if (!overrides) return { ...merged };
  return {
    release_window_days:
      overrides.release_window_days ?? merged.release_window_days,
    retention_days: overrides.retention_days ?? merged.retention_days,
    liked_threshold: overrides.liked_threshold ?? merged.liked_threshold,
    albums_per_artist: overrides.albums_per_artist ?? merged.albums_per_artist,
    top_artists_limit: overrides.top_artists_limit ?? merged.top_artists_limit,
    top_artists_time_range:
      overrides.top_artists_time_range ?? merged.top_artists_time_range,
    digest_size: overrides.digest_size ?? merged.digest_size,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): TrackerConfig {
  const configPath = expandHome(
    env.RELEASE_TRACKER_CONFIG_PATH ?? defaultConfigPath()
  );
  const fileConfig = readConfigFile(configPath);

  const stateDir = expandHome(env.RELEASE_TRACKER_STATE_DIR ?? defaultStateDir());

  return {
    spotify: {
      client_id: nonEmpty(env.SPOTIFY_CLIENT_ID ?? fileConfig.spotify?.client_id),
      client_secret: nonEmpty(
        env.SPOTIFY_CLIENT_SECRET ?? fileConfig.spotify?.client_secret
      ),
      refresh_token: nonEmpty(
        env.SPOTIFY_REFRESH_TOKEN ?? fileConfig.spotify?.refresh_token
      ),
      playlist_id: nonEmpty(env.PLAYLIST_ID ?? fileConfig.spotify?.playlist_id),
      playlist_name: fileConfig.spotify?.playlist_name ?? DEFAULT_PLAYLIST_NAME,
    },
    lastfm: {
      api_key: nonEmpty(env.LASTFM_API_KEY ?? fileConfig.lastfm?.api_key),
      username: nonEmpty(env.LASTFM_USERNAME ?? fileConfig.lastfm?.username),
    },
    selfping: {
      api_key: nonEmpty(env.SELFPING_API_KEY ?? fileConfig.selfping?.api_key),
      endpoint: fileConfig.selfping?.endpoint ?? DEFAULT_SELFPING_ENDPOINT,
      to: nonEmpty(env.MY_PHONE_NUMBER ?? fileConfig.selfping?.to),
    },
    tracking: mergeTracking(fileConfig.tracking),
    state: {
      artists_path: expandHome(
        fileConfig.state?.artists_path ?? path.join(stateDir, "artists.json")
      ),
      releases_path: expandHome(
        fileConfig.state?.releases_path ?? path.join(stateDir, "releases.json")
      ),
    },
  };
}

/**
 * Catalog credentials are the one thing a run cannot do without.
 */
export function requireCatalogCredentials(
  config: TrackerConfig
): CatalogCredentials {
  const missing: string[] = [];
  const { client_id, client_secret, refresh_token } = config.spotify;
  if (!client_id) missing.push("SPOTIFY_CLIENT_ID");
  if (!client_secret) missing.push("SPOTIFY_CLIENT_SECRET");
  if (!refresh_token) missing.push("SPOTIFY_REFRESH_TOKEN");
  if (!client_id || !client_secret || !refresh_token) {
    throw new ConfigError(
      `Missing catalog credentials: ${missing.join(", ")}. ` +
        "Set them in the environment or under spotify: in the config file."
    );
  }
  return {
    clientId: client_id,
    clientSecret: client_secret,
    refreshToken: refresh_token,
  };
}
