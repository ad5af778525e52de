import { describe, expect, it, vi } from "vitest";
import { CatalogError } from "../lib/errors";
import { CatalogPlaylistGateway, expireEntries } from "../playlist";
import { SpotifyClient } from "../services/spotify";
import { RefreshTokenProvider, TOKEN_URL } from "../services/spotifyAuth";
import type { SavedTrack } from "../services/types";

type Call = { url: string; init: RequestInit | undefined };

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function fakeFetch(responses: Response[]) {
  const calls: Call[] = [];
  const impl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = responses.shift();
    if (!next) throw new Error(`unexpected request to ${String(input)}`);
    return next;
  };
  return { impl, calls };
}

function bodyOf(call: Call | undefined): unknown {
  return JSON.parse(String(call?.init?.body));
}

const tokens = { getToken: async () => "test-token" };

function client(responses: Response[]) {
  const fake = fakeFetch(responses);
  const sleep = vi.fn(async (_ms: number) => undefined);
  const spotify = new SpotifyClient(tokens, { fetchImpl: fake.impl, retry: { sleep } });
  return { spotify, calls: fake.calls, sleep };
}

describe("SpotifyClient", () => {
  it("retries a rate-limited request after the Retry-After delay", async () => {
    const { spotify, calls, sleep } = client([
      new Response("", { status: 429, headers: { "Retry-After": "2" } }),
      json({ id: "listener" }),
    ]);

    await expect(spotify.getCurrentUserId()).resolves.toBe("listener");
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(calls.map((c) => c.url)).toEqual([
      "https://api.spotify.com/v1/me",
      "https://api.spotify.com/v1/me",
    ]);
    expect(calls[0]?.init?.headers).toEqual({
      Accept: "application/json",
      Authorization: "Bearer test-token",
    });
  });

  it("turns other failures into a CatalogError with the status", async () => {
    const { spotify } = client([json({ error: { status: 404 } }, 404)]);

    const failure = await spotify.getPlaylist("p1").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CatalogError);
    expect(failure).toMatchObject({
      status: 404,
      message: "Spotify API 404 (GET /playlists/p1)",
    });
  });

  it("follows next links through the saved library", async () => {
    const next = "https://api.spotify.com/v1/me/tracks?offset=50&limit=50";
    const { spotify, calls } = client([
      json({
        items: [
          { added_at: "2026-10-01T00:00:00Z", track: { id: "t1", name: "One", artists: [{ id: "a", name: "Ada Vox" }] } },
        ],
        next,
        offset: 0,
        limit: 50,
        total: 3,
      }),
      json({
        items: [
          {
            added_at: "2026-10-02T00:00:00Z",
            track: { id: "t2", name: "Two", artists: [{ id: null, name: "Local" }, { id: "b", name: "Bex" }] },
          },
          { added_at: "2026-10-03T00:00:00Z", track: null },
        ],
        next: null,
        offset: 50,
        limit: 50,
        total: 3,
      }),
    ]);

    const pages: SavedTrack[][] = [];
    for await (const page of spotify.savedTracks()) pages.push(page);

    expect(pages).toEqual([
      [{ id: "t1", name: "One", artists: [{ id: "a", name: "Ada Vox" }] }],
      [{ id: "t2", name: "Two", artists: [{ id: "b", name: "Bex" }] }],
    ]);
    expect(calls.map((c) => c.url)).toEqual(["https://api.spotify.com/v1/me/tracks?limit=50", next]);
  });

  it("asks for albums and singles and maps them to releases", async () => {
    const { spotify, calls } = client([
      json({
        items: [{ id: "alb", name: "Fresh", release_date: "2026-10-15", total_tracks: 12 }],
        next: null,
        offset: 0,
        limit: 10,
        total: 1,
      }),
    ]);

    await expect(spotify.getArtistReleases("a", 10)).resolves.toEqual([
      { id: "alb", name: "Fresh", releaseDate: "2026-10-15", totalTracks: 12 },
    ]);
    expect(calls[0]?.url).toBe(
      "https://api.spotify.com/v1/artists/a/albums?include_groups=album%2Csingle&limit=10"
    );
  });

  it("adds tracks in batches of 100", async () => {
    const ids = Array.from({ length: 150 }, (_, i) => `t${i}`);
    const { spotify, calls } = client([json({ snapshot_id: "s1" }, 201), json({ snapshot_id: "s2" }, 201)]);

    await spotify.addTracks("p1", ids);

    expect(calls).toHaveLength(2);
    expect(calls[0]?.init?.method).toBe("POST");
    expect(calls[0]?.url).toBe("https://api.spotify.com/v1/playlists/p1/tracks");
    expect(bodyOf(calls[0])).toEqual({ uris: ids.slice(0, 100).map((id) => `spotify:track:${id}`) });
    expect(bodyOf(calls[1])).toEqual({ uris: ids.slice(100).map((id) => `spotify:track:${id}`) });
  });

  it("removes items by the URIs it is given", async () => {
    const { spotify, calls } = client([json({ snapshot_id: "s1" })]);

    await spotify.removeTracks("p1", ["spotify:track:x", "spotify:episode:ep1"]);

    expect(calls[0]?.init?.method).toBe("DELETE");
    expect(bodyOf(calls[0])).toEqual({
      tracks: [{ uri: "spotify:track:x" }, { uri: "spotify:episode:ep1" }],
    });
  });

  it("expires old local files and episodes by their own URIs", async () => {
    const { spotify, calls } = client([
      json({
        items: [
          {
            added_at: "2026-01-01T00:00:00Z",
            track: { id: null, name: "Demo", uri: "spotify:local:Artist:Album:Demo:180", artists: [] },
          },
          {
            added_at: "2026-09-10T00:00:00Z",
            track: { id: "ep1", name: "Weekly Show", uri: "spotify:episode:ep1", artists: [] },
          },
          {
            added_at: "2026-10-17T00:00:00Z",
            track: { id: "t1", name: "Fresh", uri: "spotify:track:t1", artists: [{ id: "a", name: "Ada Vox" }] },
          },
        ],
        next: null,
        offset: 0,
        limit: 100,
        total: 3,
      }),
      json({ snapshot_id: "s2" }),
    ]);
    const gateway = new CatalogPlaylistGateway(spotify, { id: "p1", name: "Enhanced Releases", url: "" });

    const removed = await expireEntries(gateway, {
      retentionDays: 10,
      now: new Date("2026-10-18T12:00:00Z"),
    });

    expect(removed).toEqual(["spotify:local:Artist:Album:Demo:180", "spotify:episode:ep1"]);
    expect(calls.map((c) => c.init?.method)).toEqual(["GET", "DELETE"]);
    expect(calls[0]?.url).toBe("https://api.spotify.com/v1/playlists/p1/tracks?limit=100");
    expect(bodyOf(calls[1])).toEqual({
      tracks: [{ uri: "spotify:local:Artist:Album:Demo:180" }, { uri: "spotify:episode:ep1" }],
    });
  });
});

describe("RefreshTokenProvider", () => {
  const credentials = {
    clientId: "test-client",
    clientSecret: "test-secret",
    refreshToken: "test-refresh",
  };

  it("caches the access token until shortly before expiry and adopts a rotated refresh token", async () => {
    let clock = 0;
    const fake = fakeFetch([
      json({ access_token: "access-1", expires_in: 3600, refresh_token: "rotated" }),
      json({ access_token: "access-2", expires_in: 3600 }),
    ]);
    const provider = new RefreshTokenProvider(credentials, fake.impl, () => clock);

    await expect(provider.getToken()).resolves.toBe("access-1");
    clock = 3_000_000;
    await expect(provider.getToken()).resolves.toBe("access-1");
    clock = 3_540_000;
    await expect(provider.getToken()).resolves.toBe("access-2");

    expect(fake.calls.map((c) => c.url)).toEqual([TOKEN_URL, TOKEN_URL]);
    expect(fake.calls[0]?.init?.body).toBe("grant_type=refresh_token&refresh_token=test-refresh");
    expect(fake.calls[1]?.init?.body).toBe("grant_type=refresh_token&refresh_token=rotated");
    expect(fake.calls[0]?.init?.headers).toMatchObject({
      Authorization: `Basic ${Buffer.from("test-client:test-secret").toString("base64")}`,
    });
  });

  it("fails with the service's response when the refresh is rejected", async () => {
    const fake = fakeFetch([new Response("invalid_grant", { status: 400 })]);
    const provider = new RefreshTokenProvider(credentials, fake.impl, () => 0);

    await expect(provider.getToken()).rejects.toThrow(
      "Spotify token refresh failed (400): invalid_grant"
    );
  });
});
