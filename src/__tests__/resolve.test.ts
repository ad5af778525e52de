import { describe, expect, it } from "vitest";
import { CatalogError } from "../lib/errors";
import { lookupPlaylistById, resolvePlaylist } from "../playlist";
import { FakeCatalog } from "./fakeCatalog";

const name = "Enhanced Releases";

function playlistNamed(id: string, playlistName: string) {
  return { id, name: playlistName, url: `https://open.spotify.com/playlist/${id}` };
}

describe("resolvePlaylist", () => {
  it("uses the configured playlist when it is reachable", async () => {
    const catalog = new FakeCatalog();
    catalog.addPlaylist(playlistNamed("cfg", "Anything"));

    const resolved = await resolvePlaylist(catalog, { playlistId: "cfg", playlistName: name });

    expect(resolved).toEqual({ playlist: playlistNamed("cfg", "Anything"), source: "configured" });
  });

  it("falls back to a name match when the configured id is unreachable", async () => {
    const catalog = new FakeCatalog();
    catalog.addPlaylist(playlistNamed("p1", "Chill"));
    catalog.addPlaylist(playlistNamed("p2", "Workout"));
    catalog.addPlaylist(playlistNamed("p3", name));

    const resolved = await resolvePlaylist(catalog, { playlistId: "gone", playlistName: name });

    expect(resolved).toEqual({ playlist: playlistNamed("p3", name), source: "name" });
    expect(catalog.created).toEqual([]);
  });

  it("creates the playlist when nothing matches", async () => {
    const catalog = new FakeCatalog();
    catalog.addPlaylist(playlistNamed("p1", "enhanced releases"));

    const resolved = await resolvePlaylist(catalog, { playlistName: name });

    expect(resolved.source).toBe("created");
    expect(resolved.playlist.id).toBe("created-1");
    expect(catalog.created).toEqual([name]);
  });

  it("returns a virtual playlist instead of creating one in dry-run mode", async () => {
    const catalog = new FakeCatalog();

    const resolved = await resolvePlaylist(catalog, { playlistName: name, dryRun: true });

    expect(resolved).toEqual({ playlist: { id: "", name, url: "" }, source: "virtual" });
    expect(catalog.created).toEqual([]);
  });
});

describe("lookupPlaylistById", () => {
  it("propagates errors that do not mean the playlist is unusable", async () => {
    const catalog = new FakeCatalog();
    const failure = new CatalogError("Spotify API 500 (GET /playlists/p1)", 500);
    catalog.getPlaylist = async () => {
      throw failure;
    };

    await expect(lookupPlaylistById(catalog, "p1")).rejects.toBe(failure);
  });

  it("reports forbidden playlists as unreachable", async () => {
    const catalog = new FakeCatalog();
    catalog.getPlaylist = async () => {
      throw new CatalogError("Spotify API 403 (GET /playlists/p1)", 403);
    };

    await expect(lookupPlaylistById(catalog, "p1")).resolves.toEqual({
      kind: "unreachable",
      reason: "Spotify API 403 (GET /playlists/p1)",
    });
  });
});
