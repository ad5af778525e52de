import { describe, expect, it, vi } from "vitest";
import { createLastFmClient, zeroPlayCounts } from "../providers/lastfm";
import { createSelfPingClient } from "../providers/selfping";

describe("createLastFmClient", () => {
  it("returns zero counts without credentials", () => {
    expect(createLastFmClient({ apiKey: "test-key" })).toBe(zeroPlayCounts);
  });

  it("reads the user's play count for an artist", async () => {
    const fetchFn = vi.fn(async (_input: string) => ({
      ok: true,
      status: 200,
      json: async () => ({ artist: { stats: { userplaycount: "42" } } }),
    }));
    const lastfm = createLastFmClient({ apiKey: "test-key", username: "listener", fetchFn });

    await expect(lastfm.getPlayCount("Ada Vox")).resolves.toBe(42);
    expect(fetchFn.mock.calls[0]?.[0]).toBe(
      "https://ws.audioscrobbler.com/2.0/?method=artist.getinfo&artist=Ada+Vox&user=listener&api_key=test-key&format=json"
    );
  });

  it("counts failed lookups as zero", async () => {
    const notFound = createLastFmClient({
      apiKey: "test-key",
      username: "listener",
      fetchFn: async () => ({ ok: false, status: 404, json: async () => ({}) }),
    });
    const offline = createLastFmClient({
      apiKey: "test-key",
      username: "listener",
      fetchFn: async () => {
        throw new Error("offline");
      },
    });

    await expect(notFound.getPlayCount("Ada Vox")).resolves.toBe(0);
    await expect(offline.getPlayCount("Ada Vox")).resolves.toBe(0);
  });
});

describe("createSelfPingClient", () => {
  const endpoint = "https://sms.example.test/api/sms";

  it("posts the message and reports success on 200", async () => {
    const fetchFn = vi.fn(
      async (_input: string, _init?: { method?: string; headers?: Record<string, string>; body?: string }) => ({
        ok: true,
        status: 200,
        text: async () => "",
      })
    );
    const messenger = createSelfPingClient({ apiKey: "test-key", endpoint, fetchFn });

    await expect(messenger.send("+15550100", "hello")).resolves.toEqual({
      ok: true,
      status: 200,
      detail: "sent",
    });
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe(endpoint);
    expect(init?.method).toBe("POST");
    expect(init?.headers?.Authorization).toBe("Bearer test-key");
    expect(init?.body).toBe(JSON.stringify({ to: "+15550100", message: "hello" }));
  });

  it("reports the status and body of a rejected send", async () => {
    const messenger = createSelfPingClient({
      apiKey: "test-key",
      endpoint,
      fetchFn: async () => ({ ok: false, status: 502, text: async () => "bad gateway" }),
    });

    await expect(messenger.send("+15550100", "hello")).resolves.toEqual({
      ok: false,
      status: 502,
      detail: "bad gateway",
    });
  });

  it("reports transport errors without a status", async () => {
    const messenger = createSelfPingClient({
      apiKey: "test-key",
      endpoint,
      fetchFn: async () => {
        throw new Error("offline");
      },
    });

    await expect(messenger.send("+15550100", "hello")).resolves.toEqual({
      ok: false,
      status: null,
      detail: "offline",
    });
  });

  it("reports thrown non-Error values as text", async () => {
    const messenger = createSelfPingClient({
      apiKey: "test-key",
      endpoint,
      fetchFn: () => Promise.reject("socket closed"),
    });

    await expect(messenger.send("+15550100", "hello")).resolves.toEqual({
      ok: false,
      status: null,
      detail: "socket closed",
    });
  });
});
