import { describe, expect, it, vi } from "vitest";
import { CatalogError } from "../lib/errors";
import { withRetry } from "../lib/retry";

describe("withRetry", () => {
  it("waits the Retry-After delay, then returns the next attempt's result", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new CatalogError("rate limited", 429, 2))
      .mockResolvedValueOnce("page-2");

    await expect(withRetry(fn, { sleep })).resolves.toBe("page-2");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("falls back to five seconds when no Retry-After was sent", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new CatalogError("rate limited", 429))
      .mockResolvedValueOnce(7);

    await expect(withRetry(fn, { sleep })).resolves.toBe(7);
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it("keeps retrying for as long as the service answers 429", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi.fn<() => Promise<string>>();
    for (let i = 0; i < 6; i++) {
      fn.mockRejectedValueOnce(new CatalogError("rate limited", 429, 1));
    }
    fn.mockResolvedValueOnce("done");

    await expect(withRetry(fn, { sleep })).resolves.toBe("done");
    expect(sleep).toHaveBeenCalledTimes(6);
  });

  it("rethrows other errors without waiting", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const failure = new CatalogError("Spotify API 500 (GET /me)", 500);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(fn, { sleep })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("gives up after maxRetries when a bound is set", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const limited = new CatalogError("rate limited", 429, 1);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(limited);

    await expect(withRetry(fn, { sleep, maxRetries: 2 })).rejects.toBe(limited);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});
