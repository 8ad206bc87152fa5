import { describe, expect, it, vi } from "vitest";

import { AvailabilityProbe, PROBE_TIMEOUT_MS, joinUrl, type FetchLike } from "./availability-probe.js";

describe("AvailabilityProbe", () => {
  it("reports available on a 2xx response from the health path", async () => {
    const fetch = vi.fn<FetchLike>(async () => ({ ok: true, status: 200 }));
    const probe = new AvailabilityProbe({ baseUrl: "http://127.0.0.1:11434/v1/", fetch });

    await expect(probe.isAvailable()).resolves.toBe(true);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0]?.[0]).toBe("http://127.0.0.1:11434/v1/models");
    expect(fetch.mock.calls[0]?.[1].method).toBe("GET");
    expect(fetch.mock.calls[0]?.[1].signal).toBeInstanceOf(AbortSignal);
  });

  it("cancels the unread response body", async () => {
    const cancel = vi.fn(async () => undefined);
    const probe = new AvailabilityProbe({
      baseUrl: "http://local",
      fetch: async () => ({ ok: true, status: 200, body: { cancel } }),
    });

    await expect(probe.isAvailable()).resolves.toBe(true);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("treats non-2xx responses as unavailable", async () => {
    const probe = new AvailabilityProbe({
      baseUrl: "http://local",
      healthPath: "health",
      fetch: async () => ({ ok: false, status: 503 }),
    });

    await expect(probe.isAvailable()).resolves.toBe(false);
    expect(probe.endpoint).toBe("http://local/health");
  });

  it("treats network errors and aborts as unavailable", async () => {
    const refused = new AvailabilityProbe({
      baseUrl: "http://local",
      fetch: async () => {
        throw new TypeError("fetch failed");
      },
    });
    const aborted = new AvailabilityProbe({
      baseUrl: "http://local",
      fetch: async () => {
        throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
      },
    });

    await expect(refused.isAvailable()).resolves.toBe(false);
    await expect(aborted.isAvailable()).resolves.toBe(false);
  });

  it("probes on every call", async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce({ ok: true, status: 200 })
      .mockResolvedValueOnce({ ok: false, status: 500 });
    const probe = new AvailabilityProbe({ baseUrl: "http://local", fetch });

    expect(await probe.isAvailable()).toBe(true);
    expect(await probe.isAvailable()).toBe(false);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("uses a five second budget", () => {
    expect(PROBE_TIMEOUT_MS).toBe(5000);
    expect(joinUrl("http://a/", "")).toBe("http://a/");
  });
});
