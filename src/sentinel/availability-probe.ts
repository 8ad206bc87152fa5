import type { LivenessProbe } from "./types.js";

export const PROBE_TIMEOUT_MS = 5_000;

export type ProbeResponse = {
  ok: boolean;
  status: number;
  body?: { cancel(): Promise<void> } | null;
};

export type FetchLike = (url: string, init: { method: string; signal: AbortSignal }) => Promise<ProbeResponse>;

export type AvailabilityProbeOptions = {
  baseUrl: string;
  healthPath?: string;
  fetch?: FetchLike;
};

// Liveness of the local model tier. Every failure mode means "unavailable"; results are never cached.
export class AvailabilityProbe implements LivenessProbe {
  private readonly url: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: AvailabilityProbeOptions) {
    this.url = joinUrl(options.baseUrl, options.healthPath ?? "/models");
    this.fetchImpl = options.fetch ?? defaultFetch;
  }

  get endpoint(): string {
    return this.url;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(this.url, {
        method: "GET",
        signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
      });
      // Only the status matters; release the connection instead of leaving the body unread.
      await res.body?.cancel();
      return res.ok;
    } catch {
      // Network, DNS, and abort errors all read as an unreachable tier.
      return false;
    }
  }
}

export function joinUrl(baseUrl: string, suffix: string): string {
  if (suffix.length === 0) return baseUrl;
  const base = baseUrl.replace(/\/+$/, "");
  const tail = suffix.startsWith("/") ? suffix : `/${suffix}`;
  return `${base}${tail}`;
}

const defaultFetch: FetchLike = (url, init) => fetch(url, init);
