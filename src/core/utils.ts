export function isoNow(): string {
  return new Date().toISOString();
}

// Compact UTC timestamp, e.g. 20260301-101500.
export function defaultRunId(): string {
  return isoNow().replace(/[-:]/g, "").replace("T", "-").slice(0, 15);
}

// Four decimal places: enough for per-token pricing without float noise in manifests.
export function roundCurrency(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export function roundSeconds(ms: number): number {
  return Math.round(ms) / 1000;
}
