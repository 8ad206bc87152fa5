import type { ProjectConfig } from "../core/config.js";
import { createProbe } from "../sentinel/factory.js";

export async function probeCommand(config: ProjectConfig): Promise<boolean> {
  const probe = createProbe(config.sentinel.tier1);
  const available = await probe.isAvailable();
  console.log(`Tier 1 (${config.sentinel.tier1.model}) at ${probe.endpoint}: ${available ? "available" : "unavailable"}`);
  return available;
}
