import type { ProjectConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { TaskIndex } from "../core/plan.js";
import { StaticDecisionChannel, parseCascadeDecision } from "../sentinel/cascade.js";
import { WaveHaltError } from "../sentinel/errors.js";
import { createSentinel, type SentinelFactoryOptions } from "../sentinel/factory.js";
import { CASCADE_DECISIONS, type CascadeDecisionChannel, type SentinelManifest } from "../sentinel/types.js";

import { ConsoleDecisionIo, PromptDecisionChannel } from "./decision-io.js";

export const WAVE_HALT_EXIT_CODE = 3;

export type RunCommandOptions = {
  decision?: string;
  runId?: string;
  debug?: boolean;
};

export async function runCommand(
  config: ProjectConfig,
  taskId: string,
  opts: RunCommandOptions = {},
  overrides: Omit<SentinelFactoryOptions, "config" | "decisions" | "runId" | "debug"> = {},
): Promise<void> {
  const preset = resolveDecisionOption(opts.decision);
  const consoleIo = config.sentinel.mode === "human-gated" && !preset ? new ConsoleDecisionIo() : undefined;
  const decisions: CascadeDecisionChannel | undefined =
    preset ?? (consoleIo ? new PromptDecisionChannel(consoleIo) : undefined);

  const sentinel = await createSentinel({ ...overrides, config, decisions, runId: opts.runId, debug: opts.debug });
  try {
    const { task } = new TaskIndex(sentinel.plan).require(taskId);
    const outcome = await sentinel.runner.run(task);
    console.log(formatRunOutcome(outcome.manifest));
    console.log(`Audit: ${outcome.manifestDir}`);
  } catch (err) {
    if (!(err instanceof WaveHaltError)) throw err;
    console.log(`Wave halted by ${err.taskId}: ${err.reason}`);
    console.log(`Audit: ${err.manifestDir}`);
    process.exitCode = WAVE_HALT_EXIT_CODE;
  } finally {
    consoleIo?.close();
    sentinel.close();
  }
}

export function resolveDecisionOption(value: string | undefined): StaticDecisionChannel | undefined {
  if (value === undefined) return undefined;

  const decision = parseCascadeDecision(value);
  if (!decision) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Unknown cascade decision.",
      message: `--decision must be one of ${CASCADE_DECISIONS.join(", ")} (got "${value}").`,
    });
  }
  return new StaticDecisionChannel(decision);
}

export function formatRunOutcome(manifest: SentinelManifest): string {
  const tier = manifest.tier_used === 0 ? "no tier" : `tier ${manifest.tier_used}`;
  const violations =
    manifest.violations.length === 0
      ? "no violations"
      : `violations: ${manifest.violations.map((violation) => violation.axis).join(", ")}`;
  return `${manifest.task_id}: ${manifest.result} (${tier}, ${manifest.iterations} iteration(s), $${manifest.cost_usd}; ${violations})`;
}
