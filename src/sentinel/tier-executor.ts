/*
Purpose: one bounded check/repair cycle for a model tier.
Assumptions: stop conditions are only evaluated between iterations; an in-flight iteration completes.
A repair fault ends the tier with stop_reason "error" and keeps the spend so far.
Usage: await new TierExecutor(policy, { check, repair }).run({ taskId, parentTaskId })
*/

import type { CloudTierConfig, LocalTierConfig } from "../core/config.js";
import type { EventLogger } from "../core/logger.js";
import { roundCurrency, roundSeconds } from "../core/utils.js";

import type {
  CheckResult,
  RepairAgent,
  TierNumber,
  TierPolicy,
  TierResult,
  TierStopReason,
  ValidationCheck,
} from "./types.js";

export type TierExecutorDeps = {
  check: ValidationCheck;
  repair: RepairAgent;
  now?: () => number;
  log?: EventLogger;
};

export type TierRunContext = {
  taskId: string;
  parentTaskId: string;
};

export function tier1Policy(config: LocalTierConfig): TierPolicy {
  return { tier: 1, maxIterations: config.max_iterations, timeoutSeconds: config.timeout_seconds };
}

export function tier2Policy(config: CloudTierConfig): TierPolicy {
  return {
    tier: 2,
    maxIterations: config.max_iterations,
    timeoutSeconds: config.timeout_seconds,
    budgetUsd: config.budget_usd,
  };
}

export class TierExecutor {
  private readonly now: () => number;

  constructor(
    private readonly policy: TierPolicy,
    private readonly deps: TierExecutorDeps,
  ) {
    this.now = deps.now ?? Date.now;
  }

  static skipped(tier: TierNumber): TierResult {
    return freezeResult({
      tier,
      attempted: false,
      skipped: true,
      passed: false,
      iterations: 0,
      cost_usd: 0,
      duration_s: 0,
      stop_reason: "unavailable",
    });
  }

  async run(context: TierRunContext): Promise<TierResult> {
    const { tier, maxIterations, timeoutSeconds, budgetUsd } = this.policy;
    const startedAt = this.now();
    const deadline = startedAt + timeoutSeconds * 1000;

    let iterations = 0;
    let costUsd = 0;
    let lastCheck: CheckResult | undefined;
    let stopReason: TierStopReason;
    let faultMessage: string | undefined;

    this.deps.log?.log({
      type: "tier.start",
      taskId: context.taskId,
      payload: { tier, max_iterations: maxIterations, timeout_seconds: timeoutSeconds },
    });

    for (;;) {
      if (lastCheck?.passed) {
        stopReason = "passed";
        break;
      }
      if (iterations >= maxIterations) {
        stopReason = "iteration_cap";
        break;
      }
      if (this.now() >= deadline) {
        stopReason = "timeout";
        break;
      }
      if (budgetUsd !== undefined && costUsd >= budgetUsd) {
        stopReason = "budget";
        break;
      }

      iterations += 1;
      const check = lastCheck ?? (await this.deps.check.run());
      if (check.passed) {
        lastCheck = check;
        this.logIteration(context, iterations, check, costUsd, false);
        continue;
      }

      try {
        const repair = await this.deps.repair.repair({
          taskId: context.taskId,
          parentTaskId: context.parentTaskId,
          tier,
          iteration: iterations,
          failure: check,
        });
        costUsd += repair.costUsd;
      } catch (err) {
        // A broken model endpoint ends this tier only; the runner escalates.
        faultMessage = err instanceof Error ? err.message : String(err);
        stopReason = "error";
        break;
      }

      lastCheck = await this.deps.check.run();
      this.logIteration(context, iterations, lastCheck, costUsd, true);
    }

    const result = freezeResult({
      tier,
      attempted: true,
      skipped: false,
      passed: stopReason === "passed",
      iterations,
      cost_usd: roundCurrency(costUsd),
      duration_s: roundSeconds(this.now() - startedAt),
      stop_reason: stopReason,
      ...(faultMessage === undefined ? {} : { error: faultMessage }),
    });

    this.deps.log?.log({ type: "tier.complete", taskId: context.taskId, payload: { ...result } });
    return result;
  }

  private logIteration(
    context: TierRunContext,
    iteration: number,
    check: CheckResult,
    costUsd: number,
    repaired: boolean,
  ): void {
    this.deps.log?.log({
      type: "tier.iteration",
      taskId: context.taskId,
      payload: {
        tier: this.policy.tier,
        iteration,
        repaired,
        passed: check.passed,
        exit_code: check.exitCode,
        cost_usd: roundCurrency(costUsd),
      },
    });
  }
}

function freezeResult(result: TierResult): TierResult {
  return Object.freeze({ ...result });
}
