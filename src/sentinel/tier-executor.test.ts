import { describe, expect, it, vi } from "vitest";

import { buildSentinelConfig } from "../core/config.js";

import { RecordingRepair, ScriptedCheck } from "./__tests__/fakes.js";
import { TierExecutor, tier1Policy, tier2Policy } from "./tier-executor.js";

const context = { taskId: "SENTINEL-T1", parentTaskId: "T1" };
const config = buildSentinelConfig();

function clock(startMs = 0): { now: () => number; advance: (ms: number) => void } {
  let current = startMs;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("TierExecutor", () => {
  it("stops after the first check when tests already pass", async () => {
    const check = new ScriptedCheck([true]);
    const repair = new RecordingRepair();

    const result = await new TierExecutor(tier1Policy(config.tier1), { check, repair }).run(context);

    expect(result).toEqual({
      tier: 1,
      attempted: true,
      skipped: false,
      passed: true,
      iterations: 1,
      cost_usd: 0,
      duration_s: result.duration_s,
      stop_reason: "passed",
    });
    expect(check.calls).toBe(1);
    expect(repair.requests).toHaveLength(0);
  });

  it("repairs then re-checks within one iteration", async () => {
    const check = new ScriptedCheck([false, true]);
    const repair = new RecordingRepair();

    const result = await new TierExecutor(tier1Policy(config.tier1), { check, repair }).run(context);

    expect(result.passed).toBe(true);
    expect(result.iterations).toBe(1);
    expect(check.calls).toBe(2);
    expect(repair.requests).toEqual([
      {
        taskId: "SENTINEL-T1",
        parentTaskId: "T1",
        tier: 1,
        iteration: 1,
        failure: { passed: false, exitCode: 1, output: "1 failing", durationMs: 5 },
      },
    ]);
  });

  it("exhausts tier 1 after five iterations", async () => {
    const check = new ScriptedCheck([false]);
    const repair = new RecordingRepair();

    const result = await new TierExecutor(tier1Policy(config.tier1), { check, repair }).run(context);

    expect(result).toMatchObject({ tier: 1, passed: false, iterations: 5, stop_reason: "iteration_cap" });
    expect(repair.requests.map((r) => r.iteration)).toEqual([1, 2, 3, 4, 5]);
    // One initial check plus one re-check per iteration.
    expect(check.calls).toBe(6);
  });

  it("stops tier 2 once the spend reaches the budget", async () => {
    const check = new ScriptedCheck([false]);
    const repair = new RecordingRepair(0.75);

    const result = await new TierExecutor(tier2Policy(config.tier2), { check, repair }).run(context);

    expect(result).toMatchObject({
      tier: 2,
      passed: false,
      iterations: 3,
      cost_usd: 2.25,
      stop_reason: "budget",
    });
  });

  it("checks the deadline between iterations", async () => {
    const time = clock();
    const check = new ScriptedCheck([false]);
    const repair = new RecordingRepair(0, () => time.advance(100_000));

    const result = await new TierExecutor(tier1Policy(config.tier1), {
      check,
      repair,
      now: time.now,
    }).run(context);

    expect(result).toMatchObject({ iterations: 3, stop_reason: "timeout", duration_s: 300 });
  });

  it("lets an in-flight iteration finish past the deadline", async () => {
    const time = clock();
    const check = new ScriptedCheck([false, true]);
    const repair = new RecordingRepair(0, () => time.advance(400_000));

    const result = await new TierExecutor(tier1Policy(config.tier1), {
      check,
      repair,
      now: time.now,
    }).run(context);

    expect(result).toMatchObject({ passed: true, iterations: 1, stop_reason: "passed" });
    expect(check.calls).toBe(2);
  });

  it("ends the tier with an error when the repair agent fails", async () => {
    const check = new ScriptedCheck([false]);
    const repair = new RecordingRepair(0.5, (request) => {
      if (request.iteration === 2) throw new Error("model endpoint returned 500");
    });
    const log = { log: vi.fn() };

    const result = await new TierExecutor(tier2Policy(config.tier2), { check, repair, log }).run(context);

    expect(result).toMatchObject({
      tier: 2,
      attempted: true,
      passed: false,
      iterations: 2,
      cost_usd: 0.5,
      stop_reason: "error",
      error: "model endpoint returned 500",
    });
    expect(check.calls).toBe(2);
    expect(log.log).toHaveBeenLastCalledWith({
      type: "tier.complete",
      taskId: "SENTINEL-T1",
      payload: { ...result },
    });
  });

  it("logs start, iteration, and completion events", async () => {
    const log = { log: vi.fn() };
    const check = new ScriptedCheck([false, true]);

    await new TierExecutor(tier1Policy(config.tier1), {
      check,
      repair: new RecordingRepair(),
      log,
    }).run(context);

    expect(log.log.mock.calls.map(([event]) => event.type)).toEqual([
      "tier.start",
      "tier.iteration",
      "tier.complete",
    ]);
    expect(log.log.mock.calls[1]?.[0]).toEqual({
      type: "tier.iteration",
      taskId: "SENTINEL-T1",
      payload: { tier: 1, iteration: 1, repaired: true, passed: true, exit_code: 0, cost_usd: 0 },
    });
  });
});

describe("TierExecutor.skipped", () => {
  it("returns a frozen unattempted result", () => {
    const result = TierExecutor.skipped(1);

    expect(result).toEqual({
      tier: 1,
      attempted: false,
      skipped: true,
      passed: false,
      iterations: 0,
      cost_usd: 0,
      duration_s: 0,
      stop_reason: "unavailable",
    });
    expect(Object.isFrozen(result)).toBe(true);
  });
});
