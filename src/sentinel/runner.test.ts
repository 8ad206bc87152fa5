/**
 * SentinelRunner unit tests.
 * Purpose: verify the state machine, tier escalation, always-write, and halt ordering.
 * Assumptions: VCS, probe, check, and repair are in-memory fakes; manifests go to a temp dir.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { buildSentinelConfig } from "../core/config.js";
import type { ExecutionPlan } from "../core/plan.js";

import {
  FakeVcs,
  InMemoryTaskList,
  RecordingRepair,
  ScriptedCheck,
  StaticProbe,
  diffWithFiles,
  twoWavePlan,
} from "./__tests__/fakes.js";
import { CascadeAnalyzer, StaticDecisionChannel } from "./cascade.js";
import { SentinelBootstrapError, WaveHaltError } from "./errors.js";
import { buildSentinelTask } from "./injector.js";
import { MANIFEST_FILE, ManifestWriter, PATCH_FILE, SUMMARY_FILE } from "./manifest-writer.js";
import { SentinelRunner, type SentinelRunnerDeps } from "./runner.js";
import type { SentinelManifest, SentinelVcs, WorkingTreeDiff } from "./types.js";

// =============================================================================
// HELPERS
// =============================================================================

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "sentinel-runner-"));
  tempDirs.push(dir);
  return dir;
}

function injectedPlan(): ExecutionPlan {
  const plan = twoWavePlan();
  return {
    waves: plan.waves.map((wave) => ({
      ...wave,
      tasks: wave.tasks.flatMap((task) => [task, buildSentinelTask(task)]),
    })),
  };
}

const SENTINEL_T1 = buildSentinelTask({ id: "T1", agent_role: "Builder", dependencies: [], status: "done" });

type Harness = {
  runner: SentinelRunner;
  artifactsDir: string;
  taskList: InMemoryTaskList;
  check: ScriptedCheck;
  tier1: RecordingRepair;
  tier2: RecordingRepair;
  log: { log: ReturnType<typeof vi.fn> };
};

function buildHarness(
  options: {
    available?: boolean;
    checks?: boolean[];
    vcs?: SentinelVcs;
    diff?: WorkingTreeDiff;
    mode?: "auto" | "human-gated";
    decision?: "auto-apply" | "review-and-halt" | "halt";
    enabled?: boolean;
    tier1Fault?: string;
  } = {},
): Harness {
  const artifactsDir = makeTempDir();
  const taskList = new InMemoryTaskList("- [ ] T2: next task\n");
  const check = new ScriptedCheck(options.checks ?? [true]);
  const fault = options.tier1Fault;
  const tier1 = new RecordingRepair(
    0,
    fault === undefined
      ? undefined
      : () => {
          throw new Error(fault);
        },
  );
  const tier2 = new RecordingRepair(0.25);
  const log = { log: vi.fn() };
  const config = buildSentinelConfig({ mode: options.mode ?? "auto", enabled: options.enabled ?? true });

  const deps: SentinelRunnerDeps = {
    config,
    plan: injectedPlan(),
    vcs: options.vcs ?? new FakeVcs(options.diff),
    probe: new StaticProbe(options.available ?? true),
    check,
    repair: { tier1, tier2 },
    cascade: new CascadeAnalyzer({
      mode: config.mode,
      taskList,
      decisions: options.decision ? new StaticDecisionChannel(options.decision) : undefined,
    }),
    writer: new ManifestWriter({ artifactsDir, log }),
    log,
  };

  return { runner: new SentinelRunner(deps), artifactsDir, taskList, check, tier1, tier2, log };
}

function readManifest(dir: string): SentinelManifest {
  return JSON.parse(fs.readFileSync(path.join(dir, MANIFEST_FILE), "utf8"));
}

function auditFiles(artifactsDir: string, taskId: string): string[] {
  return fs.readdirSync(path.join(artifactsDir, taskId)).sort();
}

const TRIPLE = [PATCH_FILE, MANIFEST_FILE, SUMMARY_FILE].sort();

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// TESTS
// =============================================================================

describe("SentinelRunner", () => {
  it("passes on tier 1 without escalating", async () => {
    const h = buildHarness({ checks: [false, true] });

    const outcome = await h.runner.run(SENTINEL_T1);

    expect(outcome.manifest).toMatchObject({
      task_id: "SENTINEL-T1",
      parent_task_id: "T1",
      result: "PASS",
      tier_used: 1,
      iterations: 1,
      cost_usd: 0,
      files_changed: [],
      lines_changed: 0,
      interface_changes: 0,
      violations: [],
      cascade: { action: "none" },
    });
    expect(outcome.manifest.tiers.map((tier) => tier.tier)).toEqual([1]);
    expect(h.tier2.requests).toHaveLength(0);
    expect(outcome.manifestDir).toBe(path.join(h.artifactsDir, "SENTINEL-T1"));
    expect(readManifest(outcome.manifestDir)).toEqual(outcome.manifest);
  });

  it("walks the states in order", async () => {
    const h = buildHarness();

    await h.runner.run(SENTINEL_T1);

    const states = h.log.log.mock.calls
      .map(([event]) => event)
      .filter((event) => event.type === "sentinel.state")
      .map((event) => event.payload.state);
    expect(states).toEqual(["PROBING", "TIER1_RUNNING", "DIFFING", "EVALUATING", "WRITING", "DONE"]);
    expect(h.log.log.mock.calls.every(([event]) => event.taskId === "SENTINEL-T1")).toBe(true);
  });

  it("skips tier 1 when the local tier is unreachable", async () => {
    const h = buildHarness({ available: false, checks: [false, true] });

    const outcome = await h.runner.run(SENTINEL_T1);

    expect(outcome.manifest.tiers).toEqual([
      {
        tier: 1,
        attempted: false,
        skipped: true,
        passed: false,
        iterations: 0,
        cost_usd: 0,
        duration_s: 0,
        stop_reason: "unavailable",
      },
      expect.objectContaining({ tier: 2, attempted: true, passed: true, iterations: 1, cost_usd: 0.25 }),
    ]);
    expect(outcome.manifest).toMatchObject({ result: "PASS", tier_used: 2, iterations: 1, cost_usd: 0.25 });
    expect(h.tier1.requests).toHaveLength(0);
    expect(h.tier2.requests).toHaveLength(1);
  });

  it("escalates to tier 2 after tier 1 exhausts five iterations", async () => {
    const h = buildHarness({ checks: [false, false, false, false, false, false, true] });

    const outcome = await h.runner.run(SENTINEL_T1);

    expect(outcome.manifest.tiers[0]).toMatchObject({
      tier: 1,
      passed: false,
      iterations: 5,
      stop_reason: "iteration_cap",
    });
    expect(outcome.manifest.tiers[1]).toMatchObject({ tier: 2, passed: true, iterations: 1, cost_usd: 0 });
    expect(outcome.manifest).toMatchObject({ result: "PASS", tier_used: 2, iterations: 6 });
    expect(h.tier1.requests).toHaveLength(5);
    expect(h.tier2.requests).toHaveLength(0);
  });

  it("escalates to tier 2 when the tier 1 endpoint fails mid-run", async () => {
    const h = buildHarness({
      checks: [false, false, true],
      tier1Fault: "connect ECONNREFUSED 127.0.0.1:11434",
    });

    const outcome = await h.runner.run(SENTINEL_T1);

    expect(outcome.manifest.tiers.map((tier) => [tier.tier, tier.stop_reason])).toEqual([
      [1, "error"],
      [2, "passed"],
    ]);
    expect(outcome.manifest.tiers[0]).toMatchObject({
      passed: false,
      iterations: 1,
      cost_usd: 0,
      error: "connect ECONNREFUSED 127.0.0.1:11434",
    });
    expect(outcome.manifest).toMatchObject({ result: "PASS", tier_used: 2, iterations: 2, cost_usd: 0.25 });
    expect(outcome.manifest.error).toBeUndefined();
    expect(h.tier1.requests).toHaveLength(1);
    expect(h.tier2.requests).toHaveLength(1);
  });

  it("reports FAIL when both tiers give up", async () => {
    const h = buildHarness({ checks: [false] });

    const outcome = await h.runner.run(SENTINEL_T1);

    expect(outcome.manifest.tiers.map((tier) => [tier.tier, tier.stop_reason])).toEqual([
      [1, "iteration_cap"],
      [2, "budget"],
    ]);
    expect(outcome.manifest).toMatchObject({ result: "FAIL", tier_used: 2, iterations: 13, cost_usd: 2 });
  });

  it("still writes the audit triple when a phase faults", async () => {
    const vcs: SentinelVcs = {
      snapshot: async () => "tree-1",
      diffSince: async () => {
        throw new Error("git write-tree failed");
      },
    };
    const h = buildHarness({ vcs });

    const outcome = await h.runner.run(SENTINEL_T1);

    expect(outcome.manifest.result).toBe("ERROR");
    expect(outcome.manifest.error).toBe("Error: git write-tree failed");
    expect(auditFiles(h.artifactsDir, "SENTINEL-T1")).toEqual(TRIPLE);
    expect(fs.readFileSync(path.join(outcome.manifestDir, PATCH_FILE), "utf8")).toBe("");
    expect(h.log.log).toHaveBeenCalledWith({
      type: "sentinel.fault",
      taskId: "SENTINEL-T1",
      payload: { state: "DIFFING", message: "git write-tree failed" },
    });
  });

  it("annotates pending tasks on violations in auto mode and does not halt", async () => {
    const files = ["a", "b", "c", "d", "e"].map((name) => ({ path: `src/api/${name}.ts`, added: 2 }));
    const h = buildHarness({ diff: diffWithFiles(files) });

    const outcome = await h.runner.run(SENTINEL_T1);

    expect(outcome.manifest.violations).toEqual([
      {
        axis: "files",
        observed: 5,
        budget: 3,
        details: ["src/api/a.ts", "src/api/b.ts", "src/api/c.ts", "src/api/d.ts", "src/api/e.ts"],
      },
    ]);
    expect(outcome.manifest.cascade).toEqual({ action: "annotated" });
    expect(h.taskList.content).toBe(
      "- [ ] T2: next task\n  [SENTINEL CASCADE WARNING] source=SENTINEL-T1\n  - files: observed 5, budget 3\n",
    );
  });

  it("never halts on a human auto-apply", async () => {
    const files = ["a", "b", "c", "d"].map((name) => ({ path: `src/api/${name}.ts`, added: 1 }));
    const h = buildHarness({ diff: diffWithFiles(files), mode: "human-gated", decision: "auto-apply" });

    const outcome = await h.runner.run(SENTINEL_T1);

    expect(outcome.manifest.cascade).toEqual({ action: "annotated", decision: "auto-apply" });
  });

  it.each(["halt", "review-and-halt"] as const)(
    "writes the manifest before raising a wave halt on %s",
    async (decision) => {
      const files = [
        { path: "src/api/a.ts", added: 1 },
        { path: "src/db/schema.ts", added: 3, removed: 1 },
      ];
      const h = buildHarness({ diff: diffWithFiles(files), mode: "human-gated", decision });

      const error = await h.runner.run(SENTINEL_T1).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(WaveHaltError);
      if (!(error instanceof WaveHaltError)) return;
      expect(error.taskId).toBe("SENTINEL-T1");
      expect(error.reason).toBe("cross_wave (observed 1, budget 0)");
      expect(error.violations.map((violation) => violation.axis)).toEqual(["cross_wave"]);
      expect(error.manifestDir).toBe(path.join(h.artifactsDir, "SENTINEL-T1"));

      expect(auditFiles(h.artifactsDir, "SENTINEL-T1")).toEqual(TRIPLE);
      expect(readManifest(error.manifestDir).cascade).toEqual({ action: "halt", decision });
      expect(h.taskList.content).toBe("- [ ] T2: next task\n");

      const types = h.log.log.mock.calls.map(([event]) => event.type);
      expect(types.indexOf("manifest.write")).toBeLessThan(types.indexOf("sentinel.halt"));
      expect(types.slice(-2)).toEqual(["sentinel.state", "sentinel.halt"]);
    },
  );

  it("keeps concurrent runs isolated", async () => {
    const h = buildHarness();
    const sentinelT2 = buildSentinelTask({ id: "T2", agent_role: "Builder", dependencies: [], status: "done" });

    const [first, second] = await Promise.all([h.runner.run(SENTINEL_T1), h.runner.run(sentinelT2)]);

    expect(first.manifestDir).toBe(path.join(h.artifactsDir, "SENTINEL-T1"));
    expect(second.manifestDir).toBe(path.join(h.artifactsDir, "SENTINEL-T2"));
    expect(second.manifest.parent_task_id).toBe("T2");
  });

  it("refuses to run while the sentinel is disabled", async () => {
    const h = buildHarness({ enabled: false });

    await expect(h.runner.run(SENTINEL_T1)).rejects.toBeInstanceOf(SentinelBootstrapError);
    expect(fs.readdirSync(h.artifactsDir)).toEqual([]);
  });
});
