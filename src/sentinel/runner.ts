/*
Purpose: drive one Sentinel task through probe, tiered repair, diff, change radius, cascade, and audit write.
Assumptions: every run() owns its context; the runner itself holds only read-only collaborators,
so runs for different tasks may overlap.
Usage: const outcome = await runner.run(sentinelTask)  // throws WaveHaltError after WRITING on halt
*/

import type { SentinelConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { TaskIndex, type ExecutionPlan, type Task, type TaskIndexEntry } from "../core/plan.js";
import { withTaskId, type EventLogger } from "../core/logger.js";
import { roundCurrency } from "../core/utils.js";

import type { CascadeAnalyzer } from "./cascade.js";
import { countChangedLines, evaluateChangeRadius, radiusBudgetsFromConfig } from "./change-radius.js";
import { SentinelBootstrapError, WaveHaltError, formatViolations } from "./errors.js";
import { computeInterfaceReport, countInterfaceChanges } from "./interface-diff.js";
import type { ManifestWriter } from "./manifest-writer.js";
import { TierExecutor, tier1Policy, tier2Policy } from "./tier-executor.js";
import type {
  CascadeOutcome,
  ChangeRadiusViolation,
  InterfaceReport,
  LivenessProbe,
  RepairAgent,
  SentinelManifest,
  SentinelRunOutcome,
  SentinelState,
  SentinelVcs,
  TierResult,
  ValidationCheck,
  WorkingTreeDiff,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type SentinelRunnerDeps = {
  config: SentinelConfig;
  plan: ExecutionPlan;
  vcs: SentinelVcs;
  probe: LivenessProbe;
  check: ValidationCheck;
  repair: { tier1: RepairAgent; tier2: RepairAgent };
  cascade: CascadeAnalyzer;
  writer: ManifestWriter;
  log?: EventLogger;
  now?: () => number;
};

type RunContext = {
  task: Task;
  parent: TaskIndexEntry;
  log?: EventLogger;
  state: SentinelState;
  startedAt: Date;
  baseline?: string;
  tiers: TierResult[];
  diff: WorkingTreeDiff;
  reports: InterfaceReport[];
  linesChanged: number;
  violations: ChangeRadiusViolation[];
  cascade: CascadeOutcome;
  fault?: unknown;
};

// =============================================================================
// RUNNER
// =============================================================================

export class SentinelRunner {
  private readonly index: TaskIndex;
  private readonly now: () => number;

  constructor(private readonly deps: SentinelRunnerDeps) {
    this.index = new TaskIndex(deps.plan);
    this.now = deps.now ?? Date.now;
  }

  async run(task: Task): Promise<SentinelRunOutcome> {
    if (!this.deps.config.enabled) {
      throw new SentinelBootstrapError([task.id]);
    }

    const ctx = this.createContext(task);
    ctx.log?.log({
      type: "sentinel.start",
      payload: { parent_task_id: ctx.parent.task.id, wave_id: ctx.parent.waveId, mode: this.deps.config.mode },
    });

    let outcome: SentinelRunOutcome | undefined;
    try {
      await this.drive(ctx);
    } catch (err) {
      ctx.fault = err;
      ctx.log?.log({
        type: "sentinel.fault",
        payload: { state: ctx.state, message: formatErrorMessage(err) },
      });
    } finally {
      this.enter(ctx, "WRITING");
      const manifest = this.buildManifest(ctx);
      const manifestDir = await this.deps.writer.write({
        manifest,
        patch: ctx.diff.patch,
        reports: ctx.reports,
        fault: ctx.fault,
      });
      outcome = { manifest, manifestDir };
    }

    if (ctx.cascade.action === "halt") {
      this.enter(ctx, "HALTED");
      const reason = formatViolations(ctx.violations);
      ctx.log?.log({
        type: "sentinel.halt",
        payload: { decision: ctx.cascade.decision, reason, manifest_dir: outcome.manifestDir },
      });
      throw new WaveHaltError({
        reason,
        violations: ctx.violations,
        taskId: task.id,
        manifestDir: outcome.manifestDir,
      });
    }

    this.enter(ctx, "DONE");
    ctx.log?.log({
      type: "sentinel.complete",
      payload: {
        result: outcome.manifest.result,
        tier_used: outcome.manifest.tier_used,
        violations: outcome.manifest.violations.length,
      },
    });
    return outcome;
  }

  // ===========================================================================
  // STATE MACHINE
  // ===========================================================================

  private async drive(ctx: RunContext): Promise<void> {
    let state: SentinelState = "PROBING";
    while (state !== "WRITING") {
      this.enter(ctx, state);
      state = await this.step(ctx, state);
    }
  }

  private async step(ctx: RunContext, state: SentinelState): Promise<SentinelState> {
    switch (state) {
      case "PROBING":
        return this.probe(ctx);
      case "TIER1_RUNNING":
        return this.runTier1(ctx);
      case "TIER2_RUNNING":
        return this.runTier2(ctx);
      case "DIFFING":
        return this.diff(ctx);
      case "EVALUATING":
        return this.evaluate(ctx);
      case "CASCADING":
        return this.applyCascade(ctx);
      case "WRITING":
      case "DONE":
      case "HALTED":
        throw new Error(`No transition out of ${state}.`);
    }
  }

  private async probe(ctx: RunContext): Promise<SentinelState> {
    ctx.baseline = await this.deps.vcs.snapshot();

    const available = await this.deps.probe.isAvailable();
    ctx.log?.log({ type: "probe.result", payload: { tier: 1, available } });
    if (available) return "TIER1_RUNNING";

    ctx.tiers.push(TierExecutor.skipped(1));
    return "TIER2_RUNNING";
  }

  private async runTier1(ctx: RunContext): Promise<SentinelState> {
    const result = await new TierExecutor(tier1Policy(this.deps.config.tier1), {
      check: this.deps.check,
      repair: this.deps.repair.tier1,
      now: this.now,
      log: ctx.log,
    }).run({ taskId: ctx.task.id, parentTaskId: ctx.parent.task.id });

    ctx.tiers.push(result);
    return result.passed ? "DIFFING" : "TIER2_RUNNING";
  }

  private async runTier2(ctx: RunContext): Promise<SentinelState> {
    const result = await new TierExecutor(tier2Policy(this.deps.config.tier2), {
      check: this.deps.check,
      repair: this.deps.repair.tier2,
      now: this.now,
      log: ctx.log,
    }).run({ taskId: ctx.task.id, parentTaskId: ctx.parent.task.id });

    ctx.tiers.push(result);
    return "DIFFING";
  }

  private async diff(ctx: RunContext): Promise<SentinelState> {
    if (ctx.baseline === undefined) {
      throw new Error("Working tree baseline missing; PROBING must run first.");
    }

    ctx.diff = await this.deps.vcs.diffSince(ctx.baseline);
    ctx.reports = ctx.diff.contents.map((file) =>
      computeInterfaceReport({ path: file.path, before: file.before, after: file.after }),
    );
    ctx.linesChanged = countChangedLines(ctx.diff.files, this.deps.config.line_count);
    return "EVALUATING";
  }

  private evaluate(ctx: RunContext): SentinelState {
    ctx.violations = evaluateChangeRadius({
      files: ctx.diff.files,
      reports: ctx.reports,
      linesChanged: ctx.linesChanged,
      plan: this.deps.plan,
      waveId: ctx.parent.waveId,
      budgets: radiusBudgetsFromConfig(this.deps.config),
    });

    for (const violation of ctx.violations) {
      ctx.log?.log({
        type: "radius.violation",
        payload: { axis: violation.axis, observed: violation.observed, budget: violation.budget },
      });
    }
    return ctx.violations.length > 0 ? "CASCADING" : "WRITING";
  }

  private async applyCascade(ctx: RunContext): Promise<SentinelState> {
    ctx.cascade = await this.deps.cascade.apply({ taskId: ctx.task.id, violations: ctx.violations });
    return "WRITING";
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private createContext(task: Task): RunContext {
    const parent = this.index.parentOf(task);
    return {
      task,
      parent,
      log: this.deps.log ? withTaskId(this.deps.log, task.id) : undefined,
      state: "PROBING",
      startedAt: new Date(this.now()),
      tiers: [],
      diff: { patch: "", files: [], contents: [] },
      reports: [],
      linesChanged: 0,
      violations: [],
      cascade: { action: "none" },
    };
  }

  private enter(ctx: RunContext, state: SentinelState): void {
    ctx.state = state;
    ctx.log?.log({ type: "sentinel.state", payload: { state } });
  }

  private buildManifest(ctx: RunContext): SentinelManifest {
    const ran = ctx.tiers.filter((tier) => tier.attempted && tier.iterations > 0);
    const last = ran[ran.length - 1];
    const passed = ctx.tiers.some((tier) => tier.passed);

    const manifest: SentinelManifest = {
      task_id: ctx.task.id,
      parent_task_id: ctx.parent.task.id,
      result: ctx.fault !== undefined ? "ERROR" : passed ? "PASS" : "FAIL",
      tier_used: last?.tier ?? 0,
      iterations: ctx.tiers.reduce((sum, tier) => sum + tier.iterations, 0),
      cost_usd: roundCurrency(ctx.tiers.reduce((sum, tier) => sum + tier.cost_usd, 0)),
      files_changed: ctx.diff.files.map((file) => file.path),
      lines_changed: ctx.linesChanged,
      interface_changes: countInterfaceChanges(ctx.reports),
      started_at: ctx.startedAt.toISOString(),
      finished_at: new Date(this.now()).toISOString(),
      tiers: [...ctx.tiers],
      violations: ctx.violations,
      cascade:
        ctx.cascade.action === "none" || ctx.cascade.decision === undefined
          ? { action: ctx.cascade.action }
          : { action: ctx.cascade.action, decision: ctx.cascade.decision },
    };

    if (ctx.fault !== undefined) {
      manifest.error = formatFault(ctx.fault);
    }
    return manifest;
  }
}

function formatFault(fault: unknown): string {
  if (fault instanceof Error) return `${fault.name}: ${fault.message}`;
  return String(fault);
}
