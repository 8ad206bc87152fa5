/**
 * In-memory stand-ins for the sentinel ports.
 * Purpose: drive the runner and its components without git, models, or a shell.
 */

import type { ExecutionPlan, Task } from "../../core/plan.js";
import {
  appendLinesToContent,
  insertAfterIncompleteLines,
  type TaskListStore,
} from "../../core/task-list.js";
import type {
  CheckResult,
  LivenessProbe,
  RepairAgent,
  RepairOutcome,
  RepairRequest,
  SentinelVcs,
  ValidationCheck,
  WorkingTreeDiff,
} from "../types.js";

// =============================================================================
// TASK LIST
// =============================================================================

export class InMemoryTaskList implements TaskListStore {
  constructor(public content = "") {}

  async read(): Promise<string> {
    return this.content;
  }

  async appendLines(lines: string[]): Promise<void> {
    this.content = appendLinesToContent(this.content, lines);
  }

  async insertAfterIncomplete(block: string[]): Promise<number> {
    const result = insertAfterIncompleteLines(this.content, block);
    this.content = result.content;
    return result.annotated;
  }
}

// =============================================================================
// CHECK / REPAIR / PROBE
// =============================================================================

export function checkResult(passed: boolean, output = passed ? "ok" : "1 failing"): CheckResult {
  return { passed, exitCode: passed ? 0 : 1, output, durationMs: 5 };
}

// Replays the given outcomes in order, then repeats the last one.
export class ScriptedCheck implements ValidationCheck {
  calls = 0;

  constructor(private readonly outcomes: boolean[]) {}

  async run(): Promise<CheckResult> {
    const index = Math.min(this.calls, this.outcomes.length - 1);
    this.calls += 1;
    return checkResult(this.outcomes[index] ?? false);
  }
}

export class RecordingRepair implements RepairAgent {
  readonly requests: RepairRequest[] = [];

  constructor(
    private readonly costUsd = 0,
    private readonly onRepair?: (request: RepairRequest) => void,
  ) {}

  async repair(request: RepairRequest): Promise<RepairOutcome> {
    this.requests.push(request);
    this.onRepair?.(request);
    return { costUsd: this.costUsd, filesWritten: [] };
  }
}

export class StaticProbe implements LivenessProbe {
  calls = 0;

  constructor(private readonly available: boolean) {}

  async isAvailable(): Promise<boolean> {
    this.calls += 1;
    return this.available;
  }
}

// =============================================================================
// VCS
// =============================================================================

export class FakeVcs implements SentinelVcs {
  snapshots = 0;

  constructor(private readonly diff: WorkingTreeDiff = emptyDiff()) {}

  async snapshot(): Promise<string> {
    this.snapshots += 1;
    return `tree-${this.snapshots}`;
  }

  async diffSince(): Promise<WorkingTreeDiff> {
    return this.diff;
  }
}

export function emptyDiff(): WorkingTreeDiff {
  return { patch: "", files: [], contents: [] };
}

export function diffWithFiles(
  files: Array<{ path: string; added: number; removed?: number }>,
): WorkingTreeDiff {
  return {
    patch: files.map((file) => `diff --git a/${file.path} b/${file.path}\n`).join(""),
    files: files.map((file) => ({
      path: file.path,
      added: file.added,
      removed: file.removed ?? 0,
      binary: false,
    })),
    contents: files.map((file) => ({ path: file.path, before: "", after: "" })),
  };
}

// =============================================================================
// PLAN
// =============================================================================

export function task(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    agent_role: "Builder",
    dependencies: [],
    status: "pending",
    ...overrides,
  };
}

export function twoWavePlan(): ExecutionPlan {
  return {
    waves: [
      { id: "wave-1", file_locks: ["src/api/**"], tasks: [task("T1"), task("T2")] },
      { id: "wave-2", file_locks: ["src/db/schema.ts", "docs/*.md"], tasks: [task("T3")] },
    ],
  };
}
