import type { ChangedFileStat } from "../git/snapshots.js";

// =============================================================================
// TIERS
// =============================================================================

export type TierNumber = 1 | 2;

export type TierStopReason = "passed" | "iteration_cap" | "timeout" | "budget" | "unavailable" | "error";

export type TierResult = Readonly<{
  tier: TierNumber;
  attempted: boolean;
  skipped: boolean;
  passed: boolean;
  iterations: number;
  cost_usd: number;
  duration_s: number;
  stop_reason: TierStopReason;
  // Set when stop_reason is "error".
  error?: string;
}>;

export type TierPolicy = {
  tier: TierNumber;
  maxIterations: number;
  timeoutSeconds: number;
  // Tier 2 only; undefined means the tier never stops on spend.
  budgetUsd?: number;
};

// =============================================================================
// PORTS
// =============================================================================

export type CheckResult = {
  passed: boolean;
  exitCode: number;
  output: string;
  durationMs: number;
};

export interface ValidationCheck {
  run(): Promise<CheckResult>;
}

export type RepairRequest = {
  taskId: string;
  parentTaskId: string;
  tier: TierNumber;
  iteration: number;
  failure: CheckResult;
};

export type RepairOutcome = {
  costUsd: number;
  filesWritten: string[];
  notes?: string;
};

export interface RepairAgent {
  repair(request: RepairRequest): Promise<RepairOutcome>;
}

export interface LivenessProbe {
  isAvailable(): Promise<boolean>;
}

export type FileContents = {
  path: string;
  before: string | null;
  after: string | null;
};

export type WorkingTreeDiff = {
  patch: string;
  files: ChangedFileStat[];
  contents: FileContents[];
};

export interface SentinelVcs {
  snapshot(): Promise<string>;
  diffSince(snapshot: string): Promise<WorkingTreeDiff>;
}

// =============================================================================
// INTERFACE + RADIUS
// =============================================================================

export type InterfaceLanguage = "typescript" | "python" | "unsupported";

export type InterfaceReport = {
  path: string;
  language: InterfaceLanguage;
  symbols_added: string[];
  symbols_removed: string[];
  symbols_changed: string[];
};

export type RadiusAxis = "files" | "lines" | "interface" | "cross_wave";

export type ChangeRadiusViolation = {
  axis: RadiusAxis;
  observed: number;
  budget: number;
  details: string[];
};

export type RadiusBudgets = {
  maxFiles: number;
  maxLines: number;
  lineCount: "gross" | "net";
  allowInterface: boolean;
};

// =============================================================================
// CASCADE
// =============================================================================

export type CascadeDecision = "auto-apply" | "review-and-halt" | "halt";

export const CASCADE_DECISIONS: readonly CascadeDecision[] = [
  "auto-apply",
  "review-and-halt",
  "halt",
] as const;

export interface CascadeDecisionChannel {
  choose(prompt: string): Promise<CascadeDecision>;
}

export type CascadeOutcome =
  | { action: "none" }
  | { action: "annotated"; annotated: number; decision?: CascadeDecision }
  | { action: "halt"; decision: CascadeDecision };

// =============================================================================
// MANIFEST
// =============================================================================

export type SentinelResult = "PASS" | "FAIL" | "ERROR";

export type SentinelManifest = {
  task_id: string;
  parent_task_id: string;
  result: SentinelResult;
  tier_used: 0 | TierNumber;
  iterations: number;
  cost_usd: number;
  files_changed: string[];
  lines_changed: number;
  interface_changes: number;
  started_at: string;
  finished_at: string;
  tiers: TierResult[];
  violations: ChangeRadiusViolation[];
  cascade: { action: CascadeOutcome["action"]; decision?: CascadeDecision };
  error?: string;
};

export type SentinelState =
  | "PROBING"
  | "TIER1_RUNNING"
  | "TIER2_RUNNING"
  | "DIFFING"
  | "EVALUATING"
  | "CASCADING"
  | "WRITING"
  | "DONE"
  | "HALTED";

export type SentinelRunOutcome = {
  manifest: SentinelManifest;
  manifestDir: string;
};
