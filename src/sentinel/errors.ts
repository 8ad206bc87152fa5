import {
  WaveSentinelError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";

import type { ChangeRadiusViolation, SentinelManifest } from "./types.js";

// Thrown to the orchestrator after the manifest is on disk; the wave must not be checkpointed.
export class WaveHaltError extends WaveSentinelError {
  readonly reason: string;
  readonly violations: ChangeRadiusViolation[];
  readonly taskId: string;
  readonly manifestDir: string;

  constructor(input: {
    reason: string;
    violations: ChangeRadiusViolation[];
    taskId: string;
    manifestDir: string;
  }) {
    super(`Wave halted by ${input.taskId}: ${input.reason}`);
    this.name = "WaveHaltError";
    this.reason = input.reason;
    this.violations = input.violations;
    this.taskId = input.taskId;
    this.manifestDir = input.manifestDir;
  }
}

export class ManifestWriteError extends UserFacingError {
  readonly manifest: SentinelManifest;
  readonly fault?: unknown;

  constructor(input: {
    manifestDir: string;
    manifest: SentinelManifest;
    cause: unknown;
    fault?: unknown;
  }) {
    super({
      code: USER_FACING_ERROR_CODES.sentinel,
      title: "Sentinel manifest write failed.",
      message: `Could not write the audit manifest for ${input.manifest.task_id} to ${input.manifestDir}.`,
      hint: "Check that artifacts_dir is writable and has free space, then rerun the sentinel task.",
      cause: input.cause,
    });
    this.name = "ManifestWriteError";
    this.manifest = input.manifest;
    this.fault = input.fault;
  }
}

export class SentinelBootstrapError extends UserFacingError {
  readonly taskIds: string[];

  constructor(taskIds: string[]) {
    super({
      code: USER_FACING_ERROR_CODES.sentinel,
      title: "Sentinel tasks present while the sentinel is disabled.",
      message: `Found sentinel tasks with sentinel.enabled=false: ${taskIds.join(", ")}.`,
      hint: "Remove the Sentinel tasks from the plan, or set sentinel.enabled: true.",
    });
    this.name = "SentinelBootstrapError";
    this.taskIds = taskIds;
  }
}

export function formatViolations(violations: ChangeRadiusViolation[]): string {
  return violations
    .map((violation) => `${violation.axis} (observed ${violation.observed}, budget ${violation.budget})`)
    .join("; ");
}
