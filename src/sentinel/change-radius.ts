// Change radius scoring.
// Purpose: score a sentinel run against four independent budgets (files, lines, interface, cross_wave).
// Assumes repo-relative paths with forward slashes; each axis yields at most one violation.

import { minimatch } from "minimatch";

import type { SentinelConfig } from "../core/config.js";
import type { ExecutionPlan } from "../core/plan.js";
import type { ChangedFileStat } from "../git/snapshots.js";

import { countInterfaceChanges } from "./interface-diff.js";
import type { ChangeRadiusViolation, InterfaceReport, RadiusBudgets } from "./types.js";

export type ChangeRadiusInput = {
  files: ChangedFileStat[];
  reports: InterfaceReport[];
  linesChanged: number;
  plan: ExecutionPlan;
  waveId: string;
  budgets: RadiusBudgets;
};

export function radiusBudgetsFromConfig(config: SentinelConfig): RadiusBudgets {
  return {
    maxFiles: config.max_files,
    maxLines: config.max_lines,
    lineCount: config.line_count,
    allowInterface: config.allow_interface,
  };
}

export function countChangedLines(files: ChangedFileStat[], mode: RadiusBudgets["lineCount"]): number {
  const added = files.reduce((sum, file) => sum + file.added, 0);
  const removed = files.reduce((sum, file) => sum + file.removed, 0);
  return mode === "net" ? Math.abs(added - removed) : added + removed;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function evaluateChangeRadius(input: ChangeRadiusInput): ChangeRadiusViolation[] {
  return [
    evaluateFiles(input),
    evaluateLines(input),
    evaluateInterface(input),
    evaluateCrossWave(input),
  ].filter((violation): violation is ChangeRadiusViolation => violation !== null);
}

// =============================================================================
// AXES
// =============================================================================

function evaluateFiles(input: ChangeRadiusInput): ChangeRadiusViolation | null {
  const paths = distinctPaths(input.files);
  if (paths.length <= input.budgets.maxFiles) return null;

  return { axis: "files", observed: paths.length, budget: input.budgets.maxFiles, details: paths };
}

function evaluateLines(input: ChangeRadiusInput): ChangeRadiusViolation | null {
  if (input.linesChanged <= input.budgets.maxLines) return null;

  const details = [...input.files]
    .sort((a, b) => a.path.localeCompare(b.path))
    .map((file) => `${file.path}: +${file.added} -${file.removed}`);
  return {
    axis: "lines",
    observed: input.linesChanged,
    budget: input.budgets.maxLines,
    details: [`count=${input.budgets.lineCount}`, ...details],
  };
}

function evaluateInterface(input: ChangeRadiusInput): ChangeRadiusViolation | null {
  if (input.budgets.allowInterface) return null;

  const observed = countInterfaceChanges(input.reports);
  if (observed === 0) return null;

  const details = input.reports.flatMap((report) => [
    ...report.symbols_added.map((name) => `${report.path}: added ${name}`),
    ...report.symbols_removed.map((name) => `${report.path}: removed ${name}`),
    ...report.symbols_changed.map((name) => `${report.path}: changed ${name}`),
  ]);
  return { axis: "interface", observed, budget: 0, details };
}

function evaluateCrossWave(input: ChangeRadiusInput): ChangeRadiusViolation | null {
  const foreignLocks = input.plan.waves
    .filter((wave) => wave.id !== input.waveId)
    .flatMap((wave) => wave.file_locks.map((pattern) => ({ waveId: wave.id, pattern })));
  if (foreignLocks.length === 0) return null;

  const details: string[] = [];
  let observed = 0;
  for (const filePath of distinctPaths(input.files)) {
    const hits = foreignLocks.filter((lock) => matchesLock(filePath, lock.pattern));
    if (hits.length === 0) continue;

    observed += 1;
    details.push(
      `${filePath} locked by ${hits.map((hit) => `${hit.waveId} (${hit.pattern})`).join(", ")}`,
    );
  }

  return observed === 0 ? null : { axis: "cross_wave", observed, budget: 0, details };
}

// =============================================================================
// INTERNALS
// =============================================================================

function matchesLock(filePath: string, pattern: string): boolean {
  const normalized = pattern.replace(/^\.\//, "").replace(/\/+$/, "");
  if (filePath === normalized) return true;
  // A bare directory lock owns everything beneath it.
  if (filePath.startsWith(`${normalized}/`)) return true;
  return minimatch(filePath, normalized, { dot: true });
}

function distinctPaths(files: ChangedFileStat[]): string[] {
  return Array.from(new Set(files.map((file) => file.path))).sort();
}
