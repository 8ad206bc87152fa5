import type { InterfaceReport, SentinelManifest, TierResult } from "./types.js";

export type SummaryInput = {
  manifest: SentinelManifest;
  reports: InterfaceReport[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatSentinelSummary(input: SummaryInput): string {
  const lines: string[] = [];

  appendHeader(lines, input.manifest);
  appendTiers(lines, input.manifest.tiers);
  appendChanges(lines, input.manifest, input.reports);
  appendViolations(lines, input.manifest);
  appendError(lines, input.manifest);

  return lines.join("\n").trimEnd() + "\n";
}

export function formatTierLine(result: TierResult): string {
  if (result.skipped) {
    return `- Tier ${result.tier}: skipped (${result.stop_reason})`;
  }
  const reason = result.error === undefined ? result.stop_reason : `${result.stop_reason}: ${result.error}`;
  const outcome = result.passed ? "passed" : `failed (${reason})`;
  return `- Tier ${result.tier}: ${outcome} after ${result.iterations} iteration(s), $${result.cost_usd.toFixed(4)}, ${result.duration_s}s`;
}

// =============================================================================
// SECTION BUILDERS
// =============================================================================

function appendHeader(lines: string[], manifest: SentinelManifest): void {
  lines.push(`# Sentinel ${manifest.task_id}: ${manifest.result}`);
  lines.push("");
  lines.push(`- Parent task: ${manifest.parent_task_id}`);
  lines.push(`- Started: ${manifest.started_at}`);
  lines.push(`- Finished: ${manifest.finished_at}`);
  lines.push(`- Tier used: ${manifest.tier_used}`);
  lines.push(`- Iterations: ${manifest.iterations}`);
  lines.push(`- Cost: $${manifest.cost_usd.toFixed(4)}`);
  lines.push(`- Cascade: ${manifest.cascade.action}${manifest.cascade.decision ? ` (${manifest.cascade.decision})` : ""}`);
  lines.push("");
}

function appendTiers(lines: string[], tiers: TierResult[]): void {
  lines.push("## Tiers");
  lines.push("");
  if (tiers.length === 0) {
    lines.push("- none ran");
  }
  lines.push(...tiers.map(formatTierLine));
  lines.push("");
}

function appendChanges(lines: string[], manifest: SentinelManifest, reports: InterfaceReport[]): void {
  lines.push("## Changes");
  lines.push("");
  lines.push(
    `${manifest.files_changed.length} file(s), ${manifest.lines_changed} line(s), ${manifest.interface_changes} interface change(s)`,
  );
  if (manifest.files_changed.length > 0) {
    lines.push("");
    lines.push(...manifest.files_changed.map((file) => `- ${file}`));
  }

  const touched = reports.filter(
    (report) =>
      report.symbols_added.length + report.symbols_removed.length + report.symbols_changed.length > 0,
  );
  if (touched.length > 0) {
    lines.push("");
    lines.push("### Interface");
    lines.push("");
    for (const report of touched) {
      const parts = [
        formatSymbols("added", report.symbols_added),
        formatSymbols("removed", report.symbols_removed),
        formatSymbols("changed", report.symbols_changed),
      ].filter((part) => part.length > 0);
      lines.push(`- ${report.path}: ${parts.join("; ")}`);
    }
  }
  lines.push("");
}

function appendViolations(lines: string[], manifest: SentinelManifest): void {
  lines.push("## Change radius");
  lines.push("");
  if (manifest.violations.length === 0) {
    lines.push("Within budget.");
    lines.push("");
    return;
  }

  for (const violation of manifest.violations) {
    lines.push(`- ${violation.axis}: observed ${violation.observed}, budget ${violation.budget}`);
    for (const detail of violation.details) {
      lines.push(`  - ${detail}`);
    }
  }
  lines.push("");
}

function appendError(lines: string[], manifest: SentinelManifest): void {
  if (!manifest.error) return;

  lines.push("## Error");
  lines.push("");
  lines.push("```");
  lines.push(manifest.error);
  lines.push("```");
  lines.push("");
}

function formatSymbols(label: string, symbols: string[]): string {
  return symbols.length === 0 ? "" : `${label} ${symbols.join(", ")}`;
}
