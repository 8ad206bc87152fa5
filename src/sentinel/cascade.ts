import { ConfigError } from "../core/errors.js";
import type { SentinelMode } from "../core/config.js";
import type { EventLogger } from "../core/logger.js";
import type { TaskListStore } from "../core/task-list.js";

import {
  CASCADE_DECISIONS,
  type CascadeDecision,
  type CascadeDecisionChannel,
  type CascadeOutcome,
  type ChangeRadiusViolation,
} from "./types.js";

export const CASCADE_WARNING_MARKER = "[SENTINEL CASCADE WARNING]";

export type CascadeAnalyzerOptions = {
  mode: SentinelMode;
  taskList: TaskListStore;
  decisions?: CascadeDecisionChannel;
  log?: EventLogger;
};

export type CascadeInput = {
  taskId: string;
  violations: ChangeRadiusViolation[];
};

// =============================================================================
// ANALYZER
// =============================================================================

export class CascadeAnalyzer {
  constructor(private readonly options: CascadeAnalyzerOptions) {
    if (options.mode === "human-gated" && !options.decisions) {
      throw new ConfigError("sentinel.mode=human-gated needs a cascade decision channel.");
    }
  }

  async apply(input: CascadeInput): Promise<CascadeOutcome> {
    if (input.violations.length === 0) {
      return { action: "none" };
    }

    const decision = await this.decide(input);
    const outcome: CascadeOutcome =
      decision === undefined || decision === "auto-apply"
        ? await this.annotate(input, decision)
        : { action: "halt", decision };

    this.options.log?.log({
      type: "cascade.apply",
      taskId: input.taskId,
      payload: {
        mode: this.options.mode,
        action: outcome.action,
        decision: decision ?? null,
        annotated: outcome.action === "annotated" ? outcome.annotated : 0,
      },
    });
    return outcome;
  }

  private async decide(input: CascadeInput): Promise<CascadeDecision | undefined> {
    switch (this.options.mode) {
      case "auto":
        return undefined;
      case "human-gated": {
        const channel = this.options.decisions;
        if (!channel) {
          throw new ConfigError("sentinel.mode=human-gated needs a cascade decision channel.");
        }
        return channel.choose(buildDecisionPrompt(input));
      }
    }
  }

  private async annotate(input: CascadeInput, decision?: CascadeDecision): Promise<CascadeOutcome> {
    const annotated = await this.options.taskList.insertAfterIncomplete(
      buildCascadeWarningBlock(input.taskId, input.violations),
    );
    return decision === undefined ? { action: "annotated", annotated } : { action: "annotated", annotated, decision };
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

export function buildCascadeWarningBlock(taskId: string, violations: ChangeRadiusViolation[]): string[] {
  return [
    `${CASCADE_WARNING_MARKER} source=${taskId}`,
    ...violations.map(
      (violation) => `- ${violation.axis}: observed ${violation.observed}, budget ${violation.budget}`,
    ),
  ];
}

export function buildDecisionPrompt(input: CascadeInput): string {
  const lines = [
    `${input.taskId} exceeded its change radius:`,
    ...input.violations.flatMap((violation) => [
      `  ${violation.axis}: observed ${violation.observed}, budget ${violation.budget}`,
      ...violation.details.slice(0, 5).map((detail) => `    ${detail}`),
    ]),
    `Choose ${CASCADE_DECISIONS.join(" / ")}`,
  ];
  return lines.join("\n");
}

export function parseCascadeDecision(value: string): CascadeDecision | null {
  const normalized = value.trim().toLowerCase();
  return CASCADE_DECISIONS.find((decision) => decision === normalized) ?? null;
}

// =============================================================================
// CHANNELS
// =============================================================================

// Fixed answer, for non-interactive runs (`run --decision`).
export class StaticDecisionChannel implements CascadeDecisionChannel {
  readonly prompts: string[] = [];

  constructor(private readonly decision: CascadeDecision) {}

  async choose(prompt: string): Promise<CascadeDecision> {
    this.prompts.push(prompt);
    return this.decision;
  }
}
