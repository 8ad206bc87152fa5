/*
Purpose: LLM-backed repair action for one tier iteration (prompt, structured edits, token cost).
Assumptions: the model returns whole-file replacements; paths outside the repo are never written.
Usage: new LlmRepairAgent({ client, repoPath, command, rates }).repair(request)
*/

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import type { CloudTierConfig } from "../core/config.js";
import type { EventLogger } from "../core/logger.js";
import { renderRepairPrompt } from "../core/prompts.js";
import { roundCurrency } from "../core/utils.js";
import type { LlmClient, LlmUsage } from "../llm/client.js";

import type { RepairAgent, RepairOutcome, RepairRequest } from "./types.js";
import { tailOutput } from "./validation.js";

// =============================================================================
// TYPES
// =============================================================================

export type TokenRates = {
  inputPer1k: number;
  outputPer1k: number;
};

// Local models cost nothing per token.
export const FREE_RATES: TokenRates = Object.freeze({ inputPer1k: 0, outputPer1k: 0 });

export type LlmRepairAgentOptions = {
  client: LlmClient;
  repoPath: string;
  // Validation command shown to the model.
  command: string;
  rates?: TokenRates;
  timeoutMs?: number;
  log?: EventLogger;
};

const RepairEditSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

export const RepairResponseSchema = z.object({
  summary: z.string(),
  edits: z.array(RepairEditSchema),
});

export type RepairResponse = z.infer<typeof RepairResponseSchema>;

// JSON schema handed to the provider; mirrors RepairResponseSchema.
export const REPAIR_RESPONSE_JSON_SCHEMA: Record<string, unknown> = {
  type: "object",
  properties: {
    summary: { type: "string" },
    edits: {
      type: "array",
      items: {
        type: "object",
        properties: { path: { type: "string" }, content: { type: "string" } },
        required: ["path", "content"],
        additionalProperties: false,
      },
    },
  },
  required: ["summary", "edits"],
  additionalProperties: false,
};

const MAX_CONTEXT_FILES = 5;
const MAX_CONTEXT_CHARS = 20_000;
const MAX_PROMPT_OUTPUT_CHARS = 8_000;
const REFERENCED_FILE_PATTERN =
  /(?:^|[\s"'`(\[])(\/?(?:[\w.@-]+\/)*[\w.@-]+\.(?:ts|tsx|mts|cts|js|jsx|mjs|cjs|py|json))(?=[:\s"'`)\],]|$)/gm;

// =============================================================================
// AGENT
// =============================================================================

export class LlmRepairAgent implements RepairAgent {
  private readonly rates: TokenRates;

  constructor(private readonly options: LlmRepairAgentOptions) {
    this.rates = options.rates ?? FREE_RATES;
  }

  async repair(request: RepairRequest): Promise<RepairOutcome> {
    const files = await collectReferencedFiles(this.options.repoPath, request.failure.output);
    const prompt = await renderRepairPrompt({
      task_id: request.taskId,
      parent_task_id: request.parentTaskId,
      repo_path: this.options.repoPath,
      tier: request.tier,
      iteration: request.iteration,
      exit_code: request.failure.exitCode,
      command: this.options.command,
      failure_output: tailOutput(request.failure.output, MAX_PROMPT_OUTPUT_CHARS),
      file_context: formatFileContext(files),
    });

    const completion = await this.options.client.complete(prompt, {
      schema: REPAIR_RESPONSE_JSON_SCHEMA,
      timeoutMs: this.options.timeoutMs,
    });
    const costUsd = tokenCost(completion.usage, this.rates);

    const parsed = RepairResponseSchema.safeParse(completion.parsed);
    if (!parsed.success) {
      this.options.log?.log({
        type: "repair.invalid_response",
        taskId: request.taskId,
        payload: { tier: request.tier, iteration: request.iteration, issues: parsed.error.issues.length },
      });
      return { costUsd, filesWritten: [], notes: "Model response did not match the edit schema." };
    }

    const { written, rejected } = await applyEdits(this.options.repoPath, parsed.data.edits);
    this.options.log?.log({
      type: "repair.applied",
      taskId: request.taskId,
      payload: {
        tier: request.tier,
        iteration: request.iteration,
        files_written: written,
        files_rejected: rejected,
        input_tokens: completion.usage.inputTokens,
        output_tokens: completion.usage.outputTokens,
        cost_usd: costUsd,
      },
    });

    const notes = rejected.length > 0
      ? `${parsed.data.summary}\nRejected paths outside the repository: ${rejected.join(", ")}`
      : parsed.data.summary;
    return { costUsd, filesWritten: written, notes };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function tokenRatesFromConfig(config: CloudTierConfig): TokenRates {
  return {
    inputPer1k: config.cost_per_1k_input_tokens,
    outputPer1k: config.cost_per_1k_output_tokens,
  };
}

export function tokenCost(usage: LlmUsage, rates: TokenRates): number {
  return roundCurrency(
    (usage.inputTokens / 1000) * rates.inputPer1k + (usage.outputTokens / 1000) * rates.outputPer1k,
  );
}

// Repo-relative POSIX path, or null when the path leaves the repo or targets .git.
export function resolveRepoPath(repoPath: string, candidate: string): string | null {
  const absolute = path.resolve(repoPath, candidate);
  const relative = path.relative(repoPath, absolute);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) return null;

  const normalized = relative.split(path.sep).join("/");
  if (normalized === ".git" || normalized.startsWith(".git/")) return null;
  return normalized;
}

export function extractReferencedPaths(output: string): string[] {
  const found = new Set<string>();
  for (const match of output.matchAll(REFERENCED_FILE_PATTERN)) {
    const candidate = match[1];
    if (candidate && !candidate.includes("node_modules/")) found.add(candidate);
  }
  return [...found];
}

type ContextFile = { path: string; content: string };

async function collectReferencedFiles(repoPath: string, output: string): Promise<ContextFile[]> {
  const files: ContextFile[] = [];
  const seen = new Set<string>();

  for (const candidate of extractReferencedPaths(output)) {
    if (files.length >= MAX_CONTEXT_FILES) break;

    const relative = resolveRepoPath(repoPath, candidate);
    if (!relative || seen.has(relative)) continue;
    seen.add(relative);

    const absolute = path.join(repoPath, relative);
    const stat = await fse.stat(absolute).catch(() => null);
    if (!stat?.isFile()) continue;

    const content = await fse.readFile(absolute, "utf8");
    files.push({ path: relative, content: truncate(content, MAX_CONTEXT_CHARS) });
  }

  return files;
}

function formatFileContext(files: ContextFile[]): string {
  if (files.length === 0) return "(none found in the output)";
  return files.map((file) => `### ${file.path}\n\n\`\`\`\n${file.content}\n\`\`\``).join("\n\n");
}

async function applyEdits(
  repoPath: string,
  edits: RepairResponse["edits"],
): Promise<{ written: string[]; rejected: string[] }> {
  const written: string[] = [];
  const rejected: string[] = [];

  for (const edit of edits) {
    const relative = resolveRepoPath(repoPath, edit.path);
    if (!relative) {
      rejected.push(edit.path);
      continue;
    }
    await fse.outputFile(path.join(repoPath, relative), edit.content, "utf8");
    written.push(relative);
  }

  return { written, rejected };
}

function truncate(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  return `${value.slice(0, maxChars)}\n[...truncated ${value.length - maxChars} chars]`;
}
