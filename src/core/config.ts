import { z } from "zod";

// =============================================================================
// TIERS
// =============================================================================

const LocalTierSchema = z
  .object({
    // OpenAI-compatible endpoint (Ollama, llama.cpp server, LM Studio, ...).
    base_url: z.string().url().default("http://127.0.0.1:11434/v1"),
    health_path: z.string().default("/models"),
    model: z.string().min(1).default("qwen2.5-coder"),
    api_key: z.string().optional(),
    max_iterations: z.number().int().positive().default(5),
    timeout_seconds: z.number().positive().default(300),
  })
  .strict();

const CloudTierSchema = z
  .object({
    provider: z.enum(["anthropic", "openai"]).default("anthropic"),
    model: z.string().min(1).default("claude-3-5-sonnet-latest"),
    base_url: z.string().url().optional(),
    max_iterations: z.number().int().positive().default(10),
    budget_usd: z.number().nonnegative().default(2),
    timeout_seconds: z.number().positive().default(600),
    cost_per_1k_input_tokens: z.number().nonnegative().default(0.003),
    cost_per_1k_output_tokens: z.number().nonnegative().default(0.015),
  })
  .strict();

// =============================================================================
// SENTINEL
// =============================================================================

export const SentinelModeSchema = z.enum(["auto", "human-gated"]);
export const LineCountModeSchema = z.enum(["gross", "net"]);

export const SentinelConfigSchema = z
  .object({
    // Must stay false while the sentinel builds itself (no self-validation recursion).
    enabled: z.boolean().default(true),
    mode: SentinelModeSchema.default("auto"),
    max_files: z.number().int().nonnegative().default(3),
    max_lines: z.number().int().nonnegative().default(150),
    line_count: LineCountModeSchema.default("gross"),
    allow_interface: z.boolean().default(false),
    tier1: LocalTierSchema.default({}),
    tier2: CloudTierSchema.default({}),
  })
  .strict();

const ValidationSchema = z
  .object({
    command: z.string().min(1),
    timeout_seconds: z.number().positive().optional(),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    repo_path: z.string().min(1).default("."),
    plan_file: z.string().min(1).default(".sentinel/plan.yaml"),
    tasks_file: z.string().min(1).default("TASKS.md"),
    artifacts_dir: z.string().min(1).default(".sentinel/runs"),
    logs_dir: z.string().min(1).default(".sentinel/logs"),
    validation: ValidationSchema,
    sentinel: SentinelConfigSchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type SentinelConfig = z.infer<typeof SentinelConfigSchema>;
export type SentinelMode = z.infer<typeof SentinelModeSchema>;
export type LineCountMode = z.infer<typeof LineCountModeSchema>;
export type LocalTierConfig = z.infer<typeof LocalTierSchema>;
export type CloudTierConfig = z.infer<typeof CloudTierSchema>;

export function buildSentinelConfig(overrides: z.input<typeof SentinelConfigSchema> = {}): SentinelConfig {
  return SentinelConfigSchema.parse(overrides);
}
