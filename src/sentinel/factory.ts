/*
Purpose: build the sentinel's collaborators from a loaded project config.
Assumptions: config paths are already absolute (loadProjectConfig resolves them).
Usage: const sentinel = await createSentinel({ config, decisions }); ... sentinel.close();
*/

import path from "node:path";

import type { CloudTierConfig, LocalTierConfig, ProjectConfig } from "../core/config.js";
import { JsonlLogger, type EventLogger } from "../core/logger.js";
import { loadExecutionPlan, type ExecutionPlan } from "../core/plan.js";
import { MarkdownTaskList } from "../core/task-list.js";
import { defaultRunId } from "../core/utils.js";
import { AnthropicClient } from "../llm/anthropic.js";
import type { LlmClient, LlmCompletionOptions, LlmCompletionResult } from "../llm/client.js";
import { OpenAiClient } from "../llm/openai.js";

import { AvailabilityProbe } from "./availability-probe.js";
import { CascadeAnalyzer } from "./cascade.js";
import { createGitSentinelVcs } from "./git-vcs.js";
import { SentinelInjector } from "./injector.js";
import { ManifestWriter } from "./manifest-writer.js";
import { FREE_RATES, LlmRepairAgent, tokenRatesFromConfig } from "./repair-agent.js";
import { SentinelRunner } from "./runner.js";
import type {
  CascadeDecisionChannel,
  LivenessProbe,
  SentinelVcs,
  ValidationCheck,
} from "./types.js";
import { CommandValidationCheck } from "./validation.js";

export const SENTINEL_LOG_FILE = "sentinel.jsonl";

// OpenAI-compatible local servers ignore the key, but the SDK refuses to start without one.
const LOCAL_API_KEY_PLACEHOLDER = "local";

// =============================================================================
// TYPES
// =============================================================================

export type SentinelFactoryOptions = {
  config: ProjectConfig;
  decisions?: CascadeDecisionChannel;
  runId?: string;
  debug?: boolean;
  // Test seams; production builds every collaborator from config.
  log?: EventLogger;
  plan?: ExecutionPlan;
  vcs?: SentinelVcs;
  probe?: LivenessProbe;
  check?: ValidationCheck;
  clients?: { tier1?: LlmClient; tier2?: LlmClient };
};

export type Sentinel = {
  runner: SentinelRunner;
  injector: SentinelInjector;
  plan: ExecutionPlan;
  log: EventLogger;
  close(): void;
};

// =============================================================================
// FACTORIES
// =============================================================================

export async function createSentinel(options: SentinelFactoryOptions): Promise<Sentinel> {
  const { config } = options;
  const sentinelConfig = config.sentinel;
  const plan = options.plan ?? (await loadExecutionPlan(config.plan_file));
  const { log, close } = resolveLogger(options);

  const taskList = new MarkdownTaskList(config.tasks_file);
  const command = config.validation.command;

  const tier1 = new LlmRepairAgent({
    client: options.clients?.tier1 ?? lazyClient(() => createLocalTierClient(sentinelConfig.tier1)),
    repoPath: config.repo_path,
    command,
    rates: FREE_RATES,
    timeoutMs: sentinelConfig.tier1.timeout_seconds * 1000,
    log,
  });
  const tier2 = new LlmRepairAgent({
    client: options.clients?.tier2 ?? lazyClient(() => createCloudTierClient(sentinelConfig.tier2)),
    repoPath: config.repo_path,
    command,
    rates: tokenRatesFromConfig(sentinelConfig.tier2),
    timeoutMs: sentinelConfig.tier2.timeout_seconds * 1000,
    log,
  });

  const runner = new SentinelRunner({
    config: sentinelConfig,
    plan,
    vcs:
      options.vcs ??
      createGitSentinelVcs({
        repoPath: config.repo_path,
        exclude: [config.artifacts_dir, config.logs_dir],
      }),
    probe: options.probe ?? createProbe(sentinelConfig.tier1),
    check:
      options.check ??
      new CommandValidationCheck({
        command,
        cwd: config.repo_path,
        timeoutSeconds: config.validation.timeout_seconds,
      }),
    repair: { tier1, tier2 },
    cascade: new CascadeAnalyzer({
      mode: sentinelConfig.mode,
      taskList,
      decisions: options.decisions,
      log,
    }),
    writer: new ManifestWriter({ artifactsDir: config.artifacts_dir, log }),
    log,
  });

  return {
    runner,
    injector: createInjector(config),
    plan,
    log,
    close,
  };
}

export function createInjector(config: ProjectConfig): SentinelInjector {
  return new SentinelInjector({
    enabled: config.sentinel.enabled,
    taskList: new MarkdownTaskList(config.tasks_file),
  });
}

export function createProbe(config: LocalTierConfig): AvailabilityProbe {
  return new AvailabilityProbe({ baseUrl: config.base_url, healthPath: config.health_path });
}

export function createLocalTierClient(config: LocalTierConfig): LlmClient {
  return new OpenAiClient({
    model: config.model,
    baseURL: config.base_url,
    apiKey: config.api_key ?? LOCAL_API_KEY_PLACEHOLDER,
  });
}

export function createCloudTierClient(config: CloudTierConfig): LlmClient {
  switch (config.provider) {
    case "anthropic":
      return new AnthropicClient({ model: config.model, baseURL: config.base_url });
    case "openai":
      return new OpenAiClient({ model: config.model, baseURL: config.base_url });
  }
}

// Defers construction so a missing cloud key only fails a run that reaches that tier.
export function lazyClient(create: () => LlmClient): LlmClient {
  let client: LlmClient | undefined;
  return {
    async complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult> {
      client ??= create();
      return client.complete(prompt, options);
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveLogger(options: SentinelFactoryOptions): { log: EventLogger; close: () => void } {
  if (options.log) {
    return { log: options.log, close: () => undefined };
  }

  const logger = new JsonlLogger(path.join(options.config.logs_dir, SENTINEL_LOG_FILE), {
    runId: options.runId ?? defaultRunId(),
    debug: options.debug,
  });
  return { log: logger, close: () => logger.close() };
}
