export { AvailabilityProbe, type FetchLike } from "./availability-probe.js";
export {
  CASCADE_WARNING_MARKER,
  CascadeAnalyzer,
  StaticDecisionChannel,
  buildCascadeWarningBlock,
  parseCascadeDecision,
} from "./cascade.js";
export { countChangedLines, evaluateChangeRadius, radiusBudgetsFromConfig } from "./change-radius.js";
export { ManifestWriteError, SentinelBootstrapError, WaveHaltError } from "./errors.js";
export { createInjector, createProbe, createSentinel, type Sentinel, type SentinelFactoryOptions } from "./factory.js";
export { createGitSentinelVcs } from "./git-vcs.js";
export { SentinelInjector, buildSentinelTask } from "./injector.js";
export { computeInterfaceReport, countInterfaceChanges } from "./interface-diff.js";
export { MANIFEST_FILE, ManifestWriter, PATCH_FILE, SUMMARY_FILE } from "./manifest-writer.js";
export { LlmRepairAgent, tokenCost } from "./repair-agent.js";
export { SentinelRunner, type SentinelRunnerDeps } from "./runner.js";
export { formatSentinelSummary } from "./summary.js";
export { TierExecutor, tier1Policy, tier2Policy } from "./tier-executor.js";
export type * from "./types.js";
export { CASCADE_DECISIONS } from "./types.js";
export { CommandValidationCheck } from "./validation.js";
