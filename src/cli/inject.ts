import type { ProjectConfig } from "../core/config.js";
import { isSentinelTask, loadExecutionPlan, saveExecutionPlan, type ExecutionPlan } from "../core/plan.js";
import { createInjector } from "../sentinel/factory.js";
import { SentinelInjector } from "../sentinel/injector.js";

export type InjectCommandOptions = {
  dryRun?: boolean;
};

export async function injectCommand(config: ProjectConfig, opts: InjectCommandOptions = {}): Promise<number> {
  const plan = await loadExecutionPlan(config.plan_file);
  // A dry run leaves the checklist alone too.
  const injector = opts.dryRun
    ? new SentinelInjector({ enabled: config.sentinel.enabled })
    : createInjector(config);
  const expanded = await injector.injectPlan(plan);
  const added = countSentinelTasks(expanded) - countSentinelTasks(plan);

  if (opts.dryRun) {
    console.log(JSON.stringify(expanded, null, 2));
    return added;
  }

  if (added > 0) {
    await saveExecutionPlan(config.plan_file, expanded);
  }
  console.log(
    config.sentinel.enabled
      ? `Injected ${added} sentinel task(s) into ${config.plan_file}.`
      : "Sentinel is disabled; plan left unchanged.",
  );
  return added;
}

export function countSentinelTasks(plan: ExecutionPlan): number {
  return plan.waves.reduce((sum, wave) => sum + wave.tasks.filter(isSentinelTask).length, 0);
}
