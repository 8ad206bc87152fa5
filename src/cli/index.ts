import { Command } from "commander";

import { loadConfigForCli } from "./config.js";
import { injectCommand } from "./inject.js";
import { probeCommand } from "./probe.js";
import { runCommand } from "./run.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  const resolveConfig = () => loadConfigForCli({ explicitConfigPath: program.opts<GlobalOptions>().config }).config;

  program
    .name("wave-sentinel")
    .description("Per-task validation gate for wave-based build plans")
    .version("0.1.0")
    .option("--config <path>", "Project config path (default: .sentinel/config.yaml)")
    .option("--debug", "Show error codes, causes, and stack traces", false);

  program
    .command("inject")
    .description("Add a sentinel task after every task in the plan file")
    .option("--dry-run", "Print the expanded plan instead of writing it", false)
    .action(async (opts: { dryRun: boolean }) => {
      await injectCommand(resolveConfig(), { dryRun: opts.dryRun });
    });

  program
    .command("run")
    .description("Validate one task through its sentinel task")
    .argument("<taskId>", "Sentinel task id (e.g. SENTINEL-T3)")
    .option("--decision <choice>", "Answer for human-gated cascades: auto-apply, review-and-halt, or halt")
    .option("--run-id <id>", "Run id stamped on log events (default: timestamp)")
    .action(async (taskId: string, opts: { decision?: string; runId?: string }) => {
      await runCommand(resolveConfig(), taskId, {
        decision: opts.decision,
        runId: opts.runId,
        debug: program.opts<GlobalOptions>().debug,
      });
    });

  program
    .command("probe")
    .description("Check whether the local repair tier is reachable")
    .action(async () => {
      const available = await probeCommand(resolveConfig());
      if (!available) process.exitCode = 1;
    });

  return program;
}
