#!/usr/bin/env node
import { pathToFileURL } from "node:url";

import { CommanderError } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// Commander reports these through exceptions once exitOverride is on.
const QUIET_EXIT_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

export async function main(argv: string[]): Promise<void> {
  const program = buildCli()
    .configureOutput({ outputError: () => undefined })
    .exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && QUIET_EXIT_CODES.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }

    // Parsing may fail before options are populated, so argv wins over opts().
    const debug = debugFlagFromArgv(argv) ?? Boolean(program.opts<{ debug?: boolean }>().debug);
    console.error(renderCliError(error, { debug }));
    process.exitCode = error instanceof CommanderError && error.exitCode !== 0 ? error.exitCode : 1;
  }
}

function debugFlagFromArgv(argv: string[]): boolean | undefined {
  const end = argv.indexOf("--");
  const flags = (end === -1 ? argv : argv.slice(0, end)).filter(
    (arg) => arg === "--debug" || arg === "--no-debug",
  );
  const last = flags[flags.length - 1];
  return last === undefined ? undefined : last === "--debug";
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await main(process.argv);
}
