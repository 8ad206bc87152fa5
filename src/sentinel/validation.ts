import { execaCommand } from "execa";

import type { CheckResult, ValidationCheck } from "./types.js";

const MAX_OUTPUT_CHARS = 12_000;

export type CommandValidationOptions = {
  command: string;
  cwd: string;
  timeoutSeconds?: number;
  env?: NodeJS.ProcessEnv;
};

// Runs the project's test command; exit code 0 is a pass, anything else (timeouts included) a failure.
export class CommandValidationCheck implements ValidationCheck {
  constructor(private readonly options: CommandValidationOptions) {}

  async run(): Promise<CheckResult> {
    const startedAt = Date.now();
    const res = await execaCommand(this.options.command, {
      cwd: this.options.cwd,
      shell: true,
      reject: false,
      timeout: this.options.timeoutSeconds ? this.options.timeoutSeconds * 1000 : undefined,
      stdio: "pipe",
      env: this.options.env ?? process.env,
    });

    const exitCode = res.exitCode ?? -1;
    const output = tailOutput(`${res.stdout}\n${res.stderr}`.trim());
    return {
      passed: exitCode === 0 && !res.timedOut,
      exitCode,
      output: res.timedOut ? `${output}\n[timed out]`.trim() : output,
      durationMs: Date.now() - startedAt,
    };
  }
}

export function tailOutput(output: string, maxChars = MAX_OUTPUT_CHARS): string {
  if (output.length <= maxChars) return output;
  return `[...truncated ${output.length - maxChars} chars]\n${output.slice(-maxChars)}`;
}
