import { execa } from "execa";

import { GitError } from "../core/errors.js";

export type GitCommandOptions = {
  env?: NodeJS.ProcessEnv;
  // Exit codes treated as success in addition to 0 (e.g. 1 for `git diff --exit-code`).
  allowExitCodes?: number[];
};

export type GitCommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export async function git(
  cwd: string,
  args: string[],
  opts: GitCommandOptions = {},
): Promise<GitCommandResult> {
  const res = await execa("git", args, {
    cwd,
    stdio: "pipe",
    env: opts.env ?? process.env,
    extendEnv: false,
    reject: false,
    stripFinalNewline: false,
  });

  const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
  const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");
  const exitCode = res.exitCode ?? -1;

  const allowed = opts.allowExitCodes ?? [];
  if (exitCode !== 0 && !allowed.includes(exitCode)) {
    const detail = stderr.trim() || `exit code ${exitCode}`;
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${detail}`, {
      stdout,
      stderr,
    });
  }

  return { stdout, stderr, exitCode };
}

export async function resolveGitDir(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--absolute-git-dir"]);
  return res.stdout.trim();
}
