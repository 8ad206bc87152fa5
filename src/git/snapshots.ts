// Working-tree snapshots.
// Purpose: capture the full working tree (tracked + untracked, minus ignored) as a tree object
// without touching HEAD, the real index, or the files themselves, then diff later states against it.

import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

import { git, resolveGitDir } from "./git.js";

// =============================================================================
// TYPES
// =============================================================================

export type ChangedFileStat = {
  path: string;
  added: number;
  removed: number;
  binary: boolean;
};

export type TreeDiff = {
  fromTree: string;
  toTree: string;
  patch: string;
  files: ChangedFileStat[];
};

export type SnapshotOptions = {
  // Repo-relative paths left out of snapshots (sentinel artifacts, logs).
  exclude?: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function snapshotWorkingTree(
  repoPath: string,
  options: SnapshotOptions = {},
): Promise<string> {
  const tmpDir = await fse.mkdtemp(path.join(os.tmpdir(), "sentinel-index-"));
  const indexFile = path.join(tmpDir, "index");

  try {
    // Seeding from the real index keeps git's stat cache, so unchanged files are not rehashed.
    const realIndex = path.join(await resolveGitDir(repoPath), "index");
    if (await fse.pathExists(realIndex)) {
      await fse.copy(realIndex, indexFile);
    }

    const env = { ...process.env, GIT_INDEX_FILE: indexFile };
    await git(repoPath, ["add", "-A", "--", ".", ...buildExcludePathspecs(options.exclude)], {
      env,
    });
    const res = await git(repoPath, ["write-tree"], { env });
    return res.stdout.trim();
  } finally {
    await fse.remove(tmpDir);
  }
}

export async function diffTrees(
  repoPath: string,
  fromTree: string,
  toTree: string,
): Promise<TreeDiff> {
  if (fromTree === toTree) {
    return { fromTree, toTree, patch: "", files: [] };
  }

  // quotePath=false keeps non-ASCII names readable in patch headers; -z keeps numstat paths raw.
  const diffArgs = ["-c", "core.quotePath=false", "diff", "--no-color", "--no-ext-diff", "--no-renames"];
  const [patchRes, numstatRes] = await Promise.all([
    git(repoPath, [...diffArgs, fromTree, toTree]),
    git(repoPath, [...diffArgs, "--numstat", "-z", fromTree, toTree]),
  ]);

  return {
    fromTree,
    toTree,
    patch: patchRes.stdout,
    files: parseNumstat(numstatRes.stdout),
  };
}

export async function readFileAtTree(
  repoPath: string,
  tree: string,
  filePath: string,
): Promise<string | null> {
  const res = await git(repoPath, ["cat-file", "blob", `${tree}:${filePath}`], {
    allowExitCodes: [1, 128],
  });
  return res.exitCode === 0 ? res.stdout : null;
}

// =============================================================================
// INTERNALS
// =============================================================================

// Parses `git diff --numstat -z` output: NUL-terminated `added\tremoved\tpath` records.
export function parseNumstat(output: string): ChangedFileStat[] {
  return output
    .split("\0")
    .filter((record) => record.length > 0)
    .map((record) => {
      const [addedRaw = "", removedRaw = "", ...pathParts] = record.split("\t");
      const binary = addedRaw === "-" || removedRaw === "-";
      return {
        path: normalizePath(pathParts.join("\t")),
        added: binary ? 0 : Number.parseInt(addedRaw, 10) || 0,
        removed: binary ? 0 : Number.parseInt(removedRaw, 10) || 0,
        binary,
      };
    })
    .filter((stat) => stat.path.length > 0)
    .sort((a, b) => a.path.localeCompare(b.path));
}

function buildExcludePathspecs(exclude: string[] = []): string[] {
  return exclude
    .map((entry) => normalizePath(entry).replace(/\/+$/, ""))
    .filter((entry) => entry.length > 0 && entry !== "." && !entry.startsWith("../"))
    .map((entry) => `:(exclude)${entry}`);
}

function normalizePath(filePath: string): string {
  return filePath.split(path.sep).join("/");
}
