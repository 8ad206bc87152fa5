/**
 * Git-backed sentinel VCS adapter.
 * Purpose: map SentinelVcs calls onto working-tree snapshots and tree diffs.
 * Assumptions: git is available and repoPath is a local work tree.
 * Usage: createGitSentinelVcs({ repoPath, exclude: [artifactsDir, logsDir] })
 */

import path from "node:path";

import { diffTrees, readFileAtTree, snapshotWorkingTree } from "../git/snapshots.js";

import type { SentinelVcs } from "./types.js";

export type GitSentinelVcsOptions = {
  repoPath: string;
  // Absolute or repo-relative paths; anything outside the repo is ignored.
  exclude?: string[];
};

export function createGitSentinelVcs(options: GitSentinelVcsOptions): SentinelVcs {
  const { repoPath } = options;
  const exclude = (options.exclude ?? [])
    .map((entry) => (path.isAbsolute(entry) ? path.relative(repoPath, entry) : entry))
    .filter((entry) => entry.length > 0 && !entry.startsWith(".."));

  return {
    snapshot: () => snapshotWorkingTree(repoPath, { exclude }),

    diffSince: async (snapshot) => {
      const current = await snapshotWorkingTree(repoPath, { exclude });
      const diff = await diffTrees(repoPath, snapshot, current);
      const contents = await Promise.all(
        diff.files.map(async (file) => ({
          path: file.path,
          before: file.binary ? null : await readFileAtTree(repoPath, snapshot, file.path),
          after: file.binary ? null : await readFileAtTree(repoPath, current, file.path),
        })),
      );
      return { patch: diff.patch, files: diff.files, contents };
    },
  };
}
