/*
Purpose: persist the sentinel audit triple (diff.patch, summary.md, manifest.json).
Assumptions: one directory per sentinel task id; manifest.json lands last so its presence marks a complete triple.
Usage: const dir = await writer.write({ manifest, patch, reports })
*/

import path from "node:path";

import fse from "fs-extra";

import type { EventLogger } from "../core/logger.js";

import { ManifestWriteError } from "./errors.js";
import { formatSentinelSummary } from "./summary.js";
import type { InterfaceReport, SentinelManifest } from "./types.js";

export const MANIFEST_FILE = "manifest.json";
export const PATCH_FILE = "diff.patch";
export const SUMMARY_FILE = "summary.md";

export type ManifestWriteInput = {
  manifest: SentinelManifest;
  patch: string;
  reports: InterfaceReport[];
  // Fault that ended the run, carried into ManifestWriteError if the write also fails.
  fault?: unknown;
};

export type ManifestWriterOptions = {
  artifactsDir: string;
  log?: EventLogger;
};

export class ManifestWriter {
  constructor(private readonly options: ManifestWriterOptions) {}

  manifestDir(taskId: string): string {
    return path.join(this.options.artifactsDir, taskId);
  }

  async write(input: ManifestWriteInput): Promise<string> {
    const dir = this.manifestDir(input.manifest.task_id);

    try {
      await fse.ensureDir(dir);
      await writeFileAtomic(path.join(dir, PATCH_FILE), input.patch);
      await writeFileAtomic(
        path.join(dir, SUMMARY_FILE),
        formatSentinelSummary({ manifest: input.manifest, reports: input.reports }),
      );
      await writeFileAtomic(path.join(dir, MANIFEST_FILE), `${JSON.stringify(input.manifest, null, 2)}\n`);
    } catch (err) {
      throw new ManifestWriteError({
        manifestDir: dir,
        manifest: input.manifest,
        cause: err,
        fault: input.fault,
      });
    }

    this.options.log?.log({
      type: "manifest.write",
      taskId: input.manifest.task_id,
      payload: { dir, result: input.manifest.result },
    });
    return dir;
  }
}

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fse.writeFile(tmpPath, content, "utf8");
    await fse.move(tmpPath, filePath, { overwrite: true });
  } finally {
    await fse.remove(tmpPath);
  }
}
