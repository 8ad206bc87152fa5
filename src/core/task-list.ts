/*
Purpose: persisted markdown checklist shared by the orchestrator and the sentinel.
Assumptions: one task per "- [ ]" / "- [x]" line; nested lines are indented beneath it.
Usage: store.appendLines([...]) or store.insertAfterIncomplete(block).
*/

import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

export interface TaskListStore {
  read(): Promise<string>;
  appendLines(lines: string[]): Promise<void>;
  insertAfterIncomplete(block: string[]): Promise<number>;
}

const INCOMPLETE_PATTERN = /^\s*[-*] \[ \] /;
const COMPLETE_PATTERN = /^\s*[-*] \[[xX]\] /;

// =============================================================================
// PURE HELPERS
// =============================================================================

export function isIncompleteTaskLine(line: string): boolean {
  return INCOMPLETE_PATTERN.test(line);
}

export function isCompleteTaskLine(line: string): boolean {
  return COMPLETE_PATTERN.test(line);
}

export function formatChecklistLine(taskId: string, description: string): string {
  return `- [ ] ${taskId}: ${description}`;
}

export function containsChecklistEntry(content: string, taskId: string): boolean {
  return content
    .split(/\r?\n/)
    .some(
      (line) =>
        (isIncompleteTaskLine(line) || isCompleteTaskLine(line)) &&
        line.replace(INCOMPLETE_PATTERN, "").replace(COMPLETE_PATTERN, "").startsWith(`${taskId}:`),
    );
}

export function appendLinesToContent(content: string, lines: string[]): string {
  if (lines.length === 0) return content;
  const prefix = content.length === 0 || content.endsWith("\n") ? content : `${content}\n`;
  return `${prefix}${lines.join("\n")}\n`;
}

// Existing lines are kept as-is; the block is indented under each incomplete task line.
export function insertAfterIncompleteLines(
  content: string,
  block: string[],
): { content: string; annotated: number } {
  if (block.length === 0 || content.length === 0) {
    return { content, annotated: 0 };
  }

  const eol = content.includes("\r\n") ? "\r\n" : "\n";
  const lines = content.split(eol);
  const output: string[] = [];
  let annotated = 0;

  for (const line of lines) {
    output.push(line);
    if (!isIncompleteTaskLine(line)) continue;

    const indent = `${line.match(/^\s*/)?.[0] ?? ""}  `;
    output.push(...block.map((blockLine) => `${indent}${blockLine}`));
    annotated += 1;
  }

  return { content: output.join(eol), annotated };
}

// =============================================================================
// FILE STORE
// =============================================================================

export class MarkdownTaskList implements TaskListStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(public readonly filePath: string) {}

  async read(): Promise<string> {
    if (!(await fse.pathExists(this.filePath))) return "";
    return fse.readFile(this.filePath, "utf8");
  }

  appendLines(lines: string[]): Promise<void> {
    return this.serialize(async () => {
      if (lines.length === 0) return;
      const content = await this.read();
      await this.replace(appendLinesToContent(content, lines));
    });
  }

  insertAfterIncomplete(block: string[]): Promise<number> {
    return this.serialize(async () => {
      const content = await this.read();
      const result = insertAfterIncompleteLines(content, block);
      if (result.annotated > 0) {
        await this.replace(result.content);
      }
      return result.annotated;
    });
  }

  private async replace(content: string): Promise<void> {
    const tmpPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.tmp`,
    );
    await fse.outputFile(tmpPath, content, "utf8");
    await fse.move(tmpPath, this.filePath, { overwrite: true });
  }

  // Writers for the same file are chained so concurrent sentinel runs never interleave.
  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn, fn);
    this.queue = next.catch(() => undefined);
    return next;
  }
}
