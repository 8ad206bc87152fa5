import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

export type RepairPromptValues = {
  task_id: string;
  parent_task_id: string;
  repo_path: string;
  tier: number;
  iteration: number;
  exit_code: number;
  command: string;
  failure_output: string;
  file_context: string;
};

const REPAIR_TEMPLATE = "sentinel-repair.md";

let repairTemplate: Handlebars.TemplateDelegate<RepairPromptValues> | undefined;

// Strict mode throws on a missing field. Failure output is inserted verbatim, braces and all.
export async function renderRepairPrompt(values: RepairPromptValues): Promise<string> {
  repairTemplate ??= Handlebars.compile<RepairPromptValues>(
    await fse.readFile(await resolveTemplatePath(REPAIR_TEMPLATE), "utf8"),
    { noEscape: true, strict: true },
  );
  return repairTemplate(values).trim();
}

// templates/ sits at the package root, above both src/ and dist/src/.
async function resolveTemplatePath(fileName: string): Promise<string> {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, "templates", "prompts", fileName);
    if (await fse.pathExists(candidate)) return candidate;

    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`Prompt template ${fileName} not found above ${fileURLToPath(import.meta.url)}`);
    }
    dir = parent;
  }
}
