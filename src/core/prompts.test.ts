import { describe, expect, it } from "vitest";

import { renderRepairPrompt, type RepairPromptValues } from "./prompts.js";

const values: RepairPromptValues = {
  task_id: "SENTINEL-T1",
  parent_task_id: "T1",
  repo_path: "/workspace/sample",
  tier: 2,
  iteration: 3,
  exit_code: 1,
  command: "npm test",
  failure_output: "FAIL src/math.test.ts > adds",
  file_context: "### src/math.ts\n\n```\nexport const add = (a, b) => a - b;\n```",
};

describe("renderRepairPrompt", () => {
  it("fills in the gate, tier, and failure details", async () => {
    const prompt = await renderRepairPrompt(values);

    expect(prompt).toContain("Task under validation: T1 (gate SENTINEL-T1)");
    expect(prompt).toContain("Repair tier: 2, iteration 3");
    expect(prompt).toContain("failed with exit code 1:");
    expect(prompt).toContain("```\nFAIL src/math.test.ts > adds\n```");
    expect(prompt).toContain("export const add = (a, b) => a - b;");
  });

  it("keeps template syntax that appears in the failure output", async () => {
    const prompt = await renderRepairPrompt({
      ...values,
      failure_output: "Expected <h1>{{title}}</h1> to render",
    });

    expect(prompt).toContain("Expected <h1>{{title}}</h1> to render");
  });
});
