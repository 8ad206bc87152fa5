import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { TaskError, UserFacingError } from "./errors.js";
import { TaskIndex, loadExecutionPlan, saveExecutionPlan, type ExecutionPlan } from "./plan.js";

const tempDirs: string[] = [];

function tempPath(name: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "plan-"));
  tempDirs.push(dir);
  return path.join(dir, name);
}

const PLAN: ExecutionPlan = {
  waves: [
    {
      id: "wave-1",
      file_locks: ["src/api/**"],
      tasks: [
        { id: "T1", agent_role: "Builder", dependencies: [], status: "done" },
        { id: "SENTINEL-T1", agent_role: "Sentinel", dependencies: ["T1"], status: "pending" },
      ],
    },
  ],
};

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("loadExecutionPlan", () => {
  it("normalizes ids, locks, and defaults from YAML", async () => {
    const planPath = tempPath("plan.yaml");
    fs.writeFileSync(
      planPath,
      [
        "waves:",
        "  - id: ' wave-1 '",
        "    file_locks: ['src/b.ts', 'src/a.ts', 'src/b.ts']",
        "    tasks:",
        "      - id: T1",
        "        agent_role: Builder",
      ].join("\n"),
    );

    expect(await loadExecutionPlan(planPath)).toEqual({
      waves: [
        {
          id: "wave-1",
          file_locks: ["src/a.ts", "src/b.ts"],
          tasks: [{ id: "T1", agent_role: "Builder", dependencies: [], status: "pending" }],
        },
      ],
    });
  });

  it("reads back what saveExecutionPlan wrote, in JSON too", async () => {
    const planPath = tempPath("plan.json");

    await saveExecutionPlan(planPath, PLAN);

    expect(await loadExecutionPlan(planPath)).toEqual(PLAN);
  });

  it("reports a missing plan as a user-facing error", async () => {
    const error = await loadExecutionPlan(tempPath("absent.yaml")).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error instanceof UserFacingError && error.title).toBe("Execution plan missing.");
  });

  it("reports schema problems as a user-facing error", async () => {
    const planPath = tempPath("plan.yaml");
    fs.writeFileSync(planPath, "waves:\n  - id: wave-1\n    tasks:\n      - id: T1\n");

    const error = await loadExecutionPlan(planPath).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error instanceof UserFacingError && error.title).toBe("Execution plan invalid.");
  });
});

describe("TaskIndex", () => {
  it("finds a sentinel task's parent and wave", () => {
    const index = new TaskIndex(PLAN);
    const sentinel = index.require("SENTINEL-T1").task;

    expect(index.parentOf(sentinel)).toEqual({ task: PLAN.waves[0]?.tasks[0], waveId: "wave-1", position: 0 });
  });

  it("rejects regular tasks as sentinel tasks", () => {
    const index = new TaskIndex(PLAN);

    expect(() => index.parentOf(index.require("T1").task)).toThrow(TaskError);
  });

  it("rejects duplicate ids and unknown lookups", () => {
    const wave = PLAN.waves[0];
    if (!wave) throw new Error("fixture");

    expect(() => new TaskIndex({ waves: [wave, { ...wave, id: "wave-2" }] })).toThrow(
      "Duplicate task id in execution plan: T1",
    );
    expect(() => new TaskIndex(PLAN).require("T9")).toThrow("Task T9 is not part of the execution plan.");
  });
});
