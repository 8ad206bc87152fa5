import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";
import { z, type ZodIssue } from "zod";

import { TaskError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const SENTINEL_AGENT_ROLE = "Sentinel";

export const TaskStatusSchema = z.enum(["pending", "done"]);

export const TaskSchema = z
  .object({
    id: z.string().min(1),
    agent_role: z.string().min(1),
    dependencies: z.array(z.string()).default([]),
    status: TaskStatusSchema.default("pending"),
  })
  .strict();

export const WaveSchema = z
  .object({
    id: z.string().min(1),
    file_locks: z.array(z.string()).default([]),
    tasks: z.array(TaskSchema).default([]),
  })
  .strict();

export const ExecutionPlanSchema = z
  .object({
    waves: z.array(WaveSchema).default([]),
  })
  .strict();

export type TaskStatus = z.infer<typeof TaskStatusSchema>;
export type Task = z.infer<typeof TaskSchema>;
export type Wave = z.infer<typeof WaveSchema>;
export type ExecutionPlan = z.infer<typeof ExecutionPlanSchema>;

export type TaskIndexEntry = {
  task: Task;
  waveId: string;
  position: number;
};

// =============================================================================
// TASK HELPERS
// =============================================================================

export function isSentinelTask(task: Pick<Task, "agent_role">): boolean {
  return task.agent_role === SENTINEL_AGENT_ROLE;
}

export function sentinelTaskId(parentId: string): string {
  return `SENTINEL-${parentId}`;
}

export function normalizeTask(task: Task): Task {
  return {
    ...task,
    id: task.id.trim(),
    agent_role: task.agent_role.trim(),
    dependencies: normalizeStringList(task.dependencies),
  };
}

// =============================================================================
// TASK INDEX
// =============================================================================

// Flat id -> task store; sentinel tasks reach their parent through lookups, never object links.
export class TaskIndex {
  private readonly entries = new Map<string, TaskIndexEntry>();

  constructor(plan: ExecutionPlan) {
    let position = 0;
    for (const wave of plan.waves) {
      for (const task of wave.tasks) {
        if (this.entries.has(task.id)) {
          throw new TaskError(`Duplicate task id in execution plan: ${task.id}`);
        }
        this.entries.set(task.id, { task, waveId: wave.id, position });
        position += 1;
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(taskId: string): TaskIndexEntry | undefined {
    return this.entries.get(taskId);
  }

  require(taskId: string): TaskIndexEntry {
    const entry = this.entries.get(taskId);
    if (!entry) {
      throw new TaskError(`Task ${taskId} is not part of the execution plan.`);
    }
    return entry;
  }

  // A sentinel task has exactly one dependency: the regular task it validates.
  parentOf(task: Task): TaskIndexEntry {
    const [parentId, ...rest] = task.dependencies;
    if (!isSentinelTask(task) || parentId === undefined || rest.length > 0) {
      throw new TaskError(
        `Task ${task.id} is not a sentinel task with a single parent dependency.`,
      );
    }
    return this.require(parentId);
  }
}

// =============================================================================
// LOAD / SAVE
// =============================================================================

export async function loadExecutionPlan(planPath: string): Promise<ExecutionPlan> {
  const absolutePath = path.resolve(planPath);
  if (!(await fse.pathExists(absolutePath))) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.task,
      title: "Execution plan missing.",
      message: `Execution plan not found at ${absolutePath}.`,
      hint: "Point plan_file in the sentinel config at the orchestrator's wave plan.",
    });
  }

  const raw = await fse.readFile(absolutePath, "utf8");
  let doc: unknown;
  try {
    doc = isJsonPath(absolutePath) ? JSON.parse(raw) : yaml.load(raw);
  } catch (err) {
    throw new TaskError(`Failed to parse execution plan at ${absolutePath}`, err);
  }

  const parsed = ExecutionPlanSchema.safeParse(doc ?? {});
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.task,
      title: "Execution plan invalid.",
      message: `Execution plan at ${absolutePath} is invalid.`,
      hint: "Fix the plan file and rerun.",
      cause: new TaskError(formatPlanIssues(parsed.error.issues).join("\n")),
    });
  }

  return normalizeExecutionPlan(parsed.data);
}

export async function saveExecutionPlan(planPath: string, plan: ExecutionPlan): Promise<void> {
  const absolutePath = path.resolve(planPath);
  const content = isJsonPath(absolutePath)
    ? `${JSON.stringify(plan, null, 2)}\n`
    : yaml.dump(plan, { noRefs: true, lineWidth: 120 });

  const tmpPath = `${absolutePath}.tmp`;
  await fse.outputFile(tmpPath, content, "utf8");
  await fse.move(tmpPath, absolutePath, { overwrite: true });
}

export function normalizeExecutionPlan(plan: ExecutionPlan): ExecutionPlan {
  return {
    waves: plan.waves.map((wave) => ({
      id: wave.id.trim(),
      file_locks: normalizeStringList(wave.file_locks),
      tasks: wave.tasks.map(normalizeTask),
    })),
  };
}

export function formatPlanIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${location}: ${issue.message}`;
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function isJsonPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".json";
}

function normalizeStringList(values?: string[]): string[] {
  return Array.from(
    new Set((values ?? []).map((v) => v.trim()).filter((v) => v.length > 0)),
  ).sort();
}
