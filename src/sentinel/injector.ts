/*
Purpose: expand a task plan so every regular task is followed by its Sentinel task.
Assumptions: plan order is execution order within a wave; the sentinel stays in its parent's wave.
Usage: await new SentinelInjector({ enabled, taskList }).injectPlan(plan)
*/

import {
  SENTINEL_AGENT_ROLE,
  isSentinelTask,
  sentinelTaskId,
  type ExecutionPlan,
  type Task,
} from "../core/plan.js";
import {
  containsChecklistEntry,
  formatChecklistLine,
  type TaskListStore,
} from "../core/task-list.js";

import { SentinelBootstrapError } from "./errors.js";

export type SentinelInjectorOptions = {
  enabled: boolean;
  taskList?: TaskListStore;
};

export function buildSentinelTask(parent: Task): Task {
  return {
    id: sentinelTaskId(parent.id),
    agent_role: SENTINEL_AGENT_ROLE,
    dependencies: [parent.id],
    status: "pending",
  };
}

export function sentinelChecklistDescription(parentId: string): string {
  return `validate ${parentId} (tests, change radius, audit manifest)`;
}

export class SentinelInjector {
  constructor(private readonly options: SentinelInjectorOptions) {}

  async inject(tasks: Task[]): Promise<Task[]> {
    if (!this.options.enabled) {
      assertNoSentinelTasks(tasks);
      return tasks;
    }

    const { tasks: expanded, created } = expandTasks(tasks);
    await this.recordChecklist(created);
    return expanded;
  }

  async injectPlan(plan: ExecutionPlan): Promise<ExecutionPlan> {
    if (!this.options.enabled) {
      assertNoSentinelTasks(plan.waves.flatMap((wave) => wave.tasks));
      return plan;
    }

    const created: Task[] = [];
    const validated = collectValidatedParents(plan);
    const waves = plan.waves.map((wave) => {
      const result = expandTasks(wave.tasks, validated);
      created.push(...result.created);
      return { ...wave, tasks: result.tasks };
    });

    await this.recordChecklist(created);
    return { waves };
  }

  private async recordChecklist(created: Task[]): Promise<void> {
    const taskList = this.options.taskList;
    if (!taskList || created.length === 0) return;

    const content = await taskList.read();
    const lines = created
      .filter((task) => !containsChecklistEntry(content, task.id))
      .map((task) => {
        const parentId = task.dependencies[0] ?? task.id;
        return formatChecklistLine(task.id, sentinelChecklistDescription(parentId));
      });

    await taskList.appendLines(lines);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function expandTasks(
  tasks: Task[],
  validated: Set<string> = collectValidatedParentsFromTasks(tasks),
): { tasks: Task[]; created: Task[] } {
  const output: Task[] = [];
  const created: Task[] = [];

  for (const task of tasks) {
    output.push(task);
    if (isSentinelTask(task) || validated.has(task.id)) continue;

    const sentinel = buildSentinelTask(task);
    output.push(sentinel);
    created.push(sentinel);
    validated.add(task.id);
  }

  return { tasks: output, created };
}

function collectValidatedParents(plan: ExecutionPlan): Set<string> {
  return collectValidatedParentsFromTasks(plan.waves.flatMap((wave) => wave.tasks));
}

function collectValidatedParentsFromTasks(tasks: Task[]): Set<string> {
  const parents = new Set<string>();
  for (const task of tasks) {
    if (!isSentinelTask(task)) continue;
    for (const dependency of task.dependencies) {
      parents.add(dependency);
    }
  }
  return parents;
}

function assertNoSentinelTasks(tasks: Task[]): void {
  const sentinelIds = tasks.filter(isSentinelTask).map((task) => task.id);
  if (sentinelIds.length > 0) {
    throw new SentinelBootstrapError(sentinelIds);
  }
}
