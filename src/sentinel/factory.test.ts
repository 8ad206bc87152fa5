import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { ProjectConfigSchema, type ProjectConfig } from "../core/config.js";
import type { LlmClient, LlmCompletionResult } from "../llm/client.js";

import { FakeVcs, ScriptedCheck, StaticProbe, twoWavePlan } from "./__tests__/fakes.js";
import { createSentinel, lazyClient } from "./factory.js";
import { MANIFEST_FILE } from "./manifest-writer.js";

const tempDirs: string[] = [];

function buildConfig(overrides: { enabled?: boolean } = {}): ProjectConfig {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "sentinel-factory-"));
  tempDirs.push(root);
  return ProjectConfigSchema.parse({
    repo_path: root,
    plan_file: path.join(root, "plan.yaml"),
    tasks_file: path.join(root, "TASKS.md"),
    artifacts_dir: path.join(root, "runs"),
    logs_dir: path.join(root, "logs"),
    validation: { command: "npm test" },
    sentinel: { enabled: overrides.enabled ?? true },
  });
}

const NO_EDITS: LlmCompletionResult = {
  text: "",
  parsed: { summary: "nothing to change", edits: [] },
  finishReason: "stop",
  usage: { inputTokens: 1000, outputTokens: 1000 },
};

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("createSentinel", () => {
  it("wires the cloud tier's token rates and the artifacts directory", async () => {
    const config = buildConfig();
    const tier2: LlmClient = { complete: vi.fn(async () => NO_EDITS) };
    const sentinel = await createSentinel({
      config,
      log: { log: vi.fn() },
      plan: twoWavePlan(),
      vcs: new FakeVcs(),
      probe: new StaticProbe(false),
      check: new ScriptedCheck([false, true]),
      clients: { tier2 },
    });

    const outcome = await sentinel.runner.run({
      id: "SENTINEL-T1",
      agent_role: "Sentinel",
      dependencies: ["T1"],
      status: "pending",
    });
    sentinel.close();

    expect(outcome.manifest).toMatchObject({ result: "PASS", tier_used: 2, cost_usd: 0.018 });
    expect(outcome.manifestDir).toBe(path.join(config.artifacts_dir, "SENTINEL-T1"));
    expect(fs.existsSync(path.join(outcome.manifestDir, MANIFEST_FILE))).toBe(true);
    expect(tier2.complete).toHaveBeenCalledTimes(1);
  });

  it("hands the enabled flag to the injector", async () => {
    const config = buildConfig({ enabled: false });
    const sentinel = await createSentinel({ config, log: { log: vi.fn() }, plan: twoWavePlan() });

    const plan = await sentinel.injector.injectPlan(sentinel.plan);

    expect(plan).toEqual(twoWavePlan());
    expect(fs.existsSync(config.tasks_file)).toBe(false);
  });
});

describe("lazyClient", () => {
  it("builds the client on first use only", async () => {
    const create = vi.fn((): LlmClient => ({ complete: async () => NO_EDITS }));
    const client = lazyClient(create);

    expect(create).not.toHaveBeenCalled();
    await client.complete("a");
    await client.complete("b");
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("surfaces construction failures as rejections", async () => {
    const client = lazyClient(() => {
      throw new Error("ANTHROPIC_API_KEY missing");
    });

    await expect(client.complete("a")).rejects.toThrow("ANTHROPIC_API_KEY missing");
  });
});
