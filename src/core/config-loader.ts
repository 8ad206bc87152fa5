/*
Purpose: read .sentinel/config.yaml into a validated ProjectConfig with absolute paths.
Assumptions: the config is small and read once per CLI invocation, so IO is synchronous.
Usage: loadProjectConfig(resolveConfigPath(process.cwd(), opts.config)).
*/

import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const DEFAULT_CONFIG_RELATIVE_PATH = path.join(".sentinel", "config.yaml");

// ${NAME} or ${NAME:-fallback}
const ENV_REFERENCE = /\$\{([A-Z0-9_]+)(?::-([^}]*))?\}/gi;

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConfigPath(cwd: string, explicitPath?: string): string {
  return explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, DEFAULT_CONFIG_RELATIVE_PATH);
}

export function loadProjectConfig(configPath: string): ProjectConfig {
  const file = path.resolve(configPath);
  if (!fs.existsSync(file)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `Project config not found at ${file}.`,
      hint: "Create .sentinel/config.yaml in the repo or pass --config <path>.",
    });
  }

  try {
    const document = expandEnv(parseYaml(file) ?? {}, file, []);
    const parsed = ProjectConfigSchema.safeParse(document);
    if (!parsed.success) {
      throw new ConfigError(`Invalid project config at ${file}:\n${formatIssues(parsed.error.issues)}`, parsed.error);
    }
    return anchorPaths(parsed.data, path.dirname(file));
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `Project config at ${file} is invalid.`,
      hint: "Fix the config file and rerun.",
      cause: err,
    });
  }
}

// =============================================================================
// STAGES
// =============================================================================

function parseYaml(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read project config at ${file}`, err);
  }

  try {
    return yaml.load(raw);
  } catch (err) {
    const where = err instanceof yaml.YAMLException ? ` (line ${err.mark.line + 1}, column ${err.mark.column + 1})` : "";
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML config at ${file}${where}: ${detail}`, err);
  }
}

function expandEnv(value: unknown, file: string, trail: string[]): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_REFERENCE, (_match, name: string, fallback: string | undefined) => {
      const resolved = process.env[name] ?? fallback;
      if (resolved === undefined) {
        const location = trail.length > 0 ? trail.join(".") : "<root>";
        throw new ConfigError(`Environment variable ${name} is not set but is referenced in ${file} (${location}).`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => expandEnv(item, file, [...trail, String(index)]));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, expandEnv(item, file, [...trail, key])]),
    );
  }
  return value;
}

// repo_path is relative to the config file; every other path is relative to the repo.
function anchorPaths(config: ProjectConfig, configDir: string): ProjectConfig {
  const repo = path.resolve(configDir, config.repo_path);
  return {
    ...config,
    repo_path: repo,
    plan_file: path.resolve(repo, config.plan_file),
    tasks_file: path.resolve(repo, config.tasks_file),
    artifacts_dir: path.resolve(repo, config.artifacts_dir),
    logs_dir: path.resolve(repo, config.logs_dir),
  };
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${describeIssue(issue)}`).join("\n");
}

function describeIssue(issue: ZodIssue): string {
  switch (issue.code) {
    case "invalid_type":
      return `Expected ${issue.expected}, received ${issue.received}`;
    case "invalid_enum_value":
      return `Expected one of ${issue.options.map((option) => JSON.stringify(option)).join(", ")}, received ${JSON.stringify(issue.received)}`;
    case "unrecognized_keys":
      return `Unrecognized keys: ${issue.keys.join(", ")}`;
    default:
      return issue.message;
  }
}
