import type { ProjectConfig } from "../core/config.js";
import { loadProjectConfig, resolveConfigPath } from "../core/config-loader.js";

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

// --config wins; otherwise <cwd>/.sentinel/config.yaml.
export function loadConfigForCli(args: LoadConfigForCliArgs): {
  config: ProjectConfig;
  configPath: string;
} {
  const configPath = resolveConfigPath(args.cwd ?? process.cwd(), args.explicitConfigPath);
  return { config: loadProjectConfig(configPath), configPath };
}
