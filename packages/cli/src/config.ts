/**
 * argwise project configuration
 *
 * Precedence: ./argwise.config.json > ~/.argwise/config.json > defaults.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";

export const PROJECT_CONFIG_FILE = "argwise.config.json";

export const configSchema = z
  .object({
    title: z.string().optional(),
    description: z.string().optional(),
    comment: z.string().nullable().optional(),
    pathRoot: z.string().optional(),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;

export type ConfigSource = "project" | "user" | "default";

export interface ResolvedConfig {
  config: Config;
  source: ConfigSource;
  path: string | null;
}

export const DEFAULT_CONFIG: Config = {};

export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectDir = cwd ?? process.cwd();
  const projectPath = path.join(projectDir, PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".argwise", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: withAbsoluteRoot(projectConfig, projectDir), source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: withAbsoluteRoot(userConfig, projectDir), source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

// A relative pathRoot is taken from the project directory.
function withAbsoluteRoot(config: Config, projectDir: string): Config {
  if (config.pathRoot === undefined) return config;
  return { ...config, pathRoot: path.resolve(projectDir, config.pathRoot) };
}

function tryLoadConfigFile(filePath: string): Config | null {
  if (!fs.existsSync(filePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch {
    return null;
  }
  const result = configSchema.safeParse(data);
  return result.success ? result.data : null;
}
