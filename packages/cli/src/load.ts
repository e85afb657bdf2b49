/**
 * Loads a user module that exports a Cli.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { Cli, CliError } from "@argwise/core";

export const CLI_EXPORTS = ["default", "cli"] as const;

export async function loadCli(modulePath: string): Promise<Cli> {
  const resolved = path.resolve(modulePath);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw new CliError(`Module not found: ${modulePath}`, "E_IO");
  }

  const mod: unknown = await import(pathToFileURL(resolved).href);
  if (typeof mod === "object" && mod !== null) {
    for (const name of CLI_EXPORTS) {
      const value: unknown = Reflect.get(mod, name);
      if (value instanceof Cli) return value;
    }
  }
  throw new CliError(
    `Module ${modulePath} does not export a Cli as ${CLI_EXPORTS.map((n) => `'${n}'`).join(" or ")}`,
    "E_MODULE"
  );
}

/**
 * Prints a load failure and returns its exit code: 4 for I/O, 2 for a module
 * that fails to evaluate or exports no Cli.
 */
export function reportLoadError(e: unknown): number {
  const msg = e instanceof Error ? e.message : String(e);
  console.error(`Error loading module: ${msg}`);
  return e instanceof CliError && e.code === "E_IO" ? 4 : 2;
}
