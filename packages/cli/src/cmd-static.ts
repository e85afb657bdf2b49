/**
 * argwise static - write the static snapshot of a CLI module
 */
import * as fs from "node:fs";
import * as path from "node:path";
import type { Cli } from "@argwise/core";
import { loadCli, reportLoadError } from "./load.js";

export async function runStatic(modulePath: string, output: string): Promise<number> {
  let cli: Cli;
  try {
    cli = await loadCli(modulePath);
  } catch (e) {
    return reportLoadError(e);
  }

  try {
    fs.mkdirSync(path.dirname(path.resolve(output)), { recursive: true });
    cli.toStatic(output);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error writing file: ${msg}`);
    return 4;
  }

  const data = cli.toStaticJson();
  const subcommands = Object.values(data.subcommands).reduce((n, subs) => n + Object.keys(subs).length, 0);
  console.log(`Wrote ${output} (${Object.keys(data.commands).length} commands, ${subcommands} subcommands)`);
  return 0;
}
