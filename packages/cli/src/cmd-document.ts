/**
 * argwise document - Markdown documentation for a CLI module
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { documentCli } from "@argwise/core";
import type { Cli, DocumentOptions } from "@argwise/core";
import { loadCli, reportLoadError } from "./load.js";
import { resolveConfig } from "./config.js";

export interface DocumentCommandOptions {
  title?: string;
  description?: string;
  /** A string replaces the header comment; false drops it. */
  comment?: string | false;
  pathRoot?: string;
  output?: string;
  cwd?: string;
  homeDir?: string;
}

export async function runDocument(modulePath: string, opts: DocumentCommandOptions = {}): Promise<number> {
  let cli: Cli;
  try {
    cli = await loadCli(modulePath);
  } catch (e) {
    return reportLoadError(e);
  }

  const { config } = resolveConfig(opts.cwd, opts.homeDir);
  const options: DocumentOptions = {
    title: opts.title ?? config.title,
    description: opts.description ?? config.description,
    comment: opts.comment === false ? null : opts.comment ?? config.comment,
    pathRoot: opts.pathRoot ?? config.pathRoot,
  };
  const markdown = documentCli(cli, options);

  if (!opts.output) {
    console.log(markdown);
    return 0;
  }

  try {
    fs.mkdirSync(path.dirname(path.resolve(opts.output)), { recursive: true });
    fs.writeFileSync(opts.output, markdown + "\n", "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error writing file: ${msg}`);
    return 4;
  }
  console.error(`Wrote ${opts.output}`);
  return 0;
}
