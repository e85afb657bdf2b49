/**
 * Markdown documentation for a CLI.
 */
import * as path from "node:path";
import type { Command } from "./command.js";
import type { ArgumentSpec } from "./resolver.js";
import { displayType } from "./resolver.js";
import { UNSET, isPathLike } from "./types.js";
import { collapseWhitespace } from "./format.js";

export const DEFAULT_DOCS_COMMENT = "This file is auto-generated";

export interface DocumentOptions {
  title?: string;
  description?: string;
  /** HTML comment at the top; null leaves it out. */
  comment?: string | null;
  /** Absolute path defaults are shown relative to this directory. */
  pathRoot?: string;
}

/** The parts of a CLI the renderer reads. */
export interface DocumentSource {
  prog?: string;
  help: string;
  commands: ReadonlyMap<string, Command>;
  subcommands: ReadonlyMap<string, ReadonlyMap<string, Command>>;
}

function formatDefault(spec: ArgumentSpec, pathRoot: string | undefined): string {
  if (spec.default === UNSET) return "";
  let value: string;
  if (typeof spec.default === "string" && isPathLike(spec.origType)) {
    value = spec.default;
    if (pathRoot !== undefined && path.isAbsolute(spec.default)) {
      const relative = path.relative(pathRoot, spec.default);
      // Paths outside the root stay absolute
      if (relative !== ".." && !relative.startsWith(`..${path.sep}`)) value = relative || ".";
    }
  } else {
    value = JSON.stringify(spec.default) ?? String(spec.default);
  }
  return `\`${value}\``;
}

function argumentName(spec: ArgumentSpec): string {
  const option = spec.hint.option;
  let name = `\`${option ?? spec.id}\``;
  if (spec.action === "boolean_optional" && spec.default === true && option) {
    name += `/\`--no-${option.slice(2)}\``;
  }
  if (spec.hint.short) {
    name += `, \`${spec.hint.short}\``;
  }
  return name;
}

function documentCommand(command: Command, level: number, prefix: string, pathRoot: string | undefined): string[] {
  const lines = [`${"#".repeat(level)} \`${prefix + command.displayName}\``];
  if (command.description) {
    lines.push(collapseWhitespace(command.description));
  }
  if (command.args.length > 0) {
    const header = ["Argument", "Type", "Description", "Default"];
    const rows = command.args.map((spec) => {
      const type = displayType(spec);
      return [argumentName(spec), type ? `\`${type}\`` : "", spec.hint.help ?? "", formatDefault(spec, pathRoot)];
    });
    const table = [
      `| ${header.join(" | ")} |`,
      `| ${header.map(() => "---").join(" | ")} |`,
      ...rows.map((row) => `| ${row.join(" | ")} |`),
    ];
    lines.push(table.join("\n"));
  }
  return lines;
}

export function documentCli(cli: DocumentSource, options: DocumentOptions = {}): string {
  const comment = options.comment === undefined ? DEFAULT_DOCS_COMMENT : options.comment;
  const startHeading = options.title !== undefined ? 2 : 1;
  const lines: string[] = [];
  if (comment !== null) lines.push(`<!-- ${comment} -->`);
  if (options.title !== undefined) lines.push(`# ${options.title}`);
  if (options.description !== undefined) lines.push(collapseWhitespace(options.description));

  const prefix = cli.prog ? `${cli.prog} ` : "";
  lines.push(`${"#".repeat(startHeading)} ${cli.prog ? `\`${cli.prog}\`` : "CLI"}`);
  if (cli.help) lines.push(cli.help);

  for (const command of cli.commands.values()) {
    lines.push(...documentCommand(command, startHeading + 1, prefix, options.pathRoot));
    const subs = cli.subcommands.get(command.name);
    for (const sub of subs?.values() ?? []) {
      lines.push(...documentCommand(sub, startHeading + 2, prefix, options.pathRoot));
    }
  }
  // Subcommand groups without a parent command get a heading of their own
  for (const [parent, subs] of cli.subcommands) {
    if (cli.commands.has(parent)) continue;
    lines.push(`${"#".repeat(startHeading + 1)} \`${prefix + parent}\``);
    for (const sub of subs.values()) {
      lines.push(...documentCommand(sub, startHeading + 2, prefix, options.pathRoot));
    }
  }
  return lines.join("\n\n");
}
