/**
 * Grammar building and help rendering for commands.
 */
import { displayName, negatedFlag } from "@argwise/argv";
import type { ArgvArgument, ArgvGrammar } from "@argwise/argv";
import type { Command } from "./command.js";
import type { CommandRegistry } from "./registry.js";
import { UNSET } from "./types.js";
import { collapseWhitespace, formatArgHelp, formatTable, formatValue, joinStrings, joinWith } from "./format.js";

export const HELP_FLAGS: readonly string[] = ["-h", "--help"];
export const VERSION_FLAG = "--version";

export interface GrammarSettings {
  fillDefaults: boolean;
  extraKey: string;
}

export interface GrammarArg extends ArgvArgument {
  help: string;
}

/** Argv arguments for a command. The extra-arguments parameter is never matched. */
export function grammarArgs(command: Command, settings: GrammarSettings): GrammarArg[] {
  const result: GrammarArg[] = [];
  for (const spec of command.args) {
    if (spec.id === settings.extraKey) continue;
    const flags = [spec.hint.option, spec.hint.short].filter((f): f is string => typeof f === "string" && f.length > 0);
    const hasDefault = spec.default !== UNSET;
    let help = spec.help;
    if (!settings.fillDefaults && hasDefault) {
      help = `${help} (default: ${formatValue(spec.default)})`;
    }
    result.push({
      dest: spec.id,
      flags,
      action: spec.action,
      default: settings.fillDefaults ? spec.default : UNSET,
      convert: spec.resolvedType?.convert,
      converterName: spec.resolvedType?.name,
      choices: spec.choices ?? undefined,
      required: !settings.fillDefaults && flags.length > 0 && !hasDefault,
      optional: flags.length === 0 && hasDefault,
      help,
    });
  }
  return result;
}

export function addsHelpFlag(command: Command): boolean {
  return !command.args.some((a) => a.hint.option === "--help");
}

export function buildGrammar(
  command: Command,
  settings: GrammarSettings,
  extras: { version?: boolean; subcommands?: readonly string[] } = {}
): ArgvGrammar {
  return {
    args: grammarArgs(command, settings),
    helpFlags: addsHelpFlag(command) ? HELP_FLAGS : [],
    versionFlags: extras.version ? [VERSION_FLAG] : [],
    subcommands: extras.subcommands,
  };
}

type ArgLike = Pick<ArgvArgument, "action" | "dest" | "choices">;

function takesValue(arg: ArgLike): boolean {
  return arg.action === "store" || arg.action === "append";
}

function metavar(arg: ArgLike, positional: boolean): string {
  if (arg.choices && arg.choices.length > 0) {
    return `{${arg.choices.map((c) => String(c)).join(",")}}`;
  }
  return positional ? arg.dest : arg.dest.toUpperCase();
}

function usagePart(arg: GrammarArg): string {
  if (arg.flags.length === 0) {
    const name = metavar(arg, true);
    return arg.optional ? `[${name}]` : name;
  }
  const flag = arg.flags[0];
  let part: string;
  if (arg.action === "boolean_optional" && flag.startsWith("--")) {
    part = `${flag} | ${negatedFlag(flag)}`;
  } else if (takesValue(arg)) {
    part = `${flag} ${metavar(arg, false)}`;
  } else {
    part = flag;
  }
  return arg.required ? part : `[${part}]`;
}

function optionLabel(arg: GrammarArg): string {
  if (arg.action === "boolean_optional") {
    return displayName(arg).split("/").join(", ");
  }
  if (takesValue(arg)) {
    const value = metavar(arg, false);
    return arg.flags.map((f) => `${f} ${value}`).join(", ");
  }
  return arg.flags.join(", ");
}

function formatRows(rows: ReadonlyArray<readonly [string, string]>): string {
  const width = Math.min(Math.max(0, ...rows.map(([label]) => label.length)), 30);
  return rows
    .map(([label, help]) => {
      if (!help) return `  ${label}`;
      if (label.length > width) return `  ${label}\n${" ".repeat(width + 4)}${help}`;
      return `  ${label.padEnd(width)}  ${help}`;
    })
    .join("\n");
}

export interface HelpOptions extends GrammarSettings {
  prog?: string;
  /** Show the --version option. */
  version?: boolean;
}

/** Help text for a command and its subcommands. */
export function formatHelp(
  command: Command,
  subcommands: ReadonlyMap<string, Command>,
  options: HelpOptions
): string {
  const args = grammarArgs(command, options);
  const positionals = args.filter((a) => a.flags.length === 0);
  const optionArgs = args.filter((a) => a.flags.length > 0);
  const withHelp = addsHelpFlag(command);
  const subNames = [...subcommands.keys()];

  const usage = [
    "usage:",
    joinStrings(options.prog, command.displayName),
    withHelp ? "[-h]" : "",
    options.version ? `[${VERSION_FLAG}]` : "",
    ...optionArgs.map(usagePart),
    ...positionals.map(usagePart),
    subNames.length > 0 ? `{${subNames.join(",")}} ...` : "",
  ];
  const sections: string[] = [joinStrings(...usage)];

  if (command.description) {
    sections.push(command.description.trim());
  }
  if (positionals.length > 0) {
    const rows = positionals.map((a): [string, string] => [metavar(a, true), a.help]);
    sections.push("positional arguments:\n" + formatRows(rows));
  }
  const optionRows: Array<[string, string]> = [];
  if (withHelp) optionRows.push([HELP_FLAGS.join(", "), "show this help message and exit"]);
  if (options.version) optionRows.push([VERSION_FLAG, "show program's version number and exit"]);
  for (const a of optionArgs) optionRows.push([optionLabel(a), a.help]);
  if (optionRows.length > 0) {
    sections.push("options:\n" + formatRows(optionRows));
  }
  if (subNames.length > 0) {
    const rows = [...subcommands.values()].map((sub): [string, string] => [
      sub.name,
      collapseWhitespace(sub.description ?? ""),
    ]);
    sections.push("subcommands:\n" + formatRows(rows));
  }
  return sections.join("\n\n");
}

/** Overview of the available commands, shown for an empty argv or --help. */
export function formatInfo(help: string, registry: CommandRegistry): string {
  const rows: Array<[string, string]> = [];
  for (const [name, command] of registry.commands) {
    rows.push([`  ${name}`, formatArgHelp(command.description)]);
    const subs = registry.subcommands.get(name);
    if (subs && subs.size > 0) {
      rows.push(["", `Subcommands: ${[...subs.keys()].join(", ")}`]);
    }
  }
  for (const [name, subs] of registry.subcommands) {
    if (!registry.commands.has(name)) {
      rows.push([`  ${name}`, `Subcommands: ${[...subs.keys()].join(", ")}`]);
    }
  }
  return joinWith("\n", help, "\nAvailable commands:", formatTable(rows));
}
