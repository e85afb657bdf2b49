/**
 * Argument-vector parsing on commander.
 * A grammar becomes a commander Command whose options carry the argument
 * converters; commander splits the tokens and the operands are then handed
 * to the positional arguments in declaration order.
 */
import { Command, CommanderError, Option } from "commander";
import { ArgvError, ArgvConversionError } from "./errors.js";

export type ArgvAction = "store" | "store_true" | "boolean_optional" | "append" | "count";

export type Choice = string | number | boolean;

export interface ArgvArgument {
  /** Key of the value in the result mapping. */
  dest: string;
  /** Option strings such as "--name" and "-n"; empty for positionals. */
  flags: readonly string[];
  action: ArgvAction;
  default: unknown;
  convert?: (raw: string) => unknown;
  converterName?: string;
  choices?: readonly Choice[];
  /** Options only: fail when the option is absent. */
  required?: boolean;
  /** Positionals only: the argument may be left out. */
  optional?: boolean;
}

export interface ArgvGrammar {
  args: readonly ArgvArgument[];
  helpFlags?: readonly string[];
  versionFlags?: readonly string[];
  /** Names accepted by the trailing subcommand selector. */
  subcommands?: readonly string[];
}

export interface ArgvResult {
  values: Record<string, unknown>;
  /** Tokens that matched nothing, in their original order. */
  extra: string[];
  subcommand?: { name: string; rest: string[] };
  help: boolean;
  version: boolean;
}

export function negatedFlag(flag: string): string {
  return `--no-${flag.slice(2)}`;
}

export function displayName(arg: ArgvArgument): string {
  if (arg.flags.length === 0) return arg.dest;
  if (arg.action === "boolean_optional") {
    const names: string[] = [];
    for (const flag of arg.flags) {
      names.push(flag);
      if (flag.startsWith("--")) names.push(negatedFlag(flag));
    }
    return names.join("/");
  }
  return arg.flags.join("/");
}

export function formatChoice(choice: Choice): string {
  return typeof choice === "string" ? `'${choice}'` : String(choice);
}

/** commander flag syntax: short flag first, then the long one. */
function commanderFlags(flags: readonly string[]): string {
  const short = flags.filter((f) => !f.startsWith("--"));
  const long = flags.filter((f) => f.startsWith("--"));
  return [...short, ...long].join(", ");
}

/**
 * Converts a token, then checks it against the choices. String choices also
 * match the token itself, which is how enum member names are accepted.
 */
function convertValue(arg: ArgvArgument, raw: string): unknown {
  let value: unknown = raw;
  if (arg.convert) {
    try {
      value = arg.convert(raw);
    } catch (e) {
      const name = arg.converterName ?? (arg.convert.name || "converter");
      throw new ArgvConversionError(displayName(arg), name, raw, e);
    }
  }
  if (arg.choices && !arg.choices.some((c) => c === value || c === raw)) {
    const allowed = arg.choices.map(formatChoice).join(", ");
    throw new ArgvError(
      `argument ${displayName(arg)}: invalid choice: '${raw}' (choose from ${allowed})`,
      "E_ARGV_CHOICE"
    );
  }
  return value;
}

function checkConflicts(grammar: ArgvGrammar): void {
  const used = new Set([...(grammar.helpFlags ?? []), ...(grammar.versionFlags ?? [])]);
  for (const arg of grammar.args) {
    const flags =
      arg.action === "boolean_optional"
        ? arg.flags.flatMap((f) => (f.startsWith("--") ? [f, negatedFlag(f)] : [f]))
        : arg.flags;
    for (const flag of flags) {
      if (used.has(flag)) {
        throw new ArgvError(
          `argument ${displayName(arg)}: conflicting option string: ${flag}`,
          "E_ARGV_CONFLICT"
        );
      }
      used.add(flag);
    }
  }
}

function toOptions(arg: ArgvArgument): Option[] {
  const flags = commanderFlags(arg.flags);
  switch (arg.action) {
    case "store":
      return [new Option(`${flags} <value>`).argParser((raw: string) => convertValue(arg, raw))];
    case "append":
      return [
        new Option(`${flags} <value>`).argParser((raw: string, previous: unknown) => [
          ...(Array.isArray(previous) ? previous : []),
          convertValue(arg, raw),
        ]),
      ];
    case "count": {
      const base = typeof arg.default === "number" ? arg.default : 0;
      return [
        new Option(flags).argParser((_raw: string, previous: unknown) =>
          (typeof previous === "number" ? previous : base) + 1
        ),
      ];
    }
    case "store_true":
      return [new Option(flags)];
    case "boolean_optional": {
      const options = [new Option(flags)];
      const long = arg.flags.find((f) => f.startsWith("--"));
      if (long) options.push(new Option(negatedFlag(long)));
      return options;
    }
  }
}

function buildCommand(
  grammar: ArgvGrammar,
  positionalOptions: boolean
): { command: Command; keys: Map<string, string> } {
  const command = new Command()
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {}, outputError: () => {} })
    .helpOption(false)
    .helpCommand(false);

  const keys = new Map<string, string>();
  for (const arg of grammar.args) {
    if (arg.flags.length === 0) continue;
    for (const option of toOptions(arg)) {
      command.addOption(option);
      keys.set(arg.dest, option.attributeName());
    }
  }

  const versionFlags = grammar.versionFlags ?? [];
  if (versionFlags.length > 0) {
    command.version("", commanderFlags(versionFlags));
  }
  // Subcommands are only registered so commander stops at the selector
  if (positionalOptions) {
    command.enablePositionalOptions();
    for (const name of grammar.subcommands ?? []) {
      command.addCommand(new Command(name));
    }
  }
  return { command, keys };
}

function splitOperands(
  operands: readonly string[],
  unknown: readonly string[],
  positionalCount: number,
  grammar: ArgvGrammar
): { operands: string[]; unknown: string[]; subcommand?: { name: string; rest: string[] } } {
  if ((grammar.subcommands ?? []).length === 0 || operands.length <= positionalCount) {
    return { operands: [...operands], unknown: [...unknown] };
  }
  return {
    operands: operands.slice(0, positionalCount),
    unknown: [],
    subcommand: {
      name: operands[positionalCount],
      rest: [...operands.slice(positionalCount + 1), ...unknown],
    },
  };
}

function helpRequested(unknown: readonly string[], helpFlags: readonly string[]): boolean {
  const end = unknown.indexOf("--");
  return (end === -1 ? unknown : unknown.slice(0, end)).some((t) => helpFlags.includes(t));
}

export function parseArgv(tokens: readonly string[], grammar: ArgvGrammar): ArgvResult {
  checkConflicts(grammar);
  const positionals = grammar.args.filter((a) => a.flags.length === 0);
  const { command, keys } = buildCommand(grammar, positionals.length === 0);

  const values: Record<string, unknown> = {};
  for (const arg of grammar.args) {
    values[arg.dest] = arg.default;
  }
  const result: ArgvResult = { values, extra: [], help: false, version: false };

  let parsed: { operands: string[]; unknown: string[] };
  try {
    parsed = command.parseOptions([...tokens]);
  } catch (e) {
    if (!(e instanceof CommanderError)) throw e;
    if (e.code === "commander.version") {
      result.version = true;
      return result;
    }
    throw new ArgvError(e.message.replace(/^error: /, ""), "E_ARGV", { cause: e });
  }

  const split = splitOperands(parsed.operands, parsed.unknown, positionals.length, grammar);
  if (!split.subcommand && helpRequested(split.unknown, grammar.helpFlags ?? [])) {
    result.help = true;
    return result;
  }

  const seen = new Set<string>();
  for (const arg of grammar.args) {
    const key = keys.get(arg.dest);
    if (key !== undefined && command.getOptionValueSource(key) === "cli") {
      values[arg.dest] = command.getOptionValue(key);
      seen.add(arg.dest);
    }
  }

  // Optional positionals only take an operand when the required ones after
  // them can still be satisfied
  let cursor = 0;
  positionals.forEach((arg, position) => {
    const remaining = split.operands.length - cursor;
    if (remaining <= 0) return;
    const requiredAfter = positionals.slice(position + 1).filter((p) => !p.optional).length;
    if (arg.optional && remaining <= requiredAfter) return;
    const raw = split.operands[cursor];
    cursor++;
    values[arg.dest] = arg.action === "append" ? [convertValue(arg, raw)] : convertValue(arg, raw);
  });

  const missing = grammar.args
    .filter((a) => a.required && a.flags.length > 0 && !seen.has(a.dest))
    .map(displayName);
  if (missing.length > 0) {
    throw new ArgvError(
      `the following arguments are required: ${missing.join(", ")}`,
      "E_ARGV_REQUIRED"
    );
  }

  result.extra = [...split.operands.slice(cursor), ...split.unknown];
  result.subcommand = split.subcommand;
  return result;
}
