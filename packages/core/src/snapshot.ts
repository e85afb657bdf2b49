/**
 * Static snapshot of a CLI: a JSON document holding every command and its
 * resolved arguments, enough to parse argv and show help without loading
 * the command implementations.
 */
import { z } from "zod";
import { Command } from "./command.js";
import { CliError } from "./errors.js";
import { PRIMITIVE_CONVERTERS, convertStr } from "./converters.js";
import type { ConverterRegistry } from "./converters.js";
import type { ArgumentSpec, ResolvedType } from "./resolver.js";
import { UNSET, stringifyType } from "./types.js";

/** Stands in for UNSET defaults in the JSON document. */
export const UNSET_MARKER = "===UNSET===";

const staticArgSchema = z.object({
  id: z.string(),
  option: z.string().nullable(),
  short: z.string().nullable(),
  orig_help: z.string().nullable(),
  default: z.unknown(),
  help: z.string(),
  action: z.enum(["store", "store_true", "boolean_optional", "append", "count"]),
  choices: z.array(z.union([z.string(), z.number(), z.boolean()])).nullable(),
  has_converter: z.boolean(),
  type: z.string().nullable(),
  orig_type: z.string(),
});

const staticCommandSchema = z.object({
  name: z.string(),
  args: z.array(staticArgSchema),
  description: z.string().nullable(),
  allow_extra: z.boolean(),
  parent: z.string().nullable(),
  is_placeholder: z.boolean(),
});

export const staticDataSchema = z.object({
  prog: z.string().nullable(),
  help: z.string(),
  version: z.string().nullable(),
  extra_key: z.string(),
  fill_defaults: z.boolean().default(true),
  commands: z.record(staticCommandSchema),
  subcommands: z.record(z.record(staticCommandSchema)),
});

export type StaticArg = z.infer<typeof staticArgSchema>;
export type StaticCommand = z.infer<typeof staticCommandSchema>;
export type StaticData = z.infer<typeof staticDataSchema>;

/** What a snapshot is taken from. */
export interface SnapshotSource {
  prog?: string;
  help: string;
  version?: string;
  extraKey: string;
  fillDefaults: boolean;
  commands: ReadonlyMap<string, Command>;
  subcommands: ReadonlyMap<string, ReadonlyMap<string, Command>>;
}

export function argumentToStatic(spec: ArgumentSpec): StaticArg {
  return {
    id: spec.id,
    option: spec.hint.option ?? null,
    short: spec.hint.short ?? null,
    orig_help: spec.hint.help ?? null,
    default: spec.default === UNSET ? UNSET_MARKER : spec.default,
    help: spec.help,
    action: spec.action,
    choices: spec.choices ? [...spec.choices] : null,
    has_converter: spec.hasConverter,
    type: spec.resolvedType?.name ?? null,
    orig_type: stringifyType(spec.origType),
  };
}

export function commandToStatic(command: Command): StaticCommand {
  return {
    name: command.name,
    args: command.args.map(argumentToStatic),
    description: command.description ?? null,
    allow_extra: command.allowExtra,
    parent: command.parent ?? null,
    is_placeholder: command.isPlaceholder,
  };
}

export function toStaticJson(source: SnapshotSource): StaticData {
  const commands: Record<string, StaticCommand> = {};
  for (const command of source.commands.values()) {
    commands[command.name] = commandToStatic(command);
  }
  const subcommands: Record<string, Record<string, StaticCommand>> = {};
  for (const [parent, subs] of source.subcommands) {
    subcommands[parent] = {};
    for (const sub of subs.values()) {
      subcommands[parent][sub.name] = commandToStatic(sub);
    }
  }
  return {
    prog: source.prog ?? null,
    help: source.help,
    version: source.version ?? null,
    extra_key: source.extraKey,
    fill_defaults: source.fillDefaults,
    commands,
    subcommands,
  };
}

const FLAG_ACTIONS = new Set(["store_true", "boolean_optional", "count"]);

/**
 * Finds the converter for a rebuilt argument: the registry by its original
 * type, then by the bare generic origin, then the primitive type names,
 * then str.
 */
function recoverType(data: StaticArg, converters: ConverterRegistry): ResolvedType | null {
  if (FLAG_ACTIONS.has(data.action)) return null;
  const convert = converters.getWithOrigin(data.orig_type);
  if (convert) {
    return { name: data.type ?? (convert.name || "converter"), convert };
  }
  const primitive = data.type !== null ? PRIMITIVE_CONVERTERS.get(data.type) : undefined;
  if (data.type !== null && primitive) {
    return { name: data.type, convert: primitive };
  }
  return { name: "str", convert: convertStr };
}

export function argumentFromStatic(data: StaticArg, converters: ConverterRegistry): ArgumentSpec {
  const hint = Object.freeze({
    option: data.option ?? undefined,
    short: data.short ?? undefined,
    help: data.orig_help ?? undefined,
    count: data.action === "count" ? true : undefined,
  });
  return {
    id: data.id,
    hint,
    resolvedType: recoverType(data, converters),
    origType: data.orig_type,
    default: data.default === UNSET_MARKER ? UNSET : data.default,
    action: data.action,
    choices: data.choices ? [...data.choices] : null,
    hasConverter: data.has_converter,
    help: data.help,
  };
}

/** Rebuilds a command with a no-op function. */
export function commandFromStatic(data: StaticCommand, converters: ConverterRegistry): Command {
  return new Command({
    name: data.name,
    fn: () => undefined,
    args: data.args.map((a) => argumentFromStatic(a, converters)),
    description: data.description ?? undefined,
    allowExtra: data.allow_extra,
    parent: data.parent ?? undefined,
    isPlaceholder: data.is_placeholder,
  });
}

export function parseStaticData(json: unknown): StaticData {
  const result = staticDataSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new CliError(`Invalid static snapshot: ${issues}`, "E_STATIC");
  }
  return result.data;
}
