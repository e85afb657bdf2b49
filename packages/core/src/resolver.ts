/**
 * Type resolver: turns a declared parameter (name, type, default, hint)
 * into an ArgumentSpec the grammar builder understands.
 */
import type { ArgvAction, Choice } from "@argwise/argv";
import { InvalidArgumentError, UnsupportedTypeError } from "./errors.js";
import { PRIMITIVE_CONVERTERS, convertStr } from "./converters.js";
import type { Converter } from "./converters.js";
import { UNSET, formatType, genericOrigin, stringifyType } from "./types.js";
import type { TypeExpr, TypeRef, LiteralValue, PrimitiveName } from "./types.js";
import { joinStrings } from "./format.js";

/** Per-parameter hints. */
export interface ArgHint {
  /** Long option, e.g. "--name". Positional when absent. */
  option?: string;
  /** Short option, e.g. "-n". */
  short?: string;
  help?: string;
  converter?: Converter;
  /** Count repeated flags ("-vvv" is 3). */
  count?: boolean;
}

export function arg(
  option?: string,
  short?: string,
  extra: Omit<ArgHint, "option" | "short"> = {}
): Readonly<ArgHint> {
  return Object.freeze({ ...extra, option, short });
}

/** The converter an argument's raw values go through. */
export interface ResolvedType {
  name: string;
  convert: Converter;
}

export interface ArgumentSpec {
  id: string;
  hint: Readonly<ArgHint>;
  /** Null for flag-only arguments (booleans, counts). */
  resolvedType: ResolvedType | null;
  origType: TypeRef;
  /** A value, or UNSET when the parameter has no default. */
  default: unknown;
  action: ArgvAction;
  choices: Choice[] | null;
  hasConverter: boolean;
  /** Hint help with the display type appended, e.g. "Name (str)". */
  help: string;
}

export type Multiplicity = "single" | "append" | "count";

export type ConverterLookup = (type: TypeRef) => Converter | undefined;

const BASE_TYPES: readonly PrimitiveName[] = ["str", "int", "float", "Path"];

function primitive(name: string): ResolvedType {
  return { name, convert: PRIMITIVE_CONVERTERS.get(name) ?? convertStr };
}

function fromConverter(convert: Converter): ResolvedType {
  return { name: convert.name || "converter", convert };
}

function literalType(value: LiteralValue): ResolvedType {
  if (typeof value === "boolean") return primitive("bool");
  if (typeof value === "number") return primitive(Number.isInteger(value) ? "int" : "float");
  return primitive("str");
}

/** First base type present among the type arguments, else str. */
function findBaseType(args: readonly TypeExpr[]): ResolvedType {
  for (const name of BASE_TYPES) {
    if (args.some((a) => a.kind === "primitive" && a.name === name)) {
      return primitive(name);
    }
  }
  return primitive("str");
}

function isSequence(type: TypeExpr): boolean {
  return type.kind === "generic" && (type.name === "List" || type.name === "Iterable");
}

type Resolved = Omit<ArgumentSpec, "help">;

function resolve(
  id: string,
  hint: Readonly<ArgHint>,
  type: TypeExpr,
  defaultValue: unknown,
  lookup: ConverterLookup
): Resolved {
  const spec: Resolved = {
    id,
    hint,
    resolvedType: null,
    origType: type,
    default: defaultValue,
    action: "store",
    choices: null,
    hasConverter: false,
  };

  if (hint.count) {
    spec.action = "count";
    if (defaultValue === UNSET || defaultValue === null) spec.default = 0;
    return spec;
  }

  const origin = genericOrigin(type);
  const convert =
    hint.converter ?? lookup(type) ?? (origin !== undefined ? lookup(origin) : undefined);
  if (convert) {
    spec.resolvedType = fromConverter(convert);
    spec.hasConverter = true;
    return spec;
  }

  switch (type.kind) {
    case "union": {
      const present = type.members.filter((m) => m.kind !== "none");
      if (present.length === 0) break;
      const optional = present.length < type.members.length;
      const nextDefault = optional && defaultValue === UNSET ? null : defaultValue;
      // Multi-type unions resolve against their first member only
      return resolve(id, hint, present[0], nextDefault, lookup);
    }
    case "primitive":
      spec.resolvedType = primitive(type.name);
      return spec;
    case "bool":
      if (!hint.option) {
        throw new InvalidArgumentError(
          id,
          `boolean arguments need to be flags, e.g. --${id.replace(/_/g, "-")}`
        );
      }
      if (defaultValue === true) {
        spec.action = "boolean_optional";
        spec.default = true;
      } else {
        spec.action = "store_true";
        spec.default = false;
      }
      return spec;
    case "enum": {
      const members = type.members;
      spec.choices = Object.keys(members);
      spec.resolvedType = {
        name: type.name,
        convert: (raw: string) => (Object.hasOwn(members, raw) ? members[raw] : raw),
      };
      return spec;
    }
    case "literal":
      if (type.values.length === 0) break;
      spec.choices = [...type.values];
      spec.resolvedType = literalType(type.values[0]);
      return spec;
    case "generic": {
      if (!isSequence(type)) break;
      spec.action = "append";
      const item = type.args[0];
      if (item && item.kind === "literal" && item.values.length > 0) {
        spec.choices = [...item.values];
        spec.resolvedType = literalType(item.values[0]);
        return spec;
      }
      spec.resolvedType = findBaseType(type.args);
      return spec;
    }
    default:
      break;
  }
  throw new UnsupportedTypeError(id, stringifyType(type));
}

/**
 * Resolves one parameter. Order: count hint, explicit or registered
 * converter, Optional/Union unwrapping, base types, bool, enum, Literal,
 * List/Iterable; anything else is unsupported.
 */
export function resolveArgument(
  id: string,
  hint: Readonly<ArgHint>,
  type: TypeExpr,
  defaultValue: unknown,
  lookup: ConverterLookup
): ArgumentSpec {
  const resolved = resolve(id, hint, type, defaultValue, lookup);
  return { ...resolved, help: joinStrings(hint.help, `(${formatType(resolved.origType)})`) };
}

export function multiplicity(spec: Pick<ArgumentSpec, "action">): Multiplicity {
  if (spec.action === "append") return "append";
  if (spec.action === "count") return "count";
  return "single";
}

/** Canonical name of the type a spec was resolved against. */
export function displayType(spec: Pick<ArgumentSpec, "origType">): string {
  return formatType(spec.origType);
}
