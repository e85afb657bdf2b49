/**
 * Converters turn a raw command-line string into a typed value.
 *
 * The registry is keyed by canonical type strings, so live commands and
 * commands rebuilt from a static snapshot look converters up the same way.
 */
import * as fs from "node:fs";
import { z } from "zod";
import { CliParserError } from "./errors.js";
import { t, stringifyType, genericOrigin } from "./types.js";
import type { TypeRef, NamedType, UnionType } from "./types.js";

export type Converter = (raw: string) => unknown;

/** Converters keyed by type, or by canonical type string. */
export type ConverterInput =
  | Iterable<readonly [TypeRef, Converter]>
  | Readonly<Record<string, Converter>>;

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOATS: Record<string, number> = {
  inf: Infinity,
  "+inf": Infinity,
  "-inf": -Infinity,
  infinity: Infinity,
  "+infinity": Infinity,
  "-infinity": -Infinity,
  nan: NaN,
};

export function convertStr(raw: string): string {
  return raw;
}

export function convertInt(raw: string): number {
  const text = raw.trim();
  const value = INT_RE.test(text) ? Number.parseInt(text, 10) : NaN;
  // Beyond 2^53 parseInt rounds silently
  if (!Number.isSafeInteger(value)) {
    throw new CliParserError(`invalid int value: '${raw}'`);
  }
  return value;
}

export function convertFloat(raw: string): number {
  const text = raw.trim();
  const special = SPECIAL_FLOATS[text.toLowerCase()];
  if (special !== undefined) return special;
  if (!FLOAT_RE.test(text)) {
    throw new CliParserError(`invalid float value: '${raw}'`);
  }
  return Number.parseFloat(text);
}

export function convertPath(raw: string): string {
  return raw;
}

export function convertBool(raw: string): boolean {
  return raw === "true";
}

/** Converters for the types the resolver handles natively. */
export const PRIMITIVE_CONVERTERS: ReadonlyMap<string, Converter> = new Map<string, Converter>([
  ["str", convertStr],
  ["int", convertInt],
  ["float", convertFloat],
  ["Path", convertPath],
  ["bool", convertBool],
]);

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function convertExistingPath(raw: string): string {
  if (!fs.existsSync(raw)) {
    throw new CliParserError(`path does not exist: ${raw}`);
  }
  return raw;
}

export function convertExistingFilePath(raw: string): string {
  convertExistingPath(raw);
  if (!fs.statSync(raw).isFile()) {
    throw new CliParserError(`path is not a file path: ${raw}`);
  }
  return raw;
}

export function convertExistingDirPath(raw: string): string {
  convertExistingPath(raw);
  if (!fs.statSync(raw).isDirectory()) {
    throw new CliParserError(`path is not a directory path: ${raw}`);
  }
  return raw;
}

// "-" stands for stdin/stdout and is passed through unchecked
export function convertExistingPathOrDash(raw: string): string {
  return raw === "-" ? raw : convertExistingPath(raw);
}

export function convertExistingFilePathOrDash(raw: string): string {
  return raw === "-" ? raw : convertExistingFilePath(raw);
}

export function convertExistingDirPathOrDash(raw: string): string {
  return raw === "-" ? raw : convertExistingDirPath(raw);
}

export function convertPathOrDash(raw: string): string {
  return raw === "-" ? raw : convertPath(raw);
}

export const ExistingPath: NamedType = t.newType("ExistingPath", t.path);
export const ExistingFilePath: NamedType = t.newType("ExistingFilePath", t.path);
export const ExistingDirPath: NamedType = t.newType("ExistingDirPath", t.path);
export const ExistingPathOrDash: UnionType = t.union(ExistingPath, t.literal("-"));
export const ExistingFilePathOrDash: UnionType = t.union(ExistingFilePath, t.literal("-"));
export const ExistingDirPathOrDash: UnionType = t.union(ExistingDirPath, t.literal("-"));
export const PathOrDash: UnionType = t.union(t.path, t.literal("-"));

// ---------------------------------------------------------------------------
// UUIDs
// ---------------------------------------------------------------------------

const uuidSchema = z.string().uuid();

export const UUID: NamedType = t.named("UUID");
export const StrOrUUID: UnionType = t.union(t.str, UUID);

/** Validates a UUID and returns it in lowercase canonical form. */
export function convertUUID(raw: string): string {
  const result = uuidSchema.safeParse(raw.trim());
  if (!result.success) {
    throw new CliParserError(`invalid UUID: '${raw}'`);
  }
  return result.data.toLowerCase();
}

/** UUIDs are normalized, anything else passes through as a string. */
export function convertStrOrUUID(raw: string): string {
  const result = uuidSchema.safeParse(raw.trim());
  return result.success ? result.data.toLowerCase() : raw;
}

// ---------------------------------------------------------------------------
// Lists
// ---------------------------------------------------------------------------

function stripQuotes(item: string): string {
  const first = item[0];
  if (item.length >= 2 && (first === '"' || first === "'") && item.endsWith(first)) {
    return item.slice(1, -1);
  }
  return item;
}

/**
 * Builds a converter for list strings: "a, b, c", "[1,2,3]", '["a","b"]'
 * or "['a','b']".
 */
export function getListConverter(convertItem: Converter = convertStr, delimiter: string = ","): Converter {
  return function convertList(raw: string): unknown[] {
    let text = raw.trim();
    if (text.startsWith("[") && text.endsWith("]")) {
      text = text.slice(1, -1);
    }
    if (text.trim() === "") return [];
    return text.split(delimiter).map((item) => convertItem(stripQuotes(item.trim())));
  };
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

function isEntryIterable(input: ConverterInput): input is Iterable<readonly [TypeRef, Converter]> {
  return Symbol.iterator in input;
}

export class ConverterRegistry {
  private table = new Map<string, Converter>();

  constructor(input?: ConverterInput) {
    if (input) this.update(input);
  }

  /** Builtins first, overrides replace them. */
  static merge(defaults: ConverterInput, overrides?: ConverterInput): ConverterRegistry {
    const registry = new ConverterRegistry(defaults);
    if (overrides) registry.update(overrides);
    return registry;
  }

  update(input: ConverterInput): this {
    if (isEntryIterable(input)) {
      for (const [type, convert] of input) this.set(type, convert);
    } else {
      for (const [key, convert] of Object.entries(input)) this.set(key, convert);
    }
    return this;
  }

  set(type: TypeRef, convert: Converter): this {
    this.table.set(stringifyType(type), convert);
    return this;
  }

  /** Exact match on the canonical type string. */
  get(type: TypeRef): Converter | undefined {
    return this.table.get(stringifyType(type));
  }

  /** Exact match first, then the bare generic origin ("Box" for "Box[str]"). */
  getWithOrigin(type: TypeRef): Converter | undefined {
    const exact = this.get(type);
    if (exact) return exact;
    const origin = genericOrigin(type);
    return origin !== undefined ? this.table.get(origin) : undefined;
  }

  has(type: TypeRef): boolean {
    return this.table.has(stringifyType(type));
  }

  keys(): string[] {
    return [...this.table.keys()];
  }
}

export const DEFAULT_CONVERTERS: ReadonlyMap<string, Converter> = new Map<string, Converter>([
  [stringifyType(ExistingPath), convertExistingPath],
  [stringifyType(ExistingFilePath), convertExistingFilePath],
  [stringifyType(ExistingDirPath), convertExistingDirPath],
  [stringifyType(ExistingPathOrDash), convertExistingPathOrDash],
  [stringifyType(ExistingFilePathOrDash), convertExistingFilePathOrDash],
  [stringifyType(ExistingDirPathOrDash), convertExistingDirPathOrDash],
  [stringifyType(PathOrDash), convertPathOrDash],
  [stringifyType(UUID), convertUUID],
  [stringifyType(StrOrUUID), convertStrOrUUID],
]);
