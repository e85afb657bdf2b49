/**
 * Semantic parameter types.
 *
 * Types are plain values built with the `t` helpers. Every type has a
 * canonical string form (`stringifyType`) which is also its key in the
 * converter registry and in static snapshots.
 */

export type PrimitiveName = "str" | "int" | "float" | "Path";

export type LiteralValue = string | number | boolean;

export interface PrimitiveType {
  kind: "primitive";
  name: PrimitiveName;
}

export interface BoolType {
  kind: "bool";
}

export interface NoneType {
  kind: "none";
}

export interface UnionType {
  kind: "union";
  members: TypeExpr[];
}

export interface LiteralType {
  kind: "literal";
  values: LiteralValue[];
}

export interface EnumType {
  kind: "enum";
  name: string;
  members: Record<string, string | number>;
}

/** A parameterized type: List[int], Iterable[str], Box[str]. */
export interface GenericType {
  kind: "generic";
  name: string;
  args: TypeExpr[];
}

/** An opaque custom type, optionally a distinct alias of a supertype. */
export interface NamedType {
  kind: "named";
  name: string;
  supertype?: TypeExpr;
}

export type TypeExpr =
  | PrimitiveType
  | BoolType
  | NoneType
  | UnionType
  | LiteralType
  | EnumType
  | GenericType
  | NamedType;

/** A type, or only its canonical name (types recovered from a snapshot). */
export type TypeRef = TypeExpr | string;

/** Marks an argument without a default value. */
export const UNSET: unique symbol = Symbol("argwise.unset");
export type Unset = typeof UNSET;

function enumMembers(source: Record<string, string | number>): Record<string, string | number> {
  const members: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(source)) {
    // Numeric enums carry reverse mappings ("0" -> "Red")
    if (/^\d+$/.test(key)) continue;
    members[key] = value;
  }
  return members;
}

function primitive(name: PrimitiveName): PrimitiveType {
  return { kind: "primitive", name };
}

const BOOL: BoolType = { kind: "bool" };
const NONE: NoneType = { kind: "none" };

export const t = {
  str: primitive("str"),
  int: primitive("int"),
  float: primitive("float"),
  path: primitive("Path"),
  bool: BOOL,
  none: NONE,

  optional(inner: TypeExpr): UnionType {
    return { kind: "union", members: [inner, { kind: "none" }] };
  },
  union(...members: TypeExpr[]): UnionType {
    return { kind: "union", members };
  },
  literal(...values: LiteralValue[]): LiteralType {
    return { kind: "literal", values };
  },
  enumOf(name: string, source: Record<string, string | number>): EnumType {
    return { kind: "enum", name, members: enumMembers(source) };
  },
  list(item: TypeExpr): GenericType {
    return { kind: "generic", name: "List", args: [item] };
  },
  iterable(item: TypeExpr): GenericType {
    return { kind: "generic", name: "Iterable", args: [item] };
  },
  generic(name: string, ...args: TypeExpr[]): GenericType {
    return { kind: "generic", name, args };
  },
  named(name: string): NamedType {
    return { kind: "named", name };
  },
  newType(name: string, supertype: TypeExpr): NamedType {
    return { kind: "named", name, supertype };
  },
};

function formatLiteral(value: LiteralValue): string {
  return typeof value === "string" ? `'${value}'` : String(value);
}

/** Canonical name of a type, e.g. "List[int]" or "Optional[str]". */
export function stringifyType(type: TypeRef): string {
  if (typeof type === "string") return type;
  switch (type.kind) {
    case "primitive":
      return type.name;
    case "bool":
      return "bool";
    case "none":
      return "None";
    case "union": {
      const present = type.members.filter((m) => m.kind !== "none");
      if (type.members.length === 2 && present.length === 1) {
        return `Optional[${stringifyType(present[0])}]`;
      }
      return `Union[${type.members.map(stringifyType).join(", ")}]`;
    }
    case "literal":
      return `Literal[${type.values.map(formatLiteral).join(", ")}]`;
    case "enum":
      return type.name;
    case "generic":
      if (type.args.length === 0) return type.name;
      return `${type.name}[${type.args.map(stringifyType).join(", ")}]`;
    case "named":
      return type.name;
  }
}

/** Display form: distinct aliases show their supertype. */
export function formatType(type: TypeRef): string {
  if (typeof type !== "string" && type.kind === "named" && type.supertype) {
    return `${type.name} (${formatType(type.supertype)})`;
  }
  return stringifyType(type);
}

/** Bare name of a parameterized type ("Box" for "Box[str]"). */
export function genericOrigin(type: TypeRef): string | undefined {
  if (typeof type === "string") {
    const bracket = type.indexOf("[");
    return bracket > 0 ? type.slice(0, bracket) : undefined;
  }
  return type.kind === "generic" && type.args.length > 0 ? type.name : undefined;
}

export function isPathLike(type: TypeRef): boolean {
  if (typeof type === "string") return type === "Path";
  switch (type.kind) {
    case "primitive":
      return type.name === "Path";
    case "named":
      return type.supertype !== undefined && isPathLike(type.supertype);
    case "union":
      return type.members.some(isPathLike);
    default:
      return false;
  }
}
