/**
 * Commands: a target function plus its resolved argument list.
 */
import { ParserConfigError } from "./errors.js";
import { resolveArgument } from "./resolver.js";
import type { ArgHint, ArgumentSpec, ConverterLookup } from "./resolver.js";
import { t, UNSET } from "./types.js";
import type { TypeExpr } from "./types.js";
import { joinStrings } from "./format.js";

export const DEFAULT_EXTRA_KEY = "_extra";

/** One declared parameter of a command function. */
export interface ParamDecl {
  name: string;
  /** Defaults to str. */
  type?: TypeExpr;
  /** Leave out for a parameter without a default. */
  default?: unknown;
}

export type CommandValues = Record<string, unknown>;

export type CommandFn = (values: CommandValues) => unknown;

/** A command function together with its explicit parameter declaration. */
export interface CommandFunction {
  params: readonly ParamDecl[];
  description?: string;
  impl: CommandFn;
}

export function defineFunction(
  decl: { params: readonly ParamDecl[]; description?: string },
  impl: CommandFn
): CommandFunction {
  return { params: decl.params, description: decl.description, impl };
}

export interface CommandInit {
  name: string;
  fn: CommandFn;
  args: ArgumentSpec[];
  description?: string;
  allowExtra?: boolean;
  parent?: string;
  isPlaceholder?: boolean;
}

export interface FromFunctionOptions {
  parent?: string;
  allowExtra?: boolean;
  extraKey?: string;
  lookup: ConverterLookup;
}

export class Command {
  name: string;
  fn: CommandFn;
  args: ArgumentSpec[];
  description?: string;
  allowExtra: boolean;
  parent?: string;
  isPlaceholder: boolean;

  constructor(init: CommandInit) {
    this.name = init.name;
    this.fn = init.fn;
    this.args = init.args;
    this.description = init.description;
    this.allowExtra = init.allowExtra ?? false;
    this.parent = init.parent;
    this.isPlaceholder = init.isPlaceholder ?? false;
  }

  get displayName(): string {
    return joinStrings(this.parent, this.name);
  }

  withName(name: string): Command {
    return new Command({
      name,
      fn: this.fn,
      args: this.args,
      description: this.description,
      allowExtra: this.allowExtra,
      parent: this.parent,
      isPlaceholder: this.isPlaceholder,
    });
  }

  static fromFunction(
    name: string,
    hints: Readonly<Record<string, Readonly<ArgHint>>>,
    target: CommandFunction,
    options: FromFunctionOptions
  ): Command {
    const extraKey = options.extraKey ?? DEFAULT_EXTRA_KEY;
    const declared = new Set(target.params.map((p) => p.name));
    for (const param of Object.keys(hints)) {
      if (!declared.has(param)) {
        const path = joinStrings(options.parent, name);
        throw new ParserConfigError(`argument not found in function for '${path}': ${param}`);
      }
    }

    const args = target.params.map((param) => {
      const type = param.name === extraKey ? t.list(t.str) : param.type ?? t.str;
      const defaultValue = "default" in param ? param.default : UNSET;
      const hint = hints[param.name] ?? {};
      return resolveArgument(param.name, hint, type, defaultValue, options.lookup);
    });

    return new Command({
      name,
      fn: target.impl,
      args,
      description: target.description,
      allowExtra: options.allowExtra,
      parent: options.parent,
    });
  }
}
