/**
 * The CLI: command registration, argv parsing and dispatch.
 */
import * as fs from "node:fs";
import { parseArgv, ArgvError } from "@argwise/argv";
import type { ArgvResult } from "@argwise/argv";
import { Command, DEFAULT_EXTRA_KEY } from "./command.js";
import type { CommandFunction, CommandValues } from "./command.js";
import { CommandRegistry } from "./registry.js";
import { ConverterRegistry, DEFAULT_CONVERTERS } from "./converters.js";
import type { ConverterInput } from "./converters.js";
import type { ArgHint } from "./resolver.js";
import { CliExit, CliParserError, CommandNotFoundError } from "./errors.js";
import { buildGrammar, formatHelp, formatInfo } from "./help.js";
import type { HelpOptions } from "./help.js";
import { UNSET } from "./types.js";
import { toStaticJson } from "./snapshot.js";
import type { StaticData } from "./snapshot.js";
import { documentCli } from "./document.js";
import type { DocumentOptions } from "./document.js";

export const SUBCOMMAND_KEY = "__subcommand__";

export type ErrorClass = abstract new (...args: never[]) => Error;

/** Handles an error raised while running a command; may return an exit code. */
export type ErrorHandler = (error: Error) => number | void | Promise<number | void>;

export type Hints = Readonly<Record<string, Readonly<ArgHint>>>;

export interface CliOptions {
  prog?: string;
  help?: string;
  version?: string;
  /** Merged over the builtin converters. */
  converters?: ConverterInput;
  errors?: Iterable<readonly [ErrorClass, ErrorHandler]>;
  extraKey?: string;
  /** When false, unset values are left out instead of being required. */
  fillDefaults?: boolean;
}

export interface ParseOptions {
  allowPartial?: boolean;
}

const NO_SUBCOMMANDS: ReadonlyMap<string, Command> = new Map();

export class Cli {
  prog?: string;
  help: string;
  version?: string;
  converters: ConverterRegistry;
  extraKey: string;
  fillDefaults: boolean;
  errors: Map<ErrorClass, ErrorHandler>;
  readonly registry = new CommandRegistry();

  constructor(options: CliOptions = {}) {
    this.prog = options.prog;
    this.help = (options.help ?? "").trim();
    this.version = options.version;
    this.converters = ConverterRegistry.merge(DEFAULT_CONVERTERS, options.converters);
    this.extraKey = options.extraKey ?? DEFAULT_EXTRA_KEY;
    this.fillDefaults = options.fillDefaults ?? true;
    this.errors = new Map(options.errors ?? []);
  }

  get commands(): ReadonlyMap<string, Command> {
    return this.registry.commands;
  }

  get subcommands(): ReadonlyMap<string, ReadonlyMap<string, Command>> {
    return this.registry.subcommands;
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  command(name: string, hints: Hints, target: CommandFunction): CommandFunction {
    this.register(name, hints, target, { allowExtra: false });
    return target;
  }

  /** Like `command`, unmatched tokens are delivered under the extra key. */
  commandWithExtra(name: string, hints: Hints, target: CommandFunction): CommandFunction {
    this.register(name, hints, target, { allowExtra: true });
    return target;
  }

  subcommand(parent: string, name: string, hints: Hints, target: CommandFunction): CommandFunction {
    this.register(name, hints, target, { parent, allowExtra: false });
    return target;
  }

  subcommandWithExtra(parent: string, name: string, hints: Hints, target: CommandFunction): CommandFunction {
    this.register(name, hints, target, { parent, allowExtra: true });
    return target;
  }

  register(
    name: string,
    hints: Hints,
    target: CommandFunction,
    options: { parent?: string; allowExtra?: boolean } = {}
  ): Command {
    if (options.parent) this.registry.group(options.parent, true);
    const command = Command.fromFunction(name, hints, target, {
      parent: options.parent,
      allowExtra: options.allowExtra,
      extraKey: this.extraKey,
      lookup: (type) => this.converters.get(type),
    });
    return this.registry.add(command);
  }

  /** A parent command that only shows the help for its subcommands. */
  placeholder(name: string, options: { description?: string } = {}): Command {
    return this.registry.add(this.makePlaceholder(name, options.description));
  }

  protected makePlaceholder(name: string, description?: string): Command {
    const command: Command = new Command({
      name,
      args: [],
      description,
      isPlaceholder: true,
      // Running the placeholder itself shows the help for its subcommands
      fn: () => {
        throw new CliExit(formatHelp(command, this.registry.group(name), this.helpOptions(true)), 0);
      },
    });
    return command;
  }

  // -------------------------------------------------------------------------
  // Parsing
  // -------------------------------------------------------------------------

  protected helpOptions(topLevel: boolean): HelpOptions {
    return {
      prog: this.prog,
      version: topLevel && this.version !== undefined,
      fillDefaults: this.fillDefaults,
      extraKey: this.extraKey,
    };
  }

  private match(
    tokens: readonly string[],
    command: Command,
    subcommands: ReadonlyMap<string, Command>,
    topLevel: boolean
  ): ArgvResult {
    const settings = { fillDefaults: this.fillDefaults, extraKey: this.extraKey };
    const grammar = buildGrammar(command, settings, {
      version: topLevel && this.version !== undefined,
      subcommands: subcommands.size > 0 ? [...subcommands.keys()] : undefined,
    });
    let result: ArgvResult;
    try {
      result = parseArgv(tokens, grammar);
    } catch (e) {
      if (e instanceof ArgvError) throw new CliParserError(e.message, { cause: e });
      throw e;
    }
    if (result.help) {
      throw new CliExit(formatHelp(command, subcommands, this.helpOptions(topLevel)), 0);
    }
    if (result.version) {
      throw new CliExit(this.version ?? "", 0);
    }
    return result;
  }

  /**
   * Parses tokens against a command and its subcommands. The chosen
   * subcommand, if any, is returned under SUBCOMMAND_KEY.
   */
  parse(
    tokens: readonly string[],
    command: Command,
    subcommands: ReadonlyMap<string, Command> = NO_SUBCOMMANDS,
    options: ParseOptions = {}
  ): CommandValues {
    const result = this.match(tokens, command, subcommands, true);
    if (!result.subcommand) {
      return this.validate(command, result.values, result.extra, options.allowPartial ?? false);
    }
    const { name, rest } = result.subcommand;
    const sub = subcommands.get(name);
    if (!sub) {
      throw new CliParserError(`invalid subcommand: '${name}'`);
    }
    const subResult = this.match(rest, sub, NO_SUBCOMMANDS, false);
    const values = this.validate(sub, subResult.values, subResult.extra, options.allowPartial ?? false);
    return { ...values, [SUBCOMMAND_KEY]: name };
  }

  /** Checks extra tokens and required arguments. */
  validate(
    command: Command,
    parsed: Readonly<CommandValues>,
    extra: readonly string[],
    allowPartial: boolean = false
  ): CommandValues {
    const values: CommandValues = { ...parsed };
    if (command.allowExtra) {
      values[this.extraKey] = [...extra];
    } else if (extra.length > 0) {
      throw new CliParserError(`unrecognized arguments: ${extra.join(" ")}`);
    }
    const required = command.args
      .filter((a) => !(a.id in values) || values[a.id] === UNSET)
      .map((a) => a.hint.option ?? a.id);
    if (required.length > 0 && this.fillDefaults && !allowPartial) {
      throw new CliParserError(`the following arguments are required: ${required.join(", ")}`);
    }
    if (!this.fillDefaults) {
      for (const [key, value] of Object.entries(values)) {
        if (value === UNSET) delete values[key];
      }
    }
    return values;
  }

  // -------------------------------------------------------------------------
  // Running
  // -------------------------------------------------------------------------

  formatInfo(): string {
    return formatInfo(this.help, this.registry);
  }

  formatHelp(command: Command): string {
    const subcommands = command.parent ? NO_SUBCOMMANDS : this.registry.group(command.name);
    return formatHelp(command, subcommands, this.helpOptions(!command.parent));
  }

  /**
   * Runs the CLI on an argument vector that excludes the program name.
   * Resolves to the exit code.
   */
  async run(argv: readonly string[]): Promise<number> {
    return this.guard(() => this.dispatch(argv));
  }

  /** Runs a single command directly, without command selection. */
  async call(command: Command, argv: readonly string[]): Promise<number> {
    return this.guard(async () => {
      const values = this.parse(argv, command.withName(""));
      await command.fn(values);
    });
  }

  private async dispatch(argv: readonly string[]): Promise<void> {
    const args = [...argv];
    if (args.length === 0 || args[0] === "--help") {
      throw new CliExit(this.formatInfo(), 0);
    }
    // Single-command CLIs can be used without the command name
    const names = [...this.registry.commands.keys()];
    if (names.length === 1 && this.registry.subcommands.size <= 1 && args[0] !== names[0]) {
      args.unshift(names[0]);
    }
    const name = args[0];
    const rest = args.slice(1);
    if (this.version !== undefined && name === "--version") {
      throw new CliExit(this.version, 0);
    }
    const subcommands = this.registry.group(name);
    const command = this.registry.lookup(name) ?? this.placeholder(name);
    const values = this.parse(rest, command, subcommands);
    const chosen = values[SUBCOMMAND_KEY];
    delete values[SUBCOMMAND_KEY];
    const target = typeof chosen === "string" ? subcommands.get(chosen) : command;
    if (!target) {
      throw new CommandNotFoundError(String(chosen), [...subcommands.keys()]);
    }
    await target.fn(values);
  }

  private async guard(body: () => Promise<void>): Promise<number> {
    try {
      await body();
      return 0;
    } catch (e) {
      if (e instanceof CliExit) {
        if (e.output) console.log(e.output);
        return e.exitCode;
      }
      const handler = e instanceof Error ? this.findHandler(e) : undefined;
      if (!handler || !(e instanceof Error)) throw e;
      const code = await handler(e);
      return typeof code === "number" ? code : 0;
    }
  }

  /** The handler registered for the error's class or its nearest ancestor. */
  findHandler(error: Error): ErrorHandler | undefined {
    let proto: unknown = Object.getPrototypeOf(error);
    while (typeof proto === "object" && proto !== null) {
      for (const [cls, handler] of this.errors) {
        if (cls.prototype === proto) return handler;
      }
      proto = Object.getPrototypeOf(proto);
    }
    return undefined;
  }

  // -------------------------------------------------------------------------
  // Static snapshot and docs
  // -------------------------------------------------------------------------

  toStaticJson(): StaticData {
    return toStaticJson(this);
  }

  /** Writes the static snapshot and returns its path. */
  toStatic(filePath: string): string {
    fs.writeFileSync(filePath, JSON.stringify(this.toStaticJson()), "utf-8");
    return filePath;
  }

  document(options: DocumentOptions = {}): string {
    return documentCli(this, options);
  }
}
