/**
 * A CLI rebuilt from a static snapshot. Parses argv, shows help and raises
 * errors like the live CLI, but its commands do nothing.
 */
import * as fs from "node:fs";
import { Cli } from "./cli.js";
import type { CliOptions } from "./cli.js";
import { CliError } from "./errors.js";
import type { ConverterInput } from "./converters.js";
import { commandFromStatic, parseStaticData } from "./snapshot.js";
import type { StaticData } from "./snapshot.js";

export const DEBUG_START = "===== STATIC =====";
export const DEBUG_END = "=== END STATIC ===";

export interface StaticOptions {
  converters?: ConverterInput;
  errors?: CliOptions["errors"];
  /** Print markers around each run. */
  debug?: boolean;
}

export class StaticCli extends Cli {
  data: StaticData;
  debug: boolean;
  path?: string;

  constructor(data: StaticData, options: StaticOptions = {}) {
    super({
      prog: data.prog ?? undefined,
      help: data.help,
      version: data.version ?? undefined,
      extraKey: data.extra_key,
      fillDefaults: data.fill_defaults,
      converters: options.converters,
      errors: options.errors,
    });
    this.data = data;
    this.debug = options.debug ?? false;
    for (const command of Object.values(data.commands)) {
      this.registry.add(
        command.is_placeholder
          ? this.makePlaceholder(command.name, command.description ?? undefined)
          : commandFromStatic(command, this.converters)
      );
    }
    for (const [parent, subs] of Object.entries(data.subcommands)) {
      this.registry.group(parent, true);
      for (const sub of Object.values(subs)) {
        this.registry.add(commandFromStatic(sub, this.converters));
      }
    }
  }

  /** Validates and loads an already parsed snapshot document. */
  static fromStaticJson(json: unknown, options: StaticOptions = {}): StaticCli {
    return new StaticCli(parseStaticData(json), options);
  }

  static load(filePath: string, options: StaticOptions = {}): StaticCli {
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw new CliError(`Not a valid file path: ${filePath}`, "E_STATIC");
    }
    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new CliError(`Invalid static snapshot: ${msg}`, "E_STATIC", { cause: e });
    }
    const cli = StaticCli.fromStaticJson(json, options);
    cli.path = filePath;
    return cli;
  }

  override async run(argv: readonly string[]): Promise<number> {
    if (this.debug) console.log(DEBUG_START);
    const code = await super.run(argv);
    if (this.debug) console.log(DEBUG_END);
    return code;
  }
}
