/**
 * Command registry: top-level commands and subcommands grouped by parent,
 * both in insertion order.
 */
import { CommandExistsError, CommandNotFoundError } from "./errors.js";
import type { Command } from "./command.js";

export class CommandRegistry {
  readonly commands = new Map<string, Command>();
  readonly subcommands = new Map<string, Map<string, Command>>();

  /** Adds a command, or a subcommand when it names a parent. */
  add(command: Command): Command {
    const table = command.parent ? this.group(command.parent, true) : this.commands;
    if (table.has(command.name)) {
      throw new CommandExistsError(command.name);
    }
    table.set(command.name, command);
    return command;
  }

  group(parent: string, create: boolean = false): Map<string, Command> {
    let subs = this.subcommands.get(parent);
    if (!subs) {
      subs = new Map();
      if (create) this.subcommands.set(parent, subs);
    }
    return subs;
  }

  hasGroup(name: string): boolean {
    return (this.subcommands.get(name)?.size ?? 0) > 0;
  }

  /**
   * Finds a top-level command. Returns null for a subcommand group without
   * a parent command of its own.
   */
  lookup(name: string): Command | null {
    const command = this.commands.get(name);
    if (command) return command;
    if (this.hasGroup(name)) return null;
    throw new CommandNotFoundError(name, [...this.commands.keys()]);
  }
}
