/**
 * Command Registry
 *
 * Registration and lookup of commands by name. Names are unique within a
 * registry.
 */

import { CommandNotFoundError, CommandRegistrationError } from '@flatframe/core';
import { FlattenColumnsCommand } from './flatten-columns.js';
import type { Command, Invocation } from './types.js';

export class CommandRegistry {
  private readonly commands = new Map<string, Command>();

  /**
   * @throws CommandRegistrationError if the name is empty or already taken
   */
  register<TArgs, TResult>(command: Command<TArgs, TResult>): this {
    if (command.name.trim() === '') {
      throw new CommandRegistrationError(command.name, 'command name must not be empty');
    }
    if (this.commands.has(command.name)) {
      throw CommandRegistrationError.duplicate(command.name);
    }
    this.commands.set(command.name, command);
    return this;
  }

  /** No-op for unknown names */
  unregister(name: string): void {
    this.commands.delete(name);
  }

  /**
   * @throws CommandNotFoundError if `name` is not registered
   */
  get(name: string): Command {
    const command = this.commands.get(name);
    if (command === undefined) {
      throw new CommandNotFoundError(name, this.names());
    }
    return command;
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  list(): Command[] {
    return [...this.commands.values()];
  }

  /** Registered names, sorted */
  names(): string[] {
    return [...this.commands.keys()].sort();
  }

  /**
   * Look up `name`, validate `rawArgs` with the command and execute it.
   */
  async run(name: string, rawArgs: unknown, invocation: Invocation): Promise<unknown> {
    const command = this.get(name);
    const args = command.parseArguments(rawArgs);
    return command.execute(args, invocation);
  }
}

/**
 * Registry with every built-in command registered.
 */
export function createDefaultRegistry(): CommandRegistry {
  return new CommandRegistry().register(new FlattenColumnsCommand());
}
