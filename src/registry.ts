import { CommandNotFoundError, ConfigError } from './errors.js';
import type { Command } from './types.js';

/** Read-only name → command table, built once from configuration. */
export class CommandRegistry {
  private readonly commands: ReadonlyMap<string, Command>;

  constructor(commands: readonly Command[]) {
    const map = new Map<string, Command>();
    for (const command of commands) {
      if (map.has(command.name)) {
        throw new ConfigError(`Duplicate command name: ${command.name}`);
      }
      map.set(command.name, freezeCommand(command));
    }
    this.commands = map;
  }

  listCommands(): Command[] {
    return Array.from(this.commands.values());
  }

  getCommand(name: string): Command | null {
    return this.commands.get(name) ?? null;
  }

  requireCommand(name: string): Command {
    const command = this.commands.get(name);
    if (!command) {
      throw new CommandNotFoundError(name);
    }
    return command;
  }

  get size(): number {
    return this.commands.size;
  }
}

function freezeCommand(command: Command): Command {
  const webhook = command.webhook
    ? Object.freeze({
        ...command.webhook,
        headers: Object.freeze({ ...command.webhook.headers }),
        auth: command.webhook.auth ? Object.freeze({ ...command.webhook.auth }) : undefined,
        retry: command.webhook.retry
          ? Object.freeze({
              ...command.webhook.retry,
              statusCodes: command.webhook.retry.statusCodes
                ? Object.freeze([...command.webhook.retry.statusCodes])
                : undefined,
            })
          : undefined,
      })
    : undefined;
  return Object.freeze({
    ...command,
    args: Object.freeze([...command.args]),
    env: Object.freeze({ ...command.env }),
    webhook,
  });
}
