import type { Backend, ExecutionContext } from './backend.js';
import { ConfigError } from './errors.js';
import { LocalBackend, unwrapRun } from './local-backend.js';
import { runProcess } from './runner.js';
import type { Command } from './types.js';
import { parseDuration } from './utils.js';

export interface ContainerBackendOptions {
  runtime?: string;
  local?: LocalBackend;
  maxOutputBytes?: number;
}

export const DEFAULT_CONTAINER_RUNTIME = 'docker';

/**
 * Runs commands in a throwaway container through the runtime's CLI. Commands
 * without an image go to the local backend unchanged.
 */
export class ContainerBackend implements Backend {
  readonly kind = 'container' as const;
  private readonly runtime: string;
  private readonly local: LocalBackend;
  private readonly maxOutputBytes?: number;

  constructor(options: ContainerBackendOptions = {}) {
    this.runtime = options.runtime || DEFAULT_CONTAINER_RUNTIME;
    this.local = options.local ?? new LocalBackend({ maxOutputBytes: options.maxOutputBytes });
    this.maxOutputBytes = options.maxOutputBytes;
  }

  async execute(command: Command, ctx: ExecutionContext = {}): Promise<string> {
    if (!command.container) {
      return this.local.execute(command, ctx);
    }
    const result = await runProcess(buildContainerArgv(command, this.runtime), {
      timeoutMs: parseDuration(command.timeout),
      signal: ctx.signal,
      maxOutputBytes: this.maxOutputBytes,
    });
    return unwrapRun(result);
  }
}

export function buildContainerArgv(command: Command, runtime = DEFAULT_CONTAINER_RUNTIME): string[] {
  if (!command.container) {
    throw new ConfigError(`Command '${command.name}' has no container image`);
  }
  if (!command.script) {
    throw new ConfigError(`Command '${command.name}' has no script`);
  }
  const argv = [runtime, 'run', '--rm'];
  for (const [key, value] of Object.entries(command.env)) {
    argv.push('-e', `${key}=${value}`);
  }
  argv.push(command.container, command.script, ...command.args);
  return argv;
}
