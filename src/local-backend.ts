import type { Backend, ExecutionContext } from './backend.js';
import { BackendError, ConfigError } from './errors.js';
import { describeFailure, runProcess, type RunResult } from './runner.js';
import type { Command } from './types.js';
import { parseDuration } from './utils.js';

export interface LocalBackendOptions {
  cwd?: string;
  maxOutputBytes?: number;
}

export class LocalBackend implements Backend {
  readonly kind = 'local' as const;
  private readonly options: LocalBackendOptions;

  constructor(options: LocalBackendOptions = {}) {
    this.options = options;
  }

  async execute(command: Command, ctx: ExecutionContext = {}): Promise<string> {
    if (!command.script) {
      throw new ConfigError(`Command '${command.name}' has no script`);
    }
    const result = await runProcess([command.script, ...command.args], {
      env: { ...command.env },
      cwd: this.options.cwd,
      timeoutMs: parseDuration(command.timeout),
      signal: ctx.signal,
      maxOutputBytes: this.options.maxOutputBytes,
    });
    return unwrapRun(result);
  }
}

/** Output on success; otherwise a BackendError that still carries the output. */
export function unwrapRun(result: RunResult): string {
  const failure = describeFailure(result);
  if (failure) {
    throw new BackendError(failure, { output: result.output });
  }
  return result.output;
}
