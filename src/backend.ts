import type { BackendKind, Command } from './types.js';

export interface ExecutionContext {
  signal?: AbortSignal;
  sessionId?: string;
}

/**
 * One way of running a command. Resolves with the command's output text and
 * rejects with a BackendError (or a ConfigError raised before anything ran).
 */
export interface Backend {
  readonly kind: BackendKind;
  execute(command: Command, ctx?: ExecutionContext): Promise<string>;
}
