/** Malformed or incomplete configuration. Fatal at startup, or before a webhook call is sent. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CommandNotFoundError extends Error {
  readonly commandName: string;

  constructor(commandName: string) {
    super(`command '${commandName}' not found`);
    this.name = 'CommandNotFoundError';
    this.commandName = commandName;
  }
}

export interface BackendErrorDetails {
  output?: string;
  status?: number;
  attempts?: number;
  cause?: unknown;
}

/**
 * A backend ran (or tried to run) and failed. `output` holds whatever the
 * subprocess printed or the upstream returned, so callers can show it.
 */
export class BackendError extends Error {
  readonly output: string;
  readonly status: number | null;
  readonly attempts: number | null;

  constructor(message: string, details: BackendErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'BackendError';
    this.output = details.output ?? '';
    this.status = details.status ?? null;
    this.attempts = details.attempts ?? null;
  }
}

export type AuthFailure = 'unauthenticated' | 'forbidden';

export class AuthError extends Error {
  readonly reason: AuthFailure;

  constructor(reason: AuthFailure, message: string) {
    super(message);
    this.name = 'AuthError';
    this.reason = reason;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
