import type { Analytics } from './analytics.js';
import type { Backend, ExecutionContext } from './backend.js';
import { ContainerBackend } from './container-backend.js';
import { BackendError, errorMessage } from './errors.js';
import { LocalBackend } from './local-backend.js';
import type { CommandRegistry } from './registry.js';
import type { BackendKind, Command } from './types.js';
import { generateSessionId } from './utils.js';
import { WebhookBackend } from './webhook-backend.js';

export type { ExecutionContext } from './backend.js';

export type BackendSet = Record<BackendKind, Backend>;

export interface DispatcherOptions {
  analytics: Analytics;
  backends?: Partial<BackendSet>;
}

/** webhook, then container, then local. */
export function selectBackend(command: Command): BackendKind {
  if (command.webhook) return 'webhook';
  if (command.container) return 'container';
  return 'local';
}

/**
 * Routes each command to its backend and records exactly one CommandEvent per
 * execution once the backend settles.
 */
export class Dispatcher {
  private readonly analytics: Analytics;
  private readonly backends: BackendSet;

  constructor(options: DispatcherOptions) {
    this.analytics = options.analytics;
    const local = options.backends?.local ?? new LocalBackend();
    this.backends = {
      local,
      container: options.backends?.container ?? new ContainerBackend({ local: local instanceof LocalBackend ? local : undefined }),
      webhook: options.backends?.webhook ?? new WebhookBackend(),
    };
  }

  async execute(command: Command, ctx: ExecutionContext = {}): Promise<string> {
    const kind = selectBackend(command);
    const sessionId = ctx.sessionId || generateSessionId();
    const startedAt = Date.now();
    try {
      const output = await this.backends[kind].execute(command, { ...ctx, sessionId });
      this.record(command, kind, sessionId, startedAt, output, null);
      return output;
    } catch (err) {
      const output = err instanceof BackendError ? err.output : '';
      this.record(command, kind, sessionId, startedAt, output, err);
      throw err;
    }
  }

  /** Looks the command up first; an unknown name throws without recording anything. */
  async executeByName(ctx: ExecutionContext, registry: CommandRegistry, name: string): Promise<string> {
    const command = registry.requireCommand(name);
    return this.execute(command, ctx);
  }

  private record(
    command: Command,
    kind: BackendKind,
    sessionId: string,
    startedAt: number,
    output: string,
    err: unknown,
  ) {
    this.analytics.recordCommand({
      sessionId,
      commandName: command.name,
      durationMs: Date.now() - startedAt,
      success: err === null,
      outputSize: Buffer.byteLength(output, 'utf8'),
      executionMode: kind,
      error: err === null ? '' : errorMessage(err),
    });
  }
}
