import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { NoopAnalytics } from '../src/analytics.js';
import type { Backend, ExecutionContext } from '../src/backend.js';
import type { BackendKind, Command, CommandEvent, HttpEvent } from '../src/types.js';

/** Keeps recorded events in memory; statistics stay empty. */
export class RecordingAnalytics extends NoopAnalytics {
  readonly commands: CommandEvent[] = [];
  readonly http: HttpEvent[] = [];

  override recordCommand(event: CommandEvent): void {
    this.commands.push(event);
  }

  override recordHttpEvent(event: HttpEvent): void {
    this.http.push(event);
  }
}

export class StubBackend implements Backend {
  readonly calls: Array<{ command: Command; ctx?: ExecutionContext }> = [];

  constructor(
    readonly kind: BackendKind,
    private readonly run: (command: Command) => Promise<string> = async () => `${kind} ok`,
  ) {}

  async execute(command: Command, ctx?: ExecutionContext): Promise<string> {
    this.calls.push({ command, ctx });
    return this.run(command);
  }
}

export function stubBackends() {
  return {
    local: new StubBackend('local'),
    container: new StubBackend('container'),
    webhook: new StubBackend('webhook'),
  };
}

export function makeCommand(name: string, extra: Partial<Command> = {}): Command {
  return { name, description: '', script: 'echo', args: [name], env: {}, ...extra };
}

/** First text block of a tool result, plus its error flag. */
export function textOf(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  return { text: first?.type === 'text' ? first.text : '', isError: parsed.isError === true };
}
