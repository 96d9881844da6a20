import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { CallToolResult, ServerNotification, ServerRequest } from '@modelcontextprotocol/sdk/types.js';
import { fromAuthInfo, type AuthGate } from './auth.js';
import { describeCommand } from './config.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import type { Dispatcher } from './dispatcher.js';
import { AuthError, BackendError, errorMessage } from './errors.js';
import type { CommandRegistry } from './registry.js';
import type { Command } from './types.js';
import { normalizeId } from './utils.js';

export type ToolExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface CommandServerOptions {
  registry: CommandRegistry;
  dispatcher: Dispatcher;
  /** Enforced per tool call; omitted for STDIO, which performs no authentication. */
  gate?: AuthGate | null;
}

export function createCommandServer(options: CommandServerOptions) {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  for (const command of options.registry.listCommands()) {
    server.registerTool(
      command.name,
      {
        title: command.name,
        description: describeCommand(command),
        inputSchema: {},
      },
      createToolHandler(command, options),
    );
  }
  return server;
}

/** Tool callback for one command: permission check, dispatch, and result text. */
export function createToolHandler(
  command: Command,
  options: Pick<CommandServerOptions, 'dispatcher' | 'gate'>,
) {
  return async (_args: unknown, extra: ToolExtra): Promise<CallToolResult> => {
    if (options.gate) {
      try {
        options.gate.authorize(fromAuthInfo(extra.authInfo), command.name);
      } catch (err) {
        if (err instanceof AuthError) return errorResult(err.message);
        throw err;
      }
    }

    try {
      const output = await options.dispatcher.execute(command, {
        signal: extra.signal,
        sessionId: sessionIdFrom(extra),
      });
      return { content: [{ type: 'text', text: output }] };
    } catch (err) {
      const output = err instanceof BackendError ? err.output : '';
      return errorResult(`Command execution failed: ${errorMessage(err)}\nOutput: ${output}`);
    }
  };
}

function sessionIdFrom(extra: ToolExtra): string | undefined {
  const header = extra.requestInfo?.headers['x-session-id'];
  return normalizeId(Array.isArray(header) ? header[0] : header) || extra.sessionId || undefined;
}

function errorResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}
