import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, describe, expect, it } from 'vitest';
import { ApiKeyTable, AuthGate } from '../src/auth.js';
import { Dispatcher } from '../src/dispatcher.js';
import { CommandRegistry } from '../src/registry.js';
import { createCommandServer } from '../src/server.js';
import { RecordingAnalytics, makeCommand, textOf } from './helpers.js';

const registry = new CommandRegistry([
  makeCommand('echo-test', { description: 'Say hi', args: ['hi'] }),
  makeCommand('broken', { script: 'sh', args: ['-c', 'echo partial; exit 3'] }),
]);

let client: Client | null = null;

async function connect(options: { gate?: AuthGate } = {}) {
  const analytics = new RecordingAnalytics();
  const server = createCommandServer({ registry, dispatcher: new Dispatcher({ analytics }), gate: options.gate });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  client = new Client({ name: 'test-client', version: '0.0.0' });
  await client.connect(clientTransport);
  return { client, analytics };
}

afterEach(async () => {
  await client?.close();
  client = null;
});

describe('command server', () => {
  it('lists one tool per command', async () => {
    const { client } = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((tool) => [tool.name, tool.description])).toEqual([
      ['echo-test', 'Say hi'],
      ['broken', 'Execute broken with configured arguments'],
    ]);
  });

  it('runs a command and returns its output', async () => {
    const { client, analytics } = await connect();
    const result = await client.callTool({ name: 'echo-test', arguments: {} });
    expect(textOf(result)).toEqual({ text: 'hi\n', isError: false });
    expect(analytics.commands).toHaveLength(1);
    expect(analytics.commands[0]).toMatchObject({ commandName: 'echo-test', success: true });
  });

  it('reports failures as error results with the captured output', async () => {
    const { client, analytics } = await connect();
    const result = await client.callTool({ name: 'broken', arguments: {} });
    expect(textOf(result)).toEqual({
      text: 'Command execution failed: exit status 3\nOutput: partial\n',
      isError: true,
    });
    expect(analytics.commands[0]).toMatchObject({ success: false, error: 'exit status 3' });
  });

  it('refuses calls without an auth context when the gate is enabled', async () => {
    const gate = new AuthGate({ enabled: true, table: new ApiKeyTable([]) });
    const { client, analytics } = await connect({ gate });
    const result = await client.callTool({ name: 'echo-test', arguments: {} });
    expect(textOf(result)).toEqual({ text: 'Authentication required', isError: true });
    expect(analytics.commands).toHaveLength(0);
  });
});
