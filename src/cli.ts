#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createAnalytics } from './analytics.js';
import { ApiKeyTable, AuthGate } from './auth.js';
import { findConfigFile, loadConfig } from './config.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { Dispatcher } from './dispatcher.js';
import { BackendError, errorMessage } from './errors.js';
import { startHttpServer } from './http-server.js';
import { CommandRegistry } from './registry.js';
import { createCommandServer } from './server.js';
import { renderSetupInstructions } from './setup.js';
import { clampNumber, normalizeId, parseArgs } from './utils.js';

const TAG = '[command_mcp]';

const args = parseArgs(process.argv.slice(2));
if (args.help || args.h) {
  printHelp();
  process.exit(0);
}

const configPath = findConfigFile(normalizeId(args.config) || normalizeId(args.c));

async function main() {
  const config = loadConfig(configPath);
  const registry = new CommandRegistry(config.commands);

  if (args.setup) {
    process.stdout.write(
      renderSetupInstructions({
        commands: registry.listCommands(),
        configPath,
        launch: [process.execPath, process.argv[1] ?? 'cli.js'],
        cwd: process.cwd(),
      }),
    );
    return;
  }

  const analytics = createAnalytics(config.analytics);

  if (args.analytics) {
    const days = clampNumber(args.days ?? 7, 1, 3650, 7);
    const stats = {
      days,
      usage: analytics.getStats(days),
      http: analytics.getHttpStats(days),
      webhooks: analytics.getWebhookStats(days),
    };
    analytics.close();
    process.stdout.write(`${JSON.stringify(stats, null, 2)}\n`);
    return;
  }

  const dispatcher = new Dispatcher({ analytics });
  const commandName = args._[0];

  if (commandName && !args.http && !args.mcp) {
    try {
      const output = await dispatcher.executeByName({}, registry, commandName);
      process.stdout.write(output);
    } catch (err) {
      if (err instanceof BackendError && err.output) process.stdout.write(err.output);
      throw err;
    } finally {
      analytics.close();
    }
    return;
  }

  if (args.http) {
    const http = config.server.http;
    const host = normalizeId(args.host) || http.host;
    const port = clampNumber(args.port ?? http.port, 0, 65535, http.port);
    const gate = new AuthGate({ enabled: http.auth.enabled, table: new ApiKeyTable(http.auth.apiKeys) });
    const handle = await startHttpServer(
      { registry, dispatcher, analytics, gate, cors: http.cors },
      { host, port },
    );
    console.error(
      `${TAG} HTTP server v${SERVER_VERSION} listening at ${handle.url} ` +
        `(${registry.size} tools, auth=${gate.enabled ? 'on' : 'off'}, config=${configPath}).`,
    );
    console.error(`${TAG} Analytics dashboard: ${handle.url}/analytics`);
    const shutdown = () => {
      handle
        .close()
        .catch((err) => console.error(`${TAG} HTTP shutdown failed:`, err))
        .finally(() => {
          analytics.close();
          process.exit(0);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
    return;
  }

  const server = createCommandServer({ registry, dispatcher });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${TAG} MCP server ready on stdio (${registry.size} tools, config=${configPath}).`);
}

main().catch((err) => {
  console.error(`${TAG} ${errorMessage(err)}`);
  process.exit(1);
});

function printHelp() {
  console.log(`${SERVER_NAME} v${SERVER_VERSION}

Usage:
  ${SERVER_NAME} [options] [command-name]

Modes:
  --mcp                 Serve MCP over stdio (default)
  --http                Serve MCP over HTTP, with /health and /analytics
  --analytics           Print usage statistics as JSON and exit
  --setup               Print MCP client setup instructions and exit
  <command-name>        Run one configured command and print its output

Options:
  -c, --config <path>   Config file (default: $COMMAND_MCP_CONFIG, ./config.yaml,
                        ~/.command-mcp/config.yaml, /etc/command-mcp/config.yaml)
  --host <host>         HTTP bind host (overrides server.http.host)
  --port <port>         HTTP port (overrides server.http.port)
  --days <n>            Window for --analytics (default: 7)
  -h, --help            Show help
`);
}
