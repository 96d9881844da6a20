import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Analytics } from './analytics.js';
import type { AuthGate } from './auth.js';
import type { CorsConfig } from './config.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { renderDashboard } from './dashboard.js';
import type { Dispatcher } from './dispatcher.js';
import { errorMessage } from './errors.js';
import {
  analyticsMiddleware,
  authMiddleware,
  compose,
  loggingMiddleware,
  type Handler,
  type LoggingOptions,
  type Middleware,
} from './middleware.js';
import type { CommandRegistry } from './registry.js';
import { createCommandServer } from './server.js';

const DASHBOARD_DAYS = 7;

export interface HttpServerDeps {
  registry: CommandRegistry;
  dispatcher: Dispatcher;
  analytics: Analytics;
  gate: AuthGate;
  cors: CorsConfig;
  logging?: LoggingOptions;
}

export interface HttpServerHandle {
  server: Server;
  url: string;
  close(): Promise<void>;
}

function sendJson(res: ServerResponse, status: number, payload: unknown) {
  const body = JSON.stringify(payload);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(body);
}

function corsMiddleware(cors: CorsConfig): Middleware {
  return (next) => async (req, res) => {
    if (!cors.enabled) {
      await next(req, res);
      return;
    }
    const origin = typeof req.headers.origin === 'string' ? req.headers.origin : '';
    const allowed = cors.allowedOrigins.find((item) => item === '*' || item === origin);
    if (allowed) res.setHeader('Access-Control-Allow-Origin', allowed);
    if (cors.allowedMethods.length) res.setHeader('Access-Control-Allow-Methods', cors.allowedMethods.join(', '));
    if (cors.allowedHeaders.length) res.setHeader('Access-Control-Allow-Headers', cors.allowedHeaders.join(', '));
    if (req.method === 'OPTIONS') {
      res.writeHead(200);
      res.end();
      return;
    }
    await next(req, res);
  };
}

/** Stateless MCP endpoint: a fresh server and transport per POST. */
function mcpHandler(deps: HttpServerDeps): Handler {
  return async (req, res) => {
    if (req.method !== 'POST') {
      sendJson(res, 405, {
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed.' },
        id: null,
      });
      return;
    }
    const server = createCommandServer({
      registry: deps.registry,
      dispatcher: deps.dispatcher,
      gate: deps.gate.enabled ? deps.gate : null,
    });
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on('close', () => {
      transport.close().catch((err) => console.error(`[http] transport close failed: ${errorMessage(err)}`));
      server.close().catch((err) => console.error(`[http] server close failed: ${errorMessage(err)}`));
    });
    await server.connect(transport);
    await transport.handleRequest(req, res);
  };
}

/** logging → analytics → router; only the protocol endpoint passes CORS and the auth gate. */
export function createHttpHandler(deps: HttpServerDeps): Handler {
  const protocol = compose(corsMiddleware(deps.cors), authMiddleware(deps.gate))(mcpHandler(deps));

  const router: Handler = async (req, res) => {
    const pathname = (req.url || '/').split('?')[0];
    try {
      if (pathname === '/health' && req.method === 'GET') {
        sendJson(res, 200, { status: 'healthy', version: SERVER_VERSION, server: SERVER_NAME });
        return;
      }
      if (pathname === '/analytics' && req.method === 'GET') {
        const html = renderDashboard({
          days: DASHBOARD_DAYS,
          usage: deps.analytics.getStats(DASHBOARD_DAYS),
          http: deps.analytics.getHttpStats(DASHBOARD_DAYS),
          webhooks: deps.analytics.getWebhookStats(DASHBOARD_DAYS),
        });
        res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
        res.end(html);
        return;
      }
      await protocol(req, res);
    } catch (err) {
      console.error(`[http] ${req.method} ${req.url} failed: ${errorMessage(err)}`);
      if (!res.headersSent) {
        sendJson(res, 500, {
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  };

  return compose(loggingMiddleware(deps.logging), analyticsMiddleware(deps.analytics))(router);
}

export function startHttpServer(
  deps: HttpServerDeps,
  options: { host: string; port: number },
): Promise<HttpServerHandle> {
  const handler = createHttpHandler(deps);
  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    handler(req, res).catch((err) => {
      console.error(`[http] unhandled error: ${errorMessage(err)}`);
      if (!res.writableEnded) res.end();
    });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : options.port;
      resolve({
        server,
        url: `http://${options.host}:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
            server.closeAllConnections();
          }),
      });
    });
  });
}
