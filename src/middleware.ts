import type { IncomingMessage, ServerResponse } from 'node:http';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import type { Analytics } from './analytics.js';
import { classifyAuthMethod, extractCredential, toAuthInfo, type AuthGate } from './auth.js';
import { AuthError } from './errors.js';
import type { AuthMethod } from './types.js';
import { normalizeId } from './utils.js';

export type AuthenticatedRequest = IncomingMessage & { auth?: AuthInfo };
export type Handler = (req: AuthenticatedRequest, res: ServerResponse) => Promise<void>;
export type Middleware = (next: Handler) => Handler;

/** compose(a, b)(h) runs a, then b, then h. */
export function compose(...middlewares: Middleware[]): Middleware {
  return (handler) => middlewares.reduceRight((next, middleware) => middleware(next), handler);
}

interface ResponseTracker {
  bytes: number;
  done: Promise<void>;
}

const trackers = new WeakMap<ServerResponse, ResponseTracker>();

/** Counts body bytes written to the response; `done` settles on finish or close. */
export function trackResponse(res: ServerResponse): ResponseTracker {
  const existing = trackers.get(res);
  if (existing) return existing;

  const tracker: ResponseTracker = {
    bytes: 0,
    done: new Promise<void>((resolve) => {
      res.once('finish', () => resolve());
      res.once('close', () => resolve());
    }),
  };
  trackers.set(res, tracker);

  const originalWrite = res.write;
  const originalEnd = res.end;
  res.write = (...args: unknown[]): boolean => {
    tracker.bytes += chunkSize(args[0]);
    return Boolean(Reflect.apply(originalWrite, res, args));
  };
  res.end = (...args: unknown[]): ServerResponse => {
    if (typeof args[0] !== 'function') tracker.bytes += chunkSize(args[0]);
    Reflect.apply(originalEnd, res, args);
    return res;
  };
  return tracker;
}

function chunkSize(chunk: unknown): number {
  if (typeof chunk === 'string') return Buffer.byteLength(chunk, 'utf8');
  if (chunk instanceof Uint8Array) return chunk.byteLength;
  return 0;
}

function headerValue(req: IncomingMessage, name: string): string {
  const value = req.headers[name];
  return normalizeId(Array.isArray(value) ? value[0] : value);
}

export function clientIp(req: IncomingMessage): string {
  const forwarded = headerValue(req, 'x-forwarded-for').split(',')[0]?.trim();
  return forwarded || headerValue(req, 'x-real-ip') || req.socket.remoteAddress || '-';
}

function requestPath(req: IncomingMessage): string {
  const url = req.url || '/';
  const queryAt = url.indexOf('?');
  return queryAt === -1 ? url : url.slice(0, queryAt);
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `dd/Mon/yyyy:HH:mm:ss +0000`, always UTC. */
export function formatClfDate(date: Date): string {
  return (
    `${pad(date.getUTCDate())}/${MONTHS[date.getUTCMonth()]}/${date.getUTCFullYear()}:` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} +0000`
  );
}

export interface AccessLogEntry {
  clientIp: string;
  time: Date;
  method: string;
  url: string;
  httpVersion: string;
  status: number;
  size: number;
  userAgent: string;
  durationMs: number;
  authMethod: AuthMethod;
}

export function formatAccessLine(entry: AccessLogEntry): string {
  const label = entry.authMethod === 'none' ? '-' : entry.authMethod;
  return (
    `${entry.clientIp} - - [${formatClfDate(entry.time)}] ` +
    `"${entry.method} ${entry.url} HTTP/${entry.httpVersion}" ${entry.status} ${entry.size} ` +
    `"${entry.userAgent || '-'}" ${entry.durationMs}ms ${label}`
  );
}

export interface LoggingOptions {
  sink?: (line: string) => void;
  now?: () => Date;
}

/** One access-log line per request, written after the response finishes. */
export function loggingMiddleware(options: LoggingOptions = {}): Middleware {
  const sink = options.sink ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());
  return (next) => async (req, res) => {
    const time = now();
    const startedAt = Date.now();
    const tracker = trackResponse(res);
    await next(req, res);
    await tracker.done;
    sink(
      formatAccessLine({
        clientIp: clientIp(req),
        time,
        method: req.method || 'GET',
        url: req.url || '/',
        httpVersion: req.httpVersion,
        status: res.statusCode,
        size: tracker.bytes,
        userAgent: headerValue(req, 'user-agent'),
        durationMs: Date.now() - startedAt,
        authMethod: classifyAuthMethod(req.headers),
      }),
    );
  };
}

/**
 * Records an HttpEvent per request. Auth success is judged from the headers
 * and the final status, independent of the gate's own decision.
 */
export function analyticsMiddleware(analytics: Analytics): Middleware {
  return (next) => async (req, res) => {
    const startedAt = Date.now();
    const tracker = trackResponse(res);
    await next(req, res);
    await tracker.done;
    const authMethod = classifyAuthMethod(req.headers);
    analytics.recordHttpEvent({
      sessionId: headerValue(req, 'x-session-id'),
      method: req.method || 'GET',
      path: requestPath(req),
      statusCode: res.statusCode,
      durationMs: Date.now() - startedAt,
      clientIp: clientIp(req),
      userAgent: headerValue(req, 'user-agent'),
      authMethod,
      authSuccess: authMethod !== 'none' && res.statusCode < 400,
      responseSize: tracker.bytes,
    });
  };
}

/** Rejects requests without a valid key with 401; attaches the caller as `req.auth` otherwise. */
export function authMiddleware(gate: AuthGate): Middleware {
  return (next) => async (req, res) => {
    if (!gate.enabled) {
      await next(req, res);
      return;
    }
    try {
      const ctx = gate.authenticate(req.headers);
      req.auth = toAuthInfo(ctx, extractCredential(req.headers) ?? '');
    } catch (err) {
      if (!(err instanceof AuthError)) throw err;
      res.writeHead(401, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end(`${err.message}\n`);
      return;
    }
    await next(req, res);
  };
}
