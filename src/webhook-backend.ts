import { STATUS_CODES } from 'node:http';
import { setTimeout as delay } from 'node:timers/promises';
import type { Backend, ExecutionContext } from './backend.js';
import { USER_AGENT } from './constants.js';
import { BackendError, ConfigError, errorMessage } from './errors.js';
import { computeDelay, resolveRetryPolicy, shouldRetryStatus } from './retry.js';
import type { BodyFormat, Command, WebhookAuth, WebhookSpec } from './types.js';
import { isHttpMethod, isHttpUrl, parseDuration } from './utils.js';

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 30_000;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface WebhookBackendOptions {
  fetch?: typeof fetch;
  sleep?: SleepFn;
  defaultTimeoutMs?: number;
}

export interface PreparedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

const CONTENT_TYPES: Record<BodyFormat, string> = {
  json: 'application/json',
  xml: 'application/xml',
  form: 'application/x-www-form-urlencoded',
  text: 'text/plain',
};

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Calls the command's webhook, retrying transport failures and retryable
 * statuses per its retry policy. Each attempt gets its own timeout.
 */
export class WebhookBackend implements Backend {
  readonly kind = 'webhook' as const;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: SleepFn;
  private readonly defaultTimeoutMs: number;

  constructor(options: WebhookBackendOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS;
  }

  async execute(command: Command, ctx: ExecutionContext = {}): Promise<string> {
    if (!command.webhook) {
      throw new ConfigError(`Command '${command.name}' has no webhook`);
    }
    const request = prepareRequest(command.webhook);
    const policy = resolveRetryPolicy(command.webhook.retry);
    const timeout = parseDuration(command.timeout);
    const timeoutMs = timeout && timeout > 0 ? timeout : this.defaultTimeoutMs;
    const signal = ctx.signal;
    const attempts = policy.maxRetries + 1;

    let lastError = '';
    let lastBody: string | undefined;
    let lastStatus: number | undefined;

    for (let attempt = 0; attempt < attempts; attempt += 1) {
      if (signal?.aborted) throw cancelled(attempt);

      const outcome = await this.attempt(request, timeoutMs, signal);
      if (outcome.kind === 'cancelled') throw cancelled(attempt + 1);

      if (outcome.kind === 'response') {
        const { status, body } = outcome;
        if (!shouldRetryStatus(policy, status)) {
          if (status >= 400) {
            throw new BackendError(httpError(status), { output: body, status, attempts: attempt + 1 });
          }
          return body;
        }
        lastError = httpError(status);
        lastBody = body;
        lastStatus = status;
      } else {
        lastError = outcome.message;
        lastBody = undefined;
        lastStatus = undefined;
      }

      if (attempt < attempts - 1) {
        try {
          await this.sleep(computeDelay(policy, attempt), signal);
        } catch (err) {
          if (signal?.aborted) throw cancelled(attempt + 1);
          throw err;
        }
      }
    }

    throw new BackendError(`request failed after ${attempts} attempts: ${lastError}`, {
      output: lastBody,
      status: lastStatus,
      attempts,
    });
  }

  private async attempt(
    request: PreparedRequest,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: { ...request.headers },
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();
      return { kind: 'response', status: response.status, body };
    } catch (err) {
      if (signal?.aborted) return { kind: 'cancelled' };
      if (timedOut) return { kind: 'error', message: `request timed out after ${timeoutMs}ms` };
      return { kind: 'error', message: transportMessage(err) };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

type AttemptOutcome =
  | { kind: 'response'; status: number; body: string }
  | { kind: 'error'; message: string }
  | { kind: 'cancelled' };

/** Method, headers and validated body for a webhook; raises ConfigError before any network call. */
export function prepareRequest(spec: WebhookSpec): PreparedRequest {
  if (!isHttpUrl(spec.url)) {
    throw new ConfigError(`Invalid webhook URL: ${spec.url}`);
  }
  const method = (spec.method || 'GET').toUpperCase();
  if (!isHttpMethod(method)) {
    throw new ConfigError(`Invalid webhook method: ${spec.method}`);
  }
  const body = spec.body ? validateBody(spec.body, spec.bodyFormat) : undefined;
  if (body !== undefined && (method === 'GET' || method === 'HEAD')) {
    throw new ConfigError(`Webhook body is not allowed with ${method}`);
  }

  const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
  if (body !== undefined && !hasHeader(spec.headers, 'content-type')) {
    headers['Content-Type'] = CONTENT_TYPES[spec.bodyFormat ?? 'text'];
  }
  for (const [key, value] of Object.entries(spec.headers)) {
    if (key.toLowerCase() === 'user-agent') delete headers['User-Agent'];
    headers[key] = value;
  }
  if (spec.auth) {
    const [name, value] = authHeader(spec.auth);
    for (const key of Object.keys(headers)) {
      if (key.toLowerCase() === name.toLowerCase()) delete headers[key];
    }
    headers[name] = value;
  }
  return { url: spec.url, method, headers, body };
}

function validateBody(body: string, format: BodyFormat | undefined): string {
  if (format === 'json') {
    try {
      JSON.parse(body);
    } catch (err) {
      throw new ConfigError(`Invalid JSON body: ${errorMessage(err)}`);
    }
  }
  return body;
}

export function authHeader(auth: WebhookAuth): [string, string] {
  switch (auth.type) {
    case 'bearer':
      if (!auth.token) throw new ConfigError('Bearer auth requires a token');
      return ['Authorization', `Bearer ${auth.token}`];
    case 'api_key':
      if (!auth.key) throw new ConfigError('API key auth requires a key');
      return [auth.header || 'X-API-Key', auth.key];
    case 'basic': {
      if (!auth.user || !auth.pass) throw new ConfigError('Basic auth requires user and pass');
      const encoded = Buffer.from(`${auth.user}:${auth.pass}`).toString('base64');
      return ['Authorization', `Basic ${encoded}`];
    }
  }
}

function hasHeader(headers: Readonly<Record<string, string>>, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name);
}

function httpError(status: number): string {
  return `HTTP ${status}: ${STATUS_CODES[status] ?? 'Unknown Status'}`;
}

function transportMessage(err: unknown): string {
  const message = errorMessage(err);
  if (err instanceof Error && err.cause instanceof Error && err.cause.message) {
    return `${message}: ${err.cause.message}`;
  }
  return message;
}

function cancelled(attempts: number): BackendError {
  return new BackendError('request cancelled', { attempts });
}
