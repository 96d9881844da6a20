import { describe, expect, it, vi } from 'vitest';
import { USER_AGENT } from '../src/constants.js';
import { BackendError, ConfigError } from '../src/errors.js';
import type { Command, WebhookSpec } from '../src/types.js';
import { WebhookBackend, prepareRequest } from '../src/webhook-backend.js';

function webhookCommand(webhook: Partial<WebhookSpec>, extra: Partial<Command> = {}): Command {
  return {
    name: 'status-check',
    description: '',
    args: [],
    env: {},
    webhook: { url: 'http://upstream.test/hook', headers: {}, ...webhook },
    ...extra,
  };
}

function respond(status: number, body = ''): Response {
  return new Response(body, { status });
}

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

describe('WebhookBackend', () => {
  it('returns the body of a successful response', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => respond(200, '{"ok":true}'));
    const backend = new WebhookBackend({ fetch: fetchImpl });
    await expect(backend.execute(webhookCommand({}))).resolves.toBe('{"ok":true}');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://upstream.test/hook');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ 'User-Agent': USER_AGENT });
  });

  it('retries a retryable status until attempts run out', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => respond(503, 'down'));
    const { delays, sleep } = recordingSleep();
    const backend = new WebhookBackend({ fetch: fetchImpl, sleep });

    const error = await backend.execute(webhookCommand({ retry: { maxRetries: 3, delay: '1s' } })).catch((err) => err);

    expect(error).toBeInstanceOf(BackendError);
    expect(error.message).toBe('request failed after 4 attempts: HTTP 503: Service Unavailable');
    expect(error.attempts).toBe(4);
    expect(error.status).toBe(503);
    expect(error.output).toBe('down');
    expect(fetchImpl).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([1000, 2000, 4000]);
  });

  it('stops retrying once a request succeeds', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(respond(503))
      .mockResolvedValueOnce(respond(502))
      .mockResolvedValueOnce(respond(200, 'recovered'));
    const { delays, sleep } = recordingSleep();
    const backend = new WebhookBackend({ fetch: fetchImpl, sleep });

    await expect(backend.execute(webhookCommand({}))).resolves.toBe('recovered');
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('fails at once on a non-retryable error status', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => respond(404, 'no such hook'));
    const { delays, sleep } = recordingSleep();
    const backend = new WebhookBackend({ fetch: fetchImpl, sleep });

    const error = await backend.execute(webhookCommand({})).catch((err) => err);
    expect(error).toBeInstanceOf(BackendError);
    expect(error.message).toBe('HTTP 404: Not Found');
    expect(error.output).toBe('no such hook');
    expect(error.status).toBe(404);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('makes a single attempt when retries are disabled', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => respond(503));
    const { delays, sleep } = recordingSleep();
    const backend = new WebhookBackend({ fetch: fetchImpl, sleep });

    await expect(backend.execute(webhookCommand({ retry: { maxRetries: 0 } }))).rejects.toThrow(
      'request failed after 1 attempts: HTTP 503: Service Unavailable',
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('retries transport errors with linear backoff', async () => {
    const refused = new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:9') });
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockRejectedValueOnce(refused)
      .mockResolvedValueOnce(respond(200, 'ok'));
    const { delays, sleep } = recordingSleep();
    const backend = new WebhookBackend({ fetch: fetchImpl, sleep });

    const command = webhookCommand({ retry: { backoff: 'linear', delay: '200ms' } });
    await expect(backend.execute(command)).resolves.toBe('ok');
    expect(delays).toEqual([200]);
  });

  it('reports the last transport error after exhausting attempts', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND upstream.test') });
    });
    const { sleep } = recordingSleep();
    const backend = new WebhookBackend({ fetch: fetchImpl, sleep });

    await expect(backend.execute(webhookCommand({ retry: { maxRetries: 1 } }))).rejects.toThrow(
      'request failed after 2 attempts: fetch failed: getaddrinfo ENOTFOUND upstream.test',
    );
  });

  it('sends the same body on every attempt', async () => {
    const bodies: unknown[] = [];
    const fetchImpl = vi.fn<typeof fetch>(async (_url, init) => {
      bodies.push(init?.body);
      return bodies.length < 3 ? respond(429) : respond(200, 'accepted');
    });
    const { sleep } = recordingSleep();
    const backend = new WebhookBackend({ fetch: fetchImpl, sleep });

    const command = webhookCommand({ method: 'post', body: '{"a":1}', bodyFormat: 'json' });
    await expect(backend.execute(command)).resolves.toBe('accepted');
    expect(bodies).toEqual(['{"a":1}', '{"a":1}', '{"a":1}']);
    expect(fetchImpl.mock.calls[0][1]?.method).toBe('POST');
  });

  it('times out each attempt', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const backend = new WebhookBackend({ fetch: fetchImpl });

    const command = webhookCommand({ retry: { maxRetries: 0 } }, { timeout: '50ms' });
    await expect(backend.execute(command)).rejects.toThrow(
      'request failed after 1 attempts: request timed out after 50ms',
    );
  });

  it('stops when the caller cancels during backoff', async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn<typeof fetch>(async () => respond(503));
    const sleep = vi.fn(async () => {
      controller.abort();
      throw new Error('The operation was aborted');
    });
    const backend = new WebhookBackend({ fetch: fetchImpl, sleep });

    const error = await backend.execute(webhookCommand({}), { signal: controller.signal }).catch((err) => err);
    expect(error).toBeInstanceOf(BackendError);
    expect(error.message).toBe('request cancelled');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('aborts an in-flight request when the caller cancels', async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn<typeof fetch>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const backend = new WebhookBackend({ fetch: fetchImpl });

    const pending = backend.execute(webhookCommand({}), { signal: controller.signal }).catch((err) => err);
    await vi.waitFor(() => expect(fetchImpl).toHaveBeenCalledTimes(1));
    controller.abort();

    const error = await pending;
    expect(error).toBeInstanceOf(BackendError);
    expect(error.message).toBe('request cancelled');
    expect(error.attempts).toBe(1);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('cuts the backoff timer short when the caller cancels', async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn<typeof fetch>(async () => respond(503));
    const backend = new WebhookBackend({ fetch: fetchImpl });

    const startedAt = Date.now();
    const pending = backend
      .execute(webhookCommand({ retry: { delay: '10s' } }), { signal: controller.signal })
      .catch((err) => err);
    await vi.waitFor(() => expect(fetchImpl).toHaveBeenCalledTimes(1));
    await new Promise((resolve) => setTimeout(resolve, 20));
    controller.abort();

    const error = await pending;
    expect(error).toBeInstanceOf(BackendError);
    expect(error.message).toBe('request cancelled');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(Date.now() - startedAt).toBeLessThan(5000);
  });

  it('drops the earlier status when the last attempt fails in transport', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(respond(503, 'down'))
      .mockRejectedValueOnce(new TypeError('fetch failed'));
    const { sleep } = recordingSleep();
    const backend = new WebhookBackend({ fetch: fetchImpl, sleep });

    const error = await backend.execute(webhookCommand({ retry: { maxRetries: 1 } })).catch((err) => err);
    expect(error).toBeInstanceOf(BackendError);
    expect(error.message).toBe('request failed after 2 attempts: fetch failed');
    expect(error.status).toBeUndefined();
    expect(error.output).toBeUndefined();
  });

  it('does not call out when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchImpl = vi.fn<typeof fetch>(async () => respond(200));
    const backend = new WebhookBackend({ fetch: fetchImpl });

    await expect(backend.execute(webhookCommand({}), { signal: controller.signal })).rejects.toThrow(
      'request cancelled',
    );
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('raises configuration errors before any network call', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => respond(200));
    const backend = new WebhookBackend({ fetch: fetchImpl });

    await expect(
      backend.execute(webhookCommand({ method: 'POST', body: '{not json', bodyFormat: 'json' })),
    ).rejects.toBeInstanceOf(ConfigError);
    await expect(backend.execute(webhookCommand({ auth: { type: 'bearer' } }))).rejects.toThrow(
      'Bearer auth requires a token',
    );
    await expect(backend.execute(webhookCommand({ url: 'not a url' }))).rejects.toThrow(
      'Invalid webhook URL: not a url',
    );
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('prepareRequest', () => {
  const base = { url: 'http://upstream.test/hook', headers: {} };

  it('adds bearer auth', () => {
    const request = prepareRequest({ ...base, auth: { type: 'bearer', token: 'test-token' } });
    expect(request.headers.Authorization).toBe('Bearer test-token');
  });

  it('adds an api key under the default header', () => {
    const request = prepareRequest({ ...base, auth: { type: 'api_key', key: 'test-secret' } });
    expect(request.headers['X-API-Key']).toBe('test-secret');
  });

  it('adds an api key under a custom header', () => {
    const request = prepareRequest({ ...base, auth: { type: 'api_key', key: 'test-secret', header: 'X-Token' } });
    expect(request.headers['X-Token']).toBe('test-secret');
    expect(request.headers['X-API-Key']).toBeUndefined();
  });

  it('adds basic auth', () => {
    const request = prepareRequest({ ...base, auth: { type: 'basic', user: 'user', pass: 'pass' } });
    expect(request.headers.Authorization).toBe('Basic dXNlcjpwYXNz');
  });

  it('rejects basic auth without a password', () => {
    expect(() => prepareRequest({ ...base, auth: { type: 'basic', user: 'user' } })).toThrow(ConfigError);
  });

  it('derives the content type from the body format', () => {
    const post = { ...base, method: 'POST', body: 'a=1&b=2' };
    expect(prepareRequest({ ...post, bodyFormat: 'form' }).headers['Content-Type']).toBe(
      'application/x-www-form-urlencoded',
    );
    expect(prepareRequest({ ...post, bodyFormat: 'xml' }).headers['Content-Type']).toBe('application/xml');
    expect(prepareRequest(post).headers['Content-Type']).toBe('text/plain');
    expect(prepareRequest({ ...post, body: '[]', bodyFormat: 'json' }).headers['Content-Type']).toBe(
      'application/json',
    );
  });

  it('lets custom headers override defaults', () => {
    const request = prepareRequest({
      ...base,
      method: 'PUT',
      body: '{}',
      bodyFormat: 'json',
      headers: { 'content-type': 'application/vnd.test+json', 'user-agent': 'probe/1.0' },
    });
    expect(request.headers).toEqual({
      'content-type': 'application/vnd.test+json',
      'user-agent': 'probe/1.0',
    });
  });

  it('replaces a custom header that the auth header names', () => {
    const bearer = prepareRequest({
      ...base,
      headers: { authorization: 'Token old' },
      auth: { type: 'bearer', token: 'test-token' },
    });
    expect(bearer.headers).toEqual({ 'User-Agent': USER_AGENT, Authorization: 'Bearer test-token' });

    const apiKey = prepareRequest({
      ...base,
      headers: { 'x-token': 'stale' },
      auth: { type: 'api_key', key: 'test-secret', header: 'X-Token' },
    });
    expect(apiKey.headers).toEqual({ 'User-Agent': USER_AGENT, 'X-Token': 'test-secret' });
  });

  it('rejects a malformed url or method', () => {
    expect(() => prepareRequest({ ...base, url: 'not a url' })).toThrow(ConfigError);
    expect(() => prepareRequest({ ...base, url: 'ftp://upstream.test/hook' })).toThrow(
      'Invalid webhook URL: ftp://upstream.test/hook',
    );
    expect(() => prepareRequest({ ...base, method: 'GE T' })).toThrow('Invalid webhook method: GE T');
  });

  it('rejects a body on GET', () => {
    expect(() => prepareRequest({ ...base, body: 'hello' })).toThrow('Webhook body is not allowed with GET');
  });
});
