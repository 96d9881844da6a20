export type BackendKind = 'local' | 'container' | 'webhook';

export type BodyFormat = 'json' | 'xml' | 'form' | 'text';

export type BackoffKind = 'exponential' | 'linear' | 'fixed';

export type WebhookAuth =
  | { type: 'bearer'; token?: string }
  | { type: 'api_key'; key?: string; header?: string }
  | { type: 'basic'; user?: string; pass?: string };

export interface RetryPolicy {
  readonly maxRetries?: number;
  readonly backoff?: BackoffKind;
  readonly delay?: string; // duration string, e.g. "1s"
  readonly statusCodes?: readonly number[];
}

export interface WebhookSpec {
  readonly url: string;
  readonly method?: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
  readonly bodyFormat?: BodyFormat;
  readonly auth?: WebhookAuth;
  readonly retry?: RetryPolicy;
}

export interface Command {
  readonly name: string;
  readonly description: string;
  readonly script?: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  readonly timeout?: string;
  readonly container?: string; // image
  readonly webhook?: WebhookSpec;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly name: string;
  readonly description: string;
  readonly permissions: readonly string[];
}

export interface CommandEvent {
  sessionId: string;
  commandName: string;
  durationMs: number;
  success: boolean;
  outputSize: number;
  executionMode: BackendKind;
  error: string;
}

export type AuthMethod = 'api_key' | 'bearer' | 'none';

export interface HttpEvent {
  sessionId: string;
  method: string;
  path: string;
  statusCode: number;
  durationMs: number;
  clientIp: string;
  userAgent: string;
  authMethod: AuthMethod;
  authSuccess: boolean;
  responseSize: number;
}

export interface CommandSummary {
  name: string;
  count: number;
  successRate: number;
  avgDurationMs: number;
}

export interface UsageStats {
  totalCommands: number;
  successRate: number;
  avgDurationMs: number;
  errorsLast24h: number;
  topCommands: CommandSummary[];
}

export interface PathSummary {
  path: string;
  count: number;
  successRate: number;
  avgDurationMs: number;
}

export interface HttpStats {
  totalRequests: number;
  successRate: number;
  authSuccessRate: number;
  avgDurationMs: number;
  errorsLast24h: number;
  authErrorsLast24h: number;
  topPaths: PathSummary[];
}

export type WebhookErrorKind = 'client_error' | 'server_error' | 'timeout' | 'connection' | 'other';

export interface WebhookSummary {
  name: string;
  count: number;
  successRate: number;
  avgLatencyMs: number;
}

export interface WebhookStats {
  totalCalls: number;
  successRate: number;
  avgLatencyMs: number;
  errorsLast24h: number;
  topWebhooks: WebhookSummary[];
  errorBreakdown: Partial<Record<WebhookErrorKind, number>>;
}
