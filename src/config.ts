import fs from 'node:fs';
import path from 'node:path';
import { parse as parseYAML } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { ApiKeyRecord, Command, WebhookAuth, WebhookSpec } from './types.js';
import { getHomeDir, isHttpMethod, isHttpUrl, normalizeId, parseDuration } from './utils.js';

export const CONFIG_ENV_VAR = 'COMMAND_MCP_CONFIG';
export const DEFAULT_ANALYTICS_DB = './analytics.db';

export interface CorsConfig {
  enabled: boolean;
  allowedOrigins: string[];
  allowedMethods: string[];
  allowedHeaders: string[];
}

export interface AuthConfig {
  enabled: boolean;
  apiKeys: ApiKeyRecord[];
}

export interface HttpConfig {
  host: string;
  port: number;
  auth: AuthConfig;
  cors: CorsConfig;
}

export interface AnalyticsConfig {
  enabled: boolean;
  databasePath: string;
}

export interface AppConfig {
  commands: Command[];
  server: { http: HttpConfig };
  analytics: AnalyticsConfig;
}

const stringMap = z.record(z.string(), z.coerce.string());

const webhookAuthSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('bearer'), token: z.string().optional() }),
  z.object({ type: z.literal('api_key'), key: z.string().optional(), header: z.string().optional() }),
  z.object({ type: z.literal('basic'), user: z.string().optional(), pass: z.string().optional() }),
]);

const retrySchema = z.object({
  max_retries: z.number().int().min(0).optional(),
  backoff: z.enum(['exponential', 'linear', 'fixed']).optional(),
  delay: z
    .string()
    .refine((value) => parseDuration(value) !== null, { message: 'invalid duration' })
    .optional(),
  status_codes: z.array(z.number().int().min(100).max(599)).optional(),
});

const webhookSchema = z
  .object({
    url: z.string().refine(isHttpUrl, { message: 'must be an absolute http(s) URL' }),
    method: z.string().refine(isHttpMethod, { message: 'invalid HTTP method' }).optional(),
  headers: stringMap.optional(),
    body: z.string().optional(),
    body_format: z.enum(['json', 'xml', 'form', 'text']).optional(),
    auth: webhookAuthSchema.optional(),
    retry: retrySchema.optional(),
  })
  .superRefine((value, ctx) => {
    const method = (value.method || 'GET').toUpperCase();
    if (value.body && (method === 'GET' || method === 'HEAD')) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['body'], message: `body is not allowed with ${method}` });
    }
  });

const commandSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  script: z.string().optional(),
  args: z.array(z.coerce.string()).optional(),
  env: stringMap.optional(),
  timeout: z.string().optional(),
  container: z.string().optional(),
  webhook: webhookSchema.optional(),
});

const apiKeySchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  permissions: z.array(z.string()).optional(),
});

const configSchema = z.object({
  commands: z.array(commandSchema).optional(),
  server: z
    .object({
      http: z
        .object({
          host: z.string().optional(),
          port: z.number().int().min(0).max(65535).optional(),
          auth: z
            .object({
              enabled: z.boolean().optional(),
              mode: z.literal('simple').optional(),
              simple: z.object({ api_keys: z.array(apiKeySchema).optional() }).optional(),
            })
            .optional(),
          cors: z
            .object({
              enabled: z.boolean().optional(),
              allowed_origins: z.array(z.string()).optional(),
              allowed_methods: z.array(z.string()).optional(),
              allowed_headers: z.array(z.string()).optional(),
            })
            .optional(),
        })
        .optional(),
    })
    .optional(),
  analytics: z
    .object({
      enabled: z.boolean().optional(),
      database_path: z.string().optional(),
    })
    .optional(),
});

type RawConfig = z.infer<typeof configSchema>;
type RawCommand = z.infer<typeof commandSchema>;
type RawHttpConfig = NonNullable<NonNullable<RawConfig['server']>['http']>;
type RawCorsConfig = NonNullable<RawHttpConfig['cors']>;

export function loadConfig(configPath: string): AppConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, 'utf8');
  let document: unknown;
  try {
    document = parseYAML(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML in ${configPath}: ${message}`);
  }
  return parseConfig(document ?? {});
}

export function parseConfig(document: unknown): AppConfig {
  const parsed = configSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`Invalid configuration at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return toAppConfig(parsed.data);
}

function toAppConfig(raw: RawConfig): AppConfig {
  const commands = (raw.commands ?? []).map(toCommand);
  const seen = new Set<string>();
  for (const command of commands) {
    if (seen.has(command.name)) {
      throw new ConfigError(`Duplicate command name: ${command.name}`);
    }
    seen.add(command.name);
  }

  const http: RawHttpConfig = raw.server?.http ?? {};
  const cors: RawCorsConfig = http.cors ?? {};
  const corsEnabled = cors.enabled === true;

  return {
    commands,
    server: {
      http: {
        host: http.host || 'localhost',
        port: http.port || 8080,
        auth: {
          enabled: http.auth?.enabled === true,
          apiKeys: (http.auth?.simple?.api_keys ?? []).map((entry) => ({
            key: entry.key,
            name: entry.name,
            description: entry.description ?? '',
            permissions: entry.permissions ?? [],
          })),
        },
        cors: {
          enabled: corsEnabled,
          allowedOrigins: cors.allowed_origins ?? [],
          allowedMethods:
            corsEnabled && !cors.allowed_methods?.length ? ['GET', 'POST', 'OPTIONS'] : cors.allowed_methods ?? [],
          allowedHeaders:
            corsEnabled && !cors.allowed_headers?.length
              ? ['Authorization', 'Content-Type', 'X-API-Key']
              : cors.allowed_headers ?? [],
        },
      },
    },
    analytics: {
      enabled: raw.analytics?.enabled === true,
      databasePath: normalizeId(raw.analytics?.database_path) || DEFAULT_ANALYTICS_DB,
    },
  };
}

function toCommand(raw: RawCommand): Command {
  const hasScript = Boolean(normalizeId(raw.script));
  const hasWebhook = raw.webhook !== undefined;
  if (hasScript === hasWebhook) {
    throw new ConfigError(`Command '${raw.name}' must define exactly one of script or webhook`);
  }
  return {
    name: raw.name,
    description: raw.description ?? '',
    script: hasScript ? raw.script : undefined,
    args: raw.args ?? [],
    env: raw.env ?? {},
    timeout: raw.timeout,
    container: normalizeId(raw.container) || undefined,
    webhook: raw.webhook ? toWebhookSpec(raw.webhook) : undefined,
  };
}

function toWebhookSpec(raw: NonNullable<RawCommand['webhook']>): WebhookSpec {
  const auth: WebhookAuth | undefined = raw.auth;
  return {
    url: raw.url,
    method: raw.method,
    headers: raw.headers ?? {},
    body: raw.body,
    bodyFormat: raw.body_format,
    auth,
    retry: raw.retry
      ? {
          maxRetries: raw.retry.max_retries,
          backoff: raw.retry.backoff,
          delay: raw.retry.delay,
          statusCodes: raw.retry.status_codes,
        }
      : undefined,
  };
}

/** Resolves the config file: explicit path, then the env var, then the usual locations. */
export function findConfigFile(explicitPath?: string): string {
  const explicit = normalizeId(explicitPath);
  if (explicit) return explicit;

  const fromEnv = normalizeId(process.env[CONFIG_ENV_VAR]);
  if (fromEnv && fs.existsSync(fromEnv)) return fromEnv;

  const home = getHomeDir();
  const candidates = [
    'config.yaml',
    path.join(home, '.command-mcp', 'config.yaml'),
    '/etc/command-mcp/config.yaml',
  ];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) return candidate;
  }
  return 'config.yaml';
}

export function describeCommand(command: Command): string {
  return command.description || `Execute ${command.name} with configured arguments`;
}
