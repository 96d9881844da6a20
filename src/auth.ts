import type { IncomingHttpHeaders } from 'node:http';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { AuthError } from './errors.js';
import { PermissionSet } from './permissions.js';
import type { ApiKeyRecord, AuthMethod } from './types.js';
import { normalizeId } from './utils.js';

export const API_KEY_HEADER = 'x-api-key';
const API_KEY_SCHEME = /^ApiKey\s+(.+)$/i;
const BEARER_SCHEME = /^Bearer\s+/i;

export interface AuthContext {
  userId: string;
  clientName: string;
  permissions: PermissionSet;
  method: 'api_key';
}

/** Read-only key → record lookup, built once from configuration. */
export class ApiKeyTable {
  private readonly keys: ReadonlyMap<string, ApiKeyRecord>;

  constructor(records: readonly ApiKeyRecord[]) {
    const map = new Map<string, ApiKeyRecord>();
    for (const record of records) {
      map.set(record.key, Object.freeze({ ...record, permissions: Object.freeze([...record.permissions]) }));
    }
    this.keys = map;
  }

  lookup(key: string): ApiKeyRecord | null {
    return this.keys.get(key) ?? null;
  }

  get size(): number {
    return this.keys.size;
  }
}

function headerValue(headers: IncomingHttpHeaders, name: string): string {
  const value = headers[name];
  return normalizeId(Array.isArray(value) ? value[0] : value);
}

/** API key from `X-API-Key`, or from `Authorization: ApiKey <key>`. */
export function extractCredential(headers: IncomingHttpHeaders): string | null {
  const direct = headerValue(headers, API_KEY_HEADER);
  if (direct) return direct;
  const match = API_KEY_SCHEME.exec(headerValue(headers, 'authorization'));
  return match ? match[1].trim() || null : null;
}

/** How a request presents credentials, judged from its headers alone. */
export function classifyAuthMethod(headers: IncomingHttpHeaders): AuthMethod {
  if (extractCredential(headers)) return 'api_key';
  if (BEARER_SCHEME.test(headerValue(headers, 'authorization'))) return 'bearer';
  return 'none';
}

export class AuthGate {
  readonly enabled: boolean;
  private readonly table: ApiKeyTable;

  constructor(options: { enabled: boolean; table: ApiKeyTable }) {
    this.enabled = options.enabled;
    this.table = options.table;
  }

  /** Resolves the caller from request headers; throws AuthError when no valid key is present. */
  authenticate(headers: IncomingHttpHeaders): AuthContext {
    const key = extractCredential(headers);
    if (!key) {
      throw new AuthError('unauthenticated', 'Authentication required');
    }
    const record = this.table.lookup(key);
    if (!record) {
      throw new AuthError('unauthenticated', 'Authentication required');
    }
    return {
      userId: record.name,
      clientName: record.description || record.name,
      permissions: new PermissionSet(record.permissions),
      method: 'api_key',
    };
  }

  /** Throws AuthError unless the context may call the tool. A disabled gate allows everything. */
  authorize(ctx: AuthContext | null, toolName: string): void {
    if (!this.enabled) return;
    if (!ctx) {
      throw new AuthError('unauthenticated', 'Authentication required');
    }
    if (!ctx.permissions.allows(toolName)) {
      throw new AuthError('forbidden', `Permission denied for tool '${toolName}'`);
    }
  }
}

/** Carries an AuthContext through the MCP SDK's request auth slot. */
export function toAuthInfo(ctx: AuthContext, token: string): AuthInfo {
  return {
    token,
    clientId: ctx.userId,
    scopes: ctx.permissions.toArray(),
    extra: { clientName: ctx.clientName, method: ctx.method },
  };
}

export function fromAuthInfo(info: AuthInfo | undefined): AuthContext | null {
  if (!info) return null;
  const clientName = info.extra?.clientName;
  return {
    userId: info.clientId,
    clientName: typeof clientName === 'string' ? clientName : info.clientId,
    permissions: new PermissionSet(info.scopes),
    method: 'api_key',
  };
}
