import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export type ParsedArgs = { _: string[] } & Record<string, string | boolean | string[] | undefined>;

const BOOLEAN_FLAGS = new Set(['help', 'h', 'http', 'mcp', 'analytics', 'setup']);

export function parseArgs(argv: string[]): ParsedArgs {
  const args = Array.isArray(argv) ? argv : [];
  const result: ParsedArgs = { _: [] };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith('-')) {
      result._.push(token);
      continue;
    }
    const isLong = token.startsWith('--');
    const key = isLong ? token.slice(2) : token.slice(1);
    if (!key) continue;
    const [name, inline] = key.split('=');
    if (inline !== undefined) {
      result[name] = inline;
      continue;
    }
    const next = args[i + 1];
    if (!BOOLEAN_FLAGS.has(name) && next && !next.startsWith('-')) {
      result[name] = next;
      i += 1;
    } else {
      result[name] = true;
    }
  }
  return result;
}

export function ensureDir(dirPath: string) {
  if (!dirPath) return;
  fs.mkdirSync(dirPath, { recursive: true });
}

export function normalizeId(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function normalizeName(value: string): string {
  return String(value || '')
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '_')
    .replace(/^_+|_+$/g, '') || 'command_mcp';
}

export function generateId(prefix: string): string {
  const safePrefix = normalizeName(prefix || 'id') || 'id';
  return `${safePrefix}_${crypto.randomUUID()}`;
}

export function generateSessionId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function clampNumber(value: unknown, min: number, max: number, fallback: number): number {
  const num = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(num)) return fallback;
  return Math.min(Math.max(num, min), max);
}

export function getHomeDir(): string {
  const home = process.env.HOME || process.env.USERPROFILE || os.homedir();
  return typeof home === 'string' && home.trim() ? home.trim() : os.homedir();
}

export function resolveUserPath(filePath: string): string {
  if (filePath === '~') return getHomeDir();
  if (filePath.startsWith('~/')) {
    return path.join(getHomeDir(), filePath.slice(2));
  }
  return path.resolve(filePath);
}

const DURATION_UNITS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parses duration strings such as "1s", "250ms" or "1m30s" into milliseconds.
 * Returns null for anything that is not a well-formed duration.
 */
export function parseDuration(value: unknown): number | null {
  const text = normalizeId(value);
  if (!text) return null;
  if (text === '0') return 0;
  const pattern = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/y;
  let total = 0;
  let offset = 0;
  while (offset < text.length) {
    pattern.lastIndex = offset;
    const match = pattern.exec(text);
    if (!match) return null;
    total += Number(match[1]) * DURATION_UNITS[match[2]];
    offset = pattern.lastIndex;
  }
  return total;
}

const HTTP_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/** True for a method name that is a valid HTTP token. */
export function isHttpMethod(value: string): boolean {
  return HTTP_TOKEN.test(value);
}

/** True for an absolute http: or https: URL. */
export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
