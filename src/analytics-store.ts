import path from 'node:path';
import Database from 'better-sqlite3';
import type { Analytics } from './analytics.js';
import { errorMessage } from './errors.js';
import type {
  CommandEvent,
  CommandSummary,
  HttpEvent,
  HttpStats,
  PathSummary,
  UsageStats,
  WebhookErrorKind,
  WebhookStats,
  WebhookSummary,
} from './types.js';
import { ensureDir, generateId, resolveUserPath } from './utils.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const TOP_N = 10;

interface SqliteAnalyticsOptions {
  now?: () => Date;
}

interface WindowParams {
  since: string;
  day: string;
}

interface TotalsRow {
  total: number;
  successes: number | null;
  avg_duration: number | null;
  errors_24h: number | null;
}

interface HttpTotalsRow extends TotalsRow {
  auth_attempts: number | null;
  auth_successes: number | null;
  auth_errors_24h: number | null;
}

interface GroupRow {
  name: string;
  count: number;
  successes: number;
  avg_duration: number | null;
}

interface ErrorRow {
  error: string;
}

/** Append-only event store on SQLite. Record failures are logged, never thrown. */
export class SqliteAnalytics implements Analytics {
  private db: Database.Database;
  private now: () => Date;

  constructor(dbPath: string, options: SqliteAnalyticsOptions = {}) {
    const resolved = dbPath === ':memory:' ? dbPath : resolveUserPath(dbPath);
    if (resolved !== ':memory:') ensureDir(path.dirname(resolved));
    this.db = new Database(resolved);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.now = options.now ?? (() => new Date());
    this.ensureSchema();
  }

  ensureSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS command_events (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        command_name TEXT NOT NULL,
        duration_ms INTEGER NOT NULL,
        success INTEGER NOT NULL,
        output_size INTEGER NOT NULL,
        execution_mode TEXT NOT NULL,
        error TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS command_events_created_idx ON command_events(created_at);
      CREATE INDEX IF NOT EXISTS command_events_name_idx ON command_events(command_name);

      CREATE TABLE IF NOT EXISTS http_events (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        method TEXT NOT NULL,
        path TEXT NOT NULL,
        status_code INTEGER NOT NULL,
        duration_ms INTEGER NOT NULL,
        client_ip TEXT NOT NULL,
        user_agent TEXT NOT NULL,
        auth_method TEXT NOT NULL,
        auth_success INTEGER NOT NULL,
        response_size INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS http_events_created_idx ON http_events(created_at);
    `);
  }

  recordCommand(event: CommandEvent): void {
    try {
      this.db
        .prepare(
          `INSERT INTO command_events (
            id, session_id, command_name, duration_ms, success,
            output_size, execution_mode, error, created_at
          ) VALUES (
            @id, @session_id, @command_name, @duration_ms, @success,
            @output_size, @execution_mode, @error, @created_at
          )`,
        )
        .run({
          id: generateId('cmd'),
          session_id: event.sessionId,
          command_name: event.commandName,
          duration_ms: Math.round(event.durationMs),
          success: event.success ? 1 : 0,
          output_size: event.outputSize,
          execution_mode: event.executionMode,
          error: event.error,
          created_at: this.now().toISOString(),
        });
    } catch (err) {
      console.error(`[analytics] failed to record command event: ${errorMessage(err)}`);
    }
  }

  recordHttpEvent(event: HttpEvent): void {
    try {
      this.db
        .prepare(
          `INSERT INTO http_events (
            id, session_id, method, path, status_code, duration_ms, client_ip,
            user_agent, auth_method, auth_success, response_size, created_at
          ) VALUES (
            @id, @session_id, @method, @path, @status_code, @duration_ms, @client_ip,
            @user_agent, @auth_method, @auth_success, @response_size, @created_at
          )`,
        )
        .run({
          id: generateId('http'),
          session_id: event.sessionId,
          method: event.method,
          path: event.path,
          status_code: event.statusCode,
          duration_ms: Math.round(event.durationMs),
          client_ip: event.clientIp,
          user_agent: event.userAgent,
          auth_method: event.authMethod,
          auth_success: event.authSuccess ? 1 : 0,
          response_size: event.responseSize,
          created_at: this.now().toISOString(),
        });
    } catch (err) {
      console.error(`[analytics] failed to record http event: ${errorMessage(err)}`);
    }
  }

  getStats(days: number): UsageStats {
    const params = this.window(days);
    const totals = this.db
      .prepare<WindowParams, TotalsRow>(
        `SELECT
          COUNT(*) AS total,
          SUM(success) AS successes,
          AVG(duration_ms) AS avg_duration,
          SUM(CASE WHEN success = 0 AND created_at >= @day THEN 1 ELSE 0 END) AS errors_24h
        FROM command_events
        WHERE created_at >= @since`,
      )
      .get(params);

    const groups = this.db
      .prepare<Pick<WindowParams, 'since'>, GroupRow>(
        `SELECT command_name AS name, COUNT(*) AS count, SUM(success) AS successes, AVG(duration_ms) AS avg_duration
        FROM command_events
        WHERE created_at >= @since
        GROUP BY command_name
        ORDER BY count DESC, name ASC
        LIMIT ${TOP_N}`,
      )
      .all({ since: params.since });

    const total = totals?.total ?? 0;
    return {
      totalCommands: total,
      successRate: percent(totals?.successes ?? 0, total),
      avgDurationMs: round(totals?.avg_duration ?? 0),
      errorsLast24h: totals?.errors_24h ?? 0,
      topCommands: groups.map(toSummary),
    };
  }

  getHttpStats(days: number): HttpStats {
    const params = this.window(days);
    const totals = this.db
      .prepare<WindowParams, HttpTotalsRow>(
        `SELECT
          COUNT(*) AS total,
          SUM(CASE WHEN status_code < 400 THEN 1 ELSE 0 END) AS successes,
          AVG(duration_ms) AS avg_duration,
          SUM(CASE WHEN status_code >= 400 AND created_at >= @day THEN 1 ELSE 0 END) AS errors_24h,
          SUM(CASE WHEN auth_method != 'none' THEN 1 ELSE 0 END) AS auth_attempts,
          SUM(CASE WHEN auth_method != 'none' AND auth_success = 1 THEN 1 ELSE 0 END) AS auth_successes,
          SUM(CASE WHEN auth_method != 'none' AND auth_success = 0 AND created_at >= @day THEN 1 ELSE 0 END)
            AS auth_errors_24h
        FROM http_events
        WHERE created_at >= @since`,
      )
      .get(params);

    const groups = this.db
      .prepare<Pick<WindowParams, 'since'>, GroupRow>(
        `SELECT path AS name, COUNT(*) AS count,
          SUM(CASE WHEN status_code < 400 THEN 1 ELSE 0 END) AS successes,
          AVG(duration_ms) AS avg_duration
        FROM http_events
        WHERE created_at >= @since
        GROUP BY path
        ORDER BY count DESC, name ASC
        LIMIT ${TOP_N}`,
      )
      .all({ since: params.since });

    const total = totals?.total ?? 0;
    return {
      totalRequests: total,
      successRate: percent(totals?.successes ?? 0, total),
      authSuccessRate: percent(totals?.auth_successes ?? 0, totals?.auth_attempts ?? 0),
      avgDurationMs: round(totals?.avg_duration ?? 0),
      errorsLast24h: totals?.errors_24h ?? 0,
      authErrorsLast24h: totals?.auth_errors_24h ?? 0,
      topPaths: groups.map((row): PathSummary => {
        const { name, ...rest } = toSummary(row);
        return { path: name, ...rest };
      }),
    };
  }

  getWebhookStats(days: number): WebhookStats {
    const params = this.window(days);
    const totals = this.db
      .prepare<WindowParams, TotalsRow>(
        `SELECT
          COUNT(*) AS total,
          SUM(success) AS successes,
          AVG(duration_ms) AS avg_duration,
          SUM(CASE WHEN success = 0 AND created_at >= @day THEN 1 ELSE 0 END) AS errors_24h
        FROM command_events
        WHERE execution_mode = 'webhook' AND created_at >= @since`,
      )
      .get(params);

    const groups = this.db
      .prepare<Pick<WindowParams, 'since'>, GroupRow>(
        `SELECT command_name AS name, COUNT(*) AS count, SUM(success) AS successes, AVG(duration_ms) AS avg_duration
        FROM command_events
        WHERE execution_mode = 'webhook' AND created_at >= @since
        GROUP BY command_name
        ORDER BY count DESC, name ASC
        LIMIT ${TOP_N}`,
      )
      .all({ since: params.since });

    const failures = this.db
      .prepare<WindowParams, ErrorRow>(
        `SELECT error FROM command_events
        WHERE execution_mode = 'webhook' AND success = 0 AND created_at >= @day AND created_at >= @since`,
      )
      .all(params);

    const errorBreakdown: Partial<Record<WebhookErrorKind, number>> = {};
    for (const row of failures) {
      const kind = classifyWebhookError(row.error);
      errorBreakdown[kind] = (errorBreakdown[kind] ?? 0) + 1;
    }

    const total = totals?.total ?? 0;
    return {
      totalCalls: total,
      successRate: percent(totals?.successes ?? 0, total),
      avgLatencyMs: round(totals?.avg_duration ?? 0),
      errorsLast24h: totals?.errors_24h ?? 0,
      topWebhooks: groups.map((row): WebhookSummary => {
        const { avgDurationMs, ...rest } = toSummary(row);
        return { ...rest, avgLatencyMs: avgDurationMs };
      }),
      errorBreakdown,
    };
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private window(days: number): WindowParams {
    const now = this.now().getTime();
    const span = Number.isFinite(days) && days > 0 ? days : 7;
    return {
      since: new Date(now - span * DAY_MS).toISOString(),
      day: new Date(now - DAY_MS).toISOString(),
    };
  }
}

/** Buckets a failed webhook call by its error text. */
export function classifyWebhookError(error: string): WebhookErrorKind {
  if (/HTTP 4\d\d/.test(error)) return 'client_error';
  if (/HTTP 5\d\d/.test(error)) return 'server_error';
  const lower = error.toLowerCase();
  if (lower.includes('timeout') || lower.includes('timed out')) return 'timeout';
  if (/econnrefused|econnreset|enotfound|connection|fetch failed/.test(lower)) return 'connection';
  return 'other';
}

function toSummary(row: GroupRow): CommandSummary {
  return {
    name: row.name,
    count: row.count,
    successRate: percent(row.successes, row.count),
    avgDurationMs: round(row.avg_duration ?? 0),
  };
}

function percent(part: number, total: number): number {
  return total > 0 ? round((part / total) * 100) : 0;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
