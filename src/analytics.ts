import { SqliteAnalytics } from './analytics-store.js';
import type { AnalyticsConfig } from './config.js';
import { errorMessage } from './errors.js';
import type { CommandEvent, HttpEvent, HttpStats, UsageStats, WebhookStats } from './types.js';

export interface Analytics {
  recordCommand(event: CommandEvent): void;
  recordHttpEvent(event: HttpEvent): void;
  getStats(days: number): UsageStats;
  getHttpStats(days: number): HttpStats;
  getWebhookStats(days: number): WebhookStats;
  close(): void;
}

export function emptyUsageStats(): UsageStats {
  return { totalCommands: 0, successRate: 0, avgDurationMs: 0, errorsLast24h: 0, topCommands: [] };
}

export function emptyHttpStats(): HttpStats {
  return {
    totalRequests: 0,
    successRate: 0,
    authSuccessRate: 0,
    avgDurationMs: 0,
    errorsLast24h: 0,
    authErrorsLast24h: 0,
    topPaths: [],
  };
}

export function emptyWebhookStats(): WebhookStats {
  return { totalCalls: 0, successRate: 0, avgLatencyMs: 0, errorsLast24h: 0, topWebhooks: [], errorBreakdown: {} };
}

/** Records nothing and reports empty statistics. */
export class NoopAnalytics implements Analytics {
  recordCommand(_event: CommandEvent): void {}
  recordHttpEvent(_event: HttpEvent): void {}
  getStats(_days: number): UsageStats {
    return emptyUsageStats();
  }
  getHttpStats(_days: number): HttpStats {
    return emptyHttpStats();
  }
  getWebhookStats(): WebhookStats {
    return emptyWebhookStats();
  }
  close(): void {}
}

/**
 * Picks the recorder once at startup. A store that cannot be opened is logged
 * and replaced by the no-op recorder so the server still starts.
 */
export function createAnalytics(config: AnalyticsConfig): Analytics {
  if (!config.enabled) return new NoopAnalytics();
  try {
    return new SqliteAnalytics(config.databasePath);
  } catch (err) {
    console.error(`[analytics] failed to open ${config.databasePath}: ${errorMessage(err)}; analytics disabled`);
    return new NoopAnalytics();
  }
}
