import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import type { HttpStats, UsageStats, WebhookStats } from './types.js';
import { escapeHtml } from './utils.js';

export interface DashboardData {
  days: number;
  usage: UsageStats;
  http: HttpStats;
  webhooks: WebhookStats;
  generatedAt?: Date;
}

function stat(label: string, value: string | number): string {
  return `<div class="stat"><div class="stat-value">${escapeHtml(String(value))}</div>` +
    `<div class="stat-label">${escapeHtml(label)}</div></div>`;
}

function table(headers: string[], rows: Array<Array<string | number>>): string {
  if (rows.length === 0) return '<div class="empty">No data yet</div>';
  const head = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join('');
  const body = rows
    .map((row) => `<tr>${row.map((cell) => `<td>${escapeHtml(String(cell))}</td>`).join('')}</tr>`)
    .join('');
  return `<table><tr>${head}</tr>${body}</table>`;
}

function card(title: string, body: string): string {
  return `<div class="card"><div class="card-header">${escapeHtml(title)}</div><div class="card-body">${body}</div></div>`;
}

export function renderDashboard(data: DashboardData): string {
  const { usage, http, webhooks } = data;
  const generatedAt = (data.generatedAt ?? new Date()).toISOString();
  const breakdown = Object.entries(webhooks.errorBreakdown).map(([kind, count]) => [kind, count ?? 0]);

  const commands = card(
    'Commands',
    `<div class="stats">${[
      stat('Executions', usage.totalCommands),
      stat('Success rate', `${usage.successRate}%`),
      stat('Avg duration', `${usage.avgDurationMs}ms`),
      stat('Errors (24h)', usage.errorsLast24h),
    ].join('')}</div>` +
      table(
        ['Command', 'Runs', 'Success', 'Avg ms'],
        usage.topCommands.map((c) => [c.name, c.count, `${c.successRate}%`, c.avgDurationMs]),
      ),
  );

  const requests = card(
    'HTTP',
    `<div class="stats">${[
      stat('Requests', http.totalRequests),
      stat('Success rate', `${http.successRate}%`),
      stat('Auth success', `${http.authSuccessRate}%`),
      stat('Errors (24h)', http.errorsLast24h),
      stat('Auth errors (24h)', http.authErrorsLast24h),
    ].join('')}</div>` +
      table(
        ['Path', 'Requests', 'Success', 'Avg ms'],
        http.topPaths.map((p) => [p.path, p.count, `${p.successRate}%`, p.avgDurationMs]),
      ),
  );

  const hooks = card(
    'Webhooks',
    `<div class="stats">${[
      stat('Calls', webhooks.totalCalls),
      stat('Success rate', `${webhooks.successRate}%`),
      stat('Avg latency', `${webhooks.avgLatencyMs}ms`),
      stat('Errors (24h)', webhooks.errorsLast24h),
    ].join('')}</div>` +
      table(
        ['Webhook', 'Calls', 'Success', 'Avg ms'],
        webhooks.topWebhooks.map((w) => [w.name, w.count, `${w.successRate}%`, w.avgLatencyMs]),
      ) +
      table(['Error kind (24h)', 'Count'], breakdown),
  );

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(SERVER_NAME)} analytics</title>
  <style>
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #0d1117; color: #c9d1d9; }
    .header { background: #161b22; border-bottom: 1px solid #30363d; padding: 16px 24px; display: flex; align-items: center; gap: 12px; }
    .header h1 { font-size: 20px; color: #f0f6fc; }
    .header .badge { background: #238636; color: #fff; padding: 2px 8px; border-radius: 12px; font-size: 12px; }
    .content { padding: 24px; max-width: 1200px; margin: 0 auto; }
    .card { background: #161b22; border: 1px solid #30363d; border-radius: 6px; margin-bottom: 16px; overflow: hidden; }
    .card-header { padding: 12px 16px; border-bottom: 1px solid #30363d; font-weight: 600; font-size: 14px; }
    .card-body { padding: 16px; }
    .stats { display: flex; gap: 24px; flex-wrap: wrap; margin-bottom: 16px; }
    .stat-value { font-size: 22px; color: #f0f6fc; }
    .stat-label { font-size: 12px; color: #8b949e; }
    table { width: 100%; border-collapse: collapse; margin-bottom: 12px; }
    th, td { padding: 8px 12px; text-align: left; border-bottom: 1px solid #21262d; font-size: 13px; }
    th { color: #8b949e; font-weight: 600; }
    .empty { text-align: center; padding: 24px; color: #8b949e; }
    .footer { color: #8b949e; font-size: 12px; padding: 0 24px 24px; text-align: center; }
  </style>
</head>
<body>
  <div class="header"><h1>${escapeHtml(SERVER_NAME)}</h1><span class="badge">last ${data.days} days</span></div>
  <div class="content">
    ${commands}
    ${requests}
    ${hooks}
  </div>
  <div class="footer">v${escapeHtml(SERVER_VERSION)} · generated ${escapeHtml(generatedAt)}</div>
</body>
</html>`;
}
