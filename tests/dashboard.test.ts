import { describe, expect, it } from 'vitest';
import { emptyHttpStats, emptyWebhookStats } from '../src/analytics.js';
import { renderDashboard } from '../src/dashboard.js';

describe('renderDashboard', () => {
  it('renders stats and escapes names', () => {
    const html = renderDashboard({
      days: 7,
      usage: {
        totalCommands: 3,
        successRate: 66.67,
        avgDurationMs: 120,
        errorsLast24h: 1,
        topCommands: [{ name: '<script>', count: 3, successRate: 66.67, avgDurationMs: 120 }],
      },
      http: emptyHttpStats(),
      webhooks: { ...emptyWebhookStats(), errorBreakdown: { timeout: 2 } },
      generatedAt: new Date('2026-03-05T07:08:09Z'),
    });

    expect(html).toContain('<td>&lt;script&gt;</td><td>3</td><td>66.67%</td><td>120</td>');
    expect(html).toContain('<td>timeout</td><td>2</td>');
    expect(html).toContain('<span class="badge">last 7 days</span>');
    expect(html).toContain('generated 2026-03-05T07:08:09.000Z');
    expect(html).not.toContain('<script>');
  });

  it('shows an empty state when there is no data', () => {
    const html = renderDashboard({
      days: 7,
      usage: { totalCommands: 0, successRate: 0, avgDurationMs: 0, errorsLast24h: 0, topCommands: [] },
      http: emptyHttpStats(),
      webhooks: emptyWebhookStats(),
    });
    expect(html).toContain('<div class="empty">No data yet</div>');
  });
});
