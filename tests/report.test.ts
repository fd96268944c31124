import { describe, it, expect } from 'vitest';
import { formatAlert, formatAlertSummary, toTrendRecords } from '../src/monitor/report.js';
import type { Alert } from '../src/scoring/classifier.js';

const TS = '2026-03-01T12:00:00.000Z';

const newAlert = (token: string): Alert => ({ token, count: 4, change_percent: 0, kind: 'new', timestamp: TS });

describe('formatAlert', () => {
  it('marks new tokens', () => {
    expect(formatAlert(newAlert('rocket'))).toBe('🆕 rocket - 4 mentions (NEW)');
  });

  it('shows the rounded increase for spikes', () => {
    const spike: Alert = { token: 'alpha', count: 5, change_percent: 200 / 3, kind: 'spike', timestamp: TS };

    expect(formatAlert(spike)).toBe('📈 alpha - 5 mentions (+67%)');
  });
});

describe('formatAlertSummary', () => {
  it('says so when nothing is trending', () => {
    expect(formatAlertSummary([])).toEqual(['No significant trends detected']);
  });

  it('lists at most ten alerts under a header', () => {
    const alerts = Array.from({ length: 12 }, (_, i) => newAlert(`word${i}`));
    const lines = formatAlertSummary(alerts);

    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe('🔥 TRENDING WORDS:');
    expect(lines[10]).toBe('🆕 word9 - 4 mentions (NEW)');
  });
});

describe('toTrendRecords', () => {
  it('shapes one record per token', () => {
    const table = new Map([
      ['alpha', 3],
      ['#launch', 1],
    ]);

    expect(toTrendRecords(table, 'reddit', TS)).toEqual([
      { token: 'alpha', count: 3, source: 'reddit', timestamp: TS },
      { token: '#launch', count: 1, source: 'reddit', timestamp: TS },
    ]);
  });
});
