import type { FrequencyTable } from '../analyzer/frequency.js';
import { SUMMARY_LIMIT } from '../config.js';
import type { TrendRecord } from '../db/store.js';
import type { Alert } from '../scoring/classifier.js';

export function toTrendRecords(table: FrequencyTable, source: string, timestamp: string): TrendRecord[] {
  return [...table.entries()].map(([token, count]) => ({ token, count, source, timestamp }));
}

export function formatAlert(alert: Alert): string {
  if (alert.kind === 'new') {
    return `🆕 ${alert.token} - ${alert.count} mentions (NEW)`;
  }
  return `📈 ${alert.token} - ${alert.count} mentions (+${alert.change_percent.toFixed(0)}%)`;
}

/**
 * Lines for the log after a cycle: a header plus the first `limit` alerts.
 */
export function formatAlertSummary(alerts: readonly Alert[], limit = SUMMARY_LIMIT): string[] {
  if (alerts.length === 0) return ['No significant trends detected'];
  return ['🔥 TRENDING WORDS:', ...alerts.slice(0, limit).map(formatAlert)];
}
