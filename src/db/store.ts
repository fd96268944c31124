import type { Alert } from '../scoring/classifier.js';

export interface TrendRecord {
  token: string;
  count: number;
  source: string;
  timestamp: string; // ISO 8601
}

export interface RecentTrend {
  token: string;
  count: number; // summed over the window
  source: string;
}

export interface TrendStats {
  total_records: number;
  unique_tokens: number;
  alerts_count: number;
}

/**
 * Persistence for cycle results plus the read queries the API serves.
 * Every method rejects with a PersistenceError when storage fails.
 */
export interface TrendStore {
  appendTrendRecords(records: readonly TrendRecord[]): Promise<void>;
  appendAlerts(alerts: readonly Alert[]): Promise<void>;
  /** Top tokens summed per (token, source) over the last `windowHours`. */
  queryRecentTrends(windowHours: number): Promise<RecentTrend[]>;
  queryStats24h(): Promise<TrendStats>;
}
