import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { RECENT_TRENDS_LIMIT } from '../config.js';
import { ConfigError, PersistenceError } from '../errors.js';
import type { Alert } from '../scoring/classifier.js';
import type { RecentTrend, TrendRecord, TrendStats, TrendStore } from './store.js';

let client: SupabaseClient | null = null;

export function getClient(): SupabaseClient {
  if (client) return client;

  const url = process.env.SUPABASE_URL;
  const key = process.env.SUPABASE_ANON_KEY;

  if (!url || !key) {
    throw new ConfigError('Missing SUPABASE_URL or SUPABASE_ANON_KEY in environment');
  }

  client = createClient(url, key);
  return client;
}

const TrendRowSchema = z.object({
  token: z.string(),
  count: z.number(),
  source: z.string(),
});

type TrendRow = z.infer<typeof TrendRowSchema>;

const INSERT_CHUNK = 100;
const PAGE_SIZE = 1000;
const HOUR_MS = 60 * 60 * 1000;

/**
 * Tables `trends` and `alerts`, see supabase/schema.sql.
 */
export class SupabaseTrendStore implements TrendStore {
  private readonly db: SupabaseClient;
  private readonly now: () => Date;

  constructor(db: SupabaseClient = getClient(), now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  async appendTrendRecords(records: readonly TrendRecord[]): Promise<void> {
    await this.insertChunked(
      'trends',
      records.map((r) => ({ token: r.token, count: r.count, source: r.source, timestamp: r.timestamp })),
    );
  }

  async appendAlerts(alerts: readonly Alert[]): Promise<void> {
    await this.insertChunked(
      'alerts',
      alerts.map((a) => ({
        token: a.token,
        count: a.count,
        change_percent: a.change_percent,
        kind: a.kind,
        timestamp: a.timestamp,
      })),
    );
  }

  async queryRecentTrends(windowHours: number): Promise<RecentTrend[]> {
    const rows = await this.trendRowsSince(this.hoursAgo(windowHours));

    // Map keeps first-appearance order, so the stable sort breaks ties by it
    const totals = new Map<string, RecentTrend>();
    for (const row of rows) {
      const key = `${row.source}\u0000${row.token}`;
      const entry = totals.get(key);
      if (entry) {
        entry.count += row.count;
      } else {
        totals.set(key, { token: row.token, count: row.count, source: row.source });
      }
    }

    return [...totals.values()].sort((a, b) => b.count - a.count).slice(0, RECENT_TRENDS_LIMIT);
  }

  async queryStats24h(): Promise<TrendStats> {
    const since = this.hoursAgo(24);
    const rows = await this.trendRowsSince(since);

    const { count, error } = await this.db
      .from('alerts')
      .select('*', { count: 'exact', head: true })
      .gt('timestamp', since.toISOString());

    if (error) throw new PersistenceError('count alerts', error.message, { cause: error });

    return {
      total_records: rows.length,
      unique_tokens: new Set(rows.map((r) => r.token)).size,
      alerts_count: count ?? 0,
    };
  }

  private hoursAgo(hours: number): Date {
    return new Date(this.now().getTime() - hours * HOUR_MS);
  }

  private async insertChunked(table: 'trends' | 'alerts', rows: Array<Record<string, string | number>>): Promise<void> {
    for (let i = 0; i < rows.length; i += INSERT_CHUNK) {
      const chunk = rows.slice(i, i + INSERT_CHUNK);
      const { error } = await this.db.from(table).insert(chunk);
      if (error) {
        throw new PersistenceError(`insert ${table}`, `chunk ${i}: ${error.message}`, { cause: error });
      }
    }
  }

  private async trendRowsSince(since: Date): Promise<TrendRow[]> {
    const rows: TrendRow[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.db
        .from('trends')
        .select('token, count, source')
        .gt('timestamp', since.toISOString())
        .order('id', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) throw new PersistenceError('query trends', error.message, { cause: error });

      const page = z.array(TrendRowSchema).safeParse(data ?? []);
      if (!page.success) {
        throw new PersistenceError('query trends', 'unexpected row shape', { cause: page.error });
      }

      rows.push(...page.data);
      if (page.data.length < PAGE_SIZE) return rows;
    }
  }
}
