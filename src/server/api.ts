import { createServer, type Server } from 'node:http';
import { HOT_COUNT_THRESHOLD } from '../config.js';
import type { TrendStats, TrendStore } from '../db/store.js';
import { PersistenceError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../log.js';

/** Dashboard timeframe names → window in hours. Unknown names read as one hour. */
export const TIMEFRAME_HOURS: ReadonlyMap<string, number> = new Map([
  ['10min', 0.17],
  ['1hour', 1],
  ['6hour', 6],
  ['24hour', 24],
]);

const DEFAULT_WINDOW_HOURS = 1;

export interface TrendItem {
  token: string;
  count: number;
  source: string;
  hot: boolean;
}

export type StatsBody = TrendStats & { status: 'active' };

export interface ApiResponse {
  status: number;
  body: unknown;
}

const TRENDS_ROUTE = /^\/api\/trends\/([^/]+)\/?$/;

export async function handleApiRequest(
  store: TrendStore,
  method: string,
  rawUrl: string,
  now: () => Date = () => new Date(),
): Promise<ApiResponse> {
  const { pathname } = new URL(rawUrl, 'http://localhost');

  if (method !== 'GET') {
    return { status: 405, body: { error: 'Method not allowed' } };
  }

  try {
    if (pathname === '/health') {
      return { status: 200, body: { status: 'healthy', timestamp: now().toISOString() } };
    }

    if (pathname === '/api/stats') {
      const stats = await store.queryStats24h();
      const body: StatsBody = { ...stats, status: 'active' };
      return { status: 200, body };
    }

    const match = TRENDS_ROUTE.exec(pathname);
    if (match) {
      const hours = TIMEFRAME_HOURS.get(match[1]) ?? DEFAULT_WINDOW_HOURS;
      const trends = await store.queryRecentTrends(hours);
      const items: TrendItem[] = trends.map((t) => ({ ...t, hot: t.count > HOT_COUNT_THRESHOLD }));
      return { status: 200, body: items };
    }
  } catch (err) {
    if (!(err instanceof PersistenceError)) throw err;
    return { status: 500, body: { error: err.message } };
  }

  return { status: 404, body: { error: 'Not found' } };
}

export function createApiServer(store: TrendStore, log: Logger = defaultLogger): Server {
  return createServer((req, res) => {
    handleApiRequest(store, req.method ?? 'GET', req.url ?? '/')
      .then(({ status, body }) => {
        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(body));
      })
      .catch((err: unknown) => {
        log.error(`${req.method} ${req.url} failed`, err);
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Internal server error' }));
      });
  });
}
