#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig, type MonitorConfig } from './config.js';
import { SupabaseTrendStore } from './db/supabase.js';
import { errorMessage } from './errors.js';
import { logger } from './log.js';
import { CycleOrchestrator } from './monitor/cycle.js';
import { CycleScheduler } from './monitor/scheduler.js';
import { TrendClassifier } from './scoring/classifier.js';
import { RedditSource } from './scrapers/index.js';
import { createApiServer } from './server/api.js';

function buildOrchestrator(config: MonitorConfig): CycleOrchestrator {
  return new CycleOrchestrator({
    source: new RedditSource({
      userAgent: config.userAgent,
      credentials: config.credentials,
      timeoutMs: config.fetchTimeoutMs,
    }),
    store: new SupabaseTrendStore(),
    classifier: new TrendClassifier(),
    sourceIds: config.sourceIds,
    fetchDelayMs: config.fetchDelayMs,
  });
}

function fail(err: unknown): never {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}

const program = new Command();

program
  .name('wordpulse')
  .description('Word trend monitor — samples Reddit hot listings and flags new and spiking words')
  .version('0.1.0');

program
  .command('monitor')
  .description('Run trend cycles until interrupted')
  .action(async () => {
    let config: MonitorConfig;
    let scheduler: CycleScheduler;
    try {
      config = loadConfig();
      scheduler = new CycleScheduler(buildOrchestrator(config), {
        intervalMs: config.cycleIntervalMs,
        backoffMs: config.errorBackoffMs,
      });
    } catch (err) {
      fail(err);
    }

    const shutdown = (): void => {
      logger.info('Stop requested, finishing current cycle');
      scheduler.stop();
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    logger.info(`Watching r/${config.sourceIds.join(', r/')}`);
    await scheduler.run();
  });

program
  .command('cycle')
  .description('Run a single trend cycle and exit')
  .action(async () => {
    let orchestrator: CycleOrchestrator;
    try {
      orchestrator = buildOrchestrator(loadConfig());
    } catch (err) {
      fail(err);
    }

    const start = Date.now();
    const outcome = await orchestrator.runCycle();
    const elapsed = ((Date.now() - start) / 1000).toFixed(1);

    if (outcome.status !== 'completed') {
      console.error(`Cycle ${outcome.status} (${outcome.reason}) after ${elapsed}s`);
      process.exit(1);
    }
    console.log(`\nDone in ${elapsed}s: ${outcome.records.length} tokens stored, ${outcome.alerts.length} alerts`);
  });

program
  .command('serve')
  .description('Serve the trends API (/api/trends/:timeframe, /api/stats, /health)')
  .option('--port <port>', 'Port to listen on (default: PORT or 5000)')
  .action((opts: { port?: string }) => {
    let port: number;
    let store: SupabaseTrendStore;
    try {
      port = opts.port ? Number(opts.port) : loadConfig().port;
      if (!Number.isInteger(port) || port <= 0) {
        throw new Error(`Invalid port: ${opts.port}`);
      }
      store = new SupabaseTrendStore();
    } catch (err) {
      fail(err);
    }

    const server = createApiServer(store);
    server.listen(port, () => {
      console.log(`\nServing at http://localhost:${port}`);
      console.log('  /api/trends/:timeframe  — 10min, 1hour, 6hour, 24hour');
      console.log('  /api/stats              — last 24 hours');
      console.log('  /health                 — liveness');
    });

    const shutdown = (): void => {
      server.close(() => process.exit(0));
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });

program
  .command('status')
  .description('Show token and alert counts for the last 24 hours')
  .action(async () => {
    try {
      const stats = await new SupabaseTrendStore().queryStats24h();
      console.log('wordpulse status (last 24h):');
      console.log(`  Trend records: ${stats.total_records}`);
      console.log(`  Unique tokens: ${stats.unique_tokens}`);
      console.log(`  Alerts: ${stats.alerts_count}`);
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
