import { aggregate } from '../analyzer/frequency.js';
import { tokenize } from '../analyzer/tokenizer.js';
import type { TrendRecord, TrendStore } from '../db/store.js';
import { FetchError, PersistenceError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../log.js';
import type { Alert, TrendClassifier } from '../scoring/classifier.js';
import type { DocumentSource, RawDocument } from '../scrapers/types.js';
import { systemClock, type Clock } from './clock.js';
import { formatAlertSummary, toTrendRecords } from './report.js';

export type CycleOutcome =
  | { status: 'completed'; timestamp: string; tokenCount: number; records: TrendRecord[]; alerts: Alert[] }
  | { status: 'skipped'; reason: 'fetch-failed' | 'no-tokens' }
  | { status: 'failed'; reason: 'persistence'; error: PersistenceError };

export interface CycleOrchestratorOptions {
  source: DocumentSource;
  store: TrendStore;
  classifier: TrendClassifier;
  sourceIds: readonly string[];
  /** pause between two source ids */
  fetchDelayMs?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Runs one fetch → tokenize → aggregate → classify → persist pass. The
 * classifier's baseline moves forward only after both writes succeed.
 */
export class CycleOrchestrator {
  private readonly source: DocumentSource;
  private readonly store: TrendStore;
  private readonly classifier: TrendClassifier;
  private readonly sourceIds: readonly string[];
  private readonly fetchDelayMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CycleOrchestratorOptions) {
    this.source = options.source;
    this.store = options.store;
    this.classifier = options.classifier;
    this.sourceIds = options.sourceIds;
    this.fetchDelayMs = options.fetchDelayMs ?? 1000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  async runCycle(): Promise<CycleOutcome> {
    const timestamp = this.clock.now().toISOString();
    this.logger.info('Starting trend monitoring cycle');

    const documents = await this.fetchAll();
    if (documents === null) {
      this.logger.warn('Every source failed, skipping cycle');
      return { status: 'skipped', reason: 'fetch-failed' };
    }

    const tokens = documents.flatMap((doc) => tokenize(`${doc.title} ${doc.body}`));
    this.logger.info(`Scraped ${tokens.length} tokens from ${documents.length} documents`);
    if (tokens.length === 0) {
      this.logger.warn('No tokens collected, skipping cycle');
      return { status: 'skipped', reason: 'no-tokens' };
    }

    const { table, ranked } = aggregate(tokens, this.classifier.rankLimit);
    const { alerts, nextState } = this.classifier.classify(ranked, table, timestamp);
    const records = toTrendRecords(table, this.source.name, timestamp);

    try {
      await this.store.appendTrendRecords(records);
      await this.store.appendAlerts(alerts);
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      this.logger.error('Saving cycle failed, keeping previous baseline', err);
      return { status: 'failed', reason: 'persistence', error: err };
    }

    this.classifier.commit(nextState);
    this.logger.info(`Saved ${records.length} tokens and ${alerts.length} alerts`);

    for (const line of formatAlertSummary(alerts)) {
      this.logger.info(line);
    }
    this.logger.info(`Cycle complete. Processed ${tokens.length} tokens, found ${alerts.length} trends`);

    return { status: 'completed', timestamp, tokenCount: tokens.length, records, alerts };
  }

  /** null when no source id could be fetched */
  private async fetchAll(): Promise<RawDocument[] | null> {
    const documents: RawDocument[] = [];
    let succeeded = 0;

    for (const [i, sourceId] of this.sourceIds.entries()) {
      if (i > 0) await this.clock.sleep(this.fetchDelayMs);

      try {
        const docs = await this.source.fetch(sourceId);
        documents.push(...docs);
        succeeded++;
        this.logger.debug(`Fetched ${docs.length} documents`, { source: this.source.name, sourceId });
      } catch (err) {
        if (!(err instanceof FetchError)) throw err;
        this.logger.warn(`Fetch failed for ${sourceId}: ${err.message}`);
      }
    }

    return succeeded === 0 ? null : documents;
  }
}
