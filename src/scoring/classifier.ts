import { rankTokens, type FrequencyTable, type RankedToken } from '../analyzer/frequency.js';
import { TREND_THRESHOLDS, type TrendThresholds } from '../config.js';

export type AlertKind = 'new' | 'spike';

export interface Alert {
  token: string;
  count: number;
  change_percent: number; // 0 for 'new'
  kind: AlertKind;
  timestamp: string; // ISO 8601
}

/** Previous cycle's top token counts. Never larger than `stateLimit`. */
export type TrendState = Map<string, number>;

export interface Classification {
  alerts: Alert[];
  /** Baseline for the next cycle; takes effect only through `commit`. */
  nextState: TrendState;
}

/**
 * One-cycle-lag comparator: each cycle's counts are judged against the
 * snapshot retained from the last committed cycle, nothing older.
 */
export class TrendClassifier {
  private previous: TrendState;
  private readonly thresholds: TrendThresholds;

  constructor(initialState: ReadonlyMap<string, number> = new Map(), thresholds: TrendThresholds = TREND_THRESHOLDS) {
    this.thresholds = thresholds;
    this.previous = new Map(rankTokens(initialState, thresholds.stateLimit).map((r) => [r.token, r.count]));
  }

  get state(): ReadonlyMap<string, number> {
    return this.previous;
  }

  /** how many ranked tokens a cycle hands to `classify` */
  get rankLimit(): number {
    return this.thresholds.rankLimit;
  }

  /**
   * Compare the ranked tokens of the current cycle with the retained baseline.
   * Does not touch the baseline.
   */
  classify(ranked: readonly RankedToken[], table: FrequencyTable, timestamp: string): Classification {
    const { minCount, newMinCount, spikePercent, rankLimit, stateLimit } = this.thresholds;
    const alerts: Alert[] = [];

    for (const { token, count } of ranked.slice(0, rankLimit)) {
      if (count < minCount) continue;

      const prev = this.previous.get(token) ?? 0;
      if (prev === 0) {
        if (count >= newMinCount) {
          alerts.push({ token, count, change_percent: 0, kind: 'new', timestamp });
        }
        continue;
      }

      const change = ((count - prev) / prev) * 100;
      if (change >= spikePercent) {
        alerts.push({ token, count, change_percent: change, kind: 'spike', timestamp });
      }
    }

    const nextState: TrendState = new Map(rankTokens(table, stateLimit).map((r) => [r.token, r.count]));
    return { alerts, nextState };
  }

  /** Replace the baseline wholesale. */
  commit(nextState: ReadonlyMap<string, number>): void {
    if (nextState.size > this.thresholds.stateLimit) {
      throw new RangeError(`Trend state holds ${nextState.size} tokens, limit is ${this.thresholds.stateLimit}`);
    }
    this.previous = new Map(nextState);
  }
}
