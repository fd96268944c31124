import { describe, it, expect } from 'vitest';
import { countTokens, rankTokens } from '../src/analyzer/frequency.js';
import { TREND_THRESHOLDS } from '../src/config.js';
import { TrendClassifier } from '../src/scoring/classifier.js';

const TS = '2026-03-01T12:00:00.000Z';

function classifyCounts(classifier: TrendClassifier, counts: Record<string, number>) {
  const table = new Map(Object.entries(counts));
  return classifier.classify(rankTokens(table, 30), table, TS);
}

describe('TrendClassifier', () => {
  it('flags a token absent from the baseline as new', () => {
    const { alerts } = classifyCounts(new TrendClassifier(), { rocket: 5 });

    expect(alerts).toEqual([{ token: 'rocket', count: 5, change_percent: 0, kind: 'new', timestamp: TS }]);
  });

  it('needs three mentions for a new token', () => {
    const { alerts } = classifyCounts(new TrendClassifier(), { rocket: 2, launch: 1 });

    expect(alerts).toEqual([]);
  });

  it('flags a 60% increase as a spike', () => {
    const classifier = new TrendClassifier(new Map([['rocket', 10]]));
    const { alerts } = classifyCounts(classifier, { rocket: 16 });

    expect(alerts).toHaveLength(1);
    expect(alerts[0].kind).toBe('spike');
    expect(alerts[0].count).toBe(16);
    expect(alerts[0].change_percent).toBeCloseTo(60, 5);
  });

  it('ignores a 20% increase', () => {
    const classifier = new TrendClassifier(new Map([['rocket', 10]]));

    expect(classifyCounts(classifier, { rocket: 12 }).alerts).toEqual([]);
  });

  it('treats exactly 50% as a spike', () => {
    const classifier = new TrendClassifier(new Map([['rocket', 10]]));
    const { alerts } = classifyCounts(classifier, { rocket: 15 });

    expect(alerts.map((a) => a.kind)).toEqual(['spike']);
    expect(alerts[0].change_percent).toBe(50);
  });

  it('spikes from a baseline of one once the count reaches two', () => {
    const classifier = new TrendClassifier(new Map([['rocket', 1]]));
    const { alerts } = classifyCounts(classifier, { rocket: 2 });

    expect(alerts).toEqual([{ token: 'rocket', count: 2, change_percent: 100, kind: 'spike', timestamp: TS }]);
  });

  it('never alerts below the minimum count', () => {
    const classifier = new TrendClassifier(new Map([['rocket', 1]]));

    expect(classifyCounts(classifier, { rocket: 1 }).alerts).toEqual([]);
  });

  it('does not alert on a decrease', () => {
    const classifier = new TrendClassifier(new Map([['rocket', 10]]));

    expect(classifyCounts(classifier, { rocket: 4 }).alerts).toEqual([]);
  });

  it('only classifies tokens within the rank limit', () => {
    const classifier = new TrendClassifier(new Map(), { ...TREND_THRESHOLDS, rankLimit: 1 });
    const { alerts } = classifyCounts(classifier, { rocket: 9, launch: 8 });

    expect(alerts.map((a) => a.token)).toEqual(['rocket']);
  });

  it('leaves the baseline alone until commit', () => {
    const classifier = new TrendClassifier(new Map([['rocket', 10]]));
    const { nextState } = classifyCounts(classifier, { rocket: 16, launch: 4 });

    expect([...classifier.state.entries()]).toEqual([['rocket', 10]]);

    classifier.commit(nextState);
    expect([...classifier.state.entries()]).toEqual([
      ['rocket', 16],
      ['launch', 4],
    ]);
  });

  it('replaces the baseline wholesale instead of merging', () => {
    const classifier = new TrendClassifier(new Map([['rocket', 10]]));
    const { nextState } = classifyCounts(classifier, { launch: 4 });
    classifier.commit(nextState);

    expect(classifier.state.has('rocket')).toBe(false);
    expect(classifier.state.get('launch')).toBe(4);
  });

  it('retains the 100 highest-count tokens of the full table', () => {
    const tokens = [
      ...Array.from({ length: 50 }, (_, i) => `low${i}`),
      ...Array.from({ length: 100 }, (_, i) => [`high${i}`, `high${i}`]).flat(),
    ];
    const table = countTokens(tokens);
    const { nextState } = new TrendClassifier().classify(rankTokens(table, 30), table, TS);

    expect(nextState.size).toBe(100);
    expect([...nextState.keys()]).toEqual(Array.from({ length: 100 }, (_, i) => `high${i}`));
    expect([...nextState.values()].every((n) => n === 2)).toBe(true);
  });

  it('breaks ties at the state limit by first occurrence', () => {
    const table = countTokens(Array.from({ length: 120 }, (_, i) => `word${i}`));
    const { nextState } = new TrendClassifier().classify(rankTokens(table, 30), table, TS);

    expect(nextState.size).toBe(100);
    expect(nextState.has('word99')).toBe(true);
    expect(nextState.has('word100')).toBe(false);
  });

  it('trims an oversized initial state and rejects an oversized commit', () => {
    const big = new Map(Array.from({ length: 150 }, (_, i): [string, number] => [`word${i}`, 150 - i]));
    const classifier = new TrendClassifier(big);

    expect(classifier.state.size).toBe(100);
    expect(classifier.state.has('word0')).toBe(true);
    expect(classifier.state.has('word100')).toBe(false);
    expect(() => classifier.commit(big)).toThrow(RangeError);
  });
});
