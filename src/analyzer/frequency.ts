export type FrequencyTable = Map<string, number>;

export interface RankedToken {
  token: string;
  count: number;
}

export interface Aggregate {
  table: FrequencyTable;
  ranked: RankedToken[];
}

/** Map iteration order is first-occurrence order, which ranking relies on for ties. */
export function countTokens(tokens: Iterable<string>): FrequencyTable {
  const table: FrequencyTable = new Map();
  for (const token of tokens) {
    table.set(token, (table.get(token) ?? 0) + 1);
  }
  return table;
}

/**
 * Tokens by descending count. Array#sort is stable, so equal counts keep
 * first-occurrence order.
 */
export function rankTokens(table: ReadonlyMap<string, number>, limit?: number): RankedToken[] {
  const ranked = [...table.entries()]
    .map(([token, count]) => ({ token, count }))
    .sort((a, b) => b.count - a.count);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

export function aggregate(tokens: Iterable<string>, limit = 30): Aggregate {
  const table = countTokens(tokens);
  return { table, ranked: rankTokens(table, limit) };
}
