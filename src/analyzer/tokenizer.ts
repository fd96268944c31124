import { readFileSync } from 'node:fs';

const STOPWORDS_PATH = new URL('../../data/stopwords.json', import.meta.url);

function loadStopwords(): ReadonlySet<string> {
  const parsed: unknown = JSON.parse(readFileSync(STOPWORDS_PATH, 'utf-8'));
  if (!Array.isArray(parsed) || !parsed.every((w): w is string => typeof w === 'string')) {
    throw new Error(`Stopword list at ${STOPWORDS_PATH.pathname} must be a JSON array of strings`);
  }
  return new Set(parsed.map((w) => w.toLowerCase()));
}

/** Read once at module load; shared by every tokenize call. */
export const STOPWORDS: ReadonlySet<string> = loadStopwords();

export const MIN_WORD_LENGTH = 4;

// Word characters are Unicode letters, digits and underscore, so an ASCII run
// inside an accented word (the "rich" of "zürich") is not a word of its own.
const HASHTAG = /#[\p{L}\p{N}_]+/gu;
// URLs, @mentions, [bracketed] and (parenthesized) spans contribute no words
const NOISE = /http\S+|@[\p{L}\p{N}_]+|\[.*?\]|\(.*?\)/gu;
const WORD = /(?<![\p{L}\p{N}_])[a-z]{3,}(?![\p{L}\p{N}_])/gu;

/**
 * Reduce one document's text to tokens: its hashtags in order, then every
 * qualifying plain word in order. Repeats are kept; they are what gets counted.
 */
export function tokenize(text: string | null | undefined, stopwords: ReadonlySet<string> = STOPWORDS): string[] {
  if (!text) return [];

  const lower = text.toLowerCase();
  const hashtags = lower.match(HASHTAG) ?? [];

  const words = (lower.replace(NOISE, '').match(WORD) ?? []).filter(
    (w) => w.length >= MIN_WORD_LENGTH && !stopwords.has(w),
  );

  return [...hashtags, ...words];
}
