import type { Feature, NGramOrder } from './types.js';

const ORDERS: readonly NGramOrder[] = [1, 2];

/**
 * Every contiguous window of `n` tokens, space-joined, left to right.
 * k tokens give k unigrams and max(k - 1, 0) bigrams; repeats are kept.
 */
export function buildNGrams(tokens: readonly string[], n: NGramOrder): Feature[] {
  const out: Feature[] = [];
  for (let i = 0; i + n <= tokens.length; i++) {
    out.push(tokens.slice(i, i + n).join(' '));
  }
  return out;
}

// Unigrams, then bigrams, of a single sentence.
export function sentenceFeatures(tokens: readonly string[]): Feature[] {
  return ORDERS.flatMap(n => buildNGrams(tokens, n));
}

/**
 * All feature occurrences of a preprocessed document, sentence by sentence.
 * Bigrams never span a sentence boundary.
 */
export function* documentFeatures(sentences: Iterable<readonly string[]>): Generator<Feature, void, undefined> {
  for (const tokens of sentences) {
    yield* sentenceFeatures(tokens);
  }
}
