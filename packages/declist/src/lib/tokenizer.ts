import { scopeNegation } from './negation.js';
import type { DecisionListConfig } from './types.js';

// Zero-width split after sentence-final punctuation, which stays with its sentence.
const SENTENCE_BOUNDARY = /(?<=[.?!])/;
const TOKEN = /\S+/g;

export function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY);
}

export function tokenizeSentence(sentence: string, stopTokens: ReadonlySet<string>): string[] {
  const tokens = sentence.match(TOKEN) ?? [];
  return tokens.filter(t => !stopTokens.has(t));
}

/**
 * Shared preprocessing for training and inference: sentences, stop-token
 * filtering, then negation scoping. One token array per sentence; sentences
 * that filter down to nothing come back as empty arrays.
 */
export function preprocessText(
  text: string,
  config: Pick<DecisionListConfig, 'stopTokens' | 'negation'>
): string[][] {
  return splitSentences(text).map(sentence =>
    scopeNegation(tokenizeSentence(sentence, config.stopTokens), config.negation)
  );
}
