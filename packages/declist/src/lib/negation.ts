import type { NegationConfig } from './types.js';

export function isNegationCue(token: string, negation: Readonly<NegationConfig>): boolean {
  if (negation.cueWords.includes(token)) return true;
  return negation.cueSuffixes.some(suffix => token.endsWith(suffix));
}

/**
 * Prefix every token after the first negation cue of a sentence, up to the
 * sentence end. The cue itself stays as is, and later cues open no new scope
 * (they are tagged like any other token in the scope).
 *
 * Returns a new array; the input is left untouched.
 */
export function scopeNegation(tokens: readonly string[], negation: Readonly<NegationConfig>): string[] {
  const cueIndex = tokens.findIndex(t => isNegationCue(t, negation));
  if (cueIndex < 0) return tokens.slice();

  return tokens.map((t, i) => (i > cueIndex ? negation.prefix + t : t));
}
