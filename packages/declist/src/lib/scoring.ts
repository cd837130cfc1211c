import type { FeatureCounts, FeatureTable, ScoredDecision, Smoothing } from './types.js';

function laplaceRatio(p: number, n: number): number {
  let total: number;
  if (p === 0) {
    total = n + 2;
    return (1 / total) / ((n + 1) / total);
  }
  if (n === 0) {
    total = p + 2;
    return ((p + 1) / total) / (1 / total);
  }
  total = p + n;
  return (p / total) / (n / total);
}

function quadraticRatio(p: number, n: number): number {
  let pos = p;
  let neg = n;
  if (pos === 0) {
    pos = 1;
    neg = (neg - 1) ** 2 + 1;
  } else if (neg === 0) {
    pos = (pos - 1) ** 2 + 1;
    neg = 1;
  }
  const total = pos + neg;
  return (pos / total) / (neg / total);
}

/**
 * log2 of the smoothed positive/negative evidence ratio. Positive values
 * point at the positive class; the magnitude is the confidence.
 */
export function signedLogLikelihood(counts: Readonly<FeatureCounts>, smoothing: Smoothing = 'laplace'): number {
  const { positiveCount: p, negativeCount: n } = counts;
  const ratio = smoothing === 'quadratic' ? quadraticRatio(p, n) : laplaceRatio(p, n);
  return Math.log2(ratio);
}

/**
 * Turn finished counts into a decision. The class is read off the sign before
 * the score is replaced by its magnitude; a score of exactly 0 is negative.
 */
export function scoreDecision(counts: Readonly<FeatureCounts>, smoothing: Smoothing = 'laplace'): ScoredDecision {
  const signed = signedLogLikelihood(counts, smoothing);
  const classification = signed > 0;
  const logLikelihood = Math.abs(signed);
  return { feature: counts.feature, classification, logLikelihood };
}

// One decision per table entry, in table order. Call only once counting is complete.
export function scoreTable(table: FeatureTable, smoothing: Smoothing = 'laplace'): ScoredDecision[] {
  const out: ScoredDecision[] = [];
  for (const counts of table.values()) out.push(scoreDecision(counts, smoothing));
  return out;
}
