/**
 * Pre-built configuration for movie-review style sentiment data.
 * These provide sensible defaults for callers but are not required;
 * callers can override any part through `resolveConfig`.
 */

import { ConfigError } from './errors.js';
import type { ConfigOverrides, CountingPolicy, DecisionListConfig, NegationConfig } from './types.js';

// Dropped from every sentence before negation scoping and n-gram building.
export const defaultStopTokens: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'to', 'of', 'and',
  '.', ',', "'", '"', ';', ':', '-', '(', ')', '&'
]);

export const defaultNegation: Readonly<NegationConfig> = Object.freeze<NegationConfig>({
  prefix: 'NOT_',
  cueWords: Object.freeze(['not']),
  cueSuffixes: Object.freeze(["n't"])
});

export const DEFAULT_HYBRID_CAP = 2;

export const defaultConfig: Readonly<DecisionListConfig> = Object.freeze<DecisionListConfig>({
  stopTokens: defaultStopTokens,
  negation: defaultNegation,
  counting: Object.freeze<CountingPolicy>({ kind: 'presence' }),
  smoothing: 'laplace',
  // Minimum log2 ratio written to the list file.
  threshold: 2.5,
  featureWidth: 40,
  fallbackClass: false
});

function validateCounting(policy: CountingPolicy): Readonly<CountingPolicy> {
  if (policy.kind !== 'hybrid') return Object.freeze<CountingPolicy>({ ...policy });
  const cap = policy.cap ?? DEFAULT_HYBRID_CAP;
  if (!Number.isInteger(cap) || cap < 1) {
    throw new ConfigError(`Hybrid cap must be a positive integer, got ${cap}`);
  }
  return Object.freeze<CountingPolicy>({ kind: 'hybrid', cap });
}

/**
 * Merge overrides onto the defaults and freeze the result.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): Readonly<DecisionListConfig> {
  const negation = Object.freeze<NegationConfig>({ ...defaultNegation, ...overrides.negation });
  if (negation.prefix === '') throw new ConfigError('Negation prefix must not be empty');

  const threshold = overrides.threshold ?? defaultConfig.threshold;
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new ConfigError(`Threshold must be a non-negative number, got ${threshold}`);
  }

  const featureWidth = overrides.featureWidth ?? defaultConfig.featureWidth;
  if (!Number.isInteger(featureWidth) || featureWidth < 1) {
    throw new ConfigError(`Feature width must be a positive integer, got ${featureWidth}`);
  }

  return Object.freeze<DecisionListConfig>({
    stopTokens: overrides.stopTokens ? new Set(overrides.stopTokens) : defaultConfig.stopTokens,
    negation,
    counting: validateCounting(overrides.counting ?? defaultConfig.counting),
    smoothing: overrides.smoothing ?? defaultConfig.smoothing,
    threshold,
    featureWidth,
    fallbackClass: overrides.fallbackClass ?? defaultConfig.fallbackClass
  });
}
