import { ConfigError } from './errors.js';
import { DEFAULT_HYBRID_CAP } from './prebuilt.js';
import type { CountingPolicy, Feature, FeatureCounts, FeatureTable } from './types.js';

/**
 * Folds the feature occurrences of one labelled document into the training
 * table. A strategy keeps nothing between documents.
 */
export interface CountingStrategy {
  readonly policy: Readonly<CountingPolicy>;
  countDocument(table: FeatureTable, occurrences: Iterable<Feature>, positive: boolean): void;
}

// Zero-count record on first encounter.
export function ensureFeature(table: FeatureTable, feature: Feature): FeatureCounts {
  let counts = table.get(feature);
  if (!counts) {
    counts = { feature, positiveCount: 0, negativeCount: 0 };
    table.set(feature, counts);
  }
  return counts;
}

function addCount(counts: FeatureCounts, positive: boolean, amount: number): void {
  if (positive) counts.positiveCount += amount;
  else counts.negativeCount += amount;
}

/** Every occurrence counts. */
export const frequencyCounting: CountingStrategy = {
  policy: { kind: 'frequency' },
  countDocument(table, occurrences, positive) {
    for (const feature of occurrences) {
      addCount(ensureFeature(table, feature), positive, 1);
    }
  }
};

/** A feature counts once per document that contains it. */
export const presenceCounting: CountingStrategy = {
  policy: { kind: 'presence' },
  countDocument(table, occurrences, positive) {
    const seen = new Set(occurrences);
    for (const feature of seen) {
      addCount(ensureFeature(table, feature), positive, 1);
    }
  }
};

/**
 * Like frequency, but one document adds at most `cap` to a feature. Sub-counts
 * live in a document-local table that is summed into the global one once the
 * document is done. Presence is the cap = 1 case.
 */
export function hybridCounting(cap = DEFAULT_HYBRID_CAP): CountingStrategy {
  if (!Number.isInteger(cap) || cap < 1) {
    throw new ConfigError(`Hybrid cap must be a positive integer, got ${cap}`);
  }
  return {
    policy: { kind: 'hybrid', cap },
    countDocument(table, occurrences, positive) {
      const local = new Map<Feature, number>();
      for (const feature of occurrences) {
        const n = local.get(feature) ?? 0;
        if (n < cap) local.set(feature, n + 1);
      }
      for (const [feature, n] of local) {
        addCount(ensureFeature(table, feature), positive, n);
      }
    }
  };
}

export function createCountingStrategy(policy: Readonly<CountingPolicy>): CountingStrategy {
  switch (policy.kind) {
    case 'frequency':
      return frequencyCounting;
    case 'presence':
      return presenceCounting;
    case 'hybrid':
      return hybridCounting(policy.cap);
  }
}
