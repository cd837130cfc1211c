/**
 * Feature is a unigram or two space-joined tokens, negation prefix included.
 * Features compare by exact string equality (no case folding, no stemming).
 */
export type Feature = string;

/** n-gram orders the builder supports. */
export type NGramOrder = 1 | 2;

/**
 * Per-feature evidence gathered during training. Counts are reals so that
 * every counting policy can share the record.
 */
export interface FeatureCounts {
  readonly feature: Feature;
  positiveCount: number;
  negativeCount: number;
}

// Training-time table, owned by a single run and dropped after scoring.
export type FeatureTable = Map<Feature, FeatureCounts>;

/**
 * The part of a decision inference needs. `classification` is true for the
 * positive class (digit 1 on the wire).
 */
export interface ListedDecision {
  readonly feature: Feature;
  readonly classification: boolean;
}

export interface ScoredDecision extends ListedDecision {
  /** Absolute smoothed log2 ratio of positive to negative evidence. */
  readonly logLikelihood: number;
}

/** Ordered highest-confidence first; never mutated once sorted. */
export type DecisionList = readonly ListedDecision[];

export interface TrainingDocument {
  id: string;
  positive: boolean;
  text: string;
}

export interface TestDocument {
  id: string;
  text: string;
}

/**
 * Filtered, negation-tagged sentences joined by single spaces and padded on
 * both ends, so `' ' + feature + ' '` only ever matches whole tokens.
 */
export interface PreparedDocument {
  id: string;
  text: string;
}

/** id -> class, in file order. */
export type Labelling = Map<string, boolean>;

export type CountingPolicy =
  | { kind: 'frequency' }
  | { kind: 'presence' }
  | {
      kind: 'hybrid';
      /**
       * Maximum contribution of one document to a feature's class count.
       * Defaults to 2.
       */
      cap?: number;
    };

/**
 * laplace: add one to whichever side is zero.
 * quadratic: the zero side becomes 1 and the other side (count - 1)^2 + 1,
 * which dampens features seen only a handful of times.
 */
export type Smoothing = 'laplace' | 'quadratic';

export interface NegationConfig {
  /** Prepended to every token in a negation scope. */
  prefix: string;
  /** Tokens that open a scope on exact match. */
  cueWords: readonly string[];
  /** Tokens ending in one of these open a scope (contractions like "didn't"). */
  cueSuffixes: readonly string[];
}

export interface DecisionListConfig {
  stopTokens: ReadonlySet<string>;
  negation: Readonly<NegationConfig>;
  counting: Readonly<CountingPolicy>;
  smoothing: Smoothing;
  /** Decisions below this log-likelihood are not written to the list file. */
  threshold: number;
  /** Column width of the left-justified feature field in the list file. */
  featureWidth: number;
  /** Class assigned to a document no decision matches. */
  fallbackClass: boolean;
}

export interface ConfigOverrides {
  stopTokens?: Iterable<string>;
  negation?: Partial<NegationConfig>;
  counting?: CountingPolicy;
  smoothing?: Smoothing;
  threshold?: number;
  featureWidth?: number;
  fallbackClass?: boolean;
}

export interface ConfusionMatrix {
  truePositive: number;
  falsePositive: number;
  falseNegative: number;
  trueNegative: number;
}

export interface EvaluationRow {
  id: string;
  gold: boolean;
  system: boolean;
}

export interface EvaluationReport {
  rows: EvaluationRow[];
  confusion: ConfusionMatrix;
  // Rounded to 4 decimals; null when the denominator is zero.
  accuracy: number | null;
  precision: number | null;
  recall: number | null;
}
