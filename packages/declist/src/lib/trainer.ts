import { createCountingStrategy } from './counting.js';
import { sortDecisions } from './decisionList.js';
import { documentFeatures } from './ngrams.js';
import { resolveConfig } from './prebuilt.js';
import { scoreTable } from './scoring.js';
import { preprocessText } from './tokenizer.js';
import type { DecisionListConfig, FeatureTable, ScoredDecision, TrainingDocument } from './types.js';

export interface TrainingResult {
  /** Every observed feature, highest log-likelihood first. */
  decisions: ScoredDecision[];
  documentCount: number;
  featureCount: number;
}

/**
 * Count features over every document under the configured policy, then score
 * and sort. Documents are processed one at a time; nothing is scored until
 * the last one has been counted.
 */
export function countFeatures(
  documents: Iterable<TrainingDocument>,
  config: Readonly<DecisionListConfig> = resolveConfig()
): { table: FeatureTable; documentCount: number } {
  const strategy = createCountingStrategy(config.counting);
  const table: FeatureTable = new Map();
  let documentCount = 0;

  for (const doc of documents) {
    const sentences = preprocessText(doc.text, config);
    strategy.countDocument(table, documentFeatures(sentences), doc.positive);
    documentCount++;
  }

  return { table, documentCount };
}

export function trainDecisionList(
  documents: Iterable<TrainingDocument>,
  config: Readonly<DecisionListConfig> = resolveConfig()
): TrainingResult {
  const { table, documentCount } = countFeatures(documents, config);
  const decisions = sortDecisions(scoreTable(table, config.smoothing));
  return { decisions, documentCount, featureCount: table.size };
}
