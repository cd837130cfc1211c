import { resolveConfig } from './prebuilt.js';
import { preprocessText } from './tokenizer.js';
import type { DecisionList, DecisionListConfig, Feature, Labelling, PreparedDocument, TestDocument } from './types.js';

/**
 * Run a test document through the training preprocessing and flatten it to
 * one padded string. Sentences are joined, so a bigram can match across a
 * sentence boundary here even though training never produces one.
 */
export function prepareDocument(
  doc: TestDocument,
  config: Pick<DecisionListConfig, 'stopTokens' | 'negation'> = resolveConfig()
): PreparedDocument {
  const sentences = preprocessText(doc.text, config)
    .filter(tokens => tokens.length > 0)
    .map(tokens => tokens.join(' '));
  return { id: doc.id, text: ` ${sentences.join(' ')} ` };
}

export function containsFeature(prepared: PreparedDocument, feature: Feature): boolean {
  return prepared.text.includes(` ${feature} `);
}

/**
 * Class of the first decision whose feature occurs in the document, scanning
 * in list order; `fallbackClass` when none does.
 */
export function classifyDocument(
  decisions: DecisionList,
  prepared: PreparedDocument,
  fallbackClass: boolean
): boolean {
  const match = decisions.find(d => containsFeature(prepared, d.feature));
  return match ? match.classification : fallbackClass;
}

export function classifyDocuments(
  decisions: DecisionList,
  documents: Iterable<TestDocument>,
  config: Readonly<DecisionListConfig> = resolveConfig()
): Labelling {
  const labels: Labelling = new Map();
  for (const doc of documents) {
    labels.set(doc.id, classifyDocument(decisions, prepareDocument(doc, config), config.fallbackClass));
  }
  return labels;
}
