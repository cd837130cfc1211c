// Curated public API
export type {
  Feature, NGramOrder, FeatureCounts, FeatureTable, ListedDecision, ScoredDecision, DecisionList,
  TrainingDocument, TestDocument, PreparedDocument, Labelling,
  CountingPolicy, Smoothing, NegationConfig, DecisionListConfig, ConfigOverrides,
  ConfusionMatrix, EvaluationRow, EvaluationReport
} from './lib/types.js';
export { defaultConfig, defaultStopTokens, defaultNegation, resolveConfig, DEFAULT_HYBRID_CAP } from './lib/prebuilt.js';
export { DeclistError, MalformedLineError, FileAccessError, MissingLabelError, ConfigError } from './lib/errors.js';
export type { FileOperation } from './lib/errors.js';
export { splitSentences, tokenizeSentence, preprocessText } from './lib/tokenizer.js';
export { isNegationCue, scopeNegation } from './lib/negation.js';
export { buildNGrams, sentenceFeatures, documentFeatures } from './lib/ngrams.js';
export { ensureFeature, frequencyCounting, presenceCounting, hybridCounting, createCountingStrategy } from './lib/counting.js';
export type { CountingStrategy } from './lib/counting.js';
export { signedLogLikelihood, scoreDecision, scoreTable } from './lib/scoring.js';
export { sortDecisions, formatDecision, formatDecisionList, parseDecisionLine, parseDecisionList } from './lib/decisionList.js';
export { countFeatures, trainDecisionList } from './lib/trainer.js';
export type { TrainingResult } from './lib/trainer.js';
export { prepareDocument, containsFeature, classifyDocument, classifyDocuments } from './lib/classifier.js';
export { evaluate, formatEvaluationReport, roundMetric, METRIC_DECIMALS } from './lib/evaluator.js';
export { parseTrainingLines, parseTestLines, parseLabelLines, formatLabelling, classDigit } from './lib/formats.js';
export { linesFromChunks, readLines, writeLines } from './lib/io.js';
export { runTrain, runTest, runEval } from './lib/commands.js';
export type { CommandOptions, CommandLogger } from './lib/commands.js';
