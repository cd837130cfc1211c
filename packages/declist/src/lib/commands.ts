import { classifyDocuments } from './classifier.js';
import { formatDecisionList, parseDecisionList } from './decisionList.js';
import { evaluate, formatEvaluationReport } from './evaluator.js';
import { formatLabelling, parseLabelLines, parseTestLines, parseTrainingLines } from './formats.js';
import { readLines, writeLines } from './io.js';
import { resolveConfig } from './prebuilt.js';
import { trainDecisionList } from './trainer.js';
import type { ConfigOverrides } from './types.js';

export type CommandLogger = Pick<Console, 'info' | 'log'>;

export interface CommandOptions {
  config?: ConfigOverrides;
  logger?: CommandLogger;
}

/**
 * Report a wrong argument count. This is not a failure: the caller returns
 * normally and the process exits with status 0.
 */
function checkArity(args: readonly string[], expected: string[], command: string, logger: CommandLogger): boolean {
  if (args.length === expected.length) return true;
  logger.log('Incorrect number of arguments!');
  logger.log(`Usage: ${command} ${expected.map(a => `<${a}>`).join(' ')}`);
  return false;
}

export async function runTrain(args: readonly string[], options: CommandOptions = {}): Promise<void> {
  const logger = options.logger ?? console;
  if (!checkArity(args, ['trainingFile', 'outFile'], 'declist-train', logger)) return;
  const [trainingFile = '', outFile = ''] = args;
  const config = resolveConfig(options.config);

  logger.info(`Reading ${trainingFile}...`);
  const documents = parseTrainingLines(await readLines(trainingFile), trainingFile);

  const { decisions, documentCount, featureCount } = trainDecisionList(documents, config);
  const lines = formatDecisionList(decisions, config);
  logger.info(`Trained on ${documentCount} documents (${config.counting.kind} counting): ${featureCount} features, ${lines.length} at or above ${config.threshold}`);

  await writeLines(outFile, lines);
  logger.info(`Wrote ${outFile}`);
}

export async function runTest(args: readonly string[], options: CommandOptions = {}): Promise<void> {
  const logger = options.logger ?? console;
  if (!checkArity(args, ['decisionListFile', 'testFile', 'outFile'], 'declist-test', logger)) return;
  const [decisionListFile = '', testFile = '', outFile = ''] = args;
  const config = resolveConfig(options.config);

  logger.info(`Reading ${decisionListFile}...`);
  const decisions = parseDecisionList(await readLines(decisionListFile), decisionListFile);
  logger.info(`Reading ${testFile}...`);
  const documents = parseTestLines(await readLines(testFile), testFile);

  const labels = classifyDocuments(decisions, documents, config);
  logger.info(`Classified ${labels.size} documents with ${decisions.length} decisions`);

  await writeLines(outFile, formatLabelling(labels));
  logger.info(`Wrote ${outFile}`);
}

export async function runEval(args: readonly string[], options: CommandOptions = {}): Promise<void> {
  const logger = options.logger ?? console;
  if (!checkArity(args, ['goldFile', 'systemFile', 'outFile'], 'declist-eval', logger)) return;
  const [goldFile = '', systemFile = '', outFile = ''] = args;

  logger.info(`Reading ${goldFile}...`);
  const gold = parseLabelLines(await readLines(goldFile), goldFile);
  logger.info(`Reading ${systemFile}...`);
  const system = parseLabelLines(await readLines(systemFile), systemFile);

  const report = evaluate(gold, system);
  await writeLines(outFile, formatEvaluationReport(report));
  logger.info(`Wrote ${outFile}`);
}
