import { MalformedLineError } from './errors.js';
import { classDigit } from './formats.js';
import type { DecisionListConfig, ListedDecision, ScoredDecision } from './types.js';

const SCORE_WIDTH = 8;
const CLASS_WIDTH = 4;

// <feature> <score, 4 decimals> <0|1>; the feature itself may contain spaces (bigrams).
const DECISION_LINE = /^(.*\S)\s+(\d*\.\d{4})\s+([01])\s*$/;

/**
 * Highest log-likelihood first. Ties keep their arrival order
 * (Array.prototype.sort is stable). The input is not modified.
 */
export function sortDecisions<T extends ScoredDecision>(decisions: readonly T[]): T[] {
  return decisions.slice().sort((a, b) => b.logLikelihood - a.logLikelihood);
}

export function formatDecision(decision: ScoredDecision, featureWidth: number): string {
  return [
    decision.feature.padEnd(featureWidth),
    decision.logLikelihood.toFixed(4).padStart(SCORE_WIDTH),
    classDigit(decision.classification).padStart(CLASS_WIDTH)
  ].join(' ');
}

/**
 * Lines for the list file: the sorted decisions down to the first one below
 * the threshold. `decisions` must already be sorted.
 */
export function formatDecisionList(
  decisions: readonly ScoredDecision[],
  options: Pick<DecisionListConfig, 'threshold' | 'featureWidth'>
): string[] {
  const lines: string[] = [];
  for (const d of decisions) {
    if (d.logLikelihood < options.threshold) break;
    lines.push(formatDecision(d, options.featureWidth));
  }
  return lines;
}

/**
 * Parse one list line. The score is checked for shape and dropped: the list
 * is trusted to be in priority order already.
 */
export function parseDecisionLine(line: string): ListedDecision | null {
  const m = DECISION_LINE.exec(line);
  if (!m) return null;
  const [, feature, , cls] = m;
  if (feature === undefined || cls === undefined) return null;
  return { feature, classification: cls === '1' };
}

export function parseDecisionList(lines: Iterable<string>, source: string): ListedDecision[] {
  const out: ListedDecision[] = [];
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber++;
    if (line.trim() === '') continue;
    const decision = parseDecisionLine(line);
    if (!decision) throw new MalformedLineError(source, lineNumber, line, 'expected "<feature> <score> <0|1>"');
    out.push(decision);
  }
  return out;
}
