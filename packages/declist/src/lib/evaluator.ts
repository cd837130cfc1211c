import { MissingLabelError } from './errors.js';
import { classDigit } from './formats.js';
import type { ConfusionMatrix, EvaluationReport, EvaluationRow, Labelling } from './types.js';

export const METRIC_DECIMALS = 4;

/** Rounds to `METRIC_DECIMALS` places, exact halves to the even neighbour (1/32 -> 0.0312). */
export function roundMetric(value: number): number {
  const scale = 10 ** METRIC_DECIMALS;
  const scaled = value * scale;
  const floor = Math.floor(scaled);
  const rest = scaled - floor;
  const up = rest > 0.5 || (rest === 0.5 && floor % 2 !== 0);
  return (up ? floor + 1 : floor) / scale;
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : roundMetric(numerator / denominator);
}

/**
 * Compare a system labelling against gold. Rows follow gold order. Both sides
 * must cover the same ids.
 */
export function evaluate(gold: Labelling, system: Labelling): EvaluationReport {
  for (const id of system.keys()) {
    if (!gold.has(id)) throw new MissingLabelError(id, 'gold');
  }

  const confusion: ConfusionMatrix = { truePositive: 0, falsePositive: 0, falseNegative: 0, trueNegative: 0 };
  const rows: EvaluationRow[] = [];

  for (const [id, goldClass] of gold) {
    const systemClass = system.get(id);
    if (systemClass === undefined) throw new MissingLabelError(id, 'system');
    rows.push({ id, gold: goldClass, system: systemClass });

    if (systemClass) {
      if (goldClass) confusion.truePositive++;
      else confusion.falsePositive++;
    } else {
      if (goldClass) confusion.falseNegative++;
      else confusion.trueNegative++;
    }
  }

  const { truePositive: tp, falsePositive: fp, falseNegative: fn, trueNegative: tn } = confusion;
  return {
    rows,
    confusion,
    accuracy: ratio(tp + tn, tp + fp + tn + fn),
    precision: ratio(tp, tp + fp),
    recall: ratio(tp, tp + fn)
  };
}

function formatMetric(value: number | null): string {
  return value === null ? 'undefined' : value.toFixed(METRIC_DECIMALS);
}

export function formatEvaluationReport(report: EvaluationReport): string[] {
  const lines = report.rows.map(r => `${r.id} ${classDigit(r.gold)} ${classDigit(r.system)}`);
  lines.push(`Accuracy: ${formatMetric(report.accuracy)}`);
  lines.push(`Precision: ${formatMetric(report.precision)}`);
  lines.push(`Recall: ${formatMetric(report.recall)}`);
  return lines;
}
