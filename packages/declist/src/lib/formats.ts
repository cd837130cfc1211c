import { MalformedLineError } from './errors.js';
import type { Labelling, TestDocument, TrainingDocument } from './types.js';

// `s`: U+2028 and U+2029 are review text, not line breaks.
const TRAINING_LINE = /^(\S+) ([01])(?: (.*))?$/s;
const TEST_LINE = /^(\S+) __(?: (.*))?$/s;
const LABEL_LINE = /^(\S+)\s+([01])\s*$/;

interface NumberedLine {
  line: string;
  lineNumber: number;
}

// Non-blank lines with their 1-based positions.
function* contentLines(lines: Iterable<string>): Generator<NumberedLine, void, undefined> {
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber++;
    if (line.trim() === '') continue;
    yield { line, lineNumber };
  }
}

export function classDigit(positive: boolean): string {
  return positive ? '1' : '0';
}

/** `<id> <0|1> <text>`, class 1 being positive. */
export function parseTrainingLines(lines: Iterable<string>, source: string): TrainingDocument[] {
  const docs: TrainingDocument[] = [];
  for (const { line, lineNumber } of contentLines(lines)) {
    const m = TRAINING_LINE.exec(line);
    const id = m?.[1];
    if (!m || id === undefined) {
      throw new MalformedLineError(source, lineNumber, line, 'expected "<id> <0|1> <text>"');
    }
    docs.push({ id, positive: m[2] === '1', text: m[3] ?? '' });
  }
  return docs;
}

/** `<id> __ <text>`; ids must be unique. */
export function parseTestLines(lines: Iterable<string>, source: string): TestDocument[] {
  const docs: TestDocument[] = [];
  const seen = new Set<string>();
  for (const { line, lineNumber } of contentLines(lines)) {
    const m = TEST_LINE.exec(line);
    const id = m?.[1];
    if (!m || id === undefined) {
      throw new MalformedLineError(source, lineNumber, line, 'expected "<id> __ <text>"');
    }
    if (seen.has(id)) throw new MalformedLineError(source, lineNumber, line, `duplicate id ${id}`);
    seen.add(id);
    docs.push({ id, text: m[2] ?? '' });
  }
  return docs;
}

/** `<id> <0|1>`; ids must be unique. */
export function parseLabelLines(lines: Iterable<string>, source: string): Labelling {
  const labels: Labelling = new Map();
  for (const { line, lineNumber } of contentLines(lines)) {
    const m = LABEL_LINE.exec(line);
    const id = m?.[1];
    if (!m || id === undefined) {
      throw new MalformedLineError(source, lineNumber, line, 'expected "<id> <0|1>"');
    }
    if (labels.has(id)) throw new MalformedLineError(source, lineNumber, line, `duplicate id ${id}`);
    labels.set(id, m[2] === '1');
  }
  return labels;
}

export function formatLabelling(labels: Labelling): string[] {
  return Array.from(labels, ([id, positive]) => `${id} ${classDigit(positive)}`);
}
