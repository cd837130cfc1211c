import { createReadStream } from 'fs';
import { writeFile } from 'fs/promises';
import { FileAccessError } from './errors.js';

const LINE_BREAK = /\r\n|\n|\r/;
const BYTE_ORDER_MARK = "\uFEFF";

export async function* linesFromChunks(
  source: AsyncIterable<string>
): AsyncGenerator<string, void, unknown> {
  let buffer = "";
  let atStart = true;

  for await (const chunk of source) {
    buffer += chunk;
    if (atStart && buffer.length > 0) {
      if (buffer.startsWith(BYTE_ORDER_MARK)) buffer = buffer.slice(1);
      atStart = false;
    }

    while (true) {
      const match = LINE_BREAK.exec(buffer);
      if (!match) break;
      // a trailing \r may be the first half of a \r\n split across chunks
      if (match[0] === "\r" && match.index === buffer.length - 1) break;

      yield buffer.slice(0, match.index);
      buffer = buffer.slice(match.index + match[0].length);
    }
  }

  if (buffer.endsWith("\r")) buffer = buffer.slice(0, -1);
  if (buffer.length > 0) {
    yield buffer;
  }
}

/** Whole file as lines, without terminators. */
export async function readLines(file: string): Promise<string[]> {
  const lines: string[] = [];
  try {
    for await (const line of linesFromChunks(createReadStream(file, { encoding: 'utf8' }))) {
      lines.push(line);
    }
  } catch (err) {
    throw new FileAccessError(file, 'read', err);
  }
  return lines;
}

/** Replace `file` with the given lines, each newline-terminated. */
export async function writeLines(file: string, lines: Iterable<string>): Promise<void> {
  let text = "";
  for (const line of lines) text += line + "\n";
  try {
    await writeFile(file, text, 'utf8');
  } catch (err) {
    throw new FileAccessError(file, 'write', err);
  }
}
