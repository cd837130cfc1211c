export class DeclistError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A non-blank input line that does not fit its file's layout, or that repeats
 * an id already seen in the same file.
 */
export class MalformedLineError extends DeclistError {
  readonly source: string;
  readonly lineNumber: number;
  readonly line: string;

  constructor(source: string, lineNumber: number, line: string, reason: string) {
    super(`${source}:${lineNumber}: ${reason}: ${JSON.stringify(line)}`);
    this.source = source;
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

export type FileOperation = 'read' | 'write';

export class FileAccessError extends DeclistError {
  readonly file: string;
  readonly operation: FileOperation;

  constructor(file: string, operation: FileOperation, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not ${operation} ${file}: ${detail}`, { cause });
    this.file = file;
    this.operation = operation;
  }
}

/** Gold and system labellings must cover the same ids. */
export class MissingLabelError extends DeclistError {
  readonly id: string;
  readonly missingFrom: 'gold' | 'system';

  constructor(id: string, missingFrom: 'gold' | 'system') {
    super(`Document ${id} has no ${missingFrom} label`);
    this.id = id;
    this.missingFrom = missingFrom;
  }
}

export class ConfigError extends DeclistError {}
