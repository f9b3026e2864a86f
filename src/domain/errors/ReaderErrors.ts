/** Discriminant shared by every error the reader raises. */
export type ReaderErrorCode = 'RESOURCE' | 'SCHEMA' | 'ROW_SHAPE' | 'RECORD_FORMAT';

/** Base class for failures raised by the reader itself. Caller errors are never wrapped in it. */
export abstract class ReaderError extends Error {
  abstract readonly code: ReaderErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source locator could not be opened or read. Fatal to the scope. */
export class ResourceError extends ReaderError {
  readonly code = 'RESOURCE' as const;
  readonly locator: string;

  constructor(locator: string, message: string, options?: { cause?: unknown }) {
    super(`${locator}: ${message}`, options);
    this.locator = locator;
  }
}

/** Why a header line could not become a row shape. */
export type SchemaErrorReason =
  | 'MISSING_HEADER'
  | 'MALFORMED_HEADER'
  | 'EMPTY_FIELD'
  | 'INVALID_IDENTIFIER'
  | 'DUPLICATE_FIELD';

/** The header line is missing or does not normalize into a valid, unique row shape. Fatal to the scope. */
export class SchemaError extends ReaderError {
  readonly code = 'SCHEMA' as const;
  readonly reason: SchemaErrorReason;
  /** Normalized field name involved, when there is one. */
  readonly field?: string;
  /** Zero-based header column involved, when there is one. */
  readonly column?: number;

  constructor(
    reason: SchemaErrorReason,
    message: string,
    details?: { field?: string; column?: number; cause?: unknown },
  ) {
    super(message, { cause: details?.cause });
    this.reason = reason;
    this.field = details?.field;
    this.column = details?.column;
  }
}

/**
 * A data record has a different number of fields than the header.
 *
 * Raised at the position the row would have been produced. The cursor has
 * already moved past the record, so iteration may continue.
 */
export class RowShapeError extends ReaderError {
  readonly code = 'ROW_SHAPE' as const;
  readonly expected: number;
  readonly actual: number;
  /** One-based record number in the source, the header being record 1. `0` when unknown. */
  readonly recordNumber: number;

  constructor(expected: number, actual: number, recordNumber = 0) {
    const where = recordNumber > 0 ? ` at record ${recordNumber}` : '';
    super(`Expected ${expected} field(s) but got ${actual}${where}`);
    this.expected = expected;
    this.actual = actual;
    this.recordNumber = recordNumber;
  }
}

/** The tokenizer could not split one record (e.g. an unterminated quoted field). Recoverable like `RowShapeError`. */
export class RecordFormatError extends ReaderError {
  readonly code = 'RECORD_FORMAT' as const;
  /** Tokenizer-specific error code, e.g. `MissingQuotes`. */
  readonly formatCode: string;
  readonly recordNumber: number;

  constructor(formatCode: string, message: string, recordNumber: number) {
    super(`${message} at record ${recordNumber}`);
    this.formatCode = formatCode;
    this.recordNumber = recordNumber;
  }
}

/** Type guard for errors raised by the reader. */
export function isReaderError(error: unknown): error is ReaderError {
  return error instanceof ReaderError;
}
