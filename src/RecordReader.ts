import type { Row } from './domain/model/Row.js';
import type { RowShape } from './domain/model/RowShape.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import { ReaderState, canTransition } from './domain/model/ReaderState.js';
import type { AcquiredSource } from './application/acquireSource.js';
import { acquireSource, releaseSource } from './application/acquireSource.js';
import { RowProducer } from './application/RowProducer.js';
import type { ReaderConfig, ResolvedReaderConfig } from './application/ReaderConfig.js';
import { resolveReaderConfig } from './application/ReaderConfig.js';

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Stateful reader over a delimited text source: an explicit state object with a manual `close()`.
 *
 * Lifecycle: `UNOPENED → OPEN → ITERATING → EXHAUSTED → CLOSED`. `close()` is
 * reachable from every state, idempotent, and `CLOSED` is terminal. Use
 * `withRecordReader()` to have `close()` run on every exit path.
 *
 * @example
 * ```typescript
 * const reader = RecordReader.open('people.csv');
 * try {
 *   for (const row of reader) console.log(row.get('First_Name'));
 * } finally {
 *   reader.close();
 * }
 * ```
 */
export class RecordReader implements IterableIterator<Row> {
  readonly locator: string;
  private readonly config: ResolvedReaderConfig;
  private status: ReaderState = ReaderState.UNOPENED;
  private source: AcquiredSource | null = null;
  private rows: RowProducer | null = null;
  private rowShape: RowShape | null = null;

  constructor(locator: string, config: ReaderConfig = {}) {
    this.locator = locator;
    this.config = resolveReaderConfig(config);
  }

  /** Construct a reader and open it in one step. */
  static open(locator: string, config?: ReaderConfig): RecordReader {
    return new RecordReader(locator, config).open();
  }

  get state(): ReaderState {
    return this.status;
  }

  /** Row shape derived from the header. Available from `OPEN` on, including after `close()`. */
  get shape(): RowShape {
    if (!this.rowShape) {
      throw new Error('Reader is not open. Call open() first.');
    }
    return this.rowShape;
  }

  get fields(): readonly string[] {
    return this.shape.fields;
  }

  /** Rows produced so far. */
  get rowCount(): number {
    return this.rows?.rowCount ?? 0;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.config.eventBus.on(type, handler);
    return this;
  }

  /**
   * Open the resource and read the header.
   *
   * On failure the resource is already released when the error surfaces and
   * the reader is `CLOSED`.
   *
   * @throws {ResourceError} When the locator cannot be opened or read.
   * @throws {SchemaError} When the header is missing or cannot be normalized.
   */
  open(): this {
    if (this.status !== ReaderState.UNOPENED) {
      throw new Error(`Cannot open a reader in state ${this.status}`);
    }

    let source: AcquiredSource;
    try {
      source = acquireSource(this.locator, this.config);
    } catch (error) {
      this.transitionTo(ReaderState.CLOSED);
      throw error;
    }

    this.source = source;
    this.rowShape = source.shape;
    this.rows = new RowProducer(this.locator, source.shape, source.records, this.config.eventBus);
    this.transitionTo(ReaderState.OPEN);
    return this;
  }

  /**
   * Produce the next row, or `done` at end of data.
   *
   * After end of data, and after `close()`, keeps returning `done`.
   *
   * @throws {RowShapeError} When the record's field count differs from the header's. Iteration may continue.
   * @throws {RecordFormatError} When the record cannot be tokenized. Iteration may continue.
   */
  next(): IteratorResult<Row, undefined> {
    if (this.status === ReaderState.EXHAUSTED || this.status === ReaderState.CLOSED) {
      return DONE;
    }
    if (!this.rows) {
      throw new Error('Reader is not open. Call open() first.');
    }

    if (this.status === ReaderState.OPEN) {
      this.transitionTo(ReaderState.ITERATING);
    }

    const result = this.rows.next();
    if (result.done) {
      this.transitionTo(ReaderState.EXHAUSTED);
    }
    return result;
  }

  /** Release the resource if held. A no-op once closed. */
  close(): void {
    if (this.status === ReaderState.CLOSED) return;

    const { source, rows } = this;
    this.source = null;
    this.transitionTo(ReaderState.CLOSED);

    if (source && rows) {
      releaseSource(source, rows, this.config.eventBus);
    }
  }

  [Symbol.iterator](): this {
    return this;
  }

  private transitionTo(next: ReaderState): void {
    if (!canTransition(this.status, next)) {
      throw new Error(`Invalid state transition: ${this.status} → ${next}`);
    }
    this.status = next;
  }
}

/**
 * Run `body` with an open reader and close it on every exit path.
 *
 * The body's return value is passed through. An error thrown by the body
 * propagates unchanged after the resource has been released.
 *
 * @example
 * ```typescript
 * const names = withRecordReader('people.csv', (reader) => [...reader].map((row) => row.get('Name')));
 * ```
 */
export function withRecordReader<R>(locator: string, body: (reader: RecordReader) => R, config?: ReaderConfig): R {
  const reader = RecordReader.open(locator, config);
  try {
    return body(reader);
  } finally {
    reader.close();
  }
}
