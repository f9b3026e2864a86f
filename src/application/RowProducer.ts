import type { Row } from '../domain/model/Row.js';
import type { RowShape } from '../domain/model/RowShape.js';
import { RecordFormatError, RowShapeError } from '../domain/errors/ReaderErrors.js';
import type { EventBus } from './EventBus.js';

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Lazy, one-pass sequence of rows over the records that follow the header.
 *
 * Rows are built one at a time, in source order, and never buffered. Once the
 * tokenizer reports end of data (or the owning scope halts the producer),
 * every further `next()` returns `done` without touching the resource.
 *
 * A record that cannot become a row throws `RowShapeError` or
 * `RecordFormatError` from `next()`. The cursor has already moved past it, so
 * the caller may keep calling `next()`. Any other error is treated as fatal
 * and halts the producer.
 */
export class RowProducer implements IterableIterator<Row> {
  private recordNumber = 1;
  private produced = 0;
  private rejected = 0;
  private halted = false;
  private reachedEnd = false;

  constructor(
    private readonly locator: string,
    readonly shape: RowShape,
    private readonly records: Iterator<readonly string[], undefined>,
    private readonly eventBus: EventBus,
  ) {}

  /** Rows produced so far. */
  get rowCount(): number {
    return this.produced;
  }

  /** Records rejected so far. */
  get rejectedCount(): number {
    return this.rejected;
  }

  /** `true` once the tokenizer has reported end of data. */
  get exhausted(): boolean {
    return this.reachedEnd;
  }

  next(): IteratorResult<Row, undefined> {
    if (this.halted) return DONE;

    let record: IteratorResult<readonly string[], undefined>;
    try {
      record = this.records.next();
    } catch (error) {
      if (error instanceof RecordFormatError) {
        this.recordNumber += 1;
        this.reject(error);
      } else {
        this.halted = true;
      }
      throw error;
    }

    if (record.done) {
      this.finish();
      return DONE;
    }

    this.recordNumber += 1;
    let row: Row;
    try {
      row = this.shape.createRow(record.value, this.recordNumber);
    } catch (error) {
      if (error instanceof RowShapeError) this.reject(error);
      throw error;
    }

    this.produced += 1;
    return { done: false, value: row };
  }

  /** Stop producing rows. Called when the owning scope releases its resource. */
  halt(): void {
    this.halted = true;
  }

  [Symbol.iterator](): this {
    return this;
  }

  private finish(): void {
    this.halted = true;
    this.reachedEnd = true;
    this.eventBus.emit({
      type: 'reader:exhausted',
      locator: this.locator,
      rowCount: this.produced,
      rejectedCount: this.rejected,
      timestamp: Date.now(),
    });
  }

  private reject(error: RowShapeError | RecordFormatError): void {
    this.rejected += 1;
    this.eventBus.emit({
      type: 'reader:row-rejected',
      locator: this.locator,
      recordNumber: this.recordNumber,
      error: error.message,
      timestamp: Date.now(),
    });
  }
}
