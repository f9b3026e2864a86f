import Papa from 'papaparse';
import type { LineTokenizer, TokenizerOptions } from '../../domain/ports/LineTokenizer.js';
import type { TextResource } from '../../domain/ports/TextResource.js';
import { RecordFormatError } from '../../domain/errors/ReaderErrors.js';

/**
 * Tokenizer adapter using PapaParse.
 *
 * Records are framed from the chunked resource first (a record ends at a `\n`
 * outside quotes, with an optional preceding `\r`), then each record is split
 * by PapaParse, which handles quoting and escaped quotes.
 */
export class PapaLineTokenizer implements LineTokenizer {
  tokenize(resource: TextResource, options: TokenizerOptions): Iterator<readonly string[], undefined> {
    return new PapaRecordIterator(resource, options);
  }
}

class PapaRecordIterator implements Iterator<readonly string[], undefined> {
  private buffer = '';
  private scanned = 0;
  private inQuotes = false;
  private atFieldStart = true;
  private eof = false;
  private finished = false;
  private recordNumber = 0;

  constructor(
    private readonly resource: TextResource,
    private readonly options: TokenizerOptions,
  ) {}

  next(): IteratorResult<readonly string[], undefined> {
    while (!this.finished) {
      const record = this.nextRecord();
      if (record === null) {
        this.finished = true;
        break;
      }
      if (record === '' && this.options.skipEmptyLines) continue;

      this.recordNumber += 1;
      return { done: false, value: this.split(record) };
    }
    return { done: true, value: undefined };
  }

  private split(record: string): readonly string[] {
    if (record === '') return [''];

    const result = Papa.parse<string[]>(record, {
      delimiter: this.options.delimiter,
      quoteChar: this.options.quoteChar,
      escapeChar: this.options.quoteChar,
      newline: '\n',
      header: false,
      skipEmptyLines: false,
      dynamicTyping: false,
    });

    const error = result.errors[0];
    if (error) {
      throw new RecordFormatError(error.code, error.message, this.recordNumber);
    }
    return result.data[0] ?? [];
  }

  private nextRecord(): string | null {
    for (;;) {
      const end = this.scan();
      if (end !== -1) {
        return this.take(end, end + 1);
      }
      if (this.eof) {
        return this.buffer === '' ? null : this.take(this.buffer.length, this.buffer.length);
      }

      const chunk = this.resource.read();
      if (chunk === null) {
        this.eof = true;
      } else {
        this.buffer += chunk;
      }
    }
  }

  private take(end: number, resumeAt: number): string {
    const record = this.buffer.slice(0, end);
    this.buffer = this.buffer.slice(resumeAt);
    this.scanned = 0;
    this.inQuotes = false;
    this.atFieldStart = true;
    return record.endsWith('\r') ? record.slice(0, -1) : record;
  }

  /** Index of the `\n` ending the current record, or `-1` when more text is needed. */
  private scan(): number {
    const { buffer } = this;
    const { delimiter, quoteChar } = this.options;
    let i = this.scanned;

    while (i < buffer.length) {
      const ch = buffer[i];

      if (this.inQuotes) {
        if (ch === quoteChar) {
          // An escaped quote may straddle two chunks.
          if (i + 1 >= buffer.length && !this.eof) break;
          if (buffer[i + 1] === quoteChar) {
            i += 2;
            continue;
          }
          this.inQuotes = false;
        }
        i += 1;
        continue;
      }

      if (ch === '\n') {
        this.scanned = i;
        return i;
      }
      if (ch === quoteChar && this.atFieldStart) {
        this.inQuotes = true;
        this.atFieldStart = false;
        i += 1;
        continue;
      }
      if (buffer.startsWith(delimiter, i)) {
        this.atFieldStart = true;
        i += delimiter.length;
        continue;
      }
      if (!this.eof && i + delimiter.length > buffer.length && delimiter.startsWith(buffer.slice(i))) break;

      this.atFieldStart = false;
      i += 1;
    }

    this.scanned = i;
    return -1;
  }
}
