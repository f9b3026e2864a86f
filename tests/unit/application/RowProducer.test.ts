import { describe, it, expect, vi } from 'vitest';
import { RowProducer } from '../../../src/application/RowProducer.js';
import { EventBus } from '../../../src/application/EventBus.js';
import { normalizeHeader } from '../../../src/domain/services/HeaderNormalizer.js';
import { RecordFormatError, ResourceError, RowShapeError } from '../../../src/domain/errors/ReaderErrors.js';
import { StringResource } from '../../../src/infrastructure/resources/StringResource.js';
import { PapaLineTokenizer } from '../../../src/infrastructure/tokenizers/PapaLineTokenizer.js';
import { captureError } from '../../helpers/probe.js';

const OPTIONS = { delimiter: ',', quoteChar: '"', skipEmptyLines: true };

function producerFor(body: string, eventBus = new EventBus()): RowProducer {
  const records = new PapaLineTokenizer().tokenize(new StringResource(`a,b\n${body}`), OPTIONS);
  const header = records.next();
  return new RowProducer('test.csv', normalizeHeader(header.value), records, eventBus);
}

function* countForever(): Generator<readonly string[], undefined> {
  for (let i = 0; ; i++) {
    yield [String(i), String(i * i)];
  }
}

describe('RowProducer', () => {
  it('should produce rows lazily in source order', () => {
    const rows = producerFor('1,2\n3,4\n');

    const first = rows.next();
    expect(first.done).toBe(false);
    expect(first.value?.toArray()).toEqual(['1', '2']);
    expect(rows.rowCount).toBe(1);

    expect([...rows].map((row) => row.toArray())).toEqual([['3', '4']]);
    expect(rows.rowCount).toBe(2);
    expect(rows.exhausted).toBe(true);
  });

  it('should keep reporting done after exhaustion', () => {
    const rows = producerFor('1,2\n');
    rows.next();

    expect(rows.next()).toEqual({ done: true, value: undefined });
    expect(rows.next()).toEqual({ done: true, value: undefined });
    expect([...rows]).toEqual([]);
  });

  it('should raise RowShapeError at the mismatched record and allow continuing', () => {
    const rows = producerFor('1,2\n3\n4,5,6\n7,8\n');

    expect(rows.next().value?.toArray()).toEqual(['1', '2']);

    const short = captureError(() => rows.next());
    expect(short).toBeInstanceOf(RowShapeError);
    expect(short).toMatchObject({ expected: 2, actual: 1, recordNumber: 3 });

    const long = captureError(() => rows.next());
    expect(long).toMatchObject({ expected: 2, actual: 3, recordNumber: 4 });

    expect(rows.next().value?.toArray()).toEqual(['7', '8']);
    expect(rows.next().done).toBe(true);
    expect(rows.rowCount).toBe(2);
    expect(rows.rejectedCount).toBe(2);
  });

  it('should raise RecordFormatError for a malformed record', () => {
    const rows = producerFor('1,2\n3,"open\n');

    expect(rows.next().value?.toArray()).toEqual(['1', '2']);
    const error = captureError(() => rows.next());
    expect(error).toBeInstanceOf(RecordFormatError);
    expect(error).toMatchObject({ formatCode: 'MissingQuotes', recordNumber: 3 });
    expect(rows.next().done).toBe(true);
  });

  it('should emit row-rejected and exhausted events', () => {
    const bus = new EventBus();
    const rejected = vi.fn();
    const exhausted = vi.fn();
    bus.on('reader:row-rejected', rejected);
    bus.on('reader:exhausted', exhausted);

    const rows = producerFor('1,2\n3\n', bus);
    rows.next();
    captureError(() => rows.next());
    rows.next();
    rows.next();

    expect(rejected).toHaveBeenCalledOnce();
    expect(rejected.mock.calls[0]?.[0]).toMatchObject({
      type: 'reader:row-rejected',
      locator: 'test.csv',
      recordNumber: 3,
      error: 'Expected 2 field(s) but got 1 at record 3',
    });
    expect(exhausted).toHaveBeenCalledOnce();
    expect(exhausted.mock.calls[0]?.[0]).toMatchObject({ rowCount: 1, rejectedCount: 1 });
  });

  it('should stop reading once halted', () => {
    const rows = producerFor('1,2\n3,4\n');
    rows.next();
    rows.halt();

    expect(rows.next().done).toBe(true);
    expect(rows.exhausted).toBe(false);
  });

  it('should halt on a fatal source error', () => {
    const resource = new StringResource('1,2\n');
    const records = new PapaLineTokenizer().tokenize(resource, OPTIONS);
    const rows = new RowProducer('test.csv', normalizeHeader(['a', 'b']), records, new EventBus());
    resource.close();

    expect(captureError(() => rows.next())).toBeInstanceOf(ResourceError);
    expect(rows.next().done).toBe(true);
  });

  it('should support unbounded sources', () => {
    const rows = new RowProducer('squares', normalizeHeader(['n', 'square']), countForever(), new EventBus());

    const taken: string[] = [];
    for (const row of rows) {
      taken.push(row.get('square'));
      if (taken.length === 5) break;
    }

    expect(taken).toEqual(['0', '1', '4', '9', '16']);
    expect(rows.next().value?.get('n')).toBe('5');
  });
});
