import { describe, it, expect } from 'vitest';
import { withRecordReader } from '../../src/RecordReader.js';
import { withRows } from '../../src/scopedRows.js';
import type { Row } from '../../src/domain/model/Row.js';
import type { ReaderConfig } from '../../src/application/ReaderConfig.js';
import { captureError, createProbe } from '../helpers/probe.js';

const ORDERS = 'order id,customer,amount\n1,alice,10\n2,bob,20\n3,carol,30\n4,dave,40\n';

/** Both variants behind one signature: run `body` over the rows of `locator` inside a scope. */
type ScopedRead = <R>(locator: string, body: (rows: Iterable<Row>) => R, config: ReaderConfig) => R;

const variants: Array<[string, ScopedRead]> = [
  ['stateful (withRecordReader)', (locator, body, config) => withRecordReader(locator, body, config)],
  ['suspension-based (withRows)', (locator, body, config) => withRows(locator, body, config)],
];

describe.each(variants)('release guarantees: %s', (_name, read) => {
  it('should release exactly once after normal exhaustion', () => {
    const probe = createProbe({ 'orders.csv': ORDERS }, 8);

    const count = read('orders.csv', (rows) => [...rows].length, { opener: probe.opener });

    expect(count).toBe(4);
    expect(probe.count('open')).toBe(1);
    expect(probe.count('close')).toBe(1);
    expect(probe.closedAfterLastRead()).toBe(true);
  });

  it('should release exactly once when the caller breaks early', () => {
    const probe = createProbe({ 'orders.csv': ORDERS }, 8);

    const first = read(
      'orders.csv',
      (rows) => {
        for (const row of rows) {
          return row.get('customer');
        }
        return undefined;
      },
      { opener: probe.opener },
    );

    expect(first).toBe('alice');
    expect(probe.count('close')).toBe(1);
    expect(probe.closedAfterLastRead()).toBe(true);
  });

  it('should release exactly once and rethrow when the caller raises', () => {
    const probe = createProbe({ 'orders.csv': ORDERS }, 8);
    const failure = new Error('amount too large');

    const error = captureError(() =>
      read(
        'orders.csv',
        (rows) => {
          for (const row of rows) {
            if (Number(row.get('amount')) > 15) throw failure;
          }
        },
        { opener: probe.opener },
      ),
    );

    expect(error).toBe(failure);
    expect(probe.count('close')).toBe(1);
    expect(probe.closedAfterLastRead()).toBe(true);
  });

  it('should release exactly once when a row shape error escapes the body', () => {
    const probe = createProbe({ 'ragged.csv': 'a,b\n1,2\n3\n' });

    const error = captureError(() => read('ragged.csv', (rows) => [...rows], { opener: probe.opener }));

    expect(error).toMatchObject({ code: 'ROW_SHAPE', recordNumber: 3 });
    expect(probe.count('close')).toBe(1);
  });

  it('should release exactly once when the header is rejected', () => {
    const probe = createProbe({ 'dup.csv': 'A B,A-B\n1,2\n' });

    const error = captureError(() => read('dup.csv', (rows) => [...rows], { opener: probe.opener }));

    expect(error).toMatchObject({ code: 'SCHEMA', reason: 'DUPLICATE_FIELD' });
    expect(probe.calls).toEqual(['open', 'read', 'close']);
  });

  it('should not read past the rows the caller asked for', () => {
    const probe = createProbe({ 'orders.csv': ORDERS }, 1);

    read(
      'orders.csv',
      (rows) => {
        for (const row of rows) {
          if (row.get('order_id') === '1') break;
        }
      },
      { opener: probe.opener },
    );

    // header plus the first record, one character per read
    const consumed = 'order id,customer,amount\n1,alice,10\n'.length;
    expect(probe.count('read')).toBe(consumed);
  });
});
