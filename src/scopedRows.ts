import type { RowShape } from './domain/model/RowShape.js';
import { acquireSource, releaseSource } from './application/acquireSource.js';
import { RowProducer } from './application/RowProducer.js';
import type { ReaderConfig } from './application/ReaderConfig.js';
import { resolveReaderConfig } from './application/ReaderConfig.js';

/**
 * Scoped reader as a single-suspension generator.
 *
 * Setup (open, tokenize, normalize the header) runs on the first `next()`,
 * which then suspends at the `yield` and hands out the lazy row sequence.
 * Teardown runs in the `finally` block when control comes back past the
 * `yield`, whether through `next()`, `return()` or `throw()`.
 *
 * Only one resumption is meaningful; `withRows()` drives it correctly.
 *
 * @throws {ResourceError} From the first `next()`, when the locator cannot be opened or read.
 * @throws {SchemaError} From the first `next()`, when the header is missing or cannot be normalized.
 */
export function* openRows(locator: string, config?: ReaderConfig): Generator<RowProducer, void, undefined> {
  const resolved = resolveReaderConfig(config);
  const source = acquireSource(locator, resolved);
  const rows = new RowProducer(locator, source.shape, source.records, resolved.eventBus);

  try {
    yield rows;
  } finally {
    releaseSource(source, rows, resolved.eventBus);
  }
}

/**
 * Enter an `openRows()` scope, run `body` with its rows, and leave the scope
 * on every exit path.
 *
 * The body's return value is passed through. An error thrown by the body
 * propagates unchanged after the resource has been released.
 *
 * @example
 * ```typescript
 * const total = withRows('orders.csv', (rows) => {
 *   let sum = 0;
 *   for (const row of rows) sum += Number(row.get('amount'));
 *   return sum;
 * });
 * ```
 */
export function withRows<R>(
  locator: string,
  body: (rows: RowProducer, shape: RowShape) => R,
  config?: ReaderConfig,
): R {
  const scope = openRows(locator, config);
  const entered = scope.next();
  if (entered.done) {
    throw new Error('Row scope finished without handing out its rows');
  }

  try {
    return body(entered.value, entered.value.shape);
  } finally {
    scope.return();
  }
}
