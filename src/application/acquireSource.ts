import type { TextResource } from '../domain/ports/TextResource.js';
import type { RowShape } from '../domain/model/RowShape.js';
import { RecordFormatError, ResourceError, SchemaError, isReaderError } from '../domain/errors/ReaderErrors.js';
import { normalizeHeader } from '../domain/services/HeaderNormalizer.js';
import type { ResolvedReaderConfig } from './ReaderConfig.js';
import type { EventBus } from './EventBus.js';
import type { RowProducer } from './RowProducer.js';

/** Everything a scope holds once setup has succeeded. */
export interface AcquiredSource {
  readonly locator: string;
  readonly resource: TextResource;
  /** Tokenized records after the header. */
  readonly records: Iterator<readonly string[], undefined>;
  readonly shape: RowShape;
  readonly rawHeader: readonly string[];
}

/**
 * Scope setup shared by both reader variants: open the resource, start the
 * tokenizer and turn the first record into a row shape.
 *
 * On any failure the resource is released before the error is rethrown, so
 * the caller never holds a partially opened scope.
 *
 * @throws {ResourceError} When the locator cannot be opened or read.
 * @throws {SchemaError} When the header is missing, malformed or not normalizable.
 */
export function acquireSource(locator: string, config: ResolvedReaderConfig): AcquiredSource {
  const { eventBus } = config;
  let resource: TextResource | null = null;

  try {
    resource = openResource(locator, config);
    eventBus.emit({ type: 'reader:opened', locator, delimiter: config.delimiter, timestamp: Date.now() });

    const records = config.tokenizer.tokenize(resource, {
      delimiter: config.delimiter,
      quoteChar: config.quoteChar,
      skipEmptyLines: config.skipEmptyLines,
    });
    const rawHeader = readHeader(records);
    const shape = normalizeHeader(rawHeader);

    eventBus.emit({
      type: 'reader:header-parsed',
      locator,
      rawHeader: rawHeader ?? [],
      fields: shape.fields,
      timestamp: Date.now(),
    });

    return { locator, resource, records, shape, rawHeader: rawHeader ?? [] };
  } catch (error) {
    resource?.close();
    eventBus.emit({
      type: 'reader:open-failed',
      locator,
      error: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
    });
    throw error;
  }
}

/**
 * Scope teardown shared by both reader variants: halt the row producer so it
 * can never read again, then release the resource. Runs once per scope.
 */
export function releaseSource(source: AcquiredSource, rows: RowProducer, eventBus: EventBus): void {
  rows.halt();
  source.resource.close();
  eventBus.emit({
    type: 'reader:closed',
    locator: source.locator,
    rowCount: rows.rowCount,
    rejectedCount: rows.rejectedCount,
    exhausted: rows.exhausted,
    timestamp: Date.now(),
  });
}

function openResource(locator: string, config: ResolvedReaderConfig): TextResource {
  try {
    return config.opener(locator);
  } catch (error) {
    if (isReaderError(error)) throw error;
    throw new ResourceError(locator, 'cannot be opened for reading', { cause: error });
  }
}

function readHeader(records: Iterator<readonly string[], undefined>): readonly string[] | undefined {
  try {
    const first = records.next();
    return first.done ? undefined : first.value;
  } catch (error) {
    if (error instanceof RecordFormatError) {
      throw new SchemaError('MALFORMED_HEADER', `Header line cannot be tokenized: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
