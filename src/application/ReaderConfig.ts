import type { LineTokenizer } from '../domain/ports/LineTokenizer.js';
import type { ResourceOpener } from '../domain/ports/TextResource.js';
import { FileResource } from '../infrastructure/resources/FileResource.js';
import { PapaLineTokenizer } from '../infrastructure/tokenizers/PapaLineTokenizer.js';
import { EventBus } from './EventBus.js';

/** Configuration shared by both reader variants. */
export interface ReaderConfig {
  /** Field delimiter, one character or a short string. Default: `','`. */
  readonly delimiter?: string;
  /** Quote character. Default: `'"'`. */
  readonly quoteChar?: string;
  /** Encoding used by the default file opener. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Bytes per blocking read for the default file opener. Default: `65536`. */
  readonly chunkSize?: number;
  /** When `true`, blank lines are skipped instead of producing rows. Default: `true`. */
  readonly skipEmptyLines?: boolean;
  /** Opens the locator. Default: `FileResource.open` with `encoding` and `chunkSize`. */
  readonly opener?: ResourceOpener;
  /** Splits the resource into records. Default: `PapaLineTokenizer`. */
  readonly tokenizer?: LineTokenizer;
  /** Bus that receives lifecycle events. Default: a private bus with no subscribers. */
  readonly eventBus?: EventBus;
}

/** `ReaderConfig` with every default applied. */
export interface ResolvedReaderConfig {
  readonly delimiter: string;
  readonly quoteChar: string;
  readonly skipEmptyLines: boolean;
  readonly opener: ResourceOpener;
  readonly tokenizer: LineTokenizer;
  readonly eventBus: EventBus;
}

/**
 * Apply defaults and reject unusable settings.
 *
 * @throws {Error} On an empty delimiter, a delimiter containing a newline or the quote
 * character, a quote character that is not exactly one character, or a non-positive chunk size.
 */
export function resolveReaderConfig(config: ReaderConfig = {}): ResolvedReaderConfig {
  const delimiter = config.delimiter ?? ',';
  const quoteChar = config.quoteChar ?? '"';
  const chunkSize = config.chunkSize ?? 65536;
  const encoding = config.encoding ?? 'utf-8';

  if (delimiter === '') {
    throw new Error('delimiter must not be empty');
  }
  if (/[\r\n]/.test(delimiter)) {
    throw new Error('delimiter must not contain a line break');
  }
  if (quoteChar.length !== 1) {
    throw new Error(`quoteChar must be a single character, got "${quoteChar}"`);
  }
  if (delimiter.includes(quoteChar)) {
    throw new Error(`delimiter "${delimiter}" must not contain the quote character`);
  }
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  return {
    delimiter,
    quoteChar,
    skipEmptyLines: config.skipEmptyLines ?? true,
    opener: config.opener ?? ((locator) => FileResource.open(locator, { encoding, chunkSize })),
    tokenizer: config.tokenizer ?? new PapaLineTokenizer(),
    eventBus: config.eventBus ?? new EventBus(),
  };
}
