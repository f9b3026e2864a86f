import type { TextResource } from './TextResource.js';

/** Options the reader passes to a tokenizer. */
export interface TokenizerOptions {
  /** Field delimiter (one character or a short string). */
  readonly delimiter: string;
  /** Quote character used to wrap fields containing delimiters or newlines. */
  readonly quoteChar: string;
  /** When `true`, records that are entirely empty are not yielded. */
  readonly skipEmptyLines: boolean;
}

/**
 * Port for splitting an open text resource into records.
 *
 * Implement this interface to support another delimited dialect. The iterator
 * yields one ordered list of cells per record, lazily, and reports end of data
 * with `done`. A record that cannot be split may throw; the iterator must then
 * still be usable for the following records.
 */
export interface LineTokenizer {
  tokenize(resource: TextResource, options: TokenizerOptions): Iterator<readonly string[], undefined>;
}
