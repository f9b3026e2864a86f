/**
 * Port for an open, readable text source owned by exactly one reader scope.
 *
 * Reads are synchronous and sequential. `close()` must be idempotent.
 */
export interface TextResource {
  /** Next decoded chunk of text, or `null` once the end of data is reached. */
  read(): string | null;
  /** Release the underlying handle. Calling it again is a no-op. */
  close(): void;
  /** `true` once `close()` has run. */
  readonly closed: boolean;
}

/** Opens a locator (e.g. a file path) for reading. Throws `ResourceError` when it cannot. */
export type ResourceOpener = (locator: string) => TextResource;
