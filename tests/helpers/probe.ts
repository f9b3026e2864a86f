import type { ResourceOpener, TextResource } from '../../src/domain/ports/TextResource.js';
import { ResourceError } from '../../src/domain/errors/ReaderErrors.js';
import { StringResource } from '../../src/infrastructure/resources/StringResource.js';

export type ProbeCall = 'open' | 'read' | 'close';

export interface Probe {
  readonly opener: ResourceOpener;
  /** Every call made on opened resources, in order. */
  readonly calls: ProbeCall[];
  count(call: ProbeCall): number;
  /** `true` when the only close is the last call, so no read came after it. */
  closedAfterLastRead(): boolean;
}

/**
 * Opener over in-memory files that records every open, read and close.
 * Unknown locators fail the way a missing file does.
 */
export function createProbe(files: Readonly<Record<string, string>>, chunkSize?: number): Probe {
  const calls: ProbeCall[] = [];

  const opener: ResourceOpener = (locator) => {
    const content = files[locator];
    if (content === undefined) {
      throw new ResourceError(locator, 'no such probe file');
    }
    calls.push('open');
    const inner = new StringResource(content, { name: locator, chunkSize });

    const resource: TextResource = {
      read() {
        calls.push('read');
        return inner.read();
      },
      close() {
        calls.push('close');
        inner.close();
      },
      get closed() {
        return inner.closed;
      },
    };
    return resource;
  };

  return {
    opener,
    calls,
    count: (call) => calls.filter((c) => c === call).length,
    closedAfterLastRead: () => {
      const firstClose = calls.indexOf('close');
      return firstClose !== -1 && firstClose === calls.length - 1 && calls.lastIndexOf('read') < firstClose;
    },
  };
}

/** Run `fn` and return what it threw, or `undefined`. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
