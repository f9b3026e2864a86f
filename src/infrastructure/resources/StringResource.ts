import type { TextResource } from '../../domain/ports/TextResource.js';
import { ResourceError } from '../../domain/errors/ReaderErrors.js';

export interface StringResourceOptions {
  /** Name reported in errors. Default: `'string-input'`. */
  readonly name?: string;
  /** Number of characters served per `read()`. Default: the whole text at once. */
  readonly chunkSize?: number;
}

/** Text resource over an in-memory string or Buffer. Useful for tests and already-loaded content. */
export class StringResource implements TextResource {
  private readonly content: string;
  private readonly name: string;
  private readonly chunkSize: number;
  private offset = 0;
  private isClosed = false;

  constructor(data: string | Buffer, options?: StringResourceOptions) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    this.name = options?.name ?? 'string-input';
    this.chunkSize = options?.chunkSize ?? Math.max(this.content.length, 1);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  read(): string | null {
    if (this.isClosed) {
      throw new ResourceError(this.name, 'read after close');
    }
    if (this.offset >= this.content.length) return null;

    const chunk = this.content.slice(this.offset, this.offset + this.chunkSize);
    this.offset += chunk.length;
    return chunk;
  }

  close(): void {
    this.isClosed = true;
  }
}
