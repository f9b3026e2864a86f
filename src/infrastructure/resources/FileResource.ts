import { closeSync, openSync, readSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import type { TextResource } from '../../domain/ports/TextResource.js';
import { ResourceError } from '../../domain/errors/ReaderErrors.js';

export interface FileResourceOptions {
  /** Encoding for decoding the file. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for each blocking read. Default: `65536` (64KB). */
  readonly chunkSize?: number;
}

/**
 * Text resource backed by a local file descriptor, read synchronously in fixed-size chunks.
 * Node.js only.
 *
 * Multi-byte characters split across two chunks are decoded correctly.
 */
export class FileResource implements TextResource {
  private readonly filePath: string;
  private readonly buffer: Buffer;
  private readonly decoder: StringDecoder;
  private fd: number | null;
  private ended = false;

  private constructor(filePath: string, fd: number, options?: FileResourceOptions) {
    this.filePath = filePath;
    this.fd = fd;
    this.buffer = Buffer.alloc(options?.chunkSize ?? 65536);
    this.decoder = new StringDecoder(options?.encoding ?? 'utf-8');
  }

  /**
   * Open a file for reading.
   *
   * @throws {ResourceError} When the path does not exist or cannot be opened for reading.
   */
  static open(filePath: string, options?: FileResourceOptions): FileResource {
    let fd: number;
    try {
      fd = openSync(filePath, 'r');
    } catch (error) {
      throw new ResourceError(filePath, 'cannot be opened for reading', { cause: error });
    }
    return new FileResource(filePath, fd, options);
  }

  get closed(): boolean {
    return this.fd === null;
  }

  read(): string | null {
    if (this.fd === null) {
      throw new ResourceError(this.filePath, 'read after close');
    }
    if (this.ended) return null;

    for (;;) {
      let bytesRead: number;
      try {
        bytesRead = readSync(this.fd, this.buffer, 0, this.buffer.length, null);
      } catch (error) {
        throw new ResourceError(this.filePath, 'read failed', { cause: error });
      }

      if (bytesRead === 0) {
        this.ended = true;
        const rest = this.decoder.end();
        return rest === '' ? null : rest;
      }

      const text = this.decoder.write(this.buffer.subarray(0, bytesRead));
      // A chunk holding only the first bytes of a character decodes to ''.
      if (text !== '') return text;
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      throw new ResourceError(this.filePath, 'close failed', { cause: error });
    }
  }
}
