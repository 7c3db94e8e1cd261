/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Line-oriented input for the tag reader
 */

import * as fs from 'fs';
import { StreamError, createLogger } from '@dxfio/data';

const log = createLogger('LineSource');

export interface LineSource {
  /** File name or '<memory>', reported in errors */
  readonly name: string;
  /** Next line without its terminator, or null at end of input */
  readLine(): string | null;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Lines of an in-memory document (text, or UTF-8 bytes)
 */
export class StringLineSource implements LineSource {
  private lines: string[];
  private index = 0;

  constructor(content: string | Uint8Array, readonly name: string = '<memory>') {
    const text = typeof content === 'string' ? content : new TextDecoder().decode(content);
    this.lines = text.length === 0 ? [] : text.split('\n').map(stripCarriageReturn);
    // A final newline terminates the last line rather than starting a new one
    if (text.endsWith('\n')) {
      this.lines.pop();
    }
  }

  readLine(): string | null {
    return this.index < this.lines.length ? this.lines[this.index++] : null;
  }
}

const DEFAULT_CHUNK_SIZE = 64 * 1024;

function openForReading(name: string): number {
  try {
    return fs.openSync(name, 'r');
  } catch (error) {
    throw new StreamError(`Cannot open ${name}`, { source: name, line: 0 }, error);
  }
}

/**
 * Lines of a file, read synchronously in fixed-size chunks so that large
 * drawings are never held in memory whole.
 * Closes the descriptor at end of input or on a read failure.
 */
export class FileLineSource implements LineSource {
  private fd: number | null;
  private readonly chunk: Buffer;
  private readonly decoder = new TextDecoder('utf-8');
  private pending: string[] = [];
  private pendingIndex = 0;
  private partial = '';
  private linesRead = 0;

  constructor(readonly name: string, chunkSize: number = DEFAULT_CHUNK_SIZE) {
    this.fd = openForReading(name);
    this.chunk = Buffer.alloc(chunkSize);
  }

  readLine(): string | null {
    while (this.pendingIndex >= this.pending.length) {
      if (this.fd === null) return null;
      this.fill(this.fd);
    }
    this.linesRead++;
    return this.pending[this.pendingIndex++];
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }

  private closeAfterFailure(): void {
    try {
      this.close();
    } catch (closeError) {
      this.fd = null;
      log.caught(`Closing ${this.name}`, closeError);
    }
  }

  private fill(fd: number): void {
    let bytesRead: number;
    try {
      bytesRead = fs.readSync(fd, this.chunk, 0, this.chunk.length, null);
    } catch (error) {
      this.closeAfterFailure();
      throw new StreamError(
        `Error while reading from ${this.name} after line ${this.linesRead}`,
        { source: this.name, line: this.linesRead },
        error,
      );
    }

    this.pending = [];
    this.pendingIndex = 0;

    if (bytesRead === 0) {
      const tail = this.partial + this.decoder.decode();
      this.partial = '';
      if (tail.length > 0) {
        this.pending.push(stripCarriageReturn(tail));
      }
      this.close();
      return;
    }

    const text = this.partial + this.decoder.decode(this.chunk.subarray(0, bytesRead), { stream: true });
    const lines = text.split('\n');
    this.partial = lines.pop() ?? '';
    for (const line of lines) {
      this.pending.push(stripCarriageReturn(line));
    }
  }
}
