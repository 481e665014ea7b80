/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { TerminalIoError } from '../errors.js';
import type { TerminalInput } from '../types.js';

/**
 * Pulls single bytes out of a paused input stream without waiting.
 *
 * While attached, a no-op `readable` listener keeps the stream reading from the
 * terminal into its own buffer; `readByte` takes one byte from that buffer or
 * returns `null` when it is empty.
 *
 * If someone set an encoding on the stream, `read(1)` yields a whole decoded
 * character; it is encoded back to bytes and the tail is handed out by later calls.
 */
export class InputByteReader {
  private attached = false;
  private streamError: Error | null = null;
  private pending: number[] = [];

  private readonly onReadable = () => {};
  private readonly onError = (error: Error) => {
    this.streamError = error;
  };

  constructor(private readonly input: TerminalInput) {}

  attach(): void {
    if (this.attached) {
      return;
    }
    this.attached = true;
    this.streamError = null;
    this.pending = [];
    this.input.on('error', this.onError);
    this.input.on('readable', this.onReadable);
  }

  detach(): void {
    if (!this.attached) {
      return;
    }
    this.attached = false;
    this.input.off('readable', this.onReadable);
    this.input.off('error', this.onError);
    // Lets the event loop drain once nothing else holds stdin open
    this.input.pause();
  }

  readByte(): number | null {
    if (this.streamError) {
      throw new TerminalIoError(`Failed to read from terminal: ${this.streamError.message}`, 'read', this.streamError);
    }

    const queued = this.pending.shift();
    if (queued !== undefined) {
      return queued;
    }

    const chunk = this.input.read(1);
    if (chunk === null || chunk === undefined) {
      return null;
    }
    if (Buffer.isBuffer(chunk)) {
      return chunk.length > 0 ? chunk[0] : null;
    }
    if (typeof chunk === 'string') {
      const bytes = Buffer.from(chunk, this.input.readableEncoding ?? 'utf8');
      if (bytes.length === 0) {
        return null;
      }
      this.pending.push(...bytes.subarray(1));
      return bytes[0];
    }
    throw new TerminalIoError(`Unexpected chunk type from terminal input: ${typeof chunk}`, 'read');
  }
}
