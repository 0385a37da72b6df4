/**
 * In-memory byte sink and source
 *
 * Used to encode into a single buffer and to decode from bytes already in
 * memory. Sockets go through the transport's incremental parser instead.
 */

import type { ByteSink, ByteSource } from "./types.js";

/**
 * Raised by BufferSource when fewer bytes remain than were asked for.
 *
 * This is an I/O condition ("not enough data"), deliberately distinct from
 * ProtocolError ("peer sent a malformed frame").
 */
export class EndOfInputError extends Error {
  readonly code = "ERR_END_OF_INPUT";
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super(
      available === 0
        ? `Unexpected end of input: needed ${needed} bytes, none available`
        : `Unexpected end of input: needed ${needed} bytes, got ${available}`
    );
    this.name = "EndOfInputError";
    this.needed = needed;
    this.available = available;
  }
}

export function isEndOfInput(err: unknown): err is EndOfInputError {
  return err instanceof EndOfInputError;
}

/**
 * Sink that collects every written chunk
 */
export class BufferSink implements ByteSink {
  private chunks: Buffer[] = [];
  private written: number = 0;

  write(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.written += chunk.length;
  }

  get bytesWritten(): number {
    return this.written;
  }

  /**
   * Concatenate everything written so far
   */
  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.written);
  }
}

/**
 * Sequential reader over a buffer
 */
export class BufferSource implements ByteSource {
  private readonly buffer: Buffer;
  private offset: number = 0;

  constructor(buffer: Uint8Array) {
    this.buffer = Buffer.isBuffer(buffer)
      ? buffer
      : Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  /**
   * Read exactly `size` bytes. The returned buffer is a copy, so frames
   * decoded from it do not alias the caller's bytes.
   */
  read(size: number): Buffer {
    const available = this.remaining;
    if (available < size) {
      // Consume what is left, like a stream that hit EOF mid-read
      this.offset = this.buffer.length;
      throw new EndOfInputError(size, available);
    }

    const out = Buffer.from(this.buffer.subarray(this.offset, this.offset + size));
    this.offset += size;
    return out;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }
}
