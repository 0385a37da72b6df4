/**
 * Protocol Type Definitions
 */

import type { FrameType } from "./constants.js";
import type { ProtocolError } from "./errors.js";

/**
 * A frame as seen by callers. Never mutated once built.
 */
export type Frame = Readonly<{
  version: number; // Protocol version
  type: FrameType; // Frame type
  flags: number; // Flags bitmask
  streamId: number; // 0 = control plane, >0 = data stream
  payload: Buffer; // Opaque payload bytes
}>;

/**
 * Outcome of a codec call: a value, or the protocol error that stopped it
 */
export type FrameResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ProtocolError };

/**
 * A complete frame pulled off the front of a receive buffer
 */
export type ExtractedFrame = {
  frame: Frame;
  remaining: Buffer; // Bytes after the frame, not yet consumed
};

/**
 * Destination for encoded bytes. Throws when a write fails.
 */
export interface ByteSink {
  write(chunk: Buffer): void;
}

/**
 * Origin of bytes to decode.
 *
 * `read` returns exactly `size` bytes, or throws the source's own
 * end-of-input error when fewer remain. An implementation may hand out
 * buffers from a pool; the codec only holds on to what it returns in a frame.
 */
export interface ByteSource {
  read(size: number): Buffer;
}
