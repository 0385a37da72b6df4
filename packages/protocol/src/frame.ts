/**
 * Frame Encoding and Decoding
 *
 * Implements the binary protocol:
 * | length (4B) | magic (2B) | version (1B) | type (1B) | flags (1B) | streamId (4B) | payload (variable) |
 *
 * `length` counts every byte after itself (header + payload).
 * All numeric fields use Big Endian (network byte order).
 *
 * Protocol violations come back as `{ ok: false, error: ProtocolError }`.
 * I/O conditions (a sink that fails, a source that runs dry) are thrown by the
 * sink or source itself and pass through untouched.
 */

import {
  PROTOCOL_VERSION,
  MAGIC_0,
  MAGIC_1,
  LENGTH_FIELD_SIZE,
  HEADER_SIZE,
  MAX_FRAME_SIZE,
  MAX_STREAM_ID,
  MAGIC_OFFSET,
  VERSION_OFFSET,
  TYPE_OFFSET,
  FLAGS_OFFSET,
  STREAM_ID_OFFSET,
  FLAG_NONE,
  FrameType,
} from "./constants.js";
import type {
  ByteSink,
  ByteSource,
  ExtractedFrame,
  Frame,
  FrameResult,
} from "./types.js";
import { ErrorCode, ProtocolError } from "./errors.js";
import { isValidFrameType } from "./predicates.js";
import { BufferSource } from "./io.js";

type FrameHeader = Omit<Frame, "payload">;

const EMPTY_PAYLOAD = Buffer.alloc(0);

function ok<T>(value: T): FrameResult<T> {
  return { ok: true, value };
}

function fail<T>(code: ErrorCode, message: string): FrameResult<T> {
  return { ok: false, error: new ProtocolError(code, message) };
}

/**
 * Build a frame stamped with the supported protocol version
 */
export function createFrame(
  type: FrameType,
  streamId: number,
  payload: Buffer = EMPTY_PAYLOAD,
  flags: number = FLAG_NONE
): Frame {
  return { version: PROTOCOL_VERSION, type, flags, streamId, payload };
}

/**
 * Check a frame before any byte of it is written
 */
function validateFrame(frame: Frame): ProtocolError | null {
  if (frame.version !== PROTOCOL_VERSION) {
    return new ProtocolError(
      ErrorCode.INVALID_VERSION,
      `Invalid protocol version: ${frame.version} (expected ${PROTOCOL_VERSION})`
    );
  }

  const length = HEADER_SIZE + frame.payload.length;
  if (length > MAX_FRAME_SIZE) {
    return new ProtocolError(
      ErrorCode.FRAME_TOO_LARGE,
      `Frame too large: ${length} > ${MAX_FRAME_SIZE}`
    );
  }

  // The header fields are fixed width; refuse values they cannot carry
  if (!isValidFrameType(frame.type)) {
    return new ProtocolError(
      ErrorCode.BAD_FRAME,
      `Invalid frame type: ${frame.type}`
    );
  }
  if (!Number.isInteger(frame.flags) || frame.flags < 0 || frame.flags > 0xff) {
    return new ProtocolError(ErrorCode.BAD_FRAME, `Invalid flags: ${frame.flags}`);
  }
  if (
    !Number.isInteger(frame.streamId) ||
    frame.streamId < 0 ||
    frame.streamId > MAX_STREAM_ID
  ) {
    return new ProtocolError(
      ErrorCode.BAD_FRAME,
      `Invalid stream ID: ${frame.streamId}`
    );
  }

  return null;
}

/**
 * Write length prefix and fixed header into `target` at `offset`
 */
function writeHeader(target: Buffer, offset: number, frame: Frame): void {
  target.writeUInt32BE(HEADER_SIZE + frame.payload.length, offset);
  const header = offset + LENGTH_FIELD_SIZE;
  target.writeUInt8(MAGIC_0, header + MAGIC_OFFSET);
  target.writeUInt8(MAGIC_1, header + MAGIC_OFFSET + 1);
  target.writeUInt8(frame.version, header + VERSION_OFFSET);
  target.writeUInt8(frame.type, header + TYPE_OFFSET);
  target.writeUInt8(frame.flags, header + FLAGS_OFFSET);
  target.writeUInt32BE(frame.streamId, header + STREAM_ID_OFFSET);
}

/**
 * Encode a frame into a single buffer, ready for one atomic write
 */
export function encodeFrame(frame: Frame): FrameResult<Buffer> {
  const invalid = validateFrame(frame);
  if (invalid) return { ok: false, error: invalid };

  const buffer = Buffer.allocUnsafe(
    LENGTH_FIELD_SIZE + HEADER_SIZE + frame.payload.length
  );
  writeHeader(buffer, 0, frame);
  frame.payload.copy(buffer, LENGTH_FIELD_SIZE + HEADER_SIZE);

  return ok(buffer);
}

/**
 * Encode a frame straight into a sink, field by field
 *
 * Nothing is written when validation fails. A sink that throws part-way
 * leaves a partial frame behind; callers that need atomic writes should use
 * `encodeFrame` and write the result once.
 *
 * @returns Number of bytes written
 */
export function writeFrame(sink: ByteSink, frame: Frame): FrameResult<number> {
  const invalid = validateFrame(frame);
  if (invalid) return { ok: false, error: invalid };

  const prefix = Buffer.allocUnsafe(LENGTH_FIELD_SIZE + HEADER_SIZE);
  writeHeader(prefix, 0, frame);

  sink.write(prefix.subarray(0, LENGTH_FIELD_SIZE)); // length
  sink.write(prefix.subarray(LENGTH_FIELD_SIZE, LENGTH_FIELD_SIZE + VERSION_OFFSET)); // magic
  sink.write(
    prefix.subarray(
      LENGTH_FIELD_SIZE + VERSION_OFFSET,
      LENGTH_FIELD_SIZE + STREAM_ID_OFFSET
    )
  ); // version, type, flags
  sink.write(prefix.subarray(LENGTH_FIELD_SIZE + STREAM_ID_OFFSET)); // streamId

  if (frame.payload.length > 0) {
    sink.write(frame.payload);
  }

  return ok(prefix.length + frame.payload.length);
}

/**
 * Check a declared frame length (the value of the length prefix)
 */
export function validateLength(length: number): ProtocolError | null {
  if (length < HEADER_SIZE) {
    return new ProtocolError(
      ErrorCode.BAD_FRAME,
      `Invalid frame size: ${length} < ${HEADER_SIZE}`
    );
  }
  if (length > MAX_FRAME_SIZE) {
    return new ProtocolError(
      ErrorCode.FRAME_TOO_LARGE,
      `Frame too large: ${length} > ${MAX_FRAME_SIZE}`
    );
  }
  return null;
}

/**
 * Parse and validate the fixed header (the HEADER_SIZE bytes after the
 * length prefix). Checked in order: magic, version, type.
 */
export function parseHeader(header: Buffer): FrameResult<FrameHeader> {
  if (header.length < HEADER_SIZE) {
    return fail(
      ErrorCode.BAD_FRAME,
      `Header too short: expected ${HEADER_SIZE} bytes, got ${header.length}`
    );
  }

  // Magic first: nothing else in the header can be trusted without it
  if (
    header[MAGIC_OFFSET] !== MAGIC_0 ||
    header[MAGIC_OFFSET + 1] !== MAGIC_1
  ) {
    return fail(
      ErrorCode.BAD_FRAME,
      `Invalid magic marker: 0x${header
        .subarray(MAGIC_OFFSET, MAGIC_OFFSET + 2)
        .toString("hex")}`
    );
  }

  const version = header.readUInt8(VERSION_OFFSET);
  if (version !== PROTOCOL_VERSION) {
    return fail(
      ErrorCode.INVALID_VERSION,
      `Invalid protocol version: ${version} (expected ${PROTOCOL_VERSION})`
    );
  }

  const type = header.readUInt8(TYPE_OFFSET);
  if (!isValidFrameType(type)) {
    return fail(ErrorCode.BAD_FRAME, `Invalid frame type: ${type}`);
  }

  // Any flag pattern and any stream ID are structurally legal
  return ok({
    version,
    type,
    flags: header.readUInt8(FLAGS_OFFSET),
    streamId: header.readUInt32BE(STREAM_ID_OFFSET),
  });
}

/**
 * Read exactly one frame from a source
 *
 * The fixed header is validated before the payload is read, so a bad magic,
 * version or type costs at most LENGTH_FIELD_SIZE + HEADER_SIZE bytes.
 * A source that runs out of bytes throws its own end-of-input error.
 */
export function readFrame(source: ByteSource): FrameResult<Frame> {
  const length = source.read(LENGTH_FIELD_SIZE).readUInt32BE(0);

  const badLength = validateLength(length);
  if (badLength) return { ok: false, error: badLength };

  const header = parseHeader(source.read(HEADER_SIZE));
  if (!header.ok) return header;

  const payloadLength = length - HEADER_SIZE;
  const payload =
    payloadLength > 0 ? source.read(payloadLength) : Buffer.alloc(0);

  return ok({ ...header.value, payload });
}

/**
 * Decode one frame from bytes already in memory
 *
 * Throws EndOfInputError when the bytes end before the declared length.
 * Trailing bytes after the frame are ignored.
 */
export function decodeFrame(bytes: Uint8Array): FrameResult<Frame> {
  return readFrame(new BufferSource(bytes));
}

/**
 * Extract a complete frame from the front of a receive buffer
 *
 * Used by incremental parsers fed from a socket. The length and fixed header
 * are validated as soon as they have arrived, so a malformed frame is
 * rejected without buffering its payload.
 *
 * @returns The frame and remaining bytes, null if more data is needed, or a
 *          failed result when the buffered bytes can never form a valid frame
 */
export function extractFrame(
  buffer: Buffer
): FrameResult<ExtractedFrame> | null {
  // Need at least 4 bytes for length
  if (buffer.length < LENGTH_FIELD_SIZE) {
    return null;
  }

  const length = buffer.readUInt32BE(0);
  const badLength = validateLength(length);
  if (badLength) return { ok: false, error: badLength };

  const headerEnd = LENGTH_FIELD_SIZE + HEADER_SIZE;
  if (buffer.length < headerEnd) {
    return null;
  }

  const header = parseHeader(buffer.subarray(LENGTH_FIELD_SIZE, headerEnd));
  if (!header.ok) return header;

  // Not enough data yet
  const totalSize = LENGTH_FIELD_SIZE + length;
  if (buffer.length < totalSize) {
    return null;
  }

  // Copy so the frame does not pin the receive buffer
  const payload = Buffer.from(buffer.subarray(headerEnd, totalSize));

  return ok({
    frame: { ...header.value, payload },
    remaining: buffer.subarray(totalSize),
  });
}
