/**
 * Protocol Error Model
 *
 * Error codes are stable across protocol versions: they are used for logging,
 * metrics and, eventually, ERROR frames on the wire. Never renumber a code;
 * append new ones.
 */

export enum ErrorCode {
  UNKNOWN = 0,

  // Generic framing
  INVALID_VERSION = 1001,
  FRAME_TOO_LARGE = 1002,
  BAD_FRAME = 1003,
  BAD_PAYLOAD = 1004,

  // Auth / handshake
  UNAUTHORIZED = 2001,
  AUTH_EXPIRED = 2002,

  // Stream
  STREAM_NOT_FOUND = 3001,
  STREAM_CLOSED = 3002,
}

/**
 * The only error the protocol layer produces.
 */
export class ProtocolError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }

  override toString(): string {
    if (this.message === "") {
      return `protocol error (${this.code})`;
    }
    return `protocol error (${this.code}): ${this.message}`;
  }
}

/**
 * Create a protocol error
 */
export function newProtocolError(
  code: ErrorCode,
  message: string
): ProtocolError {
  return new ProtocolError(code, message);
}

/**
 * Check whether an arbitrary value is a ProtocolError
 */
export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}

/**
 * Extract a ProtocolError from an arbitrary error value
 *
 * @returns The error, or undefined when it is some other kind (or nothing)
 */
export function asProtocolError(err: unknown): ProtocolError | undefined {
  return isProtocolError(err) ? err : undefined;
}

/**
 * Printable name for a code, e.g. "BAD_FRAME" or "UNKNOWN(42)"
 */
export function errorCodeName(code: number): string {
  return ErrorCode[code] ?? `UNKNOWN(${code})`;
}

/**
 * Framing errors mean the byte stream can no longer be trusted, so the
 * connection must be closed. Auth and stream errors are scoped to a session
 * or a stream.
 */
export function isFatalErrorCode(code: ErrorCode): boolean {
  return code >= 1000 && code < 2000;
}
