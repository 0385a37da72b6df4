/**
 * Protocol Constants
 *
 * Defines frame types, flags, and protocol parameters.
 */

// Protocol version
export const PROTOCOL_VERSION = 1;

// Magic marker "RT" (0x52 0x54), detects stream desynchronization
export const MAGIC_0 = 0x52;
export const MAGIC_1 = 0x54;

// Frame structure sizes
export const LENGTH_FIELD_SIZE = 4;
export const HEADER_SIZE = 9; // magic(2) + version(1) + type(1) + flags(1) + streamId(4)
export const MAX_FRAME_SIZE = 16 * 1024 * 1024; // header + payload, excluding length field
export const MAX_PAYLOAD_SIZE = MAX_FRAME_SIZE - HEADER_SIZE;

// Header field offsets (relative to the end of the length field)
export const MAGIC_OFFSET = 0;
export const VERSION_OFFSET = 2;
export const TYPE_OFFSET = 3;
export const FLAGS_OFFSET = 4;
export const STREAM_ID_OFFSET = 5;

// Stream ID 0 is the control plane (Auth, Heartbeat, global Error)
export const STREAM_ID_CONTROL = 0;
export const MAX_STREAM_ID = 0xffffffff;

// Frame Types (1 byte)
export enum FrameType {
  AUTH = 0x01,
  OPEN_STREAM = 0x02,
  DATA = 0x03,
  CLOSE = 0x04,
  HEARTBEAT = 0x05,
}

// Flags (bitmask, independent bits)
export const FLAG_NONE = 0;
export const FLAG_END_STREAM = 0b00000001; // Sender half-close
export const FLAG_ACK = 0b00000010; // Acknowledgment
export const FLAG_ERROR = 0b00000100; // Payload carries an error

export const FrameFlag = {
  END_STREAM: FLAG_END_STREAM,
  ACK: FLAG_ACK,
  ERROR: FLAG_ERROR,
} as const;

export type FrameFlagName = keyof typeof FrameFlag;
