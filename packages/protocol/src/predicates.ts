/**
 * Frame classification and flag helpers.
 *
 * Stream ID / frame type compatibility (e.g. OPEN_STREAM must not use the
 * control stream) is enforced by the session layer, not here.
 */

import {
  FLAG_ACK,
  FLAG_END_STREAM,
  FLAG_ERROR,
  FrameFlag,
  FrameType,
  STREAM_ID_CONTROL,
  type FrameFlagName,
} from "./constants.js";
import type { Frame } from "./types.js";

const FLAG_ORDER: readonly FrameFlagName[] = ["END_STREAM", "ACK", "ERROR"];

type StreamScoped = Pick<Frame, "streamId">;
type Flagged = Pick<Frame, "flags">;

/**
 * Control frame: stream ID 0 (Auth, Heartbeat, global Error)
 */
export function isControlFrame(frame: StreamScoped): boolean {
  return frame.streamId === STREAM_ID_CONTROL;
}

/**
 * Data stream frame: stream ID > 0 (OpenStream, Data, Close)
 */
export function isDataStream(frame: StreamScoped): boolean {
  return frame.streamId > STREAM_ID_CONTROL;
}

export function hasFlag(frame: Flagged, flag: number): boolean {
  return (frame.flags & flag) !== 0;
}

export function isEndStream(frame: Flagged): boolean {
  return hasFlag(frame, FLAG_END_STREAM);
}

export function isAck(frame: Flagged): boolean {
  return hasFlag(frame, FLAG_ACK);
}

export function isError(frame: Flagged): boolean {
  return hasFlag(frame, FLAG_ERROR);
}

export function isValidFrameType(value: number): value is FrameType {
  switch (value) {
    case FrameType.AUTH:
    case FrameType.OPEN_STREAM:
    case FrameType.DATA:
    case FrameType.CLOSE:
    case FrameType.HEARTBEAT:
      return true;
    default:
      return false;
  }
}

/**
 * Names of the flags set on a frame, e.g. ["END_STREAM", "ACK"]
 */
export function flagNames(flags: number): FrameFlagName[] {
  const names: FrameFlagName[] = [];
  for (const name of FLAG_ORDER) {
    if (flags & FrameFlag[name]) names.push(name);
  }
  return names;
}
