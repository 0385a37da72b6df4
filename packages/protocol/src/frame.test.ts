import { describe, it, expect } from "vitest";
import {
  createFrame,
  decodeFrame,
  encodeFrame,
  extractFrame,
  parseHeader,
  readFrame,
  validateLength,
  writeFrame,
} from "./frame.js";
import {
  FLAG_ACK,
  FLAG_END_STREAM,
  FLAG_ERROR,
  FLAG_NONE,
  FrameType,
  HEADER_SIZE,
  LENGTH_FIELD_SIZE,
  MAX_FRAME_SIZE,
  MAX_PAYLOAD_SIZE,
  PROTOCOL_VERSION,
  STREAM_ID_CONTROL,
} from "./constants.js";
import { ErrorCode, isProtocolError } from "./errors.js";
import { BufferSink, BufferSource, EndOfInputError, isEndOfInput } from "./io.js";
import { isControlFrame } from "./predicates.js";
import type { ByteSink, Frame, FrameResult } from "./types.js";

function unwrap<T>(result: FrameResult<T> | null): T {
  if (result === null) throw new Error("expected a result, got null");
  if (!result.ok) throw result.error;
  return result.value;
}

function errorCode<T>(result: FrameResult<T> | null): ErrorCode | undefined {
  if (result === null || result.ok) return undefined;
  return result.error.code;
}

function frame(overrides: Partial<Frame> = {}): Frame {
  return {
    version: PROTOCOL_VERSION,
    type: FrameType.DATA,
    flags: FLAG_NONE,
    streamId: 1,
    payload: Buffer.from("test"),
    ...overrides,
  };
}

const responseFrame = frame({
  type: FrameType.DATA,
  flags: FLAG_END_STREAM,
  streamId: 1,
  payload: Buffer.from("Response body"),
});

describe("encodeFrame", () => {
  it("lays out length, magic, header, stream ID and payload", () => {
    const bytes = unwrap(encodeFrame(responseFrame));

    expect(bytes.length).toBe(26);
    expect([...bytes.subarray(0, 13)]).toEqual([
      0x00, 0x00, 0x00, 0x16, // length = 9 + 13
      0x52, 0x54, // magic "RT"
      0x01, // version
      0x03, // DATA
      0x01, // END_STREAM
      0x00, 0x00, 0x00, 0x01, // stream 1
    ]);
    expect(bytes.subarray(13).toString("utf8")).toBe("Response body");
  });

  it("encodes an empty heartbeat as a bare header", () => {
    const bytes = unwrap(
      encodeFrame(createFrame(FrameType.HEARTBEAT, STREAM_ID_CONTROL))
    );

    expect(bytes.toString("hex")).toBe("00000009525401050000000000");
  });

  it("writes the stream ID big-endian", () => {
    const bytes = unwrap(encodeFrame(frame({ streamId: 0x01020304 })));

    expect(bytes.subarray(9, 13).toString("hex")).toBe("01020304");
  });

  it("rejects a foreign version", () => {
    const result = encodeFrame(frame({ version: 0xff }));

    expect(errorCode(result)).toBe(ErrorCode.INVALID_VERSION);
  });

  it("rejects frames larger than MAX_FRAME_SIZE", () => {
    const result = encodeFrame(
      frame({ payload: Buffer.alloc(MAX_PAYLOAD_SIZE + 1) })
    );

    expect(errorCode(result)).toBe(ErrorCode.FRAME_TOO_LARGE);
  });

  it("checks the version before the size", () => {
    const result = encodeFrame(
      frame({ version: 2, payload: Buffer.alloc(MAX_PAYLOAD_SIZE + 1) })
    );

    expect(errorCode(result)).toBe(ErrorCode.INVALID_VERSION);
  });

  it("rejects values the header fields cannot carry", () => {
    const unknownType: number = 9;

    expect(errorCode(encodeFrame(frame({ type: unknownType })))).toBe(
      ErrorCode.BAD_FRAME
    );
    expect(errorCode(encodeFrame(frame({ flags: 0x100 })))).toBe(
      ErrorCode.BAD_FRAME
    );
    expect(errorCode(encodeFrame(frame({ flags: -1 })))).toBe(
      ErrorCode.BAD_FRAME
    );
    expect(errorCode(encodeFrame(frame({ streamId: 2 ** 32 })))).toBe(
      ErrorCode.BAD_FRAME
    );
    expect(errorCode(encodeFrame(frame({ streamId: 1.5 })))).toBe(
      ErrorCode.BAD_FRAME
    );
  });
});

describe("writeFrame", () => {
  class RecordingSink implements ByteSink {
    chunks: Buffer[] = [];

    write(chunk: Buffer): void {
      this.chunks.push(Buffer.from(chunk));
    }
  }

  it("writes the same bytes as encodeFrame, field by field", () => {
    const sink = new RecordingSink();

    const result = writeFrame(sink, responseFrame);

    expect(unwrap(result)).toBe(26);
    expect(sink.chunks.map((chunk) => chunk.length)).toEqual([4, 2, 3, 4, 13]);
    expect(Buffer.concat(sink.chunks)).toEqual(unwrap(encodeFrame(responseFrame)));
  });

  it("skips the payload write for an empty payload", () => {
    const sink = new RecordingSink();

    writeFrame(sink, frame({ payload: Buffer.alloc(0) }));

    expect(sink.chunks.map((chunk) => chunk.length)).toEqual([4, 2, 3, 4]);
  });

  it("writes nothing when the version is wrong", () => {
    const sink = new BufferSink();

    const result = writeFrame(sink, frame({ version: 0xff }));

    expect(errorCode(result)).toBe(ErrorCode.INVALID_VERSION);
    expect(sink.bytesWritten).toBe(0);
    expect(() => decodeFrame(sink.toBuffer())).toThrow(EndOfInputError);
  });

  it("writes nothing when the frame is too large", () => {
    const sink = new BufferSink();

    const result = writeFrame(
      sink,
      frame({ payload: Buffer.alloc(MAX_PAYLOAD_SIZE + 1) })
    );

    expect(errorCode(result)).toBe(ErrorCode.FRAME_TOO_LARGE);
    expect(sink.bytesWritten).toBe(0);
  });

  it("lets a failing sink's error through", () => {
    const written: Buffer[] = [];
    const sink: ByteSink = {
      write(chunk) {
        if (written.length === 2) throw new Error("EPIPE");
        written.push(chunk);
      },
    };

    expect(() => writeFrame(sink, responseFrame)).toThrow("EPIPE");
    expect(written.map((chunk) => chunk.length)).toEqual([4, 2]);
  });
});

describe("round trip", () => {
  const cases: Array<[string, Frame]> = [
    [
      "control frame - auth",
      frame({
        type: FrameType.AUTH,
        streamId: STREAM_ID_CONTROL,
        payload: Buffer.from('{"token":"test-token"}'),
      }),
    ],
    [
      "open stream",
      frame({
        type: FrameType.OPEN_STREAM,
        payload: Buffer.from("GET / HTTP/1.1\r\nHost: example.com\r\n\r\n"),
      }),
    ],
    ["data with end stream", responseFrame],
    [
      "data with error flag",
      frame({ flags: FLAG_ERROR, payload: Buffer.from("Error message") }),
    ],
    [
      "heartbeat",
      frame({
        type: FrameType.HEARTBEAT,
        streamId: STREAM_ID_CONTROL,
        payload: Buffer.alloc(0),
      }),
    ],
    ["close with empty payload", frame({ type: FrameType.CLOSE, payload: Buffer.alloc(0) })],
    ["every flag bit set", frame({ flags: 0xff })],
    ["largest stream ID", frame({ streamId: 0xffffffff })],
  ];

  it.each(cases)("%s", (_name, original) => {
    const decoded = decodeFrame(unwrap(encodeFrame(original)));

    expect(decoded).toEqual({ ok: true, value: original });
  });

  it("round-trips through writeFrame and readFrame", () => {
    const sink = new BufferSink();
    unwrap(writeFrame(sink, responseFrame));

    const decoded = unwrap(readFrame(new BufferSource(sink.toBuffer())));

    expect(decoded.version).toBe(1);
    expect(decoded.type).toBe(FrameType.DATA);
    expect(decoded.flags).toBe(FLAG_END_STREAM);
    expect(decoded.streamId).toBe(1);
    expect(decoded.payload.toString("utf8")).toBe("Response body");
  });

  it("round-trips a heartbeat as a control frame", () => {
    const heartbeat = createFrame(FrameType.HEARTBEAT, STREAM_ID_CONTROL);

    const decoded = unwrap(decodeFrame(unwrap(encodeFrame(heartbeat))));

    expect(decoded.payload.length).toBe(0);
    expect(isControlFrame(decoded)).toBe(true);
  });

  it("round-trips a 1 MiB payload", () => {
    const payload = Buffer.alloc(1024 * 1024, 0xab);

    const decoded = unwrap(decodeFrame(unwrap(encodeFrame(frame({ payload })))));

    expect(decoded.payload.equals(payload)).toBe(true);
  });

  it("round-trips the largest payload that fits", () => {
    const payload = Buffer.alloc(MAX_PAYLOAD_SIZE, 0x5a);

    const bytes = unwrap(encodeFrame(frame({ payload })));
    const decoded = unwrap(decodeFrame(bytes));

    expect(bytes.readUInt32BE(0)).toBe(MAX_FRAME_SIZE);
    expect(decoded.payload.length).toBe(MAX_PAYLOAD_SIZE);
    expect(decoded.payload.equals(payload)).toBe(true);
  });

  it("reads consecutive frames from one source", () => {
    const first = frame({ streamId: 7, payload: Buffer.from("one") });
    const second = frame({ type: FrameType.CLOSE, streamId: 7, payload: Buffer.alloc(0) });
    const source = new BufferSource(
      Buffer.concat([unwrap(encodeFrame(first)), unwrap(encodeFrame(second))])
    );

    expect(readFrame(source)).toEqual({ ok: true, value: first });
    expect(readFrame(source)).toEqual({ ok: true, value: second });
    expect(source.remaining).toBe(0);
    expect(() => readFrame(source)).toThrow(
      "Unexpected end of input: needed 4 bytes, none available"
    );
  });

  it("returns a payload that does not alias the input", () => {
    const bytes = unwrap(encodeFrame(responseFrame));
    const decoded = unwrap(decodeFrame(bytes));

    bytes.fill(0);

    expect(decoded.payload.toString("utf8")).toBe("Response body");
  });
});

describe("decodeFrame validation", () => {
  function lengthPrefix(length: number): Buffer {
    const buf = Buffer.alloc(LENGTH_FIELD_SIZE);
    buf.writeUInt32BE(length, 0);
    return buf;
  }

  it("rejects a declared length above MAX_FRAME_SIZE", () => {
    const result = decodeFrame(lengthPrefix(MAX_FRAME_SIZE + 1));

    expect(errorCode(result)).toBe(ErrorCode.FRAME_TOO_LARGE);
  });

  it("rejects a declared length below the header size", () => {
    expect(errorCode(decodeFrame(lengthPrefix(HEADER_SIZE - 1)))).toBe(
      ErrorCode.BAD_FRAME
    );
    expect(errorCode(decodeFrame(lengthPrefix(0)))).toBe(ErrorCode.BAD_FRAME);
  });

  it("accepts a declared length of exactly MAX_FRAME_SIZE", () => {
    expect(validateLength(MAX_FRAME_SIZE)).toBeNull();
    expect(validateLength(HEADER_SIZE)).toBeNull();
  });

  it("rejects a corrupted first magic byte", () => {
    const bytes = unwrap(encodeFrame(frame({ type: FrameType.AUTH })));
    bytes[4] = 0xff;

    const result = decodeFrame(bytes);

    expect(errorCode(result)).toBe(ErrorCode.BAD_FRAME);
    expect(result.ok ? "" : result.error.message).toBe(
      "Invalid magic marker: 0xff54"
    );
  });

  it("rejects a corrupted second magic byte", () => {
    const bytes = unwrap(encodeFrame(frame()));
    bytes[5] = 0x00;

    expect(errorCode(decodeFrame(bytes))).toBe(ErrorCode.BAD_FRAME);
  });

  it("rejects a corrupted version byte", () => {
    const bytes = unwrap(encodeFrame(frame()));
    bytes[6] = 0xff;

    expect(errorCode(decodeFrame(bytes))).toBe(ErrorCode.INVALID_VERSION);
  });

  it("checks the magic marker before the version", () => {
    const bytes = unwrap(encodeFrame(frame()));
    bytes[4] = 0x00;
    bytes[6] = 0xff;

    expect(errorCode(decodeFrame(bytes))).toBe(ErrorCode.BAD_FRAME);
  });

  it("rejects unknown frame types", () => {
    for (const type of [0x00, 0x06, 0xff]) {
      const bytes = unwrap(encodeFrame(frame()));
      bytes[7] = type;

      expect(errorCode(decodeFrame(bytes))).toBe(ErrorCode.BAD_FRAME);
    }
  });

  it("rejects a bad header without waiting for the payload", () => {
    const header = Buffer.from([0xff, 0xff, 0x01, 0x03, 0x00, 0x00, 0x00, 0x00, 0x01]);

    const result = decodeFrame(Buffer.concat([lengthPrefix(1000), header]));

    expect(errorCode(result)).toBe(ErrorCode.BAD_FRAME);
  });
});

describe("decodeFrame truncation", () => {
  const bytes = unwrap(encodeFrame(responseFrame));

  it("fails with end of input at every truncation point", () => {
    for (let cut = 0; cut < bytes.length; cut++) {
      let thrown: unknown;
      try {
        decodeFrame(bytes.subarray(0, cut));
      } catch (err) {
        thrown = err;
      }

      expect(isEndOfInput(thrown), `cut at ${cut}`).toBe(true);
      expect(isProtocolError(thrown)).toBe(false);
    }
  });

  it("fails when only the length field is present", () => {
    expect(() => decodeFrame(bytes.subarray(0, LENGTH_FIELD_SIZE))).toThrow(
      "Unexpected end of input: needed 9 bytes, none available"
    );
  });

  it("fails when the payload is one byte short", () => {
    expect(() => decodeFrame(bytes.subarray(0, bytes.length - 1))).toThrow(
      "Unexpected end of input: needed 13 bytes, got 12"
    );
  });

  it("fails when the declared length exceeds what was sent", () => {
    const incomplete = Buffer.from([
      0x00, 0x00, 0x00, 0x20, // claims 32 bytes
      0x52, 0x54, 0x01, 0x01, 0x00,
      0x00, 0x00, 0x00, 0x00,
    ]);

    expect(() => decodeFrame(incomplete)).toThrow(EndOfInputError);
  });
});

describe("parseHeader", () => {
  it("rejects a short header", () => {
    expect(errorCode(parseHeader(Buffer.from([0x52, 0x54])))).toBe(
      ErrorCode.BAD_FRAME
    );
  });

  it("accepts any flag pattern", () => {
    const header = Buffer.from([0x52, 0x54, 0x01, 0x05, 0xf8, 0x00, 0x00, 0x00, 0x00]);

    expect(unwrap(parseHeader(header))).toEqual({
      version: 1,
      type: FrameType.HEARTBEAT,
      flags: 0xf8,
      streamId: 0,
    });
  });
});

describe("extractFrame", () => {
  const first = unwrap(encodeFrame(responseFrame));
  const second = unwrap(
    encodeFrame(frame({ type: FrameType.HEARTBEAT, streamId: 0, flags: FLAG_ACK, payload: Buffer.alloc(0) }))
  );

  it("needs at least the length field", () => {
    expect(extractFrame(Buffer.alloc(0))).toBeNull();
    expect(extractFrame(first.subarray(0, 3))).toBeNull();
  });

  it("waits for the header, then for the payload", () => {
    expect(extractFrame(first.subarray(0, 12))).toBeNull();
    expect(extractFrame(first.subarray(0, 13))).toBeNull();
    expect(extractFrame(first.subarray(0, first.length - 1))).toBeNull();
  });

  it("returns the frame and the bytes after it", () => {
    const extracted = unwrap(extractFrame(Buffer.concat([first, second])));

    expect(extracted.frame).toEqual(responseFrame);
    expect(extracted.remaining).toEqual(second);

    const next = unwrap(extractFrame(extracted.remaining));
    expect(next.frame.type).toBe(FrameType.HEARTBEAT);
    expect(next.frame.flags).toBe(FLAG_ACK);
    expect(next.remaining.length).toBe(0);
  });

  it("fails on an oversized length before any header arrives", () => {
    const prefix = Buffer.alloc(4);
    prefix.writeUInt32BE(MAX_FRAME_SIZE + 1, 0);

    expect(errorCode(extractFrame(prefix))).toBe(ErrorCode.FRAME_TOO_LARGE);
  });

  it("fails on a bad header before the payload arrives", () => {
    const corrupted = Buffer.from(first.subarray(0, 13));
    corrupted[6] = 0x02;

    expect(errorCode(extractFrame(corrupted))).toBe(ErrorCode.INVALID_VERSION);
  });
});
