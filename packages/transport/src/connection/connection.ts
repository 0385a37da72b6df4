import type { Duplex } from "stream";
import { EventEmitter } from "events";
import { extractFrame, encodeFrame } from "../../../protocol/src/frame.js";
import type { Frame } from "../../../protocol/src/types.js";
import {
  FrameType,
  HEADER_SIZE,
  LENGTH_FIELD_SIZE,
} from "../../../protocol/src/constants.js";
import {
  isFatalErrorCode,
  type ErrorCode,
} from "../../../protocol/src/errors.js";

export enum ConnectionState {
  INIT = "INIT",
  OPEN = "OPEN",
  DRAINING = "DRAINING",
  CLOSING = "CLOSING",
  CLOSED = "CLOSED",
}

export type ConnectionError = {
  type: "transport" | "protocol";
  reason: string;
  fatal: boolean;
  code?: ErrorCode; // Set for protocol errors
};

export type ConnectionCloseStats = {
  bytesSent: number;
  bytesReceived: number;
  framesSent: number;
  framesReceived: number;
};

export interface ConnectionEvents {
  open: (connectionId: string) => void;
  frame: (frame: Frame) => void;
  heartbeat: (receivedAt: number, frame: Frame) => void;
  drain: (queuedFrames: number) => void;
  error: (error: ConnectionError) => void;
  close: (stats: ConnectionCloseStats) => void;
  state: (state: ConnectionState, previous: ConnectionState) => void;
}

export declare interface Connection {
  on<E extends keyof ConnectionEvents>(
    event: E,
    listener: ConnectionEvents[E]
  ): this;
  once<E extends keyof ConnectionEvents>(
    event: E,
    listener: ConnectionEvents[E]
  ): this;
  emit<E extends keyof ConnectionEvents>(
    event: E,
    ...args: Parameters<ConnectionEvents[E]>
  ): boolean;
}

/**
 * Connection represents one peer's framed byte stream (usually a TCP socket).
 *
 * Responsibilities:
 * - Receive buffering and incremental frame decoding
 * - Atomic frame writes with backpressure handling
 * - State machine enforcement (INIT → OPEN ⟷ DRAINING → CLOSING → CLOSED)
 * - Event emission for decoded frames
 *
 * A framing error is fatal: once the byte stream is out of sync there is no
 * safe way to find the next frame boundary, so the connection is closed.
 *
 * Does NOT:
 * - Interpret payloads
 * - Track streams or enforce stream ID / frame type rules
 * - Authenticate the peer
 */
export class Connection extends EventEmitter {
  private socket: Duplex;
  private state: ConnectionState = ConnectionState.INIT;
  public readonly connectionId: string;

  // Buffering / parsing state
  private recvChunks: Buffer[] = [];
  private recvLength: number = 0;
  private recvNeeded: number = LENGTH_FIELD_SIZE; // Bytes before the next parse attempt

  // Statistics
  private bytesSent: number = 0;
  private bytesReceived: number = 0;
  private framesSent: number = 0;
  private framesReceived: number = 0;
  private lastHeartbeatAt: number = Date.now();

  constructor(socket: Duplex, connectionId: string) {
    super();
    this.socket = socket;
    this.connectionId = connectionId;
    this.wireSocket();
    this.transition(ConnectionState.OPEN);
    this.emit("open", connectionId);
  }

  /**
   * Bind socket events to Connection behavior
   */
  private wireSocket(): void {
    // Data event
    this.socket.on("data", (chunk: Buffer) => {
      if (!this.isReadable()) return;
      this.bytesReceived += chunk.length;
      this.onData(chunk);
    });

    // Peer finished sending
    this.socket.on("end", () => {
      if (this.recvLength > 0) {
        this.emit("error", {
          type: "transport",
          reason: `Connection ended mid-frame (${this.recvLength} pending bytes)`,
          fatal: true,
        });
        this.resetReceive();
      }
    });

    // Drain event
    this.socket.on("drain", () => {
      if (this.state === ConnectionState.DRAINING) {
        this.transition(ConnectionState.OPEN);
        this.emit("drain", 0);
      }
    });

    // Close event
    this.socket.on("close", () => {
      this.handleClose();
    });

    // Error event
    this.socket.on("error", (err: Error) => {
      this.emit("error", {
        type: "transport",
        reason: err.message,
        fatal: true,
      });
      this.close();
    });
  }

  /**
   * Handle incoming data chunk
   *
   * Chunks are only joined once enough bytes have arrived for the next
   * length prefix, header or whole frame.
   */
  private onData(chunk: Buffer): void {
    this.recvChunks.push(chunk);
    this.recvLength += chunk.length;
    if (this.recvLength >= this.recvNeeded) {
      this.parse();
    }
  }

  /**
   * Incremental frame parser
   *
   * Extracts complete frames from the receive buffer.
   * Handles fragmentation and frame coalescing.
   */
  private parse(): void {
    let buffer =
      this.recvChunks.length === 1
        ? this.recvChunks[0]
        : Buffer.concat(this.recvChunks, this.recvLength);

    while (this.isReadable()) {
      const result = extractFrame(buffer);

      if (!result) {
        break;
      }

      if (!result.ok) {
        this.resetReceive();
        this.emit("error", {
          type: "protocol",
          reason: result.error.message,
          fatal: isFatalErrorCode(result.error.code),
          code: result.error.code,
        });
        // The stream is out of sync; no later byte can be framed
        this.close();
        return;
      }

      const { frame, remaining } = result.value;
      buffer = remaining;
      this.framesReceived++;

      if (frame.type === FrameType.HEARTBEAT) {
        this.lastHeartbeatAt = Date.now();
        this.emit("heartbeat", this.lastHeartbeatAt, frame);
      }

      // Emit decoded frame for higher layers
      this.emit("frame", frame);
    }

    this.recvChunks = buffer.length > 0 ? [buffer] : [];
    this.recvLength = buffer.length;
    this.recvNeeded = bytesNeeded(buffer);
  }

  private resetReceive(): void {
    this.recvChunks = [];
    this.recvLength = 0;
    this.recvNeeded = LENGTH_FIELD_SIZE;
  }

  private isReadable(): boolean {
    return (
      this.state === ConnectionState.OPEN ||
      this.state === ConnectionState.DRAINING
    );
  }

  /**
   * Send a frame to the peer
   *
   * The frame is encoded into one buffer and written in a single call, so a
   * frame is never interleaved with another.
   *
   * @returns Whether the frame was handed to the socket
   */
  send(frame: Frame): boolean {
    if (
      this.state !== ConnectionState.OPEN &&
      this.state !== ConnectionState.DRAINING
    ) {
      // Silently drop if not in writable state
      return false;
    }

    const encoded = encodeFrame(frame);
    if (!encoded.ok) {
      this.emit("error", {
        type: "protocol",
        reason: encoded.error.message,
        fatal: false,
        code: encoded.error.code,
      });
      return false;
    }

    const buffer = encoded.value;
    this.bytesSent += buffer.length;
    this.framesSent++;

    const canWrite = this.socket.write(buffer);

    if (!canWrite && this.state === ConnectionState.OPEN) {
      this.transition(ConnectionState.DRAINING);
    }

    return true;
  }

  /**
   * Close the connection gracefully
   */
  close(): void {
    if (
      this.state === ConnectionState.CLOSING ||
      this.state === ConnectionState.CLOSED
    ) {
      return;
    }

    this.transition(ConnectionState.CLOSING);
    this.socket.end();
  }

  /**
   * Handle socket close event
   */
  private handleClose(): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.transition(ConnectionState.CLOSED);
    this.emit("close", {
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      framesSent: this.framesSent,
      framesReceived: this.framesReceived,
    });
  }

  /**
   * Transition to a new state
   */
  private transition(next: ConnectionState): void {
    if (this.state === next) return;

    // Enforce state machine rules
    const allowed = this.isTransitionAllowed(this.state, next);
    if (!allowed) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    const previous = this.state;
    this.state = next;
    this.emit("state", next, previous);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(
    from: ConnectionState,
    to: ConnectionState
  ): boolean {
    const transitions: Record<ConnectionState, ConnectionState[]> = {
      [ConnectionState.INIT]: [ConnectionState.OPEN],
      [ConnectionState.OPEN]: [
        ConnectionState.DRAINING,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.DRAINING]: [
        ConnectionState.OPEN,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.CLOSING]: [ConnectionState.CLOSED],
      [ConnectionState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Get connection statistics
   */
  getStats() {
    return {
      connectionId: this.connectionId,
      state: this.state,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      framesSent: this.framesSent,
      framesReceived: this.framesReceived,
      lastHeartbeatAt: this.lastHeartbeatAt,
      bufferSize: this.recvLength,
    };
  }
}

/**
 * Buffered size at which the next frame can make progress: the length
 * prefix, then the fixed header, then the whole frame
 */
function bytesNeeded(buffer: Buffer): number {
  if (buffer.length < LENGTH_FIELD_SIZE) return LENGTH_FIELD_SIZE;
  if (buffer.length < LENGTH_FIELD_SIZE + HEADER_SIZE) {
    return LENGTH_FIELD_SIZE + HEADER_SIZE;
  }
  return LENGTH_FIELD_SIZE + buffer.readUInt32BE(0);
}
