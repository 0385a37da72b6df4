import { createServer, Server as NetServer, Socket } from "net";
import type { Duplex } from "stream";
import { ConnectionManager } from "../../../packages/transport/src/connection/connectionManager.js";
import {
  Connection,
  ConnectionState,
  type ConnectionError,
} from "../../../packages/transport/src/connection/connection.js";
import {
  FLAG_ACK,
  FrameType,
  STREAM_ID_CONTROL,
} from "../../../packages/protocol/src/constants.js";
import { createFrame } from "../../../packages/protocol/src/frame.js";
import { isAck, isControlFrame } from "../../../packages/protocol/src/predicates.js";
import { newProtocolError } from "../../../packages/protocol/src/errors.js";
import type { Frame } from "../../../packages/protocol/src/types.js";
import { config as defaultConfig, type ServerConfig } from "./config.js";
import { logger as defaultLogger, type Logger } from "./observability/logger.js";
import { metrics as defaultMetrics, type Metrics } from "./observability/metrics.js";

export type FrameHandler = (connection: Connection, frame: Frame) => void;

export type TunnelServerOptions = {
  config?: ServerConfig;
  logger?: Logger;
  metrics?: Metrics;
};

/**
 * Tunnel edge server
 *
 * Core responsibilities:
 * - Accept TCP connections from agents
 * - Wire up Connection instances
 * - Answer heartbeats on the control stream
 * - Hand every other frame to the registered frame handlers
 */
export class TunnelServer {
  private server: NetServer;
  private connectionManager: ConnectionManager;
  private frameHandlers: Set<FrameHandler> = new Set();
  private config: ServerConfig;
  private logger: Logger;
  private metrics: Metrics;

  constructor(options: TunnelServerOptions = {}) {
    this.config = options.config ?? defaultConfig;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.connectionManager = new ConnectionManager();
    this.server = createServer((socket) => this.handleSocket(socket));
  }

  /**
   * Start the server
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off("error", reject);
        this.logger.info(
          `Tunnel server listening on ${this.config.host}:${this.config.port}`
        );
        if (this.config.debug) {
          this.logger.info("Debug mode enabled (RTUN_DEBUG=1)");
        }
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.logger.info("Shutting down tunnel server...");

      this.metrics.print();
      this.connectionManager.closeAll();

      if (!this.server.listening) {
        resolve();
        return;
      }

      this.server.close((err) => {
        if (err) {
          reject(err);
        } else {
          this.logger.info("Server stopped");
          resolve();
        }
      });
    });
  }

  /**
   * Register a handler for every non-heartbeat frame
   *
   * @returns A function that removes the handler
   */
  onFrame(handler: FrameHandler): () => void {
    this.frameHandlers.add(handler);
    return () => {
      this.frameHandlers.delete(handler);
    };
  }

  private handleSocket(socket: Socket): void {
    this.attach(socket, { remoteAddress: socket.remoteAddress });
  }

  /**
   * Serve the framing protocol over any byte stream
   */
  attach(stream: Duplex, meta?: Record<string, unknown>): Connection {
    const connection = this.connectionManager.createConnection(stream);
    const id = connection.connectionId;

    this.metrics.connectionOpened();
    this.logger.connection(id, "Connected", meta);

    connection.on("frame", (frame) => {
      this.logger.frame(id, "in", frame);
      this.metrics.frameReceived(frame.type);
      this.handleFrame(connection, frame);
    });

    connection.on("error", (error) => this.handleError(id, error));

    connection.on("state", (state, previous) => {
      this.logger.stateTransition(id, previous, state);
      if (state === ConnectionState.DRAINING) {
        this.logger.backpressure(id, "detected");
      }
    });

    connection.on("drain", () => {
      this.logger.backpressure(id, "relieved");
    });

    connection.on("close", (stats) => {
      this.metrics.connectionClosed();
      this.metrics.bytesSent(stats.bytesSent);
      this.metrics.bytesReceived(stats.bytesReceived);

      this.logger.connection(id, "Closed", {
        sent: `${stats.bytesSent}B`,
        received: `${stats.bytesReceived}B`,
        framesSent: stats.framesSent,
        framesReceived: stats.framesReceived,
      });
    });

    return connection;
  }

  private handleFrame(connection: Connection, frame: Frame): void {
    if (frame.type === FrameType.HEARTBEAT && isControlFrame(frame)) {
      if (!isAck(frame)) {
        this.replyHeartbeat(connection, frame);
      }
      return;
    }

    if (this.frameHandlers.size === 0) {
      this.logger.debug(
        `[${connection.connectionId}] No handler for ${FrameType[frame.type]} on stream ${frame.streamId}`
      );
      return;
    }

    for (const handler of this.frameHandlers) {
      try {
        handler(connection, frame);
      } catch (err) {
        this.logger.error(`[${connection.connectionId}] Handler error`, {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  private replyHeartbeat(connection: Connection, frame: Frame): void {
    const ack = createFrame(
      FrameType.HEARTBEAT,
      STREAM_ID_CONTROL,
      frame.payload,
      FLAG_ACK
    );
    if (connection.send(ack)) {
      this.logger.frame(connection.connectionId, "out", ack);
      this.metrics.heartbeatAnswered();
    }
  }

  private handleError(connectionId: string, error: ConnectionError): void {
    if (error.code !== undefined) {
      this.metrics.protocolError(error.code);
      this.logger.protocolError(
        connectionId,
        newProtocolError(error.code, error.reason),
        error.fatal
      );
      return;
    }

    this.logger.error(`[${connectionId}] Error: ${error.reason}`, {
      type: error.type,
      fatal: error.fatal,
    });
  }

  /**
   * Get server stats
   */
  getStats() {
    return {
      connections: this.connectionManager.getConnectionCount(),
      closed: this.connectionManager.getClosedTotals(),
    };
  }
}
