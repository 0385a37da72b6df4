import type { Duplex } from "stream";
import { EventEmitter } from "events";
import { Connection, type ConnectionCloseStats } from "./connection.js";

export interface ConnectionManagerEvents {
  connectionCreated: (connection: Connection) => void;
  connectionClosed: (connectionId: string, stats: ConnectionCloseStats) => void;
}

export declare interface ConnectionManager {
  on<E extends keyof ConnectionManagerEvents>(
    event: E,
    listener: ConnectionManagerEvents[E]
  ): this;
  emit<E extends keyof ConnectionManagerEvents>(
    event: E,
    ...args: Parameters<ConnectionManagerEvents[E]>
  ): boolean;
}

/**
 * ConnectionManager tracks all live framed connections.
 *
 * Responsibilities:
 * - Assign unique connection IDs
 * - Track live connections and totals for closed ones
 * - Close everything on shutdown
 */
export class ConnectionManager extends EventEmitter {
  private connections: Map<string, Connection> = new Map();
  private nextId: number = 1;
  private closedTotals: ConnectionCloseStats = {
    bytesSent: 0,
    bytesReceived: 0,
    framesSent: 0,
    framesReceived: 0,
  };

  private readonly idPrefix: string;

  constructor(idPrefix: string = "conn") {
    super();
    this.idPrefix = idPrefix;
  }

  /**
   * Wrap a byte stream in a Connection and start tracking it
   */
  createConnection(socket: Duplex): Connection {
    const connectionId = `${this.idPrefix}-${this.nextId++}`;
    const connection = new Connection(socket, connectionId);

    this.connections.set(connectionId, connection);

    connection.on("close", (stats) => {
      this.connections.delete(connectionId);
      this.closedTotals.bytesSent += stats.bytesSent;
      this.closedTotals.bytesReceived += stats.bytesReceived;
      this.closedTotals.framesSent += stats.framesSent;
      this.closedTotals.framesReceived += stats.framesReceived;
      this.emit("connectionClosed", connectionId, stats);
    });

    this.emit("connectionCreated", connection);

    return connection;
  }

  getConnection(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  getAllConnections(): Connection[] {
    return Array.from(this.connections.values());
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  /**
   * Traffic totals of connections that have already closed
   */
  getClosedTotals(): ConnectionCloseStats {
    return { ...this.closedTotals };
  }

  /**
   * Close all connections
   */
  closeAll(): void {
    for (const connection of this.connections.values()) {
      connection.close();
    }
  }
}
