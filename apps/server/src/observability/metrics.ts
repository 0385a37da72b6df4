/**
 * Server metrics tracking
 */

import { FrameType } from "../../../../packages/protocol/src/constants.js";
import { errorCodeName } from "../../../../packages/protocol/src/errors.js";

export type MetricsSnapshot = {
  uptime: string;
  connections: number;
  totalBytesSent: string;
  totalBytesReceived: string;
  framesReceived: number;
  framesByType: Record<string, number>;
  heartbeatsAnswered: number;
  protocolErrors: Record<string, number>;
};

export class Metrics {
  private connectionCount: number = 0;
  private totalBytesSent: number = 0;
  private totalBytesReceived: number = 0;
  private framesByType: Map<string, number> = new Map();
  private protocolErrors: Map<string, number> = new Map();
  private heartbeatsAnswered: number = 0;
  private startTime: number = Date.now();

  connectionOpened(): void {
    this.connectionCount++;
  }

  connectionClosed(): void {
    this.connectionCount = Math.max(0, this.connectionCount - 1);
  }

  bytesSent(bytes: number): void {
    this.totalBytesSent += bytes;
  }

  bytesReceived(bytes: number): void {
    this.totalBytesReceived += bytes;
  }

  /**
   * Count an inbound frame under its type name
   */
  frameReceived(type: number): void {
    const name = FrameType[type] ?? `UNKNOWN(${type})`;
    this.framesByType.set(name, (this.framesByType.get(name) ?? 0) + 1);
  }

  heartbeatAnswered(): void {
    this.heartbeatsAnswered++;
  }

  /**
   * Count a protocol error under its code name
   */
  protocolError(code: number): void {
    const name = errorCodeName(code);
    this.protocolErrors.set(name, (this.protocolErrors.get(name) ?? 0) + 1);
  }

  getSnapshot(): MetricsSnapshot {
    const uptimeSec = Math.floor((Date.now() - this.startTime) / 1000);
    let framesReceived = 0;
    for (const count of this.framesByType.values()) {
      framesReceived += count;
    }

    return {
      uptime: `${uptimeSec}s`,
      connections: this.connectionCount,
      totalBytesSent: formatBytes(this.totalBytesSent),
      totalBytesReceived: formatBytes(this.totalBytesReceived),
      framesReceived,
      framesByType: Object.fromEntries(this.framesByType),
      heartbeatsAnswered: this.heartbeatsAnswered,
      protocolErrors: Object.fromEntries(this.protocolErrors),
    };
  }

  /**
   * Print metrics to console
   */
  print(): void {
    const snapshot = this.getSnapshot();
    const byType = Object.entries(snapshot.framesByType)
      .map(([name, count]) => `${name}=${count}`)
      .join(" ");
    const errors = Object.entries(snapshot.protocolErrors)
      .map(([name, count]) => `${name}=${count}`)
      .join(" ");

    console.log("\nServer Metrics:");
    console.log(`  Uptime:              ${snapshot.uptime}`);
    console.log(`  Active Connections:  ${snapshot.connections}`);
    console.log(`  Bytes Sent:          ${snapshot.totalBytesSent}`);
    console.log(`  Bytes Received:      ${snapshot.totalBytesReceived}`);
    console.log(`  Frames Received:     ${snapshot.framesReceived} ${byType}`.trimEnd());
    console.log(`  Heartbeats Answered: ${snapshot.heartbeatsAnswered}`);
    console.log(`  Protocol Errors:     ${errors || "none"}`);
    console.log();
  }
}

/**
 * Format bytes to human-readable
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
}

export const metrics = new Metrics();
