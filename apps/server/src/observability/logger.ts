/**
 * Centralized logging with debug mode support
 */

import { config } from "../config.js";
import type { Frame } from "../../../../packages/protocol/src/types.js";
import { FrameType } from "../../../../packages/protocol/src/constants.js";
import { flagNames } from "../../../../packages/protocol/src/predicates.js";
import {
  errorCodeName,
  type ProtocolError,
} from "../../../../packages/protocol/src/errors.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export type FrameDirection = "in" | "out";

export class Logger {
  private debugEnabled: boolean;

  constructor(debugEnabled: boolean = config.debug) {
    this.debugEnabled = debugEnabled;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private format(level: LogLevel, message: string, meta?: unknown): string {
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${this.timestamp()}] [${level}] ${message}${metaStr}`;
  }

  /**
   * Debug logs (only when RTUN_DEBUG=1)
   */
  debug(message: string, meta?: unknown): void {
    if (this.debugEnabled) {
      console.log(this.format(LogLevel.DEBUG, message, meta));
    }
  }

  info(message: string, meta?: unknown): void {
    console.log(this.format(LogLevel.INFO, message, meta));
  }

  warn(message: string, meta?: unknown): void {
    console.warn(this.format(LogLevel.WARN, message, meta));
  }

  error(message: string, meta?: unknown): void {
    console.error(this.format(LogLevel.ERROR, message, meta));
  }

  /**
   * Log connection event
   */
  connection(connectionId: string, event: string, meta?: unknown): void {
    const message = `[${connectionId}] ${event}`;
    if (this.debugEnabled) {
      this.debug(message, meta);
    } else {
      this.info(message);
    }
  }

  /**
   * Log frame details (debug only)
   */
  frame(connectionId: string, direction: FrameDirection, frame: Frame): void {
    if (!this.debugEnabled) return;

    const typeName = FrameType[frame.type] ?? `UNKNOWN(${frame.type})`;

    this.debug(`[${connectionId}] ${direction} ${typeName}`, {
      streamId: frame.streamId,
      flags: `0b${frame.flags.toString(2).padStart(8, "0")}`,
      flagNames: flagNames(frame.flags),
      payloadSize: `${frame.payload.length}B`,
    });
  }

  /**
   * Log a decode/encode failure with its wire code; non-fatal ones as warnings
   */
  protocolError(connectionId: string, err: ProtocolError, fatal: boolean = true): void {
    const meta = { code: err.code, name: errorCodeName(err.code) };
    if (fatal) {
      this.error(`[${connectionId}] ${err.toString()}`, meta);
    } else {
      this.warn(`[${connectionId}] ${err.toString()}`, meta);
    }
  }

  /**
   * Log state transition (debug only)
   */
  stateTransition(connectionId: string, from: string, to: string): void {
    if (!this.debugEnabled) return;

    this.debug(`[${connectionId}] State: ${from} -> ${to}`);
  }

  /**
   * Log backpressure event (debug only)
   */
  backpressure(connectionId: string, event: "detected" | "relieved"): void {
    if (!this.debugEnabled) return;

    this.debug(`[${connectionId}] Backpressure ${event}`);
  }
}

export const logger = new Logger();
