/**
 * Centralized logging with debug mode support
 */

import { config } from "../config.js";
import type { RelayMessage } from "../../../../packages/protocol/src/message.js";
import type { Command } from "../../../../packages/protocol/src/commands.js";
import { hexAndAscii } from "../../../../packages/protocol/src/hexdump.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export class Logger {
  private debugEnabled: boolean;

  constructor(debugEnabled: boolean = config.debug) {
    this.debugEnabled = debugEnabled;
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  /**
   * Format timestamp
   */
  private timestamp(): string {
    return new Date().toISOString();
  }

  /**
   * Format log message
   */
  private format(level: LogLevel, message: string, meta?: unknown): string {
    const metaStr = meta ? ` ${JSON.stringify(meta, jsonReplacer)}` : "";
    return `[${this.timestamp()}] [${level}] ${message}${metaStr}`;
  }

  /**
   * Debug logs (only when WEERELAY_DEBUG=1)
   */
  debug(message: string, meta?: unknown): void {
    if (this.debugEnabled) {
      console.log(this.format(LogLevel.DEBUG, message, meta));
    }
  }

  /**
   * Info logs
   */
  info(message: string, meta?: unknown): void {
    console.log(this.format(LogLevel.INFO, message, meta));
  }

  /**
   * Warning logs
   */
  warn(message: string, meta?: unknown): void {
    console.warn(this.format(LogLevel.WARN, message, meta));
  }

  /**
   * Error logs
   */
  error(message: string, meta?: unknown): void {
    console.error(this.format(LogLevel.ERROR, message, meta));
  }

  /**
   * Log session event
   */
  session(sessionId: string, event: string, meta?: unknown): void {
    const message = `[${sessionId}] ${event}`;
    if (this.debugEnabled) {
      this.debug(message, meta);
    } else {
      this.info(message);
    }
  }

  /**
   * Log received message details (debug only)
   */
  message(sessionId: string, message: RelayMessage, raw?: Buffer): void {
    if (!this.debugEnabled) return;

    this.debug(`[${sessionId}] ← Message`, {
      id: message.id || "(push)",
      objects: message.objects.map((object) => object.type).join(","),
      size: message.compressed
        ? `${message.size}B/${message.uncompressedSize}B`
        : `${message.size}B`,
    });
    if (raw) {
      this.debug(`[${sessionId}] raw frame\n${hexAndAscii(raw, 20)}`);
    }
  }

  /**
   * Log sent command (debug only); init arguments are never written out
   */
  command(sessionId: string, command: Command): void {
    if (!this.debugEnabled) return;

    const args = command.name === "init" ? "***" : command.args;
    this.debug(`[${sessionId}] → ${command.id ? `(${command.id}) ` : ""}${command.name}`, {
      args,
    });
  }

  /**
   * Log state transition (debug only)
   */
  stateTransition(
    sessionId: string,
    from: string,
    to: string,
    reason?: string
  ): void {
    if (!this.debugEnabled) return;

    this.debug(
      `[${sessionId}] State: ${from} → ${to}`,
      reason ? { reason } : undefined
    );
  }
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export const logger = new Logger();
