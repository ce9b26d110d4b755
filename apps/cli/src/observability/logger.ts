/**
 * Centralized logging with debug mode support
 *
 * Everything goes to stderr; stdout carries the data being piped.
 */

import { config } from "../config.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  ERROR = "ERROR",
}

class Logger {
  private debugEnabled: boolean;

  constructor() {
    this.debugEnabled = config.debug;
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
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${this.timestamp()}] [${level}] ${message}${metaStr}`;
  }

  /**
   * Debug logs (only when CHUNKER_DEBUG=1)
   */
  debug(message: string, meta?: unknown): void {
    if (this.debugEnabled) {
      console.error(this.format(LogLevel.DEBUG, message, meta));
    }
  }

  info(message: string, meta?: unknown): void {
    console.error(this.format(LogLevel.INFO, message, meta));
  }

  error(message: string, meta?: unknown): void {
    console.error(this.format(LogLevel.ERROR, message, meta));
  }

  /**
   * Log one datagram passing through (debug only)
   */
  datagram(direction: "in" | "out", index: number, size: number, limit: number): void {
    if (!this.debugEnabled) return;

    this.debug(`Datagram #${index} ${direction}`, {
      size: `${size}B`,
      fill: `${((size / limit) * 100).toFixed(1)}%`,
    });
  }

  /**
   * Log session state transition (debug only)
   */
  stateTransition(sessionId: string, to: string): void {
    if (!this.debugEnabled) return;

    this.debug(`[${sessionId}] State → ${to}`);
  }
}

export const logger = new Logger();
