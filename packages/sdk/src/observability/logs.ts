/**
 * Structured logging for attribute store operations
 */

import type { LogLevel } from "../types.js";

export type { LogLevel };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  type?: string;
  key?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

class Logger {
  #enabled = true;
  #minLevel: LogLevel = "info";

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled || !this.#shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.type || entry.key) {
      parts.push(`${entry.type ?? ""}/${entry.key ?? ""}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    switch (level) {
      case "debug":
        console.debug(parts.join(" "));
        break;
      case "info":
        console.log(parts.join(" "));
        break;
      case "warn":
        console.warn(parts.join(" "));
        break;
      case "error":
        console.error(parts.join(" "));
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  #shouldLog(level: LogLevel): boolean {
    // ATTRSTORE_DEBUG turns on debug output regardless of the configured level
    if (level === "debug" && process.env.ATTRSTORE_DEBUG) {
      return true;
    }
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
