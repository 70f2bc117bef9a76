/**
 * Logger Utility
 * Handles console output with different log levels
 */

import type { LoggingConfig } from "../types/config";

export type LogLevel = LoggingConfig["level"];

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(private level: LogLevel = "info") {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.log(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.warn(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: Error): void {
    console.error(`[ERROR] ${message}`);
    if (error?.cause !== undefined) {
      console.error(error.cause);
    }
  }
}
