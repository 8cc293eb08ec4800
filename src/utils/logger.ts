/**
 * Logger Utility
 * Handles console output with different log levels
 */

import type { LogLevel } from "../types";

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  // Called before each line is written, e.g. to clear a spinner
  beforeWrite?: () => void;
}

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private options: LoggerOptions = {},
  ) {}

  debug(message: string): void {
    if (this.enabled("debug")) {
      this.options.beforeWrite?.();
      console.log(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      this.options.beforeWrite?.();
      console.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      this.options.beforeWrite?.();
      console.warn(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    this.options.beforeWrite?.();
    console.error(`[ERROR] ${message}`);
    if (error) {
      console.error(error);
    }
  }

  private enabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }
}
