// File: ./tests/logger.mock.ts

import type { ILogger } from "../types/logger.ts";

/**
 * MockLogger captures log messages for each log level, allowing assertions in tests.
 */
export class MockLogger implements ILogger {
  logs: Record<keyof ILogger, string[]> = {
    attn: [],
    impt: [],
    info: [],
    warn: [],
    error: [],
  };

  /**
   * Clears all captured log messages.
   */
  clear(): void {
    this.logs = { attn: [], impt: [], info: [], warn: [], error: [] };
  }

  attn(...args: unknown[]): void {
    this.logs.attn.push(this.formatArgs(args));
  }

  impt(...args: unknown[]): void {
    this.logs.impt.push(this.formatArgs(args));
  }

  info(...args: unknown[]): void {
    this.logs.info.push(this.formatArgs(args));
  }

  warn(...args: unknown[]): void {
    this.logs.warn.push(this.formatArgs(args));
  }

  error(...args: unknown[]): void {
    this.logs.error.push(this.formatArgs(args));
  }

  /**
   * Formats the log arguments into a single string.
   * Non-string arguments are stringified using JSON.stringify.
   */
  private formatArgs(args: unknown[]): string {
    return args.map((arg) => (typeof arg === "string" ? arg : JSON.stringify(arg, null, 2))).join(" ");
  }
}
