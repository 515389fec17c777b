export interface ILogger {
  attn(...args: unknown[]): void;
  impt(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export type LogLevel = keyof ILogger;
