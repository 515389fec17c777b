// File: src/core/logger.ts
import winston from "winston";
import chalk, { type ChalkInstance } from "chalk";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogger, LogLevel } from "../types/logger.ts";
import { loadConfig } from "./config.ts";

/**
 * Acceptable color strings for the custom log levels.
 */
type ChalkColor = "red" | "blue" | "green" | "cyan" | "yellow" | "white";

/**
 * Create a typed map of chalk color functions.
 */
const chalkMethods: Record<ChalkColor, ChalkInstance> = {
  red: chalk.red,
  blue: chalk.blue,
  green: chalk.green,
  cyan: chalk.cyan,
  yellow: chalk.yellow,
  white: chalk.white,
};

const logLevels: { levels: Record<LogLevel, number>; colors: Record<string, ChalkColor> } = {
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    impt: 3,
    attn: 4,
  },
  colors: {
    error: "red",
    warn: "yellow",
    info: "green",
    impt: "blue",
    attn: "cyan",
  },
};

export interface LoggerOptions {
  /** Plain-text log file; console only when omitted. */
  logFilePath?: string;
  /** Most verbose level that is emitted. Default `info`. */
  level?: LogLevel;
}

/**
 * Logger with a colored console transport (on stderr, so it never mixes
 * with pipeline output written to stdout) and an optional file transport.
 */
export class Logger implements ILogger {
  private logger: winston.Logger;

  /**
   * @param opts.logFilePath - When set, its directory is created and every
   *   entry is also appended there, timestamped and without ANSI codes.
   */
  constructor(opts: LoggerOptions = {}) {
    winston.addColors(logLevels.colors);

    const consoleTransport = new winston.transports.Console({
      stderrLevels: Object.keys(logLevels.levels),
      format: winston.format.printf(({ level, message }: winston.Logform.TransformableInfo) => {
        const colorKey = logLevels.colors[level] || "white";
        const colourFn = chalkMethods[colorKey] || chalk.white;
        const plainMessage = this.stripConsoleFormatting(
          typeof message === "string" ? message : JSON.stringify(message, null, 2),
        );
        return `${colourFn(`[${level.toUpperCase()}]`)} ${plainMessage}`;
      }),
    });

    const fileTransport = opts.logFilePath ? this.createFileTransport(opts.logFilePath) : undefined;

    this.logger = winston.createLogger({
      levels: logLevels.levels,
      level: opts.level ?? "info",
      transports: fileTransport ? [consoleTransport, fileTransport] : [consoleTransport],
    });
  }

  attn(...args: unknown[]): void {
    this.log("attn", ...args);
  }

  impt(...args: unknown[]): void {
    this.log("impt", ...args);
  }

  info(...args: unknown[]): void {
    this.log("info", ...args);
  }

  warn(...args: unknown[]): void {
    this.log("warn", ...args);
  }

  error(...args: unknown[]): void {
    this.log("error", ...args);
  }

  /** Ends the logger; resolves once every transport has finished. */
  close(): Promise<void> {
    const finished = this.logger.transports.map(
      (transport) => new Promise<void>((resolve) => transport.once("finish", () => resolve())),
    );
    this.logger.end();
    return Promise.all(finished).then(() => undefined);
  }

  private createFileTransport(logFilePath: string) {
    mkdirSync(dirname(logFilePath), { recursive: true });
    return new winston.transports.File({
      filename: logFilePath,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(({ level, message, timestamp }: winston.Logform.TransformableInfo) => {
          const formattedMessage = this.formatForPlainTransport(message);
          return `${String(timestamp)} [${level.toUpperCase()}] ${formattedMessage}`;
        }),
      ),
    });
  }

  private log(level: string, ...args: unknown[]): void {
    this.logger.log({ level, message: this.stringifyMessage(args) });
  }

  /**
   * Removes ANSI escape codes used for console formatting from a given string.
   */
  private stripConsoleFormatting(message: string): string {
    return message.replace(
      // eslint-disable-next-line no-control-regex
      /[\u001b\u009b][[()#;?]*(?:(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><])*[m]/g,
      "",
    );
  }

  /**
   * Strings lose their console formatting; anything else becomes indented JSON.
   */
  private formatForPlainTransport(message: unknown): string {
    return typeof message === "string" ? this.stripConsoleFormatting(message) : JSON.stringify(message, null, 2);
  }

  /**
   * Joins the arguments with spaces; non-strings are JSON-stringified with indentation.
   */
  private stringifyMessage(args: unknown[]): string {
    return args.map((arg) => (typeof arg === "string" ? arg : JSON.stringify(arg, null, 2))).join(" ");
  }
}

let sharedLogger: Logger | undefined;

/** Process-wide logger configured from `RECCHAIN_LOG_LEVEL` and `RECCHAIN_LOG_PATH`. */
export function defaultLogger(): Logger {
  if (!sharedLogger) {
    const config = loadConfig();
    sharedLogger = new Logger({ level: config.logLevel, logFilePath: config.logPath });
  }
  return sharedLogger;
}
