import type { LogLevel } from "../types/logger.ts";
import { getEnv } from "./env.ts";

export interface ChainConfig {
  logLevel: LogLevel;
  /** File transport path; no file logging when undefined. */
  logPath: string | undefined;
  /** Last-stage name prefix that marks a text-producing pipeline. */
  textStagePrefix: string;
  /** Names carrying the prefix that still produce records. */
  recordStageNames: string[];
  hostFunctionComments: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "impt", "attn"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Reads the `RECCHAIN_*` environment, applying defaults for anything unset. */
export function loadConfig(): ChainConfig {
  const level = getEnv("RECCHAIN_LOG_LEVEL", "warn").trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Invalid RECCHAIN_LOG_LEVEL: ${level} (expected one of ${LOG_LEVELS.join(", ")})`);
  }
  const logPath = getEnv("RECCHAIN_LOG_PATH", "").trim();

  return {
    logLevel: level,
    logPath: logPath === "" ? undefined : logPath,
    textStagePrefix: getEnv("RECCHAIN_TEXT_PREFIX", "to"),
    recordStageNames: splitList(getEnv("RECCHAIN_RECORD_STAGES", "topn")),
    hostFunctionComments: !["0", "false", "no", "off"].includes(
      getEnv("RECCHAIN_HOST_COMMENTS", "1").trim().toLowerCase(),
    ),
  };
}

/**
 * Result-policy predicate: a pipeline whose last stage matches returns text.
 * The defaults match `totable` and `tojson` but not `topn`.
 */
export function textStagePredicate(
  prefix: string,
  recordStageNames: readonly string[] = [],
): (name: string) => boolean {
  const exceptions = new Set(recordStageNames);
  return (name) => name.startsWith(prefix) && !exceptions.has(name);
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
