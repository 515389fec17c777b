import { inspect } from "node:util";

function captureStackTrace(error: Error, ctor: Function): void {
  if (typeof Error.captureStackTrace === "function") {
    Error.captureStackTrace(error, ctor);
  }
}

export const ErrorCode = {
  UNKNOWN_STAGE: "UNKNOWN_STAGE",
  INPUT_REQUIRED: "INPUT_REQUIRED",
  UNSUPPORTED_INPUT: "UNSUPPORTED_INPUT",
  REGISTRATION_FAILED: "REGISTRATION_FAILED",
  IO_ERROR: "IO_ERROR",
  UNKNOWN_HOST_FUNCTION: "UNKNOWN_HOST_FUNCTION",
  INVALID_EXPRESSION: "INVALID_EXPRESSION",
  INVALID_STAGE_ARGUMENT: "INVALID_STAGE_ARGUMENT",
  RECORD_PARSE_FAILED: "RECORD_PARSE_FAILED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class of every error the chain engine raises.
 *
 * @example
 * ```typescript
 * try {
 *   recs().call("nope").run({ input: [] });
 * } catch (e) {
 *   if (e instanceof ChainError && e.code === ErrorCode.UNKNOWN_STAGE) {
 *     // ...
 *   }
 * }
 * ```
 */
export class ChainError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChainError";
    this.code = code;
  }
}

/** A stage name the catalog cannot resolve, raised while compiling a run. */
export class UnknownStageError extends ChainError {
  readonly stage: string;

  constructor(stage: string) {
    super(`Unknown stage: ${stage}`, ErrorCode.UNKNOWN_STAGE);
    this.name = "UnknownStageError";
    this.stage = stage;
    captureStackTrace(this, UnknownStageError);
  }
}

export class InputRequiredError extends ChainError {
  readonly stage: string;

  constructor(stage: string) {
    super(`Input required for ${stage}`, ErrorCode.INPUT_REQUIRED);
    this.name = "InputRequiredError";
    this.stage = stage;
    captureStackTrace(this, InputRequiredError);
  }
}

export class UnsupportedInputError extends ChainError {
  constructor(value: unknown) {
    super(
      `Unknown input: ${inspect(value, { depth: 2, breakLength: Infinity })}`,
      ErrorCode.UNSUPPORTED_INPUT,
    );
    this.name = "UnsupportedInputError";
    captureStackTrace(this, UnsupportedInputError);
  }
}

export class RegistrationError extends ChainError {
  constructor(message: string) {
    super(message, ErrorCode.REGISTRATION_FAILED);
    this.name = "RegistrationError";
    captureStackTrace(this, RegistrationError);
  }
}

/** Failure opening, reading, writing or closing a source or destination. */
export class ChainIOError extends ChainError {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, ErrorCode.IO_ERROR, { cause });
    this.name = "ChainIOError";
    captureStackTrace(this, ChainIOError);
  }
}

export class UnknownHostFunctionError extends ChainError {
  readonly token: string;

  constructor(token: string) {
    super(`No host function registered under ${token}`, ErrorCode.UNKNOWN_HOST_FUNCTION);
    this.name = "UnknownHostFunctionError";
    this.token = token;
    captureStackTrace(this, UnknownHostFunctionError);
  }
}

export class ExpressionError extends ChainError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_EXPRESSION);
    this.name = "ExpressionError";
    captureStackTrace(this, ExpressionError);
  }
}

export class StageArgumentError extends ChainError {
  readonly stage: string;

  constructor(stage: string, message: string) {
    super(`${stage}: ${message}`, ErrorCode.INVALID_STAGE_ARGUMENT);
    this.name = "StageArgumentError";
    this.stage = stage;
    captureStackTrace(this, StageArgumentError);
  }
}

export class RecordParseError extends ChainError {
  readonly source: string | undefined;

  constructor(line: string, source: string | undefined, cause?: unknown) {
    const where = source === undefined ? "" : ` (from ${source})`;
    super(`Cannot parse record${where}: ${line}`, ErrorCode.RECORD_PARSE_FAILED, { cause });
    this.name = "RecordParseError";
    this.source = source;
    captureStackTrace(this, RecordParseError);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
