import type { StreamRecord } from "../core/record.ts";
import type { ILogger } from "./logger.ts";

/** Plain (unwrapped) form of a record, as stored by a record-collecting sink. */
export type PlainRecord = Record<string, unknown>;

/** A caller-supplied closure used in place of a textual stage argument. */
export type HostFunction = (record: StreamRecord) => unknown;

/** A stage argument: literal configuration text, or a host closure to bridge. */
export type StageArg = string | HostFunction;

export interface StageCall {
  readonly name: string;
  readonly args: readonly StageArg[];
}

/**
 * What every downstream of a stage accepts. Both accept methods return
 * `false` to ask the caller to stop pushing.
 */
export interface StreamReceiver {
  acceptLine(line: string): boolean;
  acceptRecord(record: StreamRecord): boolean;
  finish(): void;
}

export interface Stage extends StreamReceiver {
  /** `false` for stages that produce their own records. */
  wantsInput(): boolean;
}

export interface HostFunctionResolver {
  resolve(token: string): HostFunction;
  evaluate(snippet: string, record: StreamRecord): unknown;
}

export interface StageContext {
  readonly name: string;
  /** Arguments with every host function already bridged into text. */
  readonly args: readonly string[];
  readonly next: StreamReceiver;
  readonly hosts: HostFunctionResolver;
  readonly logger: ILogger;
  /** Name of the source currently feeding the chain, for error messages. */
  currentSource(): string | undefined;
}

export type StageFactory = (ctx: StageContext) => Stage;

/** Anything text can be streamed into, such as a Node `Writable`. */
export interface LineWriter {
  write(chunk: string): unknown;
}

export interface LineSource {
  readonly name: string;
  /** Next line without its terminator, or `undefined` at end of input. */
  readLine(): string | undefined;
  close?(): void;
}

export type RunInput =
  | { readonly kind: "stream"; readonly source: LineSource; readonly closeAfterRun?: boolean }
  | { readonly kind: "lines"; readonly lines: readonly string[] }
  | { readonly kind: "records"; readonly records: readonly PlainRecord[] };
