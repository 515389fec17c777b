import { closeSync, openSync, readSync } from "node:fs";
import { StringDecoder } from "node:string_decoder";
import type { LineSource, PlainRecord, RunInput } from "../types/stream.ts";
import { ChainIOError, UnsupportedInputError } from "./errors.ts";
import { isPlainRecord } from "./record.ts";

const STDIN_FD = 0;
const READ_CHUNK_BYTES = 64 * 1024;

let streamCounter = 0;

function stripTerminator(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Synchronous, buffered line reader over a file descriptor. Reads one chunk
 * at a time, only when the buffered text holds no complete line. A source
 * made by `open` opens its file on the first read.
 */
export class FileLineSource implements LineSource {
  readonly name: string;
  private fd: number | undefined;
  private readonly path: string | undefined;
  private readonly ownsFd: boolean;
  private readonly chunk = Buffer.alloc(READ_CHUNK_BYTES);
  private readonly decoder = new StringDecoder("utf8");
  private buffered = "";
  private eof = false;
  private closed = false;

  constructor(target: number | string, opts: { name?: string; ownsFd?: boolean } = {}) {
    if (typeof target === "string") {
      this.fd = undefined;
      this.path = target;
      this.ownsFd = true;
      this.name = opts.name ?? target;
    } else {
      this.fd = target;
      this.path = undefined;
      this.ownsFd = opts.ownsFd ?? false;
      this.name = opts.name ?? (target === STDIN_FD ? "stdin" : `fd#${target}`);
    }
  }

  /** A source over the file at `path`, opened lazily and closed by `close`. */
  static open(path: string): FileLineSource {
    return new FileLineSource(path);
  }

  /** Whether the underlying descriptor is currently open. */
  get isOpen(): boolean {
    return this.fd !== undefined && !this.closed;
  }

  readLine(): string | undefined {
    for (;;) {
      const nl = this.buffered.indexOf("\n");
      if (nl >= 0) {
        const line = this.buffered.slice(0, nl);
        this.buffered = this.buffered.slice(nl + 1);
        return stripTerminator(line);
      }
      if (this.eof || this.closed) {
        if (this.buffered.length === 0) return undefined;
        const rest = this.buffered;
        this.buffered = "";
        return stripTerminator(rest);
      }
      this.fill();
    }
  }

  /** Closes the descriptor when this source opened it; a no-op otherwise. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.ownsFd || this.fd === undefined) return;
    try {
      closeSync(this.fd);
    } catch (err) {
      throw new ChainIOError(`Unable to close ${this.name}`, err);
    }
  }

  private descriptor(): number {
    if (this.fd !== undefined) return this.fd;
    const path = this.path ?? this.name;
    try {
      this.fd = openSync(path, "r");
    } catch (err) {
      throw new ChainIOError(`Unable to open ${path}`, err);
    }
    return this.fd;
  }

  private fill(): void {
    const fd = this.descriptor();
    let n: number;
    try {
      n = readSync(fd, this.chunk, 0, this.chunk.length, null);
    } catch (err) {
      throw new ChainIOError(`Unable to read ${this.name}`, err);
    }
    if (n === 0) {
      this.eof = true;
      this.buffered += this.decoder.end();
      return;
    }
    this.buffered += this.decoder.write(this.chunk.subarray(0, n));
  }
}

/** Pulls lines lazily from any iterable, such as a generator. */
export class IterableLineSource implements LineSource {
  readonly name: string;
  private readonly iterator: Iterator<string>;

  constructor(lines: Iterable<string>, name?: string) {
    this.iterator = lines[Symbol.iterator]();
    this.name = name ?? `stream#${++streamCounter}`;
  }

  readLine(): string | undefined {
    const next = this.iterator.next();
    if (next.done) return undefined;
    const line = next.value;
    return stripTerminator(line.endsWith("\n") ? line.slice(0, -1) : line);
  }

  close(): void {
    this.iterator.return?.();
  }
}

/* --------------------------------------------------------------------------
 * Input constructors
 * -------------------------------------------------------------------------- */

export function fromStream(source: LineSource | Iterable<string>, name?: string): RunInput {
  return { kind: "stream", source: isLineSource(source) ? source : new IterableLineSource(source, name) };
}

/** Reads a file line by line. The file is opened on the first read and closed when the run ends. */
export function fromFile(path: string): RunInput {
  return { kind: "stream", source: FileLineSource.open(path), closeAfterRun: true };
}

export function fromStdin(): RunInput {
  return { kind: "stream", source: new FileLineSource(STDIN_FD) };
}

export function fromLines(lines: readonly string[]): RunInput {
  return { kind: "lines", lines };
}

export function fromRecords(records: readonly PlainRecord[]): RunInput {
  return { kind: "records", records };
}

/* --------------------------------------------------------------------------
 * Shape detection for untyped callers
 * -------------------------------------------------------------------------- */

/**
 * Classifies a raw input value: a `RunInput` passes through, a line source
 * is a stream, an array of strings is lines, an array of plain objects is
 * records. An empty array counts as lines.
 */
export function adaptInput(value: unknown): RunInput {
  if (isRunInput(value)) return value;
  if (isLineSource(value)) return fromStream(value);
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    if (items.every((item): item is string => typeof item === "string")) {
      return fromLines(items);
    }
    if (items.every(isPlainRecord)) {
      return fromRecords(items);
    }
  }
  throw new UnsupportedInputError(value);
}

export function isLineSource(value: unknown): value is LineSource {
  return (
    typeof value === "object" &&
    value !== null &&
    "readLine" in value &&
    typeof value.readLine === "function" &&
    "name" in value &&
    typeof value.name === "string"
  );
}

export function isRunInput(value: unknown): value is RunInput {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false;
  switch (value.kind) {
    case "stream":
      return "source" in value && isLineSource(value.source);
    case "lines":
      return "lines" in value && Array.isArray(value.lines);
    case "records":
      return "records" in value && Array.isArray(value.records);
    default:
      return false;
  }
}
