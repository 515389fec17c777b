import type { LineWriter, PlainRecord, Stage } from "../types/stream.ts";
import { ChainIOError } from "./errors.ts";
import { StreamRecord } from "./record.ts";

/**
 * Terminal consumer of a chain. A sink takes the same calls as a stage, so
 * it can stand anywhere a downstream is expected.
 */
export interface Sink extends Stage {
  readonly kind: "records" | "lines";
}

/** Collects plain copies of every record it receives. */
export class RecordSink implements Sink {
  readonly kind = "records";
  readonly records: PlainRecord[];

  constructor(records: PlainRecord[] = []) {
    this.records = records;
  }

  wantsInput(): boolean {
    return true;
  }

  acceptRecord(record: StreamRecord): boolean {
    this.records.push(record.toPlain());
    return true;
  }

  acceptLine(line: string): boolean {
    return this.acceptRecord(StreamRecord.fromJSON(line));
  }

  finish(): void {}
}

/**
 * Writes one line per call to a destination; records go out as JSON lines.
 * A `write` that throws becomes a `ChainIOError`. Errors a stream reports
 * later through its `'error'` event arrive after the run has returned, so
 * they stay with the caller, who owns the stream and its listeners.
 */
export class LineSink implements Sink {
  readonly kind = "lines";
  readonly destination: LineWriter;

  constructor(destination: LineWriter) {
    this.destination = destination;
  }

  wantsInput(): boolean {
    return true;
  }

  acceptLine(line: string): boolean {
    try {
      this.destination.write(`${line}\n`);
    } catch (err) {
      throw new ChainIOError("Unable to write to output", err);
    }
    return true;
  }

  acceptRecord(record: StreamRecord): boolean {
    return this.acceptLine(record.serialize());
  }

  finish(): void {}
}

/** In-memory destination; its text is readable once it has been closed. */
export class TextBuffer implements LineWriter {
  private readonly chunks: string[] = [];
  private closed = false;

  write(chunk: string): boolean {
    if (this.closed) {
      throw new ChainIOError("Unable to write: buffer is closed");
    }
    this.chunks.push(chunk);
    return true;
  }

  end(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  text(): string {
    if (!this.closed) {
      throw new ChainIOError("Unable to read: buffer is still open");
    }
    return this.chunks.join("");
  }
}
