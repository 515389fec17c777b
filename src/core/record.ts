import type { PlainRecord } from "../types/stream.ts";
import { RecordParseError } from "./errors.ts";

/**
 * One record flowing through a chain: an ordered mapping of field name to
 * value. Field order is insertion order for every key, including
 * integer-like ones, which a plain object would reorder.
 */
export class StreamRecord {
  private readonly fields: Map<string, unknown>;

  constructor(fields?: PlainRecord | Iterable<readonly [string, unknown]>) {
    this.fields = new Map();
    if (fields === undefined) return;
    const entries = isIterable(fields) ? fields : Object.entries(fields);
    for (const [key, value] of entries) {
      this.fields.set(key, value);
    }
  }

  /**
   * Parses one JSON object line.
   * @param source - name of the input the line came from, for the error message
   */
  static fromJSON(line: string, source?: string): StreamRecord {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      throw new RecordParseError(line, source, err);
    }
    if (!isPlainRecord(parsed)) {
      throw new RecordParseError(line, source);
    }
    return new StreamRecord(parsed);
  }

  get size(): number {
    return this.fields.size;
  }

  get(field: string): unknown {
    return this.fields.get(field);
  }

  set(field: string, value: unknown): this {
    this.fields.set(field, value);
    return this;
  }

  has(field: string): boolean {
    return this.fields.has(field);
  }

  delete(field: string): boolean {
    return this.fields.delete(field);
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  entries(): Array<[string, unknown]> {
    return [...this.fields.entries()];
  }

  clone(): StreamRecord {
    return new StreamRecord(this.fields);
  }

  /** Shallow copy as a plain object; nested values are shared. */
  toPlain(): PlainRecord {
    return Object.fromEntries(this.fields);
  }

  toJSON(): PlainRecord {
    return this.toPlain();
  }

  /** The record as one JSON line, fields in record order. */
  serialize(): string {
    let out = "{";
    let first = true;
    for (const [key, value] of this.fields) {
      if (value === undefined || typeof value === "function" || typeof value === "symbol") continue;
      out += `${first ? "" : ","}${JSON.stringify(key)}:${JSON.stringify(value)}`;
      first = false;
    }
    return `${out}}`;
  }
}

export function isPlainRecord(value: unknown): value is PlainRecord {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isIterable(value: unknown): value is Iterable<readonly [string, unknown]> {
  return typeof value === "object" && value !== null && Symbol.iterator in value;
}
