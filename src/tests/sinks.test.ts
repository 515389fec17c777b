import { describe, expect, it } from "vitest";
import { ChainIOError, RecordParseError } from "../core/errors.ts";
import { StreamRecord } from "../core/record.ts";
import { LineSink, RecordSink, TextBuffer } from "../core/sinks.ts";

describe("RecordSink", () => {
  it("collects plain copies of records and parses lines", () => {
    const sink = new RecordSink();
    const record = new StreamRecord({ a: 1 });

    expect(sink.acceptRecord(record)).toBe(true);
    expect(sink.acceptLine('{"b":2}')).toBe(true);
    record.set("a", 99);

    expect(sink.records).toEqual([{ a: 1 }, { b: 2 }]);
    expect(sink.kind).toBe("records");
  });

  it("rejects lines that are not records", () => {
    expect(() => new RecordSink().acceptLine("plain text")).toThrow(RecordParseError);
  });
});

describe("LineSink", () => {
  it("writes lines and serialized records, one per line", () => {
    const buffer = new TextBuffer();
    const sink = new LineSink(buffer);

    sink.acceptLine("header");
    sink.acceptRecord(new StreamRecord([["z", 1], ["a", "x"]]));
    sink.finish();
    buffer.end();

    expect(buffer.text()).toBe('header\n{"z":1,"a":"x"}\n');
    expect(sink.kind).toBe("lines");
  });

  it("wraps destination failures", () => {
    const sink = new LineSink({
      write: () => {
        throw new Error("EPIPE");
      },
    });
    expect(() => sink.acceptLine("x")).toThrow(ChainIOError);
    expect(() => sink.acceptLine("x")).toThrow("Unable to write to output: EPIPE");
  });
});

describe("TextBuffer", () => {
  it("only yields its text once closed", () => {
    const buffer = new TextBuffer();
    buffer.write("a");
    expect(buffer.isClosed).toBe(false);
    expect(() => buffer.text()).toThrow("Unable to read: buffer is still open");

    buffer.end();
    expect(buffer.text()).toBe("a");
  });

  it("refuses writes after it is closed", () => {
    const buffer = new TextBuffer();
    buffer.end();
    expect(() => buffer.write("late")).toThrow(ChainIOError);
  });
});
