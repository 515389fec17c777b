import { describe, expect, it } from "vitest";
import { RecordParseError } from "../core/errors.ts";
import { StreamRecord, isPlainRecord } from "../core/record.ts";

describe("StreamRecord", () => {
  it("keeps insertion order for every key", () => {
    const record = new StreamRecord([
      ["b", 1],
      ["10", 2],
      ["a", 3],
      ["2", 4],
    ]);
    expect(record.keys()).toEqual(["b", "10", "a", "2"]);
    expect(record.serialize()).toBe('{"b":1,"10":2,"a":3,"2":4}');
  });

  it("reads, writes and deletes fields", () => {
    const record = new StreamRecord({ name: "x" });
    record.set("age", 3).set("name", "y");

    expect(record.get("name")).toBe("y");
    expect(record.has("age")).toBe(true);
    expect(record.delete("age")).toBe(true);
    expect(record.has("age")).toBe(false);
    expect(record.size).toBe(1);
  });

  it("converts to a plain object without sharing the field map", () => {
    const nested = { deep: true };
    const record = new StreamRecord({ a: 1, n: nested });
    const plain = record.toPlain();
    plain.a = 2;

    expect(record.get("a")).toBe(1);
    expect(plain.n).toBe(nested);
    expect(JSON.stringify(record)).toBe('{"a":1,"n":{"deep":true}}');
  });

  it("skips values JSON cannot carry when serializing", () => {
    const record = new StreamRecord({ a: 1, b: undefined, c: () => 1, d: null });
    expect(record.serialize()).toBe('{"a":1,"d":null}');
  });

  it("clones independently", () => {
    const record = new StreamRecord({ a: 1 });
    const copy = record.clone().set("a", 2);
    expect(record.get("a")).toBe(1);
    expect(copy.get("a")).toBe(2);
  });

  describe("fromJSON", () => {
    it("parses one JSON object line", () => {
      const record = StreamRecord.fromJSON('{"x":1,"y":[1,2]}');
      expect(record.toPlain()).toEqual({ x: 1, y: [1, 2] });
    });

    it("rejects invalid JSON, naming the source", () => {
      expect(() => StreamRecord.fromJSON("not json", "input.jsonl")).toThrow(RecordParseError);
      expect(() => StreamRecord.fromJSON("not json", "input.jsonl")).toThrow(
        "Cannot parse record (from input.jsonl): not json",
      );
    });

    it("rejects JSON that is not an object", () => {
      expect(() => StreamRecord.fromJSON("[1,2]")).toThrow("Cannot parse record: [1,2]");
      expect(() => StreamRecord.fromJSON("42")).toThrow(RecordParseError);
    });
  });
});

describe("isPlainRecord", () => {
  it("accepts plain objects only", () => {
    expect(isPlainRecord({})).toBe(true);
    expect(isPlainRecord(Object.create(null))).toBe(true);
    expect(isPlainRecord([])).toBe(false);
    expect(isPlainRecord(null)).toBe(false);
    expect(isPlainRecord(new Date())).toBe(false);
    expect(isPlainRecord("x")).toBe(false);
  });
});
