import { beforeEach, describe, expect, it } from "vitest";
import { pipeline } from "../core/pipeline.ts";
import type { PipelineExecutor, PipelineResult, RecordPipeline, RunParams } from "../core/pipeline.ts";
import { PipelineRunner } from "../core/runner.ts";
import { TextBuffer } from "../core/sinks.ts";
import type { LineWriter } from "../types/stream.ts";
import { MockLogger } from "./logger.mock.ts";
import { recordingCatalog } from "./stages.mock.ts";
import type { StageEvent } from "./stages.mock.ts";

describe("RecordPipeline builder", () => {
  let events: StageEvent[];
  let runner: PipelineRunner;

  beforeEach(() => {
    events = [];
    runner = new PipelineRunner({ catalog: recordingCatalog(events), logger: new MockLogger() });
  });

  it("starts empty", () => {
    const p = runner.recs();
    expect(p.stages).toEqual([]);
    expect(p.last()).toBeUndefined();
    expect(p.describe()).toBe("");
  });

  it("appends calls in order and never mutates the receiver", () => {
    const base = runner.recs().call("a");
    const left = base.call("b", "--x", "1");
    const right = base.call("c");

    expect(base.stages.map((s) => s.name)).toEqual(["a"]);
    expect(left.stages.map((s) => s.name)).toEqual(["a", "b"]);
    expect(right.stages.map((s) => s.name)).toEqual(["a", "c"]);
    expect(left.last()).toEqual({ name: "b", args: ["--x", "1"] });
  });

  it("freezes its stage list and each call", () => {
    const p = runner.recs().call("a", "--x");
    expect(Object.isFrozen(p.stages)).toBe(true);
    expect(Object.isFrozen(p.stages[0])).toBe(true);
    expect(Object.isFrozen(p.stages[0]?.args)).toBe(true);
  });

  it("accepts unknown stage names until it is run", () => {
    const p = runner.recs().call("does-not-exist");
    expect(p.stages).toHaveLength(1);
    expect(() => p.run({ input: [] })).toThrow("Unknown stage: does-not-exist");
  });

  it("concat runs the receiver's stages first", () => {
    const p = runner.recs().call("a").concat(runner.recs().call("b"));
    p.run({ input: [{ x: 1 }] });

    expect(events.filter((e) => e.kind === "record").map((e) => e.stage)).toEqual(["a", "b"]);
  });

  it("concat is associative", () => {
    const P = runner.recs().call("a");
    const Q = runner.recs().call("b");
    const R = runner.recs().call("c");
    const input = [{ x: 1 }, { x: 2 }];

    P.concat(Q).concat(R).run({ input });
    const leftEvents = [...events];
    events.length = 0;
    P.concat(Q.concat(R)).run({ input });

    expect(events).toEqual(leftEvents);
    expect(leftEvents.map((e) => e.stage)).toEqual(["a", "b", "c", "a", "b", "c", "a", "b", "c"]);
  });

  it("describes itself for logs", () => {
    const named = function adults() {
      return true;
    };
    const p = runner
      .recs()
      .call("grep", named)
      .call("sort", "--key", "income=-numeric")
      .call("grep", () => true)
      .call("totable", "--key", "first name");

    expect(p.describe()).toBe('grep <fn adults> | sort --key income=-numeric | grep <fn> | totable --key "first name"');
  });

  it("delegates run to its executor", () => {
    const executor = new StubExecutor();
    const p = pipeline(executor).call("a");
    const output = new TextBuffer();

    expect(p.run()).toEqual([]);
    expect(p.run({ output })).toBe(output);
    expect(executor.calls).toEqual([p, p]);
  });
});

class StubExecutor implements PipelineExecutor {
  readonly calls: RecordPipeline[] = [];

  run<W extends LineWriter>(definition: RecordPipeline, params: RunParams & { output: W }): W;
  run(definition: RecordPipeline, params?: RunParams): PipelineResult;
  run(definition: RecordPipeline, params: RunParams = {}): LineWriter | PipelineResult {
    this.calls.push(definition);
    return params.output ?? [];
  }
}
