/**
 * Immutable pipeline definitions.
 *
 * - `call(name, ...args)` appends one stage; execution order is call order.
 * - `concat(other)` runs the receiver's stages, then `other`'s.
 * - Every operation returns a new pipeline, so partial pipelines can be shared
 *   and branched freely.
 * - Nothing is validated here: stage names are resolved when a run compiles
 *   the definition.
 */

import type { LineSource, LineWriter, PlainRecord, RunInput, StageArg, StageCall } from "../types/stream.ts";

/** What `run` accepts as input: a tagged `RunInput`, or a raw value to classify. */
export type PipelineInput = RunInput | LineSource | readonly string[] | readonly PlainRecord[];

export interface RunParams {
  input?: PipelineInput;
  output?: LineWriter;
}

/** Formatted text, or the records of a pipeline that ends in a record stage. */
export type PipelineResult = string | PlainRecord[];

export interface PipelineExecutor {
  run<W extends LineWriter>(definition: RecordPipeline, params: RunParams & { output: W }): W;
  run(definition: RecordPipeline, params?: RunParams): PipelineResult;
}

export interface RecordPipeline {
  readonly stages: readonly StageCall[];
  call(name: string, ...args: StageArg[]): RecordPipeline;
  concat(next: RecordPipeline): RecordPipeline;
  /** The stage that runs last, which decides the shape of the result. */
  last(): StageCall | undefined;
  describe(): string;
  run<W extends LineWriter>(params: RunParams & { output: W }): W;
  run(params?: RunParams): PipelineResult;
}

/** Builds a pipeline bound to `executor`, which every `run` delegates to. */
export function pipeline(executor: PipelineExecutor, stages: readonly StageCall[] = []): RecordPipeline {
  const frozen: readonly StageCall[] = Object.freeze([...stages]);

  function run<W extends LineWriter>(params: RunParams & { output: W }): W;
  function run(params?: RunParams): PipelineResult;
  function run(params: RunParams = {}): LineWriter | PipelineResult {
    return executor.run(api, params);
  }

  const api: RecordPipeline = Object.freeze({
    stages: frozen,

    call(name: string, ...args: StageArg[]): RecordPipeline {
      const call: StageCall = Object.freeze({ name, args: Object.freeze([...args]) });
      return pipeline(executor, [...frozen, call]);
    },

    concat(next: RecordPipeline): RecordPipeline {
      return pipeline(executor, [...frozen, ...next.stages]);
    },

    last(): StageCall | undefined {
      return frozen[frozen.length - 1];
    },

    describe(): string {
      return frozen.map(describeCall).join(" | ");
    },

    run,
  });

  return api;
}

function describeCall(call: StageCall): string {
  return [call.name, ...call.args.map(describeArg)].join(" ");
}

function describeArg(arg: StageArg): string {
  if (typeof arg !== "string") return arg.name ? `<fn ${arg.name}>` : "<fn>";
  return /^[\w.,=:+\-/]+$/.test(arg) ? arg : JSON.stringify(arg);
}
