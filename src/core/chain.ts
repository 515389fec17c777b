/**
 * Compiled chains.
 *
 * A pipeline's stage calls are folded tail-first into linked `ChainNode`s
 * ending in one sink. Nothing is instantiated until `run`: each stage is
 * built with its downstream already in hand, because stages push to their
 * downstream rather than being pulled from.
 */

import type { ILogger } from "../types/logger.ts";
import type { RunInput, Stage, StageCall, StreamReceiver } from "../types/stream.ts";
import type { StageCatalog } from "./catalog.ts";
import type { HostFunctionRegistry } from "./host-functions.ts";
import type { Sink } from "./sinks.ts";
import { InputRequiredError, UnknownStageError } from "./errors.ts";
import { StreamRecord } from "./record.ts";

export type Downstream = ChainNode | Sink;

/** Everything a chain needs from its runner to instantiate stages. */
export interface ChainEnvironment {
  catalog: StageCatalog;
  hosts: HostFunctionRegistry;
  logger: ILogger;
}

/** Mutable per-run state shared by the driving loop and the stages. */
export interface RunState {
  sourceName: string | undefined;
}

export class ChainNode {
  readonly call: StageCall;
  readonly next: Downstream;

  constructor(call: StageCall, next: Downstream) {
    this.call = call;
    this.next = next;
  }

  get name(): string {
    return this.call.name;
  }

  /**
   * Builds this node's stage and, before it, every stage downstream.
   * Unknown names fail here, not when the pipeline was declared.
   */
  instantiate(env: ChainEnvironment, state: RunState): Stage {
    const next: StreamReceiver = this.next instanceof ChainNode ? this.next.instantiate(env, state) : this.next;
    const factory = env.catalog.resolve(this.call.name);
    if (!factory) throw new UnknownStageError(this.call.name);

    const args = this.call.args.map((arg) => env.hosts.bridgeArg(arg));
    return factory({
      name: this.call.name,
      args,
      next,
      hosts: env.hosts,
      logger: env.logger,
      currentSource: () => state.sourceName,
    });
  }

  /** Walks the chain to its terminal sink. */
  outputSink(): Sink {
    return this.next instanceof ChainNode ? this.next.outputSink() : this.next;
  }

  /** Instantiates the chain, drives `input` through it and returns its sink. */
  run(env: ChainEnvironment, input?: RunInput): Sink {
    const state: RunState = { sourceName: undefined };
    try {
      const head = this.instantiate(env, state);
      drive(head, this.call.name, input, state, env.logger);
    } finally {
      closeOwnedInput(input);
    }
    return this.outputSink();
  }
}

/** Folds stage calls tail-first; an empty list compiles to the sink itself. */
export function compileChain(calls: readonly StageCall[], sink: Sink): Downstream {
  return calls.reduceRight<Downstream>((next, call) => new ChainNode(call, next), sink);
}

/**
 * Pushes `input` into `head` one unit at a time, then finishes it exactly
 * once. A `false` from the head stops feeding. An exception from a stage
 * propagates and skips `finish`. Closing the input is the caller's job.
 */
export function drive(
  head: Stage,
  label: string,
  input: RunInput | undefined,
  state: RunState,
  logger: ILogger,
): void {
  if (!head.wantsInput()) {
    if (input) logger.warn(`${label} generates its own input; the supplied ${input.kind} input is ignored`);
  } else if (!input) {
    throw new InputRequiredError(label);
  } else {
    feed(head, input, state);
  }
  head.finish();
}

/** Closes a stream input the run owns (`closeAfterRun`); anything else is left open. */
export function closeOwnedInput(input: RunInput | undefined): void {
  if (input?.kind === "stream" && input.closeAfterRun) input.source.close?.();
}

function feed(head: Stage, input: RunInput, state: RunState): void {
  switch (input.kind) {
    case "stream": {
      const { source } = input;
      state.sourceName = source.name;
      for (let line = source.readLine(); line !== undefined; line = source.readLine()) {
        if (!head.acceptLine(line)) break;
      }
      return;
    }
    case "lines":
      for (const line of input.lines) {
        if (!head.acceptLine(line)) break;
      }
      return;
    case "records":
      for (const fields of input.records) {
        if (!head.acceptRecord(new StreamRecord(fields))) break;
      }
      return;
  }
}
