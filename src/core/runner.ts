import type { ILogger } from "../types/logger.ts";
import type { LineWriter, PlainRecord } from "../types/stream.ts";
import { StageCatalog } from "./catalog.ts";
import { ChainNode, closeOwnedInput, compileChain, drive } from "./chain.ts";
import type { ChainEnvironment } from "./chain.ts";
import { loadConfig, textStagePredicate } from "./config.ts";
import { HostFunctionRegistry } from "./host-functions.ts";
import { adaptInput } from "./input.ts";
import { defaultLogger } from "./logger.ts";
import { pipeline } from "./pipeline.ts";
import type { PipelineExecutor, PipelineResult, RecordPipeline, RunParams } from "./pipeline.ts";
import { LineSink, RecordSink, TextBuffer } from "./sinks.ts";
import type { Sink } from "./sinks.ts";
import { createDefaultCatalog } from "./stages/index.ts";

export interface RunnerOptions {
  /** Stage names available to this runner's pipelines. Defaults to the built-in stages. */
  catalog?: StageCatalog;
  /** Registry host functions are bridged into. A fresh one per runner by default. */
  hosts?: HostFunctionRegistry;
  logger?: ILogger;
  /** Decides whether a pipeline ending in `name` returns text. Defaults from configuration. */
  isTextProducingStage?: (name: string) => boolean;
}

const EMPTY_PIPELINE = "(empty pipeline)";

/**
 * Compiles and runs pipelines. The result shape follows the run:
 *
 * 1. `output` given: lines stream into it and it is returned.
 * 2. Last stage is text-producing: lines collect in a buffer and its text is returned.
 * 3. Otherwise the records reaching the end are returned as plain objects.
 */
export class PipelineRunner implements PipelineExecutor {
  readonly catalog: StageCatalog;
  readonly hosts: HostFunctionRegistry;
  readonly logger: ILogger;
  readonly isTextProducingStage: (name: string) => boolean;

  constructor(opts: RunnerOptions = {}) {
    const needsConfig = !opts.hosts || !opts.isTextProducingStage;
    const config = needsConfig ? loadConfig() : undefined;

    this.catalog = opts.catalog ?? createDefaultCatalog();
    this.hosts = opts.hosts ?? new HostFunctionRegistry({ comments: config?.hostFunctionComments ?? true });
    this.logger = opts.logger ?? defaultLogger();
    this.isTextProducingStage =
      opts.isTextProducingStage ??
      textStagePredicate(config?.textStagePrefix ?? "to", config?.recordStageNames ?? ["topn"]);
  }

  /** An empty pipeline bound to this runner. */
  recs(): RecordPipeline {
    return pipeline(this);
  }

  run<W extends LineWriter>(definition: RecordPipeline, params: RunParams & { output: W }): W;
  run(definition: RecordPipeline, params?: RunParams): PipelineResult;
  run(definition: RecordPipeline, params: RunParams = {}): LineWriter | PipelineResult {
    const { output } = params;
    if (output !== undefined) {
      this.execute(definition, params, new LineSink(output));
      return output;
    }

    const last = definition.last();
    if (last && this.isTextProducingStage(last.name)) {
      const buffer = this.createBuffer();
      try {
        this.execute(definition, params, new LineSink(buffer));
      } finally {
        buffer.end();
      }
      return buffer.text();
    }

    const sink = new RecordSink();
    this.execute(definition, params, sink);
    return sink.records;
  }

  /** Runs `definition` and returns its records, whatever its last stage is. */
  records(definition: RecordPipeline, params: Omit<RunParams, "output"> = {}): PlainRecord[] {
    const sink = new RecordSink();
    this.execute(definition, params, sink);
    return sink.records;
  }

  /** Buffer a text-producing run collects into. It is ended on every exit path. */
  protected createBuffer(): TextBuffer {
    return new TextBuffer();
  }

  private execute(definition: RecordPipeline, params: RunParams, sink: Sink): void {
    const description = definition.describe() || EMPTY_PIPELINE;
    const env: ChainEnvironment = { catalog: this.catalog, hosts: this.hosts, logger: this.logger };

    try {
      const input = params.input === undefined ? undefined : adaptInput(params.input);
      const head = compileChain(definition.stages, sink);
      this.logger.info(`Running ${description} into a ${sink.kind} sink`);

      if (head instanceof ChainNode) {
        head.run(env, input);
      } else {
        try {
          drive(head, EMPTY_PIPELINE, input, { sourceName: undefined }, this.logger);
        } finally {
          closeOwnedInput(input);
        }
      }
    } catch (err) {
      this.logger.error(`Pipeline failed: ${description}: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }

    if (sink instanceof RecordSink) {
      this.logger.impt(`${description} produced ${sink.records.length} record(s)`);
    }
  }
}

let sharedRunner: PipelineRunner | undefined;

/** The runner behind `recs()`: built-in stages, shared registry, default logger. */
export function defaultRunner(): PipelineRunner {
  sharedRunner ??= new PipelineRunner();
  return sharedRunner;
}

/**
 * Starts a pipeline on the default runner.
 *
 * @example
 * ```typescript
 * const table = recs()
 *   .call("grep", (r) => Number(r.get("age")) >= 21)
 *   .call("sort", "--key", "income=-numeric")
 *   .call("totable")
 *   .run({ input: people });
 * ```
 */
export function recs(): RecordPipeline {
  return defaultRunner().recs();
}
