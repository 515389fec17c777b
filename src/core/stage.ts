import type { ILogger } from "../types/logger.ts";
import type { Stage, StageContext, StreamReceiver } from "../types/stream.ts";
import { parseStageArgs } from "./args.ts";
import type { OptionSpecs, ParsedStageArgs } from "./args.ts";
import { StreamRecord } from "./record.ts";

/**
 * Convenience base for stage implementations.
 *
 * - `acceptLine` parses a JSON line and hands it to `acceptRecord`.
 * - `finish` runs `streamDone` (flush buffered output) and then finishes
 *   the downstream, so one `finish` on the head reaches the sink.
 * - `push*` helpers forward the downstream's stop signal.
 */
export abstract class BaseStage implements Stage {
  protected readonly ctx: StageContext;
  protected readonly next: StreamReceiver;
  protected readonly logger: ILogger;
  private finished = false;

  constructor(ctx: StageContext) {
    this.ctx = ctx;
    this.next = ctx.next;
    this.logger = ctx.logger;
  }

  get name(): string {
    return this.ctx.name;
  }

  wantsInput(): boolean {
    return true;
  }

  acceptLine(line: string): boolean {
    return this.acceptRecord(StreamRecord.fromJSON(line, this.ctx.currentSource()));
  }

  abstract acceptRecord(record: StreamRecord): boolean;

  finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.streamDone();
    this.next.finish();
  }

  /** Called once at end of input, before the downstream is finished. */
  protected streamDone(): void {}

  protected pushRecord(record: StreamRecord): boolean {
    return this.next.acceptRecord(record);
  }

  protected pushLine(line: string): boolean {
    return this.next.acceptLine(line);
  }

  protected parseArgs(specs: OptionSpecs): ParsedStageArgs {
    return parseStageArgs(this.ctx.name, this.ctx.args, specs);
  }
}
