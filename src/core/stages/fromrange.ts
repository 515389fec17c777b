import type { StageContext, StageFactory } from "../../types/stream.ts";
import { StageArgumentError } from "../errors.ts";
import { StreamRecord } from "../record.ts";
import { BaseStage } from "../stage.ts";

const OPTIONS = {
  field: { type: "string", short: "f" },
  start: { type: "number" },
  end: { type: "number" },
  step: { type: "number" },
} as const;

/**
 * `fromrange --end N [--start 1] [--step 1] [--field n]`: generates one
 * record per value. Takes no input; records are produced when the chain
 * is finished.
 */
export class FromRangeStage extends BaseStage {
  private readonly field: string;
  private readonly start: number;
  private readonly end: number;
  private readonly step: number;

  constructor(ctx: StageContext) {
    super(ctx);
    const { options, positionals } = this.parseArgs(OPTIONS);
    if (positionals.length > 0) {
      throw new StageArgumentError(ctx.name, `unexpected argument ${positionals[0]}`);
    }
    const end = options.number("end");
    if (end === undefined) {
      throw new StageArgumentError(ctx.name, "--end is required");
    }
    const step = options.number("step") ?? 1;
    if (step === 0) {
      throw new StageArgumentError(ctx.name, "--step must not be 0");
    }
    this.field = options.string("field") ?? "n";
    this.start = options.number("start") ?? 1;
    this.end = end;
    this.step = step;
  }

  wantsInput(): boolean {
    return false;
  }

  acceptRecord(record: StreamRecord): boolean {
    return this.pushRecord(record);
  }

  protected streamDone(): void {
    const inRange = (value: number) => (this.step > 0 ? value <= this.end : value >= this.end);
    for (let value = this.start; inRange(value); value += this.step) {
      if (!this.pushRecord(new StreamRecord({ [this.field]: value }))) break;
    }
  }
}

export const fromrange: StageFactory = (ctx) => new FromRangeStage(ctx);
