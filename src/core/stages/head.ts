import type { StageContext, StageFactory } from "../../types/stream.ts";
import { StageArgumentError } from "../errors.ts";
import type { StreamRecord } from "../record.ts";
import { BaseStage } from "../stage.ts";

const OPTIONS = {
  count: { type: "number", short: "n" },
} as const;

const DEFAULT_COUNT = 10;

/** `head [-n N]`: the first N records, then a stop signal. */
export class HeadStage extends BaseStage {
  private readonly limit: number;
  private seen = 0;

  constructor(ctx: StageContext) {
    super(ctx);
    const { options, positionals } = this.parseArgs(OPTIONS);
    if (positionals.length > 0) {
      throw new StageArgumentError(ctx.name, `unexpected argument ${positionals[0]}`);
    }
    const limit = options.number("count") ?? DEFAULT_COUNT;
    if (!Number.isInteger(limit) || limit < 0) {
      throw new StageArgumentError(ctx.name, `count must be a non-negative integer, got ${limit}`);
    }
    this.limit = limit;
  }

  acceptRecord(record: StreamRecord): boolean {
    if (this.seen >= this.limit) return false;
    this.seen++;
    return this.pushRecord(record) && this.seen < this.limit;
  }
}

export const head: StageFactory = (ctx) => new HeadStage(ctx);
