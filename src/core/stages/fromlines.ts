import type { StageContext, StageFactory } from "../../types/stream.ts";
import { StageArgumentError } from "../errors.ts";
import { StreamRecord } from "../record.ts";
import { BaseStage } from "../stage.ts";

const OPTIONS = {
  field: { type: "string", short: "f" },
} as const;

/** `fromlines [--field line]`: wraps each raw input line in a one-field record. */
export class FromLinesStage extends BaseStage {
  private readonly field: string;

  constructor(ctx: StageContext) {
    super(ctx);
    const { options, positionals } = this.parseArgs(OPTIONS);
    if (positionals.length > 0) {
      throw new StageArgumentError(ctx.name, `unexpected argument ${positionals[0]}`);
    }
    this.field = options.string("field") ?? "line";
  }

  acceptLine(line: string): boolean {
    return this.pushRecord(new StreamRecord({ [this.field]: line }));
  }

  acceptRecord(record: StreamRecord): boolean {
    return this.pushRecord(record);
  }
}

export const fromlines: StageFactory = (ctx) => new FromLinesStage(ctx);
