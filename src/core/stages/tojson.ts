import type { StageContext, StageFactory } from "../../types/stream.ts";
import { StageArgumentError } from "../errors.ts";
import type { StreamRecord } from "../record.ts";
import { BaseStage } from "../stage.ts";

/** `tojson`: one JSON line per record. */
export class ToJsonStage extends BaseStage {
  constructor(ctx: StageContext) {
    super(ctx);
    const { positionals } = this.parseArgs({});
    if (positionals.length > 0) {
      throw new StageArgumentError(ctx.name, `unexpected argument ${positionals[0]}`);
    }
  }

  acceptRecord(record: StreamRecord): boolean {
    return this.pushLine(record.serialize());
  }
}

export const tojson: StageFactory = (ctx) => new ToJsonStage(ctx);
