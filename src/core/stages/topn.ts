import type { StageContext, StageFactory } from "../../types/stream.ts";
import { StageArgumentError } from "../errors.ts";
import type { StreamRecord } from "../record.ts";
import { BaseStage } from "../stage.ts";
import { splitFields } from "./snippet.ts";

const OPTIONS = {
  topn: { type: "number", short: "n" },
  key: { type: "string", short: "k", multiple: true },
} as const;

const DEFAULT_TOP = 10;

/**
 * `topn -n N [--key field,...]`: the first N records of each group of key
 * values, in arrival order. Emits records, not text, despite the `to` prefix.
 */
export class TopNStage extends BaseStage {
  private readonly top: number;
  private readonly fields: string[];
  private readonly counts = new Map<string, number>();

  constructor(ctx: StageContext) {
    super(ctx);
    const { options, positionals } = this.parseArgs(OPTIONS);
    if (positionals.length > 0) {
      throw new StageArgumentError(ctx.name, `unexpected argument ${positionals[0]}`);
    }
    const top = options.number("topn") ?? DEFAULT_TOP;
    if (!Number.isInteger(top) || top < 0) {
      throw new StageArgumentError(ctx.name, `-n must be a non-negative integer, got ${top}`);
    }
    this.top = top;
    this.fields = splitFields(options.strings("key"));
  }

  acceptRecord(record: StreamRecord): boolean {
    const group = JSON.stringify(this.fields.map((field) => record.get(field) ?? null));
    const count = this.counts.get(group) ?? 0;
    if (count >= this.top) return true;
    this.counts.set(group, count + 1);
    return this.pushRecord(record);
  }
}

export const topn: StageFactory = (ctx) => new TopNStage(ctx);
