import type { StageContext, StageFactory } from "../../types/stream.ts";
import type { StreamRecord } from "../record.ts";
import { BaseStage } from "../stage.ts";
import { requireSnippet } from "./snippet.ts";

const OPTIONS = {
  invert: { type: "boolean", short: "v" },
} as const;

/** `grep [-v] <expr>`: passes on the records the expression holds for. */
export class GrepStage extends BaseStage {
  private readonly snippet: string;
  private readonly invert: boolean;

  constructor(ctx: StageContext) {
    super(ctx);
    const { options, positionals } = this.parseArgs(OPTIONS);
    this.snippet = requireSnippet(ctx.name, positionals);
    this.invert = options.flag("invert") ?? false;
  }

  acceptRecord(record: StreamRecord): boolean {
    const matched = Boolean(this.ctx.hosts.evaluate(this.snippet, record));
    return matched !== this.invert ? this.pushRecord(record) : true;
  }
}

export const grep: StageFactory = (ctx) => new GrepStage(ctx);
