import type { StageContext, StageFactory } from "../../types/stream.ts";
import { ExpressionError } from "../errors.ts";
import { StreamRecord, isPlainRecord } from "../record.ts";
import { BaseStage } from "../stage.ts";
import { requireSnippet } from "./snippet.ts";

/**
 * `xform <expr>`: the expression may edit `r` in place. A returned record
 * (or plain object) replaces it; a returned array emits one record per item.
 */
export class XformStage extends BaseStage {
  private readonly snippet: string;

  constructor(ctx: StageContext) {
    super(ctx);
    this.snippet = requireSnippet(ctx.name, this.parseArgs({}).positionals);
  }

  acceptRecord(record: StreamRecord): boolean {
    const result = this.ctx.hosts.evaluate(this.snippet, record);
    if (!Array.isArray(result)) {
      return this.pushRecord(this.toRecord(result) ?? record);
    }
    for (const item of result) {
      const out = this.toRecord(item);
      if (!out) {
        throw new ExpressionError(`${this.name}: array results must hold records, got ${typeof item}`);
      }
      if (!this.pushRecord(out)) return false;
    }
    return true;
  }

  private toRecord(value: unknown): StreamRecord | undefined {
    if (value instanceof StreamRecord) return value;
    if (isPlainRecord(value)) return new StreamRecord(value);
    return undefined;
  }
}

export const xform: StageFactory = (ctx) => new XformStage(ctx);
