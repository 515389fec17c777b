import type { StageContext, StageFactory } from "../../types/stream.ts";
import { StageArgumentError } from "../errors.ts";
import type { StreamRecord } from "../record.ts";
import { BaseStage } from "../stage.ts";
import { splitFields } from "./snippet.ts";

const OPTIONS = {
  key: { type: "string", short: "k", multiple: true },
  reverse: { type: "boolean", short: "r" },
} as const;

type SortType = "lexical" | "numeric";

export interface SortKey {
  field: string;
  type: SortType;
  descending: boolean;
}

const TYPE_ALIASES: Record<string, SortType> = {
  lexical: "lexical",
  lex: "lexical",
  l: "lexical",
  numeric: "numeric",
  num: "numeric",
  n: "numeric",
};

/** Parses `field`, `field=numeric`, `field=-lexical` and the short forms `n` / `l`. */
export function parseSortKey(stage: string, keyText: string): SortKey {
  const eq = keyText.indexOf("=");
  const field = eq >= 0 ? keyText.slice(0, eq) : keyText;
  let type = eq >= 0 ? keyText.slice(eq + 1) : "lexical";
  let descending = false;
  if (type.startsWith("-")) {
    descending = true;
    type = type.slice(1);
  }
  const resolved = TYPE_ALIASES[type];
  if (!field || !resolved) {
    throw new StageArgumentError(stage, `invalid sort key ${JSON.stringify(keyText)}`);
  }
  return { field, type: resolved, descending };
}

function compareValues(a: unknown, b: unknown, type: SortType): number {
  if (type === "numeric") {
    const x = Number(a);
    const y = Number(b);
    // Non-numbers sort after every number.
    if (Number.isNaN(x) || Number.isNaN(y)) return Number(Number.isNaN(x)) - Number(Number.isNaN(y));
    return x - y;
  }
  const x = a === undefined || a === null ? "" : String(a);
  const y = b === undefined || b === null ? "" : String(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

/** `sort --key field[=[-]type][,...] [-r]`: buffers every record and emits them sorted at end of input. */
export class SortStage extends BaseStage {
  private readonly keys: SortKey[];
  private readonly reverse: boolean;
  private readonly buffer: StreamRecord[] = [];

  constructor(ctx: StageContext) {
    super(ctx);
    const { options, positionals } = this.parseArgs(OPTIONS);
    const keyTexts = splitFields([...options.strings("key"), ...positionals]);
    if (keyTexts.length === 0) {
      throw new StageArgumentError(ctx.name, "at least one --key is required");
    }
    this.keys = keyTexts.map((keyText) => parseSortKey(ctx.name, keyText));
    this.reverse = options.flag("reverse") ?? false;
  }

  acceptRecord(record: StreamRecord): boolean {
    this.buffer.push(record);
    return true;
  }

  protected streamDone(): void {
    const sorted = [...this.buffer].sort((a, b) => this.compare(a, b));
    if (this.reverse) sorted.reverse();
    for (const record of sorted) {
      if (!this.pushRecord(record)) break;
    }
    this.buffer.length = 0;
  }

  private compare(a: StreamRecord, b: StreamRecord): number {
    for (const key of this.keys) {
      const order = compareValues(a.get(key.field), b.get(key.field), key.type);
      if (order !== 0) return key.descending ? -order : order;
    }
    return 0;
  }
}

export const sort: StageFactory = (ctx) => new SortStage(ctx);
