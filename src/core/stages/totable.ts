import type { StageContext, StageFactory } from "../../types/stream.ts";
import { StageArgumentError } from "../errors.ts";
import type { StreamRecord } from "../record.ts";
import { BaseStage } from "../stage.ts";
import { splitFields } from "./snippet.ts";

const OPTIONS = {
  key: { type: "string", short: "k", multiple: true },
  header: { type: "boolean" },
} as const;

const COLUMN_GAP = "  ";

function formatCell(value: unknown): string {
  if (value === undefined || value === null) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * `totable [--key field,...] [--no-header]`: an aligned text table, written
 * once every record is in. Columns default to every field, in the order
 * they were first seen.
 */
export class ToTableStage extends BaseStage {
  private readonly columns: string[];
  private readonly header: boolean;
  private readonly rows: StreamRecord[] = [];

  constructor(ctx: StageContext) {
    super(ctx);
    const { options, positionals } = this.parseArgs(OPTIONS);
    if (positionals.length > 0) {
      throw new StageArgumentError(ctx.name, `unexpected argument ${positionals[0]}`);
    }
    this.columns = splitFields(options.strings("key"));
    this.header = options.flag("header") ?? true;
  }

  acceptRecord(record: StreamRecord): boolean {
    this.rows.push(record);
    return true;
  }

  protected streamDone(): void {
    for (const line of this.render()) {
      if (!this.pushLine(line)) break;
    }
  }

  /** The table's lines, trailing spaces trimmed. */
  render(): string[] {
    const columns = this.columns.length > 0 ? this.columns : this.discoverColumns();
    if (columns.length === 0) return [];

    const cells = this.rows.map((row) => columns.map((column) => formatCell(row.get(column))));
    const widths = columns.map((column, i) =>
      cells.reduce((width, row) => Math.max(width, (row[i] ?? "").length), this.header ? column.length : 0),
    );
    const line = (values: string[]) =>
      values
        .map((value, i) => value.padEnd(widths[i] ?? 0))
        .join(COLUMN_GAP)
        .trimEnd();

    const lines: string[] = [];
    if (this.header) {
      lines.push(line(columns));
      lines.push(line(widths.map((width) => "-".repeat(width))));
    }
    for (const row of cells) lines.push(line(row));
    return lines;
  }

  private discoverColumns(): string[] {
    const seen = new Set<string>();
    for (const row of this.rows) {
      for (const key of row.keys()) seen.add(key);
    }
    return [...seen];
  }
}

export const totable: StageFactory = (ctx) => new ToTableStage(ctx);
