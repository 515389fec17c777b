import { StageArgumentError } from "./errors.ts";

export type OptionType = "string" | "number" | "boolean";

export interface OptionSpec {
  type: OptionType;
  /** Single-letter alias, used as `-x`. */
  short?: string;
  /** Collect every occurrence instead of keeping the last. */
  multiple?: boolean;
}

export type OptionSpecs = Record<string, OptionSpec>;

export type OptionValue = string | number | boolean;

/** Parsed option values, read back by the type their option declared. */
export class OptionValues {
  private readonly values: ReadonlyMap<string, readonly OptionValue[]>;

  constructor(values: ReadonlyMap<string, readonly OptionValue[]>) {
    this.values = values;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  string(name: string): string | undefined {
    const value = this.last(name);
    return typeof value === "string" ? value : undefined;
  }

  number(name: string): number | undefined {
    const value = this.last(name);
    return typeof value === "number" ? value : undefined;
  }

  flag(name: string): boolean | undefined {
    const value = this.last(name);
    return typeof value === "boolean" ? value : undefined;
  }

  /** Every string given for `name`, in order. */
  strings(name: string): string[] {
    return (this.values.get(name) ?? []).filter((value): value is string => typeof value === "string");
  }

  private last(name: string): OptionValue | undefined {
    const list = this.values.get(name);
    return list?.[list.length - 1];
  }
}

export interface ParsedStageArgs {
  options: OptionValues;
  positionals: string[];
}

/**
 * Parses a stage's command-line style arguments:
 * `--name value`, `--name=value`, `-n value`, boolean `--flag` / `--no-flag`,
 * and `--` to end option parsing.
 */
export function parseStageArgs(stage: string, args: readonly string[], specs: OptionSpecs): ParsedStageArgs {
  const values = new Map<string, OptionValue[]>();
  const positionals: string[] = [];
  const byShort = new Map<string, string>();
  for (const [name, spec] of Object.entries(specs)) {
    if (spec.short) byShort.set(spec.short, name);
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--") {
      positionals.push(...args.slice(i + 1));
      break;
    }

    let name: string | undefined;
    let inline: string | undefined;
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
      inline = eq >= 0 ? arg.slice(eq + 1) : undefined;
    } else if (arg.length === 2 && arg.startsWith("-")) {
      name = byShort.get(arg.slice(1)) ?? arg.slice(1);
    } else {
      positionals.push(arg);
      continue;
    }

    let spec: OptionSpec | undefined = specs[name];
    let negated = false;
    if (!spec && name.startsWith("no-")) {
      const base: OptionSpec | undefined = specs[name.slice(3)];
      if (base?.type === "boolean") {
        spec = base;
        name = name.slice(3);
        negated = true;
      }
    }
    if (!spec) {
      throw new StageArgumentError(stage, `unknown option ${arg}`);
    }

    let value: OptionValue;
    if (spec.type === "boolean") {
      if (inline !== undefined) {
        throw new StageArgumentError(stage, `option --${name} takes no value`);
      }
      value = !negated;
    } else {
      const raw = inline ?? args[++i];
      if (raw === undefined) {
        throw new StageArgumentError(stage, `option --${name} requires a value`);
      }
      value = spec.type === "number" ? toNumber(stage, name, raw) : raw;
    }

    const list = spec.multiple ? values.get(name) ?? [] : [];
    values.set(name, [...list, value]);
  }

  return { options: new OptionValues(values), positionals };
}

function toNumber(stage: string, name: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n)) {
    throw new StageArgumentError(stage, `option --${name} expects a number, got ${JSON.stringify(raw)}`);
  }
  return n;
}
