import type { StageFactory } from "../../types/stream.ts";
import { StageCatalog } from "../catalog.ts";
import { fromlines } from "./fromlines.ts";
import { fromrange } from "./fromrange.ts";
import { grep } from "./grep.ts";
import { head } from "./head.ts";
import { sort } from "./sort.ts";
import { tojson } from "./tojson.ts";
import { topn } from "./topn.ts";
import { totable } from "./totable.ts";
import { xform } from "./xform.ts";

export const builtinStages: Readonly<Record<string, StageFactory>> = Object.freeze({
  fromlines,
  fromrange,
  grep,
  head,
  sort,
  tojson,
  topn,
  totable,
  xform,
});

export function registerBuiltinStages(catalog: StageCatalog): StageCatalog {
  for (const [name, factory] of Object.entries(builtinStages)) {
    catalog.register(name, factory);
  }
  return catalog;
}

export function createDefaultCatalog(): StageCatalog {
  return registerBuiltinStages(new StageCatalog());
}

export { FromLinesStage } from "./fromlines.ts";
export { FromRangeStage } from "./fromrange.ts";
export { GrepStage } from "./grep.ts";
export { HeadStage } from "./head.ts";
export { SortStage, parseSortKey } from "./sort.ts";
export type { SortKey } from "./sort.ts";
export { ToJsonStage } from "./tojson.ts";
export { TopNStage } from "./topn.ts";
export { ToTableStage } from "./totable.ts";
export { XformStage } from "./xform.ts";
