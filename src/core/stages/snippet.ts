import { ExpressionError, StageArgumentError } from "../errors.ts";
import { parseHostInvocation } from "../host-functions.ts";

/** The single snippet argument of a predicate or transform stage, checked up front. */
export function requireSnippet(stage: string, positionals: readonly string[]): string {
  if (positionals.length !== 1) {
    throw new StageArgumentError(stage, `expected exactly one expression, got ${positionals.length}`);
  }
  const snippet = positionals[0] ?? "";
  if (parseHostInvocation(snippet) === undefined) {
    throw new ExpressionError(`${stage}: only host function invocations are supported, got ${JSON.stringify(snippet)}`);
  }
  return snippet;
}

/** Splits repeated, comma-separated option values into one flat list. */
export function splitFields(values: readonly string[] | undefined): string[] {
  return (values ?? [])
    .flatMap((value) => value.split(","))
    .map((field) => field.trim())
    .filter((field) => field.length > 0);
}
