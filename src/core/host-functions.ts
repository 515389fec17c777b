/**
 * Host-function bridge.
 *
 * Stage arguments are text, so a closure passed as an argument is stored in
 * a registry and replaced by a one-line instruction in the stage's
 * expression language:
 *
 *   $host("fn-1", r)
 *
 * meaning "call the host function registered as fn-1 with the current
 * record". Stages hand such snippets back to `evaluate`, which looks the
 * token up and calls the closure directly; nothing is compiled or eval'd.
 */

import type { HostFunction, HostFunctionResolver, StageArg } from "../types/stream.ts";
import type { StreamRecord } from "./record.ts";
import { ExpressionError, RegistrationError, UnknownHostFunctionError } from "./errors.ts";

/** Name the current record is bound to inside an instruction. */
export const RECORD_BINDING = "r";

const INVOCATION = /^\$host\(\s*"([^"\\]+)"\s*,\s*r\s*\)\s*;?$/;

export interface HostFunctionRegistryOptions {
  /** Prefix of generated tokens. Default `fn`. */
  tokenPrefix?: string;
  /** Lead each generated snippet with the closure's source as `//` comments. Default true. */
  comments?: boolean;
}

export class HostFunctionRegistry implements HostFunctionResolver {
  private readonly tokens = new Map<HostFunction, string>();
  private readonly functions = new Map<string, HostFunction>();
  private readonly tokenPrefix: string;
  private readonly comments: boolean;
  private counter = 0;
  private sealed = false;

  constructor(opts: HostFunctionRegistryOptions = {}) {
    this.tokenPrefix = opts.tokenPrefix ?? "fn";
    this.comments = opts.comments ?? true;
  }

  get size(): number {
    return this.functions.size;
  }

  /**
   * Registers `fn` and returns its token. Registering the same closure
   * again returns the token it already has.
   */
  register(fn: unknown): string {
    if (this.sealed) {
      throw new RegistrationError("Host function registry is sealed");
    }
    if (!isHostFunction(fn)) {
      throw new RegistrationError(`Host function must be a function, got ${typeof fn}`);
    }
    const existing = this.tokens.get(fn);
    if (existing !== undefined) return existing;

    const token = `${this.tokenPrefix}-${++this.counter}`;
    this.tokens.set(fn, token);
    this.functions.set(token, fn);
    return token;
  }

  /** Registers `fn` and returns the snippet text that invokes it. */
  bridge(fn: HostFunction): string {
    const token = this.register(fn);
    const call = `$host(${JSON.stringify(token)}, ${RECORD_BINDING})`;
    if (!this.comments) return call;
    return `${describeHostFunction(fn)}\n${call}`;
  }

  /** Literal arguments pass through; closures are bridged. */
  bridgeArg(arg: StageArg): string {
    return typeof arg === "string" ? arg : this.bridge(arg);
  }

  resolve(token: string): HostFunction {
    const fn = this.functions.get(token);
    if (fn === undefined) throw new UnknownHostFunctionError(token);
    return fn;
  }

  invoke(token: string, record: StreamRecord): unknown {
    return this.resolve(token)(record);
  }

  evaluate(snippet: string, record: StreamRecord): unknown {
    const token = parseHostInvocation(snippet);
    if (token === undefined) {
      throw new ExpressionError(`Not a host function invocation: ${snippet}`);
    }
    return this.invoke(token, record);
  }

  /** Drops one entry, by closure or by token. Returns whether anything was removed. */
  release(target: HostFunction | string): boolean {
    const token = typeof target === "string" ? target : this.tokens.get(target);
    if (token === undefined) return false;
    const fn = this.functions.get(token);
    if (fn === undefined) return false;
    this.functions.delete(token);
    this.tokens.delete(fn);
    return true;
  }

  /** Refuses every later registration. Already registered closures stay callable. */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }
}

/**
 * Extracts the token from a snippet, skipping `//` comment lines and blank
 * lines. Returns `undefined` when the rest is not exactly one invocation.
 */
export function parseHostInvocation(snippet: string): string | undefined {
  const body = snippet
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("//"));
  if (body.length !== 1) return undefined;
  const match = INVOCATION.exec(body[0] ?? "");
  return match?.[1];
}

/** Best-effort source of `fn`, one `// ` comment line per source line. */
export function describeHostFunction(fn: HostFunction): string {
  let source: string;
  try {
    source = Function.prototype.toString.call(fn);
  } catch {
    source = fn.name ? `function ${fn.name}` : "<anonymous host function>";
  }
  return source
    .split("\n")
    .map((line) => `// ${line}`.trimEnd())
    .join("\n");
}

function isHostFunction(value: unknown): value is HostFunction {
  return typeof value === "function";
}
