import { describe, expect, it } from "vitest";
import { ExpressionError, RegistrationError, UnknownHostFunctionError } from "../core/errors.ts";
import { HostFunctionRegistry, describeHostFunction, parseHostInvocation } from "../core/host-functions.ts";
import { StreamRecord } from "../core/record.ts";

describe("HostFunctionRegistry", () => {
  it("gives the same closure the same token", () => {
    const hosts = new HostFunctionRegistry({ comments: false });
    const fn = () => true;

    const first = hosts.bridge(fn);
    const second = hosts.bridge(fn);

    expect(first).toBe('$host("fn-1", r)');
    expect(second).toBe(first);
    expect(hosts.size).toBe(1);
  });

  it("gives distinct closures distinct tokens", () => {
    const hosts = new HostFunctionRegistry({ comments: false });

    expect(hosts.bridge(() => 1)).toBe('$host("fn-1", r)');
    expect(hosts.bridge(() => 2)).toBe('$host("fn-2", r)');
  });

  it("leads the snippet with the closure's source as comments", () => {
    const hosts = new HostFunctionRegistry();
    function keep() {
      return true;
    }
    const snippet = hosts.bridge(keep);
    const lines = snippet.split("\n");

    expect(lines[0]).toBe("// function keep() {");
    expect(lines.slice(0, -1).every((line) => line.startsWith("//"))).toBe(true);
    expect(lines[lines.length - 1]).toBe('$host("fn-1", r)');
    expect(parseHostInvocation(snippet)).toBe("fn-1");
  });

  it("uses the configured token prefix", () => {
    const hosts = new HostFunctionRegistry({ tokenPrefix: "cb", comments: false });
    expect(hosts.register(() => null)).toBe("cb-1");
  });

  it("passes literal arguments through untouched", () => {
    const hosts = new HostFunctionRegistry();
    expect(hosts.bridgeArg("--key")).toBe("--key");
    expect(hosts.size).toBe(0);
  });

  it("evaluates a bridged snippet against a record", () => {
    const hosts = new HostFunctionRegistry();
    const snippet = hosts.bridge((r) => `${String(r.get("first"))} ${String(r.get("last"))}`);
    const record = new StreamRecord({ first: "Ada", last: "Lovelace" });

    expect(hosts.evaluate(snippet, record)).toBe("Ada Lovelace");
  });

  it("invokes by token", () => {
    const hosts = new HostFunctionRegistry();
    const token = hosts.register((r: StreamRecord) => r.size);
    expect(hosts.invoke(token, new StreamRecord({ a: 1, b: 2 }))).toBe(2);
  });

  it("rejects snippets that are not an invocation", () => {
    const hosts = new HostFunctionRegistry();
    expect(() => hosts.evaluate("r.age > 21", new StreamRecord())).toThrow(ExpressionError);
  });

  it("fails on unknown tokens", () => {
    const hosts = new HostFunctionRegistry();
    expect(() => hosts.resolve("fn-9")).toThrow(UnknownHostFunctionError);
    expect(() => hosts.evaluate('$host("fn-9", r)', new StreamRecord())).toThrow(
      "No host function registered under fn-9",
    );
  });

  it("refuses non-functions", () => {
    const hosts = new HostFunctionRegistry();
    expect(() => hosts.register("not a function")).toThrow(RegistrationError);
    expect(() => hosts.register("not a function")).toThrow("Host function must be a function, got string");
  });

  it("refuses registrations once sealed but keeps resolving", () => {
    const hosts = new HostFunctionRegistry();
    const fn = () => "kept";
    const token = hosts.register(fn);
    hosts.seal();

    expect(hosts.isSealed()).toBe(true);
    expect(() => hosts.register(() => "late")).toThrow("Host function registry is sealed");
    expect(hosts.invoke(token, new StreamRecord())).toBe("kept");
  });

  it("releases entries by closure or token", () => {
    const hosts = new HostFunctionRegistry();
    const a = () => "a";
    const b = () => "b";
    const tokenB = hosts.register(b);
    hosts.register(a);

    expect(hosts.release(a)).toBe(true);
    expect(hosts.release(tokenB)).toBe(true);
    expect(hosts.release(a)).toBe(false);
    expect(hosts.size).toBe(0);
    expect(hosts.register(a)).toBe("fn-3");
  });
});

describe("parseHostInvocation", () => {
  it("ignores comment and blank lines", () => {
    expect(parseHostInvocation('// x => x\n\n  $host("fn-4", r);  ')).toBe("fn-4");
  });

  it("rejects anything besides a single invocation", () => {
    expect(parseHostInvocation('$host("fn-1", r)\n$host("fn-2", r)')).toBeUndefined();
    expect(parseHostInvocation('$host("fn-1", record)')).toBeUndefined();
    expect(parseHostInvocation("")).toBeUndefined();
  });
});

describe("describeHostFunction", () => {
  it("prefixes every source line", () => {
    const fn = function twoLines() {
      return 1;
    };
    const lines = describeHostFunction(fn).split("\n");
    expect(lines.length).toBeGreaterThan(1);
    expect(lines.every((line) => line.startsWith("//"))).toBe(true);
  });
});
