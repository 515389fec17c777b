// src/tests/env.test.ts
import { env as stdEnv } from "std-env";
import { beforeEach, describe, expect, it } from "vitest";
import { getEnv, setEnv, unsetEnv } from "../core/env.ts";

describe("env module", () => {
  beforeEach(() => {
    delete stdEnv.RECCHAIN_TEXT_PREFIX;
  });

  describe("getEnv", () => {
    it("returns existing env value", () => {
      stdEnv.RECCHAIN_TEXT_PREFIX = "as";
      expect(getEnv("RECCHAIN_TEXT_PREFIX")).toBe("as");
    });

    it("returns default when env is missing", () => {
      expect(getEnv("RECCHAIN_TEXT_PREFIX", "to")).toBe("to");
    });

    it("throws when key is missing and no default", () => {
      expect(() => getEnv("RECCHAIN_TEXT_PREFIX")).toThrow("Missing environment variable: RECCHAIN_TEXT_PREFIX");
    });
  });

  describe("setEnv", () => {
    it("sets an environment key and returns true", () => {
      expect(setEnv("RECCHAIN_TEXT_PREFIX", "out")).toBe(true);
      expect(stdEnv.RECCHAIN_TEXT_PREFIX).toBe("out");
    });

    it("can be read back via getEnv and removed again", () => {
      setEnv("RECCHAIN_TEXT_PREFIX", "roundtrip");
      expect(getEnv("RECCHAIN_TEXT_PREFIX")).toBe("roundtrip");

      unsetEnv("RECCHAIN_TEXT_PREFIX");
      expect(getEnv("RECCHAIN_TEXT_PREFIX", "to")).toBe("to");
    });
  });
});
