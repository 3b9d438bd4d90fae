/**
 * Tests for config.ts — loadConfig + arithmeticOptionsFromConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { arithmeticOptionsFromConfig, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      SETTLEMENT_ROUNDING: "half-even",
      SETTLEMENT_CLAMP: "literal",
    });
  });

  it("reads explicit settings", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      SETTLEMENT_ROUNDING: "half-away-from-zero",
      SETTLEMENT_CLAMP: "bounded",
    });
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.SETTLEMENT_ROUNDING).toBe("half-away-from-zero");
    expect(config.SETTLEMENT_CLAMP).toBe("bounded");
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ PATH: "/usr/bin" }).SETTLEMENT_CLAMP).toBe("literal");
  });

  it("rejects an unknown rounding mode", () => {
    expect(() => loadConfig({ SETTLEMENT_ROUNDING: "half-up" })).toThrow(ZodError);
  });

  it("rejects an unknown clamp", () => {
    expect(() => loadConfig({ SETTLEMENT_CLAMP: "fixed" })).toThrow(ZodError);
  });
});

describe("arithmeticOptionsFromConfig", () => {
  it("maps settings to validator options", () => {
    const config = loadConfig({ SETTLEMENT_ROUNDING: "half-away-from-zero", SETTLEMENT_CLAMP: "bounded" });
    expect(arithmeticOptionsFromConfig(config)).toEqual({
      rounding: "half-away-from-zero",
      clamp: "bounded",
    });
  });
});
