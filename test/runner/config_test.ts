import { afterEach, describe, expect, it } from "vitest";

import {
  defaultAttempts,
  defaultExamples,
  defaultTrials,
  getTrials,
  parseTrials,
  readTrialsEnv,
  scaleTrials,
  setTrialsForTesting,
} from "../../src/runner/config.ts";

afterEach(() => {
  setTrialsForTesting(null);
});

describe("config constants", () => {
  it("has the documented defaults", () => {
    expect(defaultTrials).toBe(100);
    expect(defaultAttempts).toBe(10);
    expect(defaultExamples).toBe(5);
  });
});

describe("parseTrials", () => {
  it("parses percentage format", () => {
    expect(parseTrials("5%")).toEqual({ multiplier: 0.05 });
    expect(parseTrials("100%")).toEqual({ multiplier: 1 });
    expect(parseTrials("250%")).toEqual({ multiplier: 2.5 });
  });
  it("parses multiplier format", () => {
    expect(parseTrials("5x")).toEqual({ multiplier: 5 });
    expect(parseTrials("0.5x")).toEqual({ multiplier: 0.5 });
  });
  it("handles whitespace", () => {
    expect(parseTrials(" 5x ")).toEqual({ multiplier: 5 });
  });
  it("accepts zero", () => {
    expect(parseTrials("0")).toEqual({ multiplier: 0 });
    expect(parseTrials("0%")).toEqual({ multiplier: 0 });
  });
  it("returns undefined for invalid formats", () => {
    for (const bad of ["5", "abc", "-5%", "x", "%", "5y"]) {
      expect(parseTrials(bad)).toBe(undefined);
    }
  });
});

describe("readTrialsEnv", () => {
  it("returns undefined when TRIALS isn't set", () => {
    expect(readTrialsEnv({})).toBe(undefined);
    expect(readTrialsEnv({ TRIALS: "" })).toBe(undefined);
  });
  it("parses TRIALS", () => {
    expect(readTrialsEnv({ TRIALS: "10%" })).toEqual({ multiplier: 0.1 });
  });
  it("throws for an invalid value", () => {
    expect(() => readTrialsEnv({ TRIALS: "lots" })).toThrow(
      'Invalid TRIALS value: "lots". ' +
        'Use percentage (e.g., "5%") or multiplier (e.g., "5x") format.',
    );
  });
});

describe("scaleTrials", () => {
  it("returns the baseline when TRIALS isn't set", () => {
    setTrialsForTesting(undefined);
    expect(getTrials()).toBe(undefined);
    expect(scaleTrials(100)).toBe(100);
  });
  it("rounds up", () => {
    setTrialsForTesting({ multiplier: 0.05 });
    expect(scaleTrials(100)).toBe(5);
    expect(scaleTrials(7)).toBe(1);
  });
  it("can turn trials off", () => {
    setTrialsForTesting({ multiplier: 0 });
    expect(scaleTrials(100)).toBe(0);
  });
  it("multiplies", () => {
    setTrialsForTesting({ multiplier: 3 });
    expect(scaleTrials(100)).toBe(300);
  });
});
