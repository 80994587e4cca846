import { describe, expect, it } from "vitest";

import { errorText, evaluate, failure, success } from "@/src/results.ts";

describe("success", () => {
  it("holds a value", () => {
    expect(success(3)).toEqual({ ok: true, val: 3 });
    expect(success()).toEqual({ ok: true, val: undefined });
  });
});

describe("failure", () => {
  it("holds a message and the value that caused it", () => {
    expect(failure("oops", 7)).toEqual({
      ok: false,
      message: "oops",
      actual: 7,
    });
  });
});

describe("errorText", () => {
  it("uses the stack trace of an Error", () => {
    const e = new Error("boom");
    expect(errorText(e)).toBe(e.stack);
  });
  it("uses the name and message when there's no stack", () => {
    const e = new TypeError("bad");
    e.stack = undefined;
    expect(errorText(e)).toBe("TypeError: bad");
  });
  it("converts anything else to a string", () => {
    expect(errorText("plain")).toBe("plain");
    expect(errorText(12)).toBe("12");
  });
});

describe("evaluate", () => {
  it("returns what the predicate returns", () => {
    expect(evaluate((n: number) => n > 0, 1)).toEqual(success(true));
    expect(evaluate((n: number) => n > 0, -1)).toEqual(success(false));
  });
  it("catches what the predicate throws", () => {
    const result = evaluate((_n: number): boolean => {
      throw "nope";
    }, 5);
    expect(result).toEqual({ ok: false, message: "nope", actual: 5 });
  });
});
