import { describe, expect, it } from "vitest";

import * as arb from "@/arbs.ts";
import { ScriptedRandom } from "../lib/scripted.ts";
import { samples } from "../lib/samples.ts";

describe("sequence", () => {
  it("generates a fixed-length list of a constant", () => {
    const fives = arb.sequence(arb.chooseValue([5]), arb.intRange(3, 3));
    expect(samples(fives, 5)).toEqual(Array(5).fill([5, 5, 5]));
  });
  it("picks the length first, then each item in order", () => {
    const digits = arb.sequence(arb.intRange(0, 9), arb.intRange(0, 4));
    expect(digits.generate(new ScriptedRandom([2, 7, 3]))).toEqual([7, 3]);
  });
  it("generates an empty list for length 0", () => {
    const empty = arb.sequence(arb.intRange(0, 9), arb.constant(0));
    expect(empty.generate(new ScriptedRandom([]))).toEqual([]);
  });
  it("keeps lengths and items within their ranges", () => {
    const digits = arb.sequence(arb.intRange(0, 9), arb.intRange(0, 4));
    for (const list of samples(digits, 100)) {
      expect(list.length).toBeLessThanOrEqual(4);
      for (const item of list) {
        expect(item).toBeGreaterThanOrEqual(0);
        expect(item).toBeLessThanOrEqual(9);
      }
    }
  });
  it("throws when the length is negative", () => {
    const bad = arb.sequence(arb.constant(1), arb.constant(-1));
    expect(() => bad.generate(new ScriptedRandom([]))).toThrow(
      "sequence: length must be a non-negative integer; got -1",
    );
  });
});
