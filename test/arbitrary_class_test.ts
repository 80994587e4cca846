import { describe, expect, it } from "vitest";

import { Arbitrary } from "@/arbitrary.ts";
import { ScriptedRandom } from "./lib/scripted.ts";
import { samples } from "./lib/samples.ts";

const dice = Arbitrary.from((random) => random.int(1, 6), { name: "dice" });

describe("Arbitrary", () => {
  describe("from", () => {
    it("generates values with a build function", () => {
      expect(dice.generate(new ScriptedRandom([4]))).toBe(4);
    });
    it("uses 'untitled' as the default name", () => {
      expect(Arbitrary.from(() => 1).name).toBe("untitled");
    });
    it("returns an Arbitrary unchanged when there is no name", () => {
      expect(Arbitrary.from(dice)).toBe(dice);
    });
    it("renames an Arbitrary when given a name", () => {
      expect(Arbitrary.from(dice, { name: "d6" }).name).toBe("d6");
    });
    it("accepts any Sampler", () => {
      const sampler = { generate: () => "hello" };
      expect(Arbitrary.from(sampler).generate(new ScriptedRandom([]))).toBe(
        "hello",
      );
    });
  });

  describe("map", () => {
    it("converts each value", () => {
      const doubled = dice.map((n) => n * 2);
      expect(doubled.generate(new ScriptedRandom([3]))).toBe(6);
    });
  });

  describe("with", () => {
    it("changes the name", () => {
      expect(dice.with({ name: "roll" }).name).toBe("roll");
    });
  });

  describe("asFunction", () => {
    it("returns a function that returns the Arbitrary", () => {
      expect(dice.asFunction()()).toBe(dice);
    });
  });

  describe("toString", () => {
    it("includes the name", () => {
      expect(dice.toString()).toBe("Arbitrary('dice')");
    });
  });

  describe("of", () => {
    it("throws when given no values", () => {
      expect(() => Arbitrary.of()).toThrow(
        "Arbitrary.of() requires at least one value",
      );
    });
    it("returns a constant without reading random numbers", () => {
      const random = new ScriptedRandom([]);
      expect(Arbitrary.of("x").generate(random)).toBe("x");
    });
    it("picks the value at the chosen index", () => {
      const arb = Arbitrary.of("a", "b", "c");
      expect(arb.generate(new ScriptedRandom([2]))).toBe("c");
    });
    it("generates every value", () => {
      const seen = new Set(samples(Arbitrary.of("a", "b", "c"), 100));
      expect(seen).toEqual(new Set(["a", "b", "c"]));
    });
  });

  describe("ofList", () => {
    it("throws when given an empty list", () => {
      expect(() => Arbitrary.ofList([])).toThrow(
        "Arbitrary.ofList() requires at least one value",
      );
    });
    it("copies the list", () => {
      const values = ["a", "b"];
      const arb = Arbitrary.ofList(values);
      values.length = 0;
      expect(arb.generate(new ScriptedRandom([1]))).toBe("b");
    });
  });

  describe("oneOf", () => {
    it("throws when given no cases", () => {
      expect(() => Arbitrary.oneOf()).toThrow(
        "Arbitrary.oneOf() requires at least one case",
      );
    });
    it("generates a value with the chosen case", () => {
      const arb = Arbitrary.oneOf(Arbitrary.of(0), dice);
      expect(arb.generate(new ScriptedRandom([1, 5]))).toBe(5);
    });
    it("uses each case", () => {
      const arb = Arbitrary.oneOf(Arbitrary.of("a"), Arbitrary.of("b"));
      expect(new Set(samples(arb, 100))).toEqual(new Set(["a", "b"]));
    });
  });

  describe("oneOfList", () => {
    it("throws when given an empty list", () => {
      expect(() => Arbitrary.oneOfList([])).toThrow(
        "Arbitrary.oneOfList() requires at least one case",
      );
    });
    it("generates a value with the chosen case", () => {
      const arb = Arbitrary.oneOfList([Arbitrary.of("a"), Arbitrary.of("b")]);
      expect(arb.generate(new ScriptedRandom([1]))).toBe("b");
    });
  });
});
