import { describe, expect, it } from "vitest";

import { ScriptedRandom } from "./scripted.ts";

describe("ScriptedRandom", () => {
  it("replies with its picks in order", () => {
    const random = new ScriptedRandom([3, 0.5, 1]);
    expect(random.int(0, 5)).toBe(3);
    expect(random.fraction()).toBe(0.5);
    expect(random.int(1, 1)).toBe(1);
    expect(random.remaining).toBe(0);
  });
  it("throws when a pick is out of range", () => {
    const random = new ScriptedRandom([7]);
    expect(() => random.int(0, 5)).toThrow(
      "pick 0 is 7; want a value in [0, 5]",
    );
  });
  it("throws when it runs out of picks", () => {
    const random = new ScriptedRandom([]);
    expect(() => random.int(0, 1)).toThrow("ran out of picks after 0");
  });
});
