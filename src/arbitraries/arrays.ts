import type { Sampler } from "../arbitrary_class.ts";

import { Arbitrary } from "../arbitrary_class.ts";
import { pickLength } from "./basics.ts";

/**
 * Defines an Arbitrary that generates arrays of the given item.
 *
 * The length is picked first, then each item is generated independently, in
 * order.
 */
export function sequence<T>(
  item: Sampler<T>,
  length: Sampler<number>,
): Arbitrary<T[]> {
  return Arbitrary.from((random) => {
    const n = pickLength(length, random, "sequence");
    const result: T[] = [];
    for (let i = 0; i < n; i++) {
      result.push(item.generate(random));
    }
    return result;
  }, { name: "sequence" });
}
