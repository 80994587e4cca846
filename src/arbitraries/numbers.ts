import { Arbitrary } from "../arbitrary_class.ts";
import { intRange } from "./basics.ts";

/**
 * Returns an Arbitrary that generates a signed 32-bit integer.
 */
export const intFull: () => Arbitrary<number> = intRange(
  -(2 ** 31),
  2 ** 31 - 1,
).with({ name: "intFull" }).asFunction();

/** Floats are spread over (-floatScale / 2, floatScale / 2). */
export const floatScale = 2 ** 63;

/**
 * Returns an Arbitrary that generates a float over a wide range centered on
 * zero, so that very large magnitudes are common.
 */
export const floatFull: () => Arbitrary<number> = Arbitrary.from(
  (random) => (random.fraction() - 0.5) * floatScale,
  { name: "floatFull" },
).asFunction();
