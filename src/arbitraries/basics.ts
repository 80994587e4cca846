import type { Sampler } from "../arbitrary_class.ts";
import type { Random } from "../random.ts";

import { Arbitrary } from "../arbitrary_class.ts";

/** Returns an Arbitrary that always generates the given value. */
export function constant<T>(val: T): Arbitrary<T> {
  return Arbitrary.of(val).with({ name: "constant" });
}

/**
 * Returns an Arbitrary that chooses one of the given values.
 *
 * @throws if the list is empty.
 */
export function chooseValue<T>(values: T[]): Arbitrary<T> {
  if (values.length === 0) {
    throw new Error("chooseValue() requires at least one value");
  }
  return Arbitrary.ofList(values).with({ name: "chooseValue" });
}

/**
 * Returns an Arbitrary that chooses one of the given Samplers and generates a
 * value with it.
 *
 * Each Sampler is equally likely to be picked, regardless of how many values
 * it can generate.
 *
 * @throws if the list is empty.
 */
export function chooseGenerator<T>(cases: Sampler<T>[]): Arbitrary<T> {
  if (cases.length === 0) {
    throw new Error("chooseGenerator() requires at least one generator");
  }
  return Arbitrary.oneOfList(cases).with({ name: "chooseGenerator" });
}

/** Returns an Arbitrary that converts each value generated by another. */
export function map<T, U>(
  arb: Arbitrary<T>,
  convert: (val: T) => U,
): Arbitrary<U> {
  return arb.map(convert);
}

/** Returns an Arbitrary that generates a boolean. */
export const boolean: () => Arbitrary<boolean> = Arbitrary.of(false, true).with(
  {
    name: "boolean",
  },
).asFunction();

/**
 * Returns an Arbitrary that chooses a safe integer in the given range.
 *
 * Invariant: min <= pick <= max. Each integer in range is equally likely.
 */
export function intRange(min: number, max: number): Arbitrary<number> {
  if (!Number.isSafeInteger(min)) {
    throw new Error(`min must be a safe integer; got ${min}`);
  }
  if (!Number.isSafeInteger(max)) {
    throw new Error(`max must be a safe integer; got ${max}`);
  }
  if (min > max) {
    throw new Error(
      `the range (min, max) must not be empty; got ${min} > ${max}`,
    );
  }
  return Arbitrary.from((random) => random.int(min, max), {
    name: `intRange(${min}, ${max})`,
  });
}

/**
 * Generates a length using the given Arbitrary.
 *
 * @throws if the Arbitrary returns something other than a non-negative safe
 * integer.
 */
export function pickLength(
  length: Sampler<number>,
  random: Random,
  caller: string,
): number {
  const n = length.generate(random);
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new Error(
      `${caller}: length must be a non-negative integer; got ${n}`,
    );
  }
  return n;
}
