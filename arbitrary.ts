/**
 * The symbols needed to define a new {@linkcode Arbitrary}.
 *
 * @module arbitrary
 */

export type { BuildFunction, Sampler } from "./src/arbitrary_class.ts";
export type { Random } from "./src/random.ts";

export { Arbitrary } from "./src/arbitrary_class.ts";
export { pickRandomSeed, RandomSource, randomSources } from "./src/random.ts";
