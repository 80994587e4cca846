import {
  type RandomGenerator,
  unsafeUniformIntDistribution,
  xoroshiro128plus,
} from "pure-rand";

/**
 * A source of random numbers that's passed to every sampling call.
 *
 * Implementations are usually seeded random number generators, but a test can
 * substitute its own choices.
 */
export interface Random {
  /**
   * Returns an integer such that min <= n <= max.
   *
   * Both bounds are safe integers.
   */
  int(min: number, max: number): number;

  /** Returns a number such that 0 <= n < 1. */
  fraction(): number;
}

export function pickRandomSeed(): number {
  return Date.now() ^ (Math.random() * 0x100000000);
}

const fractionHiMax = 2 ** 21 - 1;
const fractionLoMax = 2 ** 32 - 1;

/**
 * Random numbers from a seeded xoroshiro128+ generator.
 */
export class RandomSource implements Random {
  readonly seed: number;
  readonly #rng: RandomGenerator;

  constructor(opts?: { seed?: number; rng?: RandomGenerator }) {
    this.seed = opts?.seed ?? pickRandomSeed();
    this.#rng = opts?.rng?.clone() ?? xoroshiro128plus(this.seed);
  }

  int(min: number, max: number): number {
    return unsafeUniformIntDistribution(min, max, this.#rng);
  }

  fraction(): number {
    const hi = this.int(0, fractionHiMax);
    const lo = this.int(0, fractionLoMax);
    return (hi * 0x100000000 + lo) / 2 ** 53;
  }
}

function jump(r: RandomGenerator): RandomGenerator {
  const jump = r.jump;
  if (jump === undefined) {
    throw new Error("random generator doesn't support jump()");
  }
  return jump.bind(r)();
}

/**
 * Returns a sequence of random sources where each is independent.
 *
 * Each one starts from the same seed, jumped ahead, so a run can be reproduced
 * from the seed alone.
 */
export function* randomSources(
  seed: number,
): Generator<RandomSource, never, undefined> {
  let rng = xoroshiro128plus(seed);
  while (true) {
    yield new RandomSource({ seed, rng });
    rng = jump(rng);
  }
}
