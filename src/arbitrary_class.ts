import type { Random } from "./random.ts";

/**
 * Builds a value, reading as many random numbers as it needs.
 *
 * It should always finish, and it shouldn't change any state except the
 * Random that's passed in.
 */
export type BuildFunction<T> = (random: Random) => T;

/**
 * Anything that can generate values, given a source of random numbers.
 */
export interface Sampler<T> {
  generate(random: Random): T;
}

/**
 * A description of how to generate random values of some type.
 *
 * An Arbitrary is immutable. Constructing one doesn't generate anything;
 * each call to {@link generate} produces a new value independently of earlier
 * calls.
 */
export class Arbitrary<T> implements Sampler<T> {
  readonly #build: BuildFunction<T>;

  protected constructor(readonly name: string, build: BuildFunction<T>) {
    this.#build = build;
  }

  /** Generates one value. */
  generate(random: Random): T {
    return this.#build(random);
  }

  /**
   * Creates a new Arbitrary by converting each generated value.
   */
  map<U>(convert: (val: T) => U): Arbitrary<U> {
    return new Arbitrary("map", (random) => convert(this.#build(random)));
  }

  /**
   * Returns a new Arbitrary with a different name.
   */
  with(opts: { name: string }): Arbitrary<T> {
    return new Arbitrary(opts.name, this.#build);
  }

  /**
   * Creates a function that always returns this Arbitrary.
   *
   * (Useful when optional arguments might be added later.)
   */
  asFunction(): () => Arbitrary<T> {
    return () => this;
  }

  /**
   * A short string describing this Arbitrary, for debugging.
   */
  toString(): string {
    return `${this.constructor.name}('${this.name}')`;
  }

  /**
   * Creates an Arbitrary from a {@link Sampler} or {@link BuildFunction}.
   */
  static from<T>(
    arg: Sampler<T> | BuildFunction<T>,
    opts?: { name?: string },
  ): Arbitrary<T> {
    const name = opts?.name ?? "untitled";
    if (typeof arg === "function") {
      return new Arbitrary(name, arg);
    } else if (arg instanceof Arbitrary) {
      return opts?.name === undefined ? arg : arg.with({ name });
    }
    return new Arbitrary(name, (random) => arg.generate(random));
  }

  /**
   * Creates an Arbitrary that returns one of the given values, chosen with a
   * uniform distribution.
   *
   * There must be at least one value. The values are returned as-is rather
   * than copied, so mutable objects will be shared between calls.
   */
  static of<T>(...values: T[]): Arbitrary<T> {
    return Arbitrary.#choose(values, "Arbitrary.of()");
  }

  /**
   * Like {@link Arbitrary.of}, but takes an array, which may be too long to
   * pass as arguments. The array is copied.
   */
  static ofList<T>(values: readonly T[]): Arbitrary<T> {
    return Arbitrary.#choose(values.slice(), "Arbitrary.ofList()");
  }

  static #choose<T>(values: readonly T[], caller: string): Arbitrary<T> {
    if (values.length === 0) {
      throw new Error(`${caller} requires at least one value`);
    }
    if (values.length === 1) {
      const only = values[0];
      return new Arbitrary("constant", () => only);
    }
    const max = values.length - 1;
    return new Arbitrary(
      `of(${values.length} values)`,
      (random) => values[random.int(0, max)],
    );
  }

  /**
   * Creates an Arbitrary that picks one of the given Samplers with a uniform
   * distribution and then generates a value with it.
   *
   * Picking samplers rather than values makes it possible to weight families
   * of values against each other.
   */
  static oneOf<T>(...cases: Sampler<T>[]): Arbitrary<T> {
    return Arbitrary.#pickCase(cases, "Arbitrary.oneOf()");
  }

  /** Like {@link Arbitrary.oneOf}, but takes an array, which is copied. */
  static oneOfList<T>(cases: readonly Sampler<T>[]): Arbitrary<T> {
    return Arbitrary.#pickCase(cases.slice(), "Arbitrary.oneOfList()");
  }

  static #pickCase<T>(
    cases: readonly Sampler<T>[],
    caller: string,
  ): Arbitrary<T> {
    if (cases.length === 0) {
      throw new Error(`${caller} requires at least one case`);
    }
    if (cases.length === 1) {
      return Arbitrary.from(cases[0]);
    }
    const max = cases.length - 1;
    return new Arbitrary(
      `oneOf(${cases.length} cases)`,
      (random) => cases[random.int(0, max)].generate(random),
    );
  }
}
