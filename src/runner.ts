import type { Sampler } from "./arbitrary_class.ts";
import type { SystemConsole } from "./console.ts";
import type { Value } from "./values.ts";

import { nullConsole, systemConsole } from "./console.ts";
import { formatValue } from "./format.ts";
import { pickRandomSeed, randomSources } from "./random.ts";
import { evaluate } from "./results.ts";
import { reduce } from "./shrink.ts";
import {
  defaultAttempts,
  defaultExamples,
  defaultTrials,
  scaleTrials,
} from "./runner/config.ts";

/**
 * A property to check. It returns false or throws for a counterexample.
 *
 * While shrinking, the predicate will be called with simplified versions of
 * generated values, which might not be values the generator could produce.
 */
export type Predicate = (val: Value) => boolean;

/**
 * Options to {@link check}.
 */
export type CheckOpts = {
  /**
   * The number of values to generate. Defaults to 100, scaled by the TRIALS
   * environment variable.
   */
  trials?: number;

  /** If specified, makes the run repeatable. */
  seed?: number;

  /** The shrinker's retry budget for each value. Defaults to 10. */
  attempts?: number;

  /** Receives progress messages. Defaults to discarding them. */
  console?: SystemConsole;
};

function checkCount(name: string, val: number | undefined): void {
  if (val === undefined) return;
  if (!Number.isInteger(val)) {
    throw new Error(`${name} option must be an integer; got ${val}`);
  }
  if (val <= 0) {
    throw new Error(`${name} option must be at least 1; got ${val}`);
  }
}

/**
 * Checks a predicate against randomly generated values.
 *
 * Returns a description of each counterexample found, in the order found. An
 * empty list means that no counterexample turned up in this run.
 *
 * When the predicate returns false, the value is shrunk first and reported as
 * `after <N> reductions: <value>`. When it throws, the value is reported with
 * the error as `<value> : <error>`, without shrinking.
 *
 * Exceptions thrown by the predicate never escape. Exceptions from the
 * generator do.
 */
export function check(
  predicate: Predicate,
  input: Sampler<Value>,
  opts?: CheckOpts,
): string[] {
  checkCount("trials", opts?.trials);
  checkCount("attempts", opts?.attempts);
  const trials = scaleTrials(opts?.trials ?? defaultTrials);
  const attempts = opts?.attempts ?? defaultAttempts;
  const console = opts?.console ?? nullConsole;
  const sources = randomSources(opts?.seed ?? pickRandomSeed());

  const counterexamples: string[] = [];
  for (let i = 0; i < trials; i++) {
    const random = sources.next().value;
    const val = input.generate(random);

    const result = evaluate(predicate, val);
    if (!result.ok) {
      counterexamples.push(`${formatValue(val)} : ${result.message}`);
      continue;
    } else if (result.val) {
      continue;
    }

    console.log(`trial ${i + 1} failed; shrinking...`);
    const reduced = reduce(val, predicate, { random, attempts, console });
    if (!reduced.ok) {
      counterexamples.push(`${formatValue(val)} : ${reduced.message}`);
      continue;
    }
    const { reductions, value } = reduced.val;
    counterexamples.push(
      `after ${reductions} reductions: ${formatValue(value)}`,
    );
  }
  return counterexamples;
}

/**
 * The part of a test framework that {@link checkFails} uses to fail a test.
 *
 * For example, Vitest's `assert` has a suitable fail method.
 */
export interface TestContext {
  fail(message: string): void;
}

/** Options to {@link checkFails}. */
export type CheckFailsOpts = CheckOpts & {
  /** How many counterexamples to include in the message. Defaults to 5. */
  examples?: number;
};

/**
 * Formats the message for a failed check, listing the first few
 * counterexamples.
 */
export function formatFailure(
  counterexamples: string[],
  examples = defaultExamples,
): string {
  const failures = counterexamples.length;
  const shown = Math.min(failures, examples);
  const lines = counterexamples.slice(0, shown).map((c) => `    -> ${c}`);
  return `found ${failures} counter examples, displaying first ${shown}:\n${
    lines.join("\n")
  }`;
}

/**
 * Runs {@link check} and fails the current test if any counterexample was
 * found.
 *
 * Before failing, the seed is logged to the console (by default, the global
 * one) so that the run can be repeated.
 *
 * @throws the failure from the test context, or an Error with the same
 * message if the context didn't throw.
 */
export function checkFails(
  test: TestContext,
  predicate: Predicate,
  input: Sampler<Value>,
  opts?: CheckFailsOpts,
): void {
  checkCount("examples", opts?.examples);
  const seed = opts?.seed ?? pickRandomSeed();
  const counterexamples = check(predicate, input, { ...opts, seed });
  if (counterexamples.length === 0) {
    return;
  }

  const message = formatFailure(counterexamples, opts?.examples);
  const console = opts?.console ?? systemConsole;
  console.error(message);
  console.log(`rerun using {seed: ${seed}}`);
  test.fail(message);
  throw new Error(message);
}
