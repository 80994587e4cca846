import type { Random } from "./random.ts";
import type { SystemConsole } from "./console.ts";
import type { Value } from "./values.ts";

import { nullConsole } from "./console.ts";
import { formatValue } from "./format.ts";
import { RandomSource } from "./random.ts";
import { evaluate, type Failure, success, type Success } from "./results.ts";
import { defaultAttempts } from "./runner/config.ts";
import { type Document, tag } from "./values.ts";

/**
 * A possible simplification of a value.
 *
 * When changed is false, the candidate is the original value.
 */
export type ShrinkProposal = {
  readonly changed: boolean;
  readonly candidate: Value;
};

/** A value that was found by shrinking, along with how many steps it took. */
export type Reduction = {
  readonly reductions: number;
  readonly value: Value;
};

/** Options to {@link reduce}. */
export type ReduceOpts = {
  /** Where to get random choices. Defaults to a new RandomSource. */
  random?: Random;

  /**
   * How many simplifications to try before giving up on a value. Defaults to
   * 10.
   */
  attempts?: number;

  /** Receives a log message for each accepted simplification. */
  console?: SystemConsole;
};

function unchanged(candidate: Value): ShrinkProposal {
  return { changed: false, candidate };
}

function flip(random: Random): boolean {
  return random.int(0, 1) === 1;
}

function simplifyDocument(doc: Document, random: Random): ShrinkProposal {
  if (doc.size === 0) {
    return unchanged(doc);
  }
  const keys = doc.keys();
  const key = keys[random.int(0, keys.length - 1)];
  const copy = doc.copy();
  if (flip(random)) {
    copy.delete(key);
    return { changed: true, candidate: copy };
  }
  const inner = simplify(copy.get(key) ?? null, random);
  if (!inner.changed) {
    return unchanged(doc);
  }
  copy.set(key, inner.candidate);
  return { changed: true, candidate: copy };
}

function simplifySequence(list: Value[], random: Random): ShrinkProposal {
  if (list.length === 0) {
    return unchanged(list);
  }
  const index = random.int(0, list.length - 1);
  const copy = list.slice();
  if (flip(random)) {
    copy.splice(index, 1);
    return { changed: true, candidate: copy };
  }
  const inner = simplify(copy[index], random);
  if (!inner.changed) {
    return unchanged(list);
  }
  copy[index] = inner.candidate;
  return { changed: true, candidate: copy };
}

/**
 * Proposes a simpler value by removing one entry from a document or sequence,
 * or by simplifying one of its entries.
 *
 * Deleting and recursing are equally likely. Leaves can't be simplified, and
 * neither can references, whether they're a DBRef or a document with a `$ref`
 * key.
 *
 * The original value isn't modified.
 */
export function simplify(val: Value, random: Random): ShrinkProposal {
  const t = tag(val);
  switch (t.kind) {
    case "document":
      return simplifyDocument(t.val, random);
    case "sequence":
      return simplifySequence(t.val, random);
    default:
      return unchanged(val);
  }
}

/**
 * Searches for a simpler value that still fails a predicate.
 *
 * The search is greedy: it accepts the first simplification that still fails
 * and starts over from there. When every attempt on a value either can't
 * change it or makes the predicate pass, that value is the result.
 */
export class Shrinker {
  readonly #random: Random;
  readonly #attempts: number;
  readonly #console: SystemConsole;
  #tries = 0;

  constructor(
    private readonly predicate: (val: Value) => boolean,
    opts?: ReduceOpts,
  ) {
    const attempts = opts?.attempts ?? defaultAttempts;
    if (!Number.isInteger(attempts) || attempts < 1) {
      throw new Error(`attempts must be an integer >= 1; got ${attempts}`);
    }
    this.#random = opts?.random ?? new RandomSource();
    this.#attempts = attempts;
    this.#console = opts?.console ?? nullConsole;
  }

  /** The number of times the predicate was called. */
  get tries(): number {
    return this.#tries;
  }

  /**
   * Returns the simplest failing value found, starting from one that fails.
   *
   * If the predicate throws on a candidate, returns a Failure with the error.
   */
  reduce(start: Value): Success<Reduction> | Failure {
    let current = start;
    let reductions = 0;
    let attempt = 0;
    while (attempt < this.#attempts) {
      attempt++;
      const proposal = simplify(current, this.#random);
      if (!proposal.changed) {
        continue;
      }
      this.#tries++;
      const result = evaluate(this.predicate, proposal.candidate);
      if (!result.ok) {
        return result;
      } else if (result.val) {
        continue; // simplified too far
      }
      current = proposal.candidate;
      reductions++;
      attempt = 0;
      this.#console.log(`reduction ${reductions}:`, formatValue(current));
    }
    return success({ reductions, value: current });
  }
}

/**
 * Given a value that fails a predicate, searches for a simpler one that also
 * fails. See {@link Shrinker}.
 */
export function reduce(
  val: Value,
  predicate: (val: Value) => boolean,
  opts?: ReduceOpts,
): Success<Reduction> | Failure {
  return new Shrinker(predicate, opts).reduce(val);
}
