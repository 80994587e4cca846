/**
 * The symbols needed when writing tests. See {@linkcode check} and
 * {@linkcode checkFails}.
 *
 * @module runner
 */

export { check, checkFails, formatFailure } from "./src/runner.ts";
export { reduce, Shrinker, simplify } from "./src/shrink.ts";
export { setTrialsForTesting } from "./src/runner/config.ts";
export { nullConsole, RecordingConsole, systemConsole } from "./src/console.ts";

export type {
  CheckFailsOpts,
  CheckOpts,
  Predicate,
  TestContext,
} from "./src/runner.ts";
export type { ReduceOpts, Reduction, ShrinkProposal } from "./src/shrink.ts";
export type { SystemConsole } from "./src/console.ts";
export type { Failure, Success } from "./src/results.ts";
