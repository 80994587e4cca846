/**
 * The docprop library checks properties of semi-structured documents.
 *
 * Describe test data with an {@link Arbitrary}; the {@linkcode arb} namespace
 * has the combinators and the document generators. Then pass a predicate and
 * an Arbitrary to {@linkcode check}, or to {@linkcode checkFails} from inside a
 * test. Failing values are shrunk before they're reported.
 */

export * from "./arbitrary.ts";
export * from "./values.ts";
export * from "./runner.ts";

export * as arb from "./arbs.ts";
