/**
 * Functions for defining new Arbitraries, including generators for documents
 * and the values they contain.
 *
 * @module arbs
 */

export * from "./src/arbitraries/basics.ts";
export * from "./src/arbitraries/numbers.ts";
export * from "./src/arbitraries/strings.ts";
export * from "./src/arbitraries/scalars.ts";
export { sequence } from "./src/arbitraries/arrays.ts";
export { mapping } from "./src/arbitraries/documents.ts";
export { document, list, reference, value } from "./src/arbitraries/values.ts";
