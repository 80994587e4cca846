import type { Document, Value } from "../values.ts";

import { Arbitrary } from "../arbitrary_class.ts";
import { DBRef } from "../scalars.ts";
import { boolean, chooseGenerator, constant, intRange } from "./basics.ts";
import { floatFull, intFull } from "./numbers.ts";
import { sequence } from "./arrays.ts";
import { mapping } from "./documents.ts";
import { bytes, printableText, text } from "./strings.ts";
import { objectId, timestamp } from "./scalars.ts";

const keyLength = intRange(0, 20);
const containerLength = intRange(0, 10);

function checkDepth(depth: number, min: number, caller: string): void {
  if (!Number.isSafeInteger(depth) || depth < min) {
    throw new Error(
      `${caller}: depth must be an integer >= ${min}; got ${depth}`,
    );
  }
}

const leaves: Arbitrary<Value>[] = [
  text(intRange(0, 50)),
  printableText(intRange(0, 50)),
  bytes(intRange(0, 1000)),
  intFull(),
  floatFull(),
  boolean(),
  timestamp(),
  objectId(),
  constant(null),
];

/**
 * Defines an Arbitrary that generates any {@link Value} that can appear in a
 * document, nested up to the given depth.
 *
 * Each kind of leaf is equally likely. Sequences and documents are only
 * generated when depth > 0, and their items are generated with depth - 1.
 *
 * @param refs whether references may be generated.
 */
export function value(depth: number, refs = true): Arbitrary<Value> {
  checkDepth(depth, 0, "value");
  let current = valueAt(0, refs);
  for (let d = 1; d <= depth; d++) {
    current = valueAt(d, refs, current);
  }
  return current;
}

/** One level of {@link value}, given the generator for the level below. */
function valueAt(
  depth: number,
  refs: boolean,
  inner?: Arbitrary<Value>,
): Arbitrary<Value> {
  const cases = leaves.slice();
  if (refs) {
    cases.push(reference());
  }
  if (inner !== undefined) {
    cases.push(listOf(depth, inner));
    cases.push(documentOf(depth, inner));
  }
  return chooseGenerator(cases).with({ name: `value(${depth})` });
}

function listOf(depth: number, item: Arbitrary<Value>): Arbitrary<Value[]> {
  return sequence(item, containerLength).with({ name: `list(${depth})` });
}

function documentOf(
  depth: number,
  item: Arbitrary<Value>,
): Arbitrary<Document> {
  return mapping(text(keyLength), item, containerLength)
    .with({ name: `document(${depth})` });
}

/**
 * Defines an Arbitrary that generates a sequence of up to 10 values, each
 * nested at most depth - 1 deep.
 */
export function list(depth: number, refs = true): Arbitrary<Value[]> {
  checkDepth(depth, 1, "list");
  return listOf(depth, value(depth - 1, refs));
}

/**
 * Defines an Arbitrary that generates a {@link Document} with up to 10
 * entries, whose values are nested at most depth - 1 deep.
 */
export function document(depth: number, refs = true): Arbitrary<Document> {
  checkDepth(depth, 1, "document");
  return documentOf(depth, value(depth - 1, refs));
}

let sharedReference: Arbitrary<DBRef> | undefined;

/**
 * Returns an Arbitrary that generates a {@link DBRef}.
 *
 * The id may be a sequence or document, but never contains another reference.
 * The same Arbitrary is returned on each call.
 */
export function reference(): Arbitrary<DBRef> {
  if (sharedReference === undefined) {
    const collection = text(keyLength);
    const id = value(1, false);
    sharedReference = Arbitrary.from(
      (random) => new DBRef(collection.generate(random), id.generate(random)),
      { name: "reference" },
    );
  }
  return sharedReference;
}
