import type { Sampler } from "../arbitrary_class.ts";
import type { Value } from "../values.ts";

import { Arbitrary } from "../arbitrary_class.ts";
import { Document } from "../values.ts";
import { pickLength } from "./basics.ts";

/**
 * Defines an Arbitrary that generates a {@link Document}.
 *
 * After picking a length, it generates that many key-value pairs and sets them
 * in order. When a key repeats, the later value replaces the earlier one, so
 * the document may have fewer entries than the picked length.
 */
export function mapping(
  key: Sampler<string>,
  val: Sampler<Value>,
  length: Sampler<number>,
): Arbitrary<Document> {
  return Arbitrary.from((random) => {
    const n = pickLength(length, random, "mapping");
    const doc = new Document();
    for (let i = 0; i < n; i++) {
      const k = key.generate(random);
      doc.set(k, val.generate(random));
    }
    return doc;
  }, { name: "mapping" });
}
