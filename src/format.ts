import type { Value } from "./values.ts";

import { DBRef, toHex } from "./scalars.ts";
import { type Document, tag } from "./values.ts";

/**
 * Formats a value for a counterexample report.
 *
 * The output looks like a JavaScript expression that would construct the
 * value. Strings and keys are quoted the way JSON quotes them.
 */
export function formatValue(val: Value): string {
  const t = tag(val);
  switch (t.kind) {
    case "null":
    case "boolean":
      return String(t.val);
    case "int":
    case "float":
      return Object.is(t.val, -0) ? "-0" : String(t.val);
    case "text":
      return JSON.stringify(t.val);
    case "bytes":
      return `Bytes("${toHex(t.val)}")`;
    case "binary":
      return `Binary("${toHex(t.val.bytes)}", ${t.val.subtype})`;
    case "timestamp":
      return `Date("${t.val.toISOString()}")`;
    case "objectId":
      return `ObjectId("${t.val.toHexString()}")`;
    case "regexp":
      return t.val.toString();
    case "sequence":
      return `[${t.val.map(formatValue).join(", ")}]`;
    case "document":
      return formatDocument(t.val);
    case "reference":
      if (t.val instanceof DBRef) {
        const collection = JSON.stringify(t.val.collection);
        return `DBRef(${collection}, ${formatValue(t.val.id)})`;
      }
      return formatDocument(t.val);
  }
}

function formatDocument(doc: Document): string {
  if (doc.size === 0) {
    return "{}";
  }
  const fields = doc.items().map(([k, v]) =>
    `${JSON.stringify(k)}: ${formatValue(v)}`
  );
  return `{${fields.join(", ")}}`;
}
