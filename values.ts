/**
 * The values that documents contain, and the document type itself.
 *
 * @module values
 */

export type { Tagged, Value, ValueKind } from "./src/values.ts";

export {
  copyValue,
  Document,
  equalValues,
  isReference,
  nestingDepth,
  referenceKey,
  referenceToDocument,
  tag,
} from "./src/values.ts";
export {
  Binary,
  binarySubtypes,
  DBRef,
  fromHex,
  ObjectId,
  sameBytes,
  toHex,
} from "./src/scalars.ts";
export { formatValue } from "./src/format.ts";
