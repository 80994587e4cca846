import { Binary, DBRef, ObjectId, sameBytes } from "./scalars.ts";

/**
 * A value that can appear in a document.
 */
export type Value =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | Binary
  | Date
  | ObjectId
  | DBRef
  | RegExp
  | Value[]
  | Document;

/**
 * The key that marks a document as a reference rather than ordinary data.
 */
export const referenceKey = "$ref";

/**
 * A map from string keys to values that remembers insertion order.
 *
 * Setting an existing key replaces its value without moving it.
 */
export class Document implements Iterable<[string, Value]> {
  readonly #entries: Map<string, Value>;

  constructor(entries?: Iterable<readonly [string, Value]>) {
    this.#entries = new Map(entries);
  }

  get size(): number {
    return this.#entries.size;
  }

  has(key: string): boolean {
    return this.#entries.has(key);
  }

  get(key: string): Value | undefined {
    return this.#entries.get(key);
  }

  set(key: string, val: Value): this {
    this.#entries.set(key, val);
    return this;
  }

  delete(key: string): boolean {
    return this.#entries.delete(key);
  }

  keys(): string[] {
    return Array.from(this.#entries.keys());
  }

  values(): Value[] {
    return Array.from(this.#entries.values());
  }

  items(): [string, Value][] {
    return Array.from(this.#entries.entries());
  }

  [Symbol.iterator](): Iterator<[string, Value]> {
    return this.#entries.entries();
  }

  /**
   * Returns true if both documents have the same keys in the same order, with
   * equal values.
   */
  equals(other: Document): boolean {
    if (this.size !== other.size) return false;
    const theirs = other.items();
    let i = 0;
    for (const [key, val] of this.#entries) {
      const [otherKey, otherVal] = theirs[i++];
      if (key !== otherKey || !equalValues(val, otherVal)) return false;
    }
    return true;
  }

  /** Returns a copy that shares its values with this one. */
  copy(): Document {
    return new Document(this.#entries);
  }

  /** Returns a copy that shares no mutable state with this one. */
  deepCopy(): Document {
    return new Document(
      this.items().map(([k, v]): [string, Value] => [k, copyValue(v)]),
    );
  }

  static from(record: Record<string, Value>): Document {
    return new Document(Object.entries(record));
  }
}

/**
 * A {@link Value} along with its kind.
 *
 * Numbers are told apart by value: a signed 32-bit integer is tagged "int" and
 * any other number is tagged "float", even if it's integral.
 */
export type Tagged =
  | { readonly kind: "null"; readonly val: null }
  | { readonly kind: "boolean"; readonly val: boolean }
  | { readonly kind: "int"; readonly val: number }
  | { readonly kind: "float"; readonly val: number }
  | { readonly kind: "text"; readonly val: string }
  | { readonly kind: "bytes"; readonly val: Uint8Array }
  | { readonly kind: "binary"; readonly val: Binary }
  | { readonly kind: "timestamp"; readonly val: Date }
  | { readonly kind: "objectId"; readonly val: ObjectId }
  | { readonly kind: "regexp"; readonly val: RegExp }
  | { readonly kind: "sequence"; readonly val: Value[] }
  | { readonly kind: "document"; readonly val: Document }
  | { readonly kind: "reference"; readonly val: DBRef | Document };

export type ValueKind = Tagged["kind"];

/** Returns true if a document is a reference in document form. */
export function isReference(doc: Document): boolean {
  return doc.has(referenceKey);
}

/** Classifies a value by kind. */
export function tag(val: Value): Tagged {
  if (val === null) {
    return { kind: "null", val };
  } else if (typeof val === "boolean") {
    return { kind: "boolean", val };
  } else if (typeof val === "number") {
    return (val | 0) === val && !Object.is(val, -0)
      ? { kind: "int", val }
      : { kind: "float", val };
  } else if (typeof val === "string") {
    return { kind: "text", val };
  } else if (Array.isArray(val)) {
    return { kind: "sequence", val };
  } else if (val instanceof Uint8Array) {
    return { kind: "bytes", val };
  } else if (val instanceof Binary) {
    return { kind: "binary", val };
  } else if (val instanceof Date) {
    return { kind: "timestamp", val };
  } else if (val instanceof ObjectId) {
    return { kind: "objectId", val };
  } else if (val instanceof RegExp) {
    return { kind: "regexp", val };
  } else if (val instanceof DBRef) {
    return { kind: "reference", val };
  }
  return isReference(val)
    ? { kind: "reference", val }
    : { kind: "document", val };
}

/** Returns true if both values have the same kind and contents. */
export function equalValues(a: Value, b: Value): boolean {
  const left = tag(a);
  const right = tag(b);
  switch (left.kind) {
    case "null":
    case "boolean":
    case "text":
      return left.val === right.val;
    case "int":
    case "float":
      return right.kind === left.kind &&
        (left.val === right.val ||
          (Number.isNaN(left.val) && Number.isNaN(right.val)));
    case "bytes":
      return right.kind === "bytes" && sameBytes(left.val, right.val);
    case "binary":
      return right.kind === "binary" && left.val.equals(right.val);
    case "timestamp":
      return right.kind === "timestamp" &&
        left.val.getTime() === right.val.getTime();
    case "objectId":
      return right.kind === "objectId" && left.val.equals(right.val);
    case "regexp":
      return right.kind === "regexp" &&
        left.val.source === right.val.source &&
        left.val.flags === right.val.flags;
    case "sequence": {
      if (right.kind !== "sequence") return false;
      const others = right.val;
      return left.val.length === others.length &&
        left.val.every((item, i) => equalValues(item, others[i]));
    }
    case "document":
      return right.kind === "document" && left.val.equals(right.val);
    case "reference":
      return right.kind === "reference" && equalReferences(left.val, right.val);
  }
}

function equalReferences(a: DBRef | Document, b: DBRef | Document): boolean {
  if (a instanceof DBRef && b instanceof DBRef) {
    return a.collection === b.collection && equalValues(a.id, b.id);
  } else if (a instanceof Document && b instanceof Document) {
    return a.equals(b);
  }
  return false;
}

/**
 * Copies a value so that the copy shares no mutable state with the original.
 */
export function copyValue(val: Value): Value {
  const t = tag(val);
  switch (t.kind) {
    case "bytes":
      return t.val.slice();
    case "binary":
      return new Binary(t.val.bytes, t.val.subtype);
    case "timestamp":
      return new Date(t.val.getTime());
    case "regexp":
      return new RegExp(t.val.source, t.val.flags);
    case "sequence":
      return t.val.map(copyValue);
    case "document":
      return t.val.deepCopy();
    case "reference":
      return t.val instanceof DBRef
        ? new DBRef(t.val.collection, copyValue(t.val.id))
        : t.val.deepCopy();
    default:
      return t.val;
  }
}

/**
 * Returns how deeply sequences and documents are nested in a value.
 *
 * Leaves have depth 0, including references. A sequence or document has a
 * depth one more than its deepest element, or 1 when empty.
 */
export function nestingDepth(val: Value): number {
  const t = tag(val);
  let items: Value[];
  if (t.kind === "sequence") {
    items = t.val;
  } else if (t.kind === "document") {
    items = t.val.values();
  } else {
    return 0;
  }
  const deepest = items.reduce<number>(
    (max, v) => Math.max(max, nestingDepth(v)),
    0,
  );
  return 1 + deepest;
}

/**
 * Converts a reference to its document form, with `$ref` and `$id` keys.
 */
export function referenceToDocument(ref: DBRef): Document {
  const entries: [string, Value][] = [
    [referenceKey, ref.collection],
    ["$id", ref.id],
  ];
  return new Document(entries);
}
