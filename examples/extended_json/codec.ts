import {
  Binary,
  DBRef,
  Document,
  fromHex,
  ObjectId,
  tag,
  toHex,
  type Value,
} from "@/mod.ts";

// Values that JSON can't represent directly are wrapped in single-purpose
// objects with "$" keys. Documents are stored as a list of pairs, because
// JSON objects don't keep integer-like keys in insertion order.

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

function toJson(val: Value): Json {
  const t = tag(val);
  switch (t.kind) {
    case "null":
    case "boolean":
    case "int":
    case "float":
    case "text":
      return t.val;
    case "bytes":
      return { $bytes: toHex(t.val) };
    case "binary":
      return { $binary: toHex(t.val.bytes), $type: t.val.subtype };
    case "timestamp":
      return { $date: t.val.getTime() };
    case "objectId":
      return { $oid: t.val.toHexString() };
    case "regexp":
      return { $regex: t.val.source, $options: t.val.flags };
    case "sequence":
      return t.val.map(toJson);
    case "document":
      return documentToJson(t.val);
    case "reference":
      if (t.val instanceof DBRef) {
        return { $ref: t.val.collection, $id: toJson(t.val.id) };
      }
      return documentToJson(t.val);
  }
}

function documentToJson(doc: Document): Json {
  return { $doc: doc.items().map(([k, v]) => [k, toJson(v)]) };
}

/** Converts a value to a JSON string. */
export function encode(val: Value): string {
  return JSON.stringify(toJson(val));
}

function isObject(json: Json): json is { [key: string]: Json } {
  return typeof json === "object" && json !== null && !Array.isArray(json);
}

function str(json: Json | undefined, field: string): string {
  if (typeof json !== "string") {
    throw new Error(`${field} must be a string`);
  }
  return json;
}

function num(json: Json | undefined, field: string): number {
  if (typeof json !== "number") {
    throw new Error(`${field} must be a number`);
  }
  return json;
}

function fromJson(json: Json): Value {
  if (Array.isArray(json)) {
    return json.map(fromJson);
  } else if (!isObject(json)) {
    return json;
  }

  const keys = Object.keys(json);
  if (keys.includes("$doc")) {
    const pairs = json.$doc;
    if (!Array.isArray(pairs)) {
      throw new Error("$doc must be an array");
    }
    return new Document(pairs.map((pair): [string, Value] => {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw new Error("each $doc entry must be a pair");
      }
      return [str(pair[0], "key"), fromJson(pair[1])];
    }));
  } else if (keys.includes("$bytes")) {
    return fromHex(str(json.$bytes, "$bytes"));
  } else if (keys.includes("$binary")) {
    return new Binary(
      fromHex(str(json.$binary, "$binary")),
      num(json.$type, "$type"),
    );
  } else if (keys.includes("$date")) {
    return new Date(num(json.$date, "$date"));
  } else if (keys.includes("$oid")) {
    return ObjectId.fromHexString(str(json.$oid, "$oid"));
  } else if (keys.includes("$regex")) {
    return new RegExp(
      str(json.$regex, "$regex"),
      str(json.$options, "$options"),
    );
  } else if (keys.includes("$ref")) {
    const id = json.$id;
    if (id === undefined) {
      throw new Error("$id is missing");
    }
    return new DBRef(str(json.$ref, "$ref"), fromJson(id));
  }
  throw new Error(`unknown wrapper: ${JSON.stringify(keys)}`);
}

/** Converts a JSON string from {@link encode} back to a value. */
export function decode(text: string): Value {
  const parsed: Json = JSON.parse(text);
  return fromJson(parsed);
}
