import { assert, describe, expect, it } from "vitest";

import {
  arb,
  checkFails,
  DBRef,
  Document,
  equalValues,
  ObjectId,
  RecordingConsole,
} from "@/mod.ts";
import { decode, encode } from "./codec.ts";

describe("encode", () => {
  it("writes documents as pairs, keeping key order", () => {
    expect(encode(Document.from({ "1": 1, a: 2 }))).toBe(
      '{"$doc":[["1",1],["a",2]]}',
    );
  });
  it("wraps values that JSON can't represent", () => {
    const id = ObjectId.fromHexString("000102030405060708090a0b");
    expect(encode([Uint8Array.of(255), new Date(5), id, /x/i])).toBe(
      '[{"$bytes":"ff"},{"$date":5},{"$oid":"000102030405060708090a0b"},' +
        '{"$regex":"x","$options":"i"}]',
    );
    expect(encode(new DBRef("users", "u1"))).toBe(
      '{"$ref":"users","$id":"u1"}',
    );
  });
});

describe("decode", () => {
  it("reads back any generated value", () => {
    checkFails(
      assert,
      (v) => equalValues(decode(encode(v)), v),
      arb.value(3),
      { trials: 50, console: new RecordingConsole() },
    );
  });
  it("rejects a malformed document", () => {
    expect(() => decode('{"$doc":5}')).toThrow("$doc must be an array");
    expect(() => decode('{"$doc":[["a"]]}')).toThrow(
      "each $doc entry must be a pair",
    );
  });
  it("rejects an unknown wrapper", () => {
    expect(() => decode('{"x":1}')).toThrow('unknown wrapper: ["x"]');
  });
});
