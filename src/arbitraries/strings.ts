import type { Sampler } from "../arbitrary_class.ts";

import { Arbitrary } from "../arbitrary_class.ts";
import { intRange, pickLength } from "./basics.ts";
import { sequence } from "./arrays.ts";

/**
 * Characters that are never generated by {@link text}, so that its output can
 * be used as a document key.
 */
export const reservedKeyChars = ".$";

function charFrom(min: number, max: number, name: string): Arbitrary<string> {
  return intRange(min, max).map((code) => String.fromCodePoint(code)).with({
    name,
  });
}

/**
 * Returns an Arbitrary that generates a character from code points 1 to 0xFFF.
 */
export const unicodeChar: () => Arbitrary<string> = charFrom(
  1,
  0xfff,
  "unicodeChar",
).asFunction();

/** Returns an Arbitrary that generates a character from 32 to 126. */
export const printableChar: () => Arbitrary<string> = charFrom(
  32,
  126,
  "printableChar",
).asFunction();

/** Returns an Arbitrary that generates a character from 0 to 255. */
export const latin1Char: () => Arbitrary<string> = charFrom(
  0,
  255,
  "latin1Char",
).asFunction();

function join(chars: Sampler<string>, length: Sampler<number>, name: string) {
  return sequence(chars, length).map((list) => list.join("")).with({ name });
}

/**
 * Defines an Arbitrary that generates strings of {@link unicodeChar}, leaving
 * out "." and "$".
 *
 * Those characters are dropped after the length is picked, so a string may be
 * shorter than the picked length.
 */
export function text(length: Sampler<number>): Arbitrary<string> {
  return sequence(unicodeChar(), length).map((list) =>
    list.filter((c) => !reservedKeyChars.includes(c)).join("")
  ).with({ name: "text" });
}

/** Defines an Arbitrary that generates strings of {@link printableChar}. */
export function printableText(length: Sampler<number>): Arbitrary<string> {
  return join(printableChar(), length, "printableText");
}

/** Defines an Arbitrary that generates strings of {@link latin1Char}. */
export function latin1Text(length: Sampler<number>): Arbitrary<string> {
  return join(latin1Char(), length, "latin1Text");
}

const byteArb = intRange(0, 255);

/** Defines an Arbitrary that generates byte arrays. */
export function bytes(length: Sampler<number>): Arbitrary<Uint8Array> {
  return Arbitrary.from((random) => {
    const n = pickLength(length, random, "bytes");
    const out = new Uint8Array(n);
    for (let i = 0; i < n; i++) {
      out[i] = byteArb.generate(random);
    }
    return out;
  }, { name: "bytes" });
}

const flagChars = ["i", "m", "s"];

/**
 * Defines an Arbitrary that generates regular expressions.
 *
 * The pattern is "a" repeated a random number of times. Each of the i, m and s
 * flags is set half of the time.
 */
export function regexp(length: Sampler<number>): Arbitrary<RegExp> {
  return Arbitrary.from((random) => {
    const pattern = "a".repeat(pickLength(length, random, "regexp"));
    const flags = flagChars.filter(() => random.int(0, 1) === 1).join("");
    return new RegExp(pattern, flags);
  }, { name: "regexp" });
}
