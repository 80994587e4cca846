import type { Value } from "./values.ts";

const hexDigits = "0123456789abcdef";

/** Converts bytes to lowercase hexadecimal. */
export function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += hexDigits[b >> 4] + hexDigits[b & 0xf];
  }
  return out;
}

/**
 * Parses hexadecimal into bytes.
 *
 * @throws if the input has an odd length or a character that isn't a hex digit.
 */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new Error(`hex string must have an even length; got ${hex.length}`);
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    const hi = hexDigits.indexOf(hex[i * 2].toLowerCase());
    const lo = hexDigits.indexOf(hex[i * 2 + 1].toLowerCase());
    if (hi < 0 || lo < 0) {
      throw new Error(`invalid hex digit at offset ${i * 2}`);
    }
    out[i] = hi * 16 + lo;
  }
  return out;
}

/** Returns true if both arrays hold the same bytes. */
export function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Binary subtypes that the generators use. */
export const binarySubtypes = {
  generic: 0x00,
  function: 0x01,
  uuid: 0x04,
  md5: 0x05,
  userDefined: 0x80,
} as const;

/**
 * A blob of bytes tagged with a subtype.
 */
export class Binary {
  readonly bytes: Uint8Array;

  /**
   * @param subtype an integer between 0 and 255.
   */
  constructor(bytes: Uint8Array, readonly subtype: number = 0) {
    if (!Number.isInteger(subtype) || subtype < 0 || subtype > 255) {
      throw new Error(
        `binary subtype must be between 0 and 255; got ${subtype}`,
      );
    }
    this.bytes = bytes.slice();
  }

  equals(other: Binary): boolean {
    return this.subtype === other.subtype &&
      sameBytes(this.bytes, other.bytes);
  }
}

/**
 * A 12-byte identifier.
 */
export class ObjectId {
  static readonly byteLength = 12;

  readonly #bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    if (bytes.length !== ObjectId.byteLength) {
      throw new Error(
        `an ObjectId needs ${ObjectId.byteLength} bytes; got ${bytes.length}`,
      );
    }
    this.#bytes = bytes.slice();
  }

  /** The seconds-since-epoch stored in the first four bytes. */
  get timestamp(): number {
    const b = this.#bytes;
    return ((b[0] << 24) >>> 0) + (b[1] << 16) + (b[2] << 8) + b[3];
  }

  toHexString(): string {
    return toHex(this.#bytes);
  }

  equals(other: ObjectId): boolean {
    return sameBytes(this.#bytes, other.#bytes);
  }

  static fromHexString(hex: string): ObjectId {
    return new ObjectId(fromHex(hex));
  }
}

/**
 * A reference to a value stored elsewhere, by collection name and id.
 */
export class DBRef {
  constructor(readonly collection: string, readonly id: Value) {}
}
