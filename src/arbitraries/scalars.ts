import type { Sampler } from "../arbitrary_class.ts";

import { Arbitrary } from "../arbitrary_class.ts";
import { Binary, binarySubtypes, ObjectId } from "../scalars.ts";
import { chooseValue, intRange } from "./basics.ts";
import { bytes } from "./strings.ts";

const yearArb = intRange(1970, 2037);
const monthArb = intRange(1, 12);
// Every month has 28 days.
const dayArb = intRange(1, 28);
const hourArb = intRange(0, 23);
const minuteArb = intRange(0, 59);
const millisArb = intRange(0, 999);

/**
 * Returns an Arbitrary that generates a Date between 1970 and 2037, with
 * millisecond precision.
 *
 * The fields are picked independently in UTC, so the Date has no timezone
 * offset to account for.
 */
export const timestamp: () => Arbitrary<Date> = Arbitrary.from((random) => {
  const year = yearArb.generate(random);
  const month = monthArb.generate(random);
  const day = dayArb.generate(random);
  const hour = hourArb.generate(random);
  const minute = minuteArb.generate(random);
  const second = minuteArb.generate(random);
  const millis = millisArb.generate(random);
  return new Date(
    Date.UTC(year, month - 1, day, hour, minute, second, millis),
  );
}, { name: "timestamp" }).asFunction();

const objectIdBytes = bytes(intRange(ObjectId.byteLength, ObjectId.byteLength));

/** Returns an Arbitrary that generates an ObjectId from random bytes. */
export const objectId: () => Arbitrary<ObjectId> = objectIdBytes.map((b) =>
  new ObjectId(b)
).with({ name: "objectId" }).asFunction();

const subtypeArb = chooseValue(Object.values(binarySubtypes));

/**
 * Defines an Arbitrary that generates a {@link Binary} with one of the
 * subtypes in {@link binarySubtypes}.
 */
export function binary(length: Sampler<number>): Arbitrary<Binary> {
  const data = bytes(length);
  return Arbitrary.from(
    (random) => new Binary(data.generate(random), subtypeArb.generate(random)),
    { name: "binary" },
  );
}
