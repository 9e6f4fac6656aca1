import * as fc from "fast-check";
import { I64_MIN, U64_MAX } from "../value/integer";
import { PlistDate } from "../value/plist-date";
import { Uid } from "../value/uid";
import { PlistValue } from "../value/value";

export interface PlistValueArbitraryOptions {
  /** UIDs have no XML form */
  readonly withUids: boolean;
  readonly strings: fc.Arbitrary<string>;
  readonly reals: fc.Arbitrary<number>;
  readonly dates: fc.Arbitrary<PlistDate>;
}

export const binaryValueOptions: PlistValueArbitraryOptions = {
  withUids: true,
  strings: fc.string({ unit: 'binary', maxLength: 20 }),
  reals: fc.double(),
  // within the range of Date
  dates: fc.double({ min: -8e12, max: 8e12, noNaN: true }).map(seconds => new PlistDate(seconds)),
};

/** only what survives a trip through XML text exactly: printable ASCII, whole-second dates */
export const xmlValueOptions: PlistValueArbitraryOptions = {
  withUids: false,
  strings: fc.string({ maxLength: 20 }),
  reals: fc.double(),
  dates: fc.integer({ min: -3_000_000_000, max: 3_000_000_000 }).map(seconds => new PlistDate(seconds)),
};

export function plistValueArbitrary(options: PlistValueArbitraryOptions): fc.Arbitrary<PlistValue> {
  const scalars: fc.Arbitrary<PlistValue>[] = [
    options.strings,
    fc.boolean(),
    options.reals,
    fc.bigInt({ min: I64_MIN, max: U64_MAX }),
    fc.uint8Array({ maxLength: 16 }),
    options.dates,
  ];
  if (options.withUids) {
    scalars.push(fc.bigUintN(64).map(value => new Uid(value)));
  }
  const scalar = fc.oneof(...scalars);

  const value: fc.Memo<PlistValue> = fc.memo(depth => depth <= 1
    ? scalar
    : fc.oneof(
      scalar,
      fc.array(value(depth - 1), { maxLength: 4 }),
      fc.uniqueArray(fc.tuple(options.strings, value(depth - 1)), { selector: ([key]) => key, maxLength: 4 })
        .map(entries => new Map(entries)),
    ));

  return value(3);
}
