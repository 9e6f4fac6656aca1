import { cfAbsoluteTimeEpochMilliseconds } from "../bplist/constants/epoch";

/** the furthest a `Date` reaches either side of the Unix epoch */
const maxUnixMilliseconds = 8.64e15;

/**
 * An absolute point in time, stored the way the binary format stores it:
 * floating-point seconds relative to 2001-01-01T00:00:00Z.
 *
 * Keeping the raw seconds (rather than a `Date`, which only has millisecond precision)
 * means a binary round trip reproduces the exact value.
 */
export class PlistDate {
  constructor(readonly secondsSinceEpoch: number) {
    if (!PlistDate.isRepresentable(secondsSinceEpoch)) {
      throw new RangeError(`PlistDate must be finite and within the range of Date, got ${secondsSinceEpoch}`);
    }
  }

  static isRepresentable(secondsSinceEpoch: number) {
    return Number.isFinite(secondsSinceEpoch)
      && Math.abs(cfAbsoluteTimeEpochMilliseconds + secondsSinceEpoch * 1e3) <= maxUnixMilliseconds;
  }

  static fromDate(date: Date) {
    return PlistDate.fromUnixMilliseconds(date.getTime());
  }

  static fromUnixMilliseconds(milliseconds: number) {
    return new PlistDate((milliseconds - cfAbsoluteTimeEpochMilliseconds) / 1e3);
  }

  /**
   * @returns undefined when the string is not a date `Date.parse` understands
   */
  static fromISOString(iso: string) {
    const milliseconds = Date.parse(iso);
    return Number.isNaN(milliseconds) ? undefined : PlistDate.fromUnixMilliseconds(milliseconds);
  }

  toUnixMilliseconds() {
    return cfAbsoluteTimeEpochMilliseconds + this.secondsSinceEpoch * 1e3;
  }

  toDate() {
    return new Date(this.toUnixMilliseconds());
  }

  /** ISO 8601 in UTC; whole seconds are written without a fraction, as Apple's tools do. */
  toISOString() {
    return this.toDate().toISOString().replace('.000Z', 'Z');
  }

  equals(other: PlistDate) {
    return Object.is(this.secondsSinceEpoch, other.secondsSinceEpoch);
  }

  toString() {
    return `PlistDate<${this.toISOString()}>`;
  }
}
