import { U64_MAX } from "./integer";

/**
 * A reference-style integer, used by keyed archives to point at other objects.
 * Kept apart from ordinary integers so it survives a round trip as its own kind.
 */
export class Uid {
  constructor(readonly value: bigint) {
    if (value < 0n || value > U64_MAX) {
      throw new RangeError(`Uid must fit in an unsigned 64-bit integer, got ${value}`);
    }
  }

  equals(other: Uid) {
    return this.value === other.value;
  }

  toString() {
    return `Uid<${this.value}>`;
  }
}
