/**
 * Hand-assembles binary plists for tests, so the reader can be checked against files
 * no writer in this package would produce.
 */
export interface BplistLayout {
  /** raw object records, in object-table order */
  readonly objects: readonly (readonly number[])[];
  readonly offsetIntSize?: number;
  readonly objectRefSize?: number;
  readonly topObject?: number;
  /** defaults to `objects.length` */
  readonly numObjects?: number;
  /** bytes between the last object and the offset table */
  readonly padding?: readonly number[];
  /** defaults to `bplist00` */
  readonly header?: string;
}

/** `value` as `width` big-endian bytes */
export function be(value: number | bigint, width: number): number[] {
  let remaining = BigInt.asUintN(width * 8, BigInt(value));
  const bytes: number[] = [];
  for (let i = 0; i < width; ++i) {
    bytes.unshift(Number(remaining & 0xFFn));
    remaining >>= 8n;
  }
  return bytes;
}

export function ascii(text: string): number[] {
  return [...text].map(char => char.charCodeAt(0));
}

export function buildBplist(layout: BplistLayout): Uint8Array {
  const {
    objects,
    offsetIntSize = 1,
    objectRefSize = 1,
    topObject = 0,
    numObjects = objects.length,
    padding = [],
    header = 'bplist00',
  } = layout;

  const bytes = ascii(header);
  const offsets: number[] = [];
  for (const object of objects) {
    offsets.push(bytes.length);
    bytes.push(...object);
  }
  bytes.push(...padding);

  const offsetTableOffset = bytes.length;
  for (const offset of offsets) {
    bytes.push(...be(offset, offsetIntSize));
  }

  bytes.push(0, 0, 0, 0, 0, 0, offsetIntSize, objectRefSize);
  bytes.push(...be(numObjects, 8), ...be(topObject, 8), ...be(offsetTableOffset, 8));
  return Uint8Array.from(bytes);
}

/** `{ "a": true }` with the given widths */
export function buildSingleEntryDict(offsetIntSize = 1, objectRefSize = 1) {
  return buildBplist({
    objects: [
      [0xD1, ...be(1, objectRefSize), ...be(2, objectRefSize)],
      [0x51, ...ascii('a')],
      [0x09],
    ],
    offsetIntSize,
    objectRefSize,
  });
}
