export type AcceptedBitLength = 8 | 16 | 24 | 32 | 64 | -64 | 128 | -128;

/** byte widths allowed for offset-table entries and object references */
export const acceptedRefByteWidths = [1, 2, 3, 4, 8] as const;
export type AcceptedRefByteWidth = typeof acceptedRefByteWidths[number];

type BitLengthToType<T extends AcceptedBitLength> =
  T extends 64 | -64 | 128 | -128 ? bigint : number;

export type DeStructWithReader<T extends number | bigint = number | bigint> = ((v: DataView, offset: number) => ({ readonly value: T, readonly bytesRead: number }));

const readerMap: { readonly [K in AcceptedBitLength]: DeStructWithReader<BitLengthToType<K>> } = {
  [8]: (view, byteOffset) => ({ value: view.getUint8(byteOffset), bytesRead: 1 }),
  [16]: (view, byteOffset) => ({ value: view.getUint16(byteOffset), bytesRead: 2 }),
  [24]: (view, byteOffset) => ({ value: view.getUint16(byteOffset) * 0x100 + view.getUint8(byteOffset + 2), bytesRead: 3 }),
  [32]: (view, byteOffset) => ({ value: view.getUint32(byteOffset), bytesRead: 4 }),
  [64]: (view, byteOffset) => ({ value: view.getBigUint64(byteOffset), bytesRead: 8 }),
  [-64]: (view, byteOffset) => ({ value: view.getBigInt64(byteOffset), bytesRead: 8 }),
  [128]: (view, byteOffset) => {
    const high = view.getBigUint64(byteOffset);
    const low = view.getBigUint64(byteOffset + 8);
    return {
      value: (high << 64n) + low,
      bytesRead: 16,
    };
  },
  [-128]: (view, byteOffset) => {
    const high = view.getBigInt64(byteOffset);
    const low = view.getBigUint64(byteOffset + 8);
    return {
      value: (high << 64n) + low,
      bytesRead: 16,
    };
  },
};

export function getDeStructReaderBySize<T extends AcceptedBitLength>(bitLength: T): DeStructWithReader<BitLengthToType<T>> {
  return readerMap[bitLength];
}

/**
 * Reads an unsigned big-endian integer of width 1, 2, 3, 4 or 8 bytes as a `number`.
 * 8-byte values beyond `Number.MAX_SAFE_INTEGER` come back imprecise, which callers treat as out of range anyway.
 */
export function getRefReaderByWidth(byteWidth: AcceptedRefByteWidth): DeStructWithReader<number> {
  switch (byteWidth) {
    case 1:
      return readerMap[8];
    case 2:
      return readerMap[16];
    case 3:
      return readerMap[24];
    case 4:
      return readerMap[32];
    case 8: {
      const reader = readerMap[64];
      return (view, byteOffset) => ({ value: Number(reader(view, byteOffset).value), bytesRead: 8 });
    }
  }
}

/**
 * Reads an arbitrarily wide big-endian integer; two's complement when `signed`.
 */
export function readBigIntBE(view: DataView, byteOffset: number, byteLength: number, signed: boolean) {
  let value = 0n;
  for (let i = 0; i < byteLength; ++i) {
    value = (value << 8n) | BigInt(view.getUint8(byteOffset + i));
  }
  if (signed && byteLength > 0 && (view.getUint8(byteOffset) & 0x80) !== 0) {
    value -= 1n << BigInt(byteLength * 8);
  }
  return value;
}

export function* deStructWithIter<T extends number | bigint>(
  fns: Iterable<DeStructWithReader<T>>,
  view: DataView,
  byteOffset = 0,
) {
  let currentByteOffset = byteOffset;

  for (const fn of fns) {
    const { value, bytesRead } = fn(view, currentByteOffset);
    yield value;
    currentByteOffset += bytesRead;
  }
}

export function deStructWith<T extends number | bigint>(
  fns: Iterable<DeStructWithReader<T>>,
  view: DataView,
  byteOffset = 0,
): T[] {
  return [...deStructWithIter(fns, view, byteOffset)];
}

/**
 * Reads `count` consecutive values with the same reader.
 */
export function deStructRepeated<T extends number | bigint>(
  fn: DeStructWithReader<T>,
  count: number,
  view: DataView,
  byteOffset = 0,
): T[] {
  return deStructWith(repeat(fn, count), view, byteOffset);
}

function* repeat<T>(item: T, count: number) {
  for (let i = 0; i < count; ++i) {
    yield item;
  }
}
