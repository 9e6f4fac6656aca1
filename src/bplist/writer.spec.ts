import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { EncodeError, EncodeErrorKind } from '../errors/encode-error';
import { EventStreamError, EventStreamErrorKind } from '../errors/event-stream-error';
import { binaryValueOptions, plistValueArbitrary } from '../testing/arbitraries';
import { be } from '../testing/build-bplist';
import { captureError } from '../testing/capture-error';
import { PlistDate } from '../value/plist-date';
import { Uid } from '../value/uid';
import { PlistValue, valuesEqual } from '../value/value';
import { decodeBinary, encodeBinary } from './index';
import { BinaryWriter, widthFor } from './writer';

/** the trailer is the last 32 bytes: 5 unused, sort version, offsetIntSize, objectRefSize, numObjects, topObject, offsetTableOffset */
function readTrailer(bytes: Uint8Array) {
  const view = new DataView(bytes.buffer, bytes.byteOffset + bytes.byteLength - 32, 32);
  return {
    offsetIntSize: view.getUint8(6),
    objectRefSize: view.getUint8(7),
    numObjects: view.getBigUint64(8),
    topObject: view.getBigUint64(16),
    offsetTableOffset: view.getBigUint64(24),
  };
}

/** the record of the first object, which follows the 8-byte header */
function firstRecord(bytes: Uint8Array, length: number) {
  return [...bytes.subarray(8, 8 + length)];
}

describe('BinaryWriter', () => {
  it('interns equal strings into one object', () => {
    const bytes = encodeBinary(['x', 'x', 'x']);

    expect(readTrailer(bytes).numObjects).toBe(2n);
    expect(firstRecord(bytes, 4)).toEqual([0xA3, 0x01, 0x01, 0x01]);
    expect(decodeBinary(bytes)).toEqual(['x', 'x', 'x']);
  });

  it('interns equal dictionary values into one object', () => {
    const value = new Map([['a', 'x'], ['b', 'x'], ['c', 'x']]);
    const bytes = encodeBinary(value);

    expect(readTrailer(bytes).numObjects).toBe(5n);
    expect(firstRecord(bytes, 7)).toEqual([0xD3, 0x01, 0x03, 0x04, 0x02, 0x02, 0x02]);
    expect(decodeBinary(bytes)).toEqual(value);
  });

  it('keeps integers and reals with the same numeric value apart', () => {
    const bytes = encodeBinary([1n, 1]);

    expect(readTrailer(bytes).numObjects).toBe(3n);
    expect(decodeBinary(bytes)).toEqual([1n, 1]);
  });

  it('never interns collections', () => {
    const bytes = encodeBinary([[], []]);
    expect(readTrailer(bytes).numObjects).toBe(3n);
  });

  it('numbers objects in first-seen order with the root at 0', () => {
    const bytes = encodeBinary(new Map([['k', 'v']]));
    const trailer = readTrailer(bytes);

    expect(trailer.topObject).toBe(0n);
    expect([...bytes.subarray(8, 15)]).toEqual([0xD1, 0x01, 0x02, 0x51, 0x6B, 0x51, 0x76]);
  });

  it.each<[bigint, number[]]>([
    [0n, [0x10, 0x00]],
    [255n, [0x10, 0xFF]],
    [256n, [0x11, 0x01, 0x00]],
    [0xFFFF_FFFFn, [0x12, 0xFF, 0xFF, 0xFF, 0xFF]],
    [0x1_0000_0000n, [0x13, ...be(0x1_0000_0000n, 8)]],
    [-1n, [0x13, ...be(-1n, 8)]],
    [-(2n ** 63n), [0x13, 0x80, 0, 0, 0, 0, 0, 0, 0]],
    [2n ** 63n, [0x14, ...be(2n ** 63n, 16)]],
    [2n ** 64n - 1n, [0x14, ...be(2n ** 64n - 1n, 16)]],
  ])('writes %s as %j', (value, record) => {
    const bytes = encodeBinary(value);

    expect(firstRecord(bytes, record.length)).toEqual(record);
    expect(decodeBinary(bytes)).toBe(value);
  });

  it('rejects integers beyond 64 bits by default', () => {
    const error = captureError(() => encodeBinary(2n ** 64n));
    expect(error).toBeInstanceOf(EncodeError);
    expect(error).toMatchObject({ kind: EncodeErrorKind.IntegerOverflow });
  });

  it('round-trips 128-bit integers with wideIntegers', () => {
    const options = { unstable: { wideIntegers: true } };
    for (const value of [2n ** 64n, -(2n ** 127n), 2n ** 127n - 1n]) {
      expect(decodeBinary(encodeBinary(value, options), options)).toBe(value);
    }
  });

  it('rejects integers beyond 128 bits even with wideIntegers', () => {
    const error = captureError(() => encodeBinary(2n ** 127n, { unstable: { wideIntegers: true } }));
    expect(error).toMatchObject({ name: 'EncodeError', kind: EncodeErrorKind.IntegerOverflow });
  });

  it('writes non-ASCII strings as UTF-16', () => {
    expect(firstRecord(encodeBinary('é'), 3)).toEqual([0x61, 0x00, 0xE9]);
    expect(firstRecord(encodeBinary('e'), 2)).toEqual([0x51, 0x65]);
  });

  it('writes sizes of 15 and more after the marker', () => {
    const bytes = encodeBinary(Array.from({ length: 20 }, () => true));

    expect(firstRecord(bytes, 3)).toEqual([0xAF, 0x10, 0x14]);
    expect(readTrailer(bytes).numObjects).toBe(2n);
  });

  it('writes reals and dates as 8 bytes and UIDs at the smallest width', () => {
    expect(firstRecord(encodeBinary(1.5), 1)).toEqual([0x23]);
    expect(firstRecord(encodeBinary(new PlistDate(0)), 1)).toEqual([0x33]);
    expect(firstRecord(encodeBinary(new Uid(0x1234n)), 3)).toEqual([0x81, 0x12, 0x34]);
  });

  it('widens references and offsets once there are more than 256 objects', () => {
    const value = Array.from({ length: 300 }, (_, i) => BigInt(i));
    const bytes = encodeBinary(value);
    const trailer = readTrailer(bytes);

    expect(trailer.numObjects).toBe(301n);
    expect(trailer.objectRefSize).toBe(2);
    expect(trailer.offsetIntSize).toBe(2);
    expect(decodeBinary(bytes)).toEqual(value);
  });

  it('is deterministic', () => {
    const value = new Map<string, PlistValue>([['list', [1n, 'two', 3.5]], ['flag', false]]);
    expect(encodeBinary(value)).toEqual(encodeBinary(value));
  });

  it('rejects malformed event streams', () => {
    const writer = new BinaryWriter();
    const error = captureError(() => writer.write({ type: 'endCollection' }));
    expect(error).toBeInstanceOf(EventStreamError);
    expect(error).toMatchObject({ kind: EventStreamErrorKind.UnexpectedEventType });
  });

  it('rejects an unfinished value', () => {
    const writer = new BinaryWriter();
    writer.write({ type: 'startArray' });
    expect(captureError(() => writer.finish())).toMatchObject({ kind: EventStreamErrorKind.UnexpectedEndOfEventStream });
  });

  it('round-trips arbitrary values', () => {
    fc.assert(
      fc.property(plistValueArbitrary(binaryValueOptions), value => {
        expect(valuesEqual(decodeBinary(encodeBinary(value)), value)).toBe(true);
      }),
      { numRuns: 200 },
    );
  });
});

describe('widthFor', () => {
  it.each([
    [0, 1],
    [255, 1],
    [256, 2],
    [65535, 2],
    [65536, 4],
    [2 ** 32, 8],
  ])('%d needs %d bytes', (max, width) => {
    expect(widthFor(max)).toBe(width);
  });
});
