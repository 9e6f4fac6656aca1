import { assert } from "../assert";
import { EncodeError, EncodeErrorKind } from "../errors/encode-error";
import { EventConsumer, PlistEvent, ScalarEvent } from "../events/event";
import { EventStreamValidator } from "../events/stream-validator";
import { ILogger } from "../shared/logger";
import { PlistOptions, resolveOptions } from "../shared/options";
import { I64_MIN, IntegerRange, integerRangeFor, isIntegerInRange } from "../value/integer";
import { ByteWriter } from "./byte-writer";
import { bplistMagicNumber, bplistVersion } from "./constants/magic-number";
import { Marker, extendedSizeNibble } from "./markers";
import { Trailer } from "./models/trailer";
import { ObjRef } from "./types/bplist-index-aliases";

type WriterObject =
  | { readonly type: 'scalar'; readonly event: ScalarEvent }
  | { readonly type: 'array'; readonly refs: ObjRef[] }
  | { readonly type: 'dictionary'; readonly keyRefs: ObjRef[]; readonly valueRefs: ObjRef[] };

type WriteWidth = 1 | 2 | 4 | 8;

/** smallest of 1, 2, 4 or 8 bytes that holds the unsigned `max` */
export function widthFor(max: number | bigint): WriteWidth {
  const value = BigInt(max);
  if (value < 0x100n) {
    return 1;
  }
  if (value < 0x1_0000n) {
    return 2;
  }
  if (value < 0x1_0000_0000n) {
    return 4;
  }
  return 8;
}

function float64Hex(value: number) {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return view.getBigUint64(0).toString(16);
}

/**
 * Equal scalars of the same kind share a key; the leading character keeps kinds apart.
 */
function internKey(event: ScalarEvent) {
  switch (event.type) {
    case 'string':
      return `s${event.value}`;
    case 'boolean':
      return `b${event.value}`;
    case 'integer':
      return `i${event.value}`;
    case 'real':
      return `r${float64Hex(event.value)}`;
    case 'date':
      return `d${float64Hex(event.value.secondsSinceEpoch)}`;
    case 'data':
      return `D${Buffer.from(event.value.buffer, event.value.byteOffset, event.value.byteLength).toString('hex')}`;
    case 'uid':
      return `u${event.value.value}`;
  }
}

function isAscii(value: string) {
  for (let i = 0; i < value.length; ++i) {
    if (value.charCodeAt(i) >= 0x80) {
      return false;
    }
  }
  return true;
}

/**
 * Consumer that encodes one value as a `bplist00` file.
 *
 * Objects are numbered in the order they are first seen, so the root is always object 0.
 * Scalars are interned; collections never are.
 */
export class BinaryWriter implements EventConsumer {
  private readonly _validator = new EventStreamValidator();
  private readonly _objects: WriterObject[] = [];
  private readonly _interned = new Map<string, ObjRef>();
  private readonly _stack: ObjRef[] = [];

  private readonly _logger: ILogger;
  private readonly _integerRange: IntegerRange;

  constructor(options?: PlistOptions) {
    const { logger, wideIntegers } = resolveOptions(options);
    this._logger = logger;
    this._integerRange = integerRangeFor(wideIntegers);
  }

  write(event: PlistEvent) {
    const keyPosition = this._validator.isExpectingKey;
    this._validator.accept(event);

    switch (event.type) {
      case 'startArray':
        this._open({ type: 'array', refs: [] }, keyPosition);
        return;
      case 'startDictionary':
        this._open({ type: 'dictionary', keyRefs: [], valueRefs: [] }, keyPosition);
        return;
      case 'endCollection':
        this._stack.pop();
        return;
      default:
        this._attach(this._intern(event), keyPosition);
    }
  }

  /**
   * Serializes everything written so far. The events must describe exactly one complete value.
   */
  finish(): Uint8Array {
    this._validator.finish();

    const numObjects = this._objects.length;
    const objectRefSize = widthFor(numObjects - 1);
    const out = new ByteWriter();
    out.writeBytes(new TextEncoder().encode(bplistMagicNumber + bplistVersion));

    const offsets: number[] = [];
    for (const object of this._objects) {
      offsets.push(out.length);
      this._writeObject(out, object, objectRefSize);
    }

    const offsetTableOffset = out.length;
    const offsetIntSize = widthFor(offsetTableOffset);
    this._logger.debug('DBG: writing %d objects (%d interned scalars), objectRefSize=%d offsetIntSize=%d', numObjects, this._interned.size, objectRefSize, offsetIntSize);

    for (const offset of offsets) {
      out.writeUIntBE(offset, offsetIntSize);
    }

    for (let i = 0; i < Trailer.unusedLeadingBytes; ++i) {
      out.writeUint8(0);
    }
    out.writeUint8(0); // sort version
    out.writeUint8(offsetIntSize);
    out.writeUint8(objectRefSize);
    out.writeUIntBE(numObjects, 8);
    out.writeUIntBE(0, 8); // top object
    out.writeUIntBE(offsetTableOffset, 8);

    return out.toUint8Array();
  }

  private _open(object: WriterObject, keyPosition: boolean) {
    const ref = this._objects.length;
    this._objects.push(object);
    this._attach(ref, keyPosition);
    this._stack.push(ref);
  }

  private _intern(event: ScalarEvent): ObjRef {
    if (event.type === 'integer' && !isIntegerInRange(event.value, this._integerRange)) {
      throw new EncodeError(EncodeErrorKind.IntegerOverflow, `integer ${event.value} is outside [${this._integerRange.min}, ${this._integerRange.max}]`);
    }

    const key = internKey(event);
    const existing = this._interned.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const ref = this._objects.length;
    this._objects.push({ type: 'scalar', event });
    this._interned.set(key, ref);
    return ref;
  }

  private _attach(ref: ObjRef, keyPosition: boolean) {
    const parentRef = this._stack.at(-1);
    if (parentRef === undefined) {
      return;
    }
    const parent = this._objects[parentRef];
    if (parent.type === 'array') {
      parent.refs.push(ref);
    }
    else if (parent.type === 'dictionary') {
      (keyPosition ? parent.keyRefs : parent.valueRefs).push(ref);
    }
  }

  private _writeObject(out: ByteWriter, object: WriterObject, objectRefSize: WriteWidth) {
    switch (object.type) {
      case 'array':
        writeSizedMarker(out, Marker.array, object.refs.length);
        object.refs.forEach(ref => out.writeUIntBE(ref, objectRefSize));
        return;
      case 'dictionary':
        assert(object.keyRefs.length === object.valueRefs.length, 'dictionary keys and values are unbalanced');
        writeSizedMarker(out, Marker.dict, object.keyRefs.length);
        object.keyRefs.forEach(ref => out.writeUIntBE(ref, objectRefSize));
        object.valueRefs.forEach(ref => out.writeUIntBE(ref, objectRefSize));
        return;
      case 'scalar':
        writeScalar(out, object.event);
    }
  }
}

function writeScalar(out: ByteWriter, event: ScalarEvent) {
  switch (event.type) {
    case 'boolean':
      out.writeUint8(event.value ? Marker.true : Marker.false);
      return;
    case 'integer':
      writeInt(out, event.value);
      return;
    case 'real':
      out.writeUint8(Marker.real | 3);
      out.writeFloat64(event.value);
      return;
    case 'date':
      out.writeUint8(Marker.date | 3);
      out.writeFloat64(event.value.secondsSinceEpoch);
      return;
    case 'data':
      writeSizedMarker(out, Marker.data, event.value.byteLength);
      out.writeBytes(event.value);
      return;
    case 'string':
      writeString(out, event.value);
      return;
    case 'uid': {
      const bytes = widthFor(event.value.value);
      out.writeUint8(Marker.uid | (bytes - 1));
      out.writeUIntBE(event.value.value, bytes);
      return;
    }
  }
}

/**
 * 1, 2 and 4 byte ints are read back unsigned and 8 byte ints signed,
 * so only non-negative values below 2^32 use the short forms and `[2^63, 2^64)` needs 16 bytes.
 */
function writeInt(out: ByteWriter, value: bigint) {
  let bytes: number;
  if (value >= 0n && value < 0x1_0000_0000n) {
    bytes = widthFor(value);
  }
  else if (value >= I64_MIN && value < 2n ** 63n) {
    bytes = 8;
  }
  else {
    bytes = 16;
  }
  out.writeUint8(Marker.int | Math.log2(bytes));
  out.writeUIntBE(value, bytes);
}

function writeSizedMarker(out: ByteWriter, marker: Marker, size: number) {
  if (size < extendedSizeNibble) {
    out.writeUint8(marker | size);
    return;
  }
  out.writeUint8(marker | extendedSizeNibble);
  writeInt(out, BigInt(size));
}

function writeString(out: ByteWriter, value: string) {
  if (isAscii(value)) {
    writeSizedMarker(out, Marker.ascii, value.length);
    for (let i = 0; i < value.length; ++i) {
      out.writeUint8(value.charCodeAt(i));
    }
    return;
  }
  writeSizedMarker(out, Marker.unicode, value.length);
  for (let i = 0; i < value.length; ++i) {
    out.writeUint16(value.charCodeAt(i));
  }
}
