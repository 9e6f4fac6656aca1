import { ParseError, ParseErrorKind } from "../errors/parse-error";
import { ILogger } from "../shared/logger";
import { integerRangeFor, IntegerRange, isIntegerInRange, U64_MAX } from "../value/integer";
import { PlistDate } from "../value/plist-date";
import { Uid } from "../value/uid";
import { AcceptedRefByteWidth, deStructRepeated, getDeStructReaderBySize, getRefReaderByWidth, readBigIntBE } from "./de-struct";
import { Marker, byteToMarker, extendedSizeNibble } from "./markers";

/** longest run of char codes handed to `String.fromCharCode` at once */
const charCodeChunkLength = 0x2000;

/**
 * Bounds-checked primitive reads over the whole input buffer.
 * Every read takes the exclusive `limit` of the region it is allowed to touch;
 * crossing it raises a {@link ParseError} rather than a DataView RangeError.
 */
export abstract class BaseReader {
  protected readonly view: DataView;
  protected readonly integerRange: IntegerRange;

  protected constructor(
    protected readonly bytes: Uint8Array,
    protected readonly logger: ILogger,
    wideIntegers: boolean,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.integerRange = integerRangeFor(wideIntegers);
  }

  protected ensureAvailable(offset: number, byteLength: number, limit: number, what: string) {
    if (!Number.isSafeInteger(byteLength) || byteLength < 0 || offset + byteLength > limit) {
      throw new ParseError(ParseErrorKind.TruncatedInput, `${what} needs ${byteLength} bytes but only ${Math.max(limit - offset, 0)} remain`, { byteOffset: offset });
    }
  }

  protected readByte(offset: number, limit: number) {
    this.ensureAvailable(offset, 1, limit, 'marker');
    return this.view.getUint8(offset);
  }

  /**
   * Reads an int object (marker byte included) at `offset`.
   * According to the comments in CFBinaryPList.c, ints of size 1|2|4 are always unsigned while ints of size 8|16 are always signed;
   * anything wider is read as signed too and must still fit {@link integerRange}.
   */
  protected readIntObject(offset: number, limit: number) {
    const { marker, lowerNibble } = byteToMarker(this.readByte(offset, limit), { byteOffset: offset });
    if (marker !== Marker.int) {
      throw new ParseError(ParseErrorKind.InvalidObjectLength, `expected an int object but found ${Marker[marker]}`, { byteOffset: offset });
    }
    const bytes = 2 ** lowerNibble;
    return {
      value: this.readInt(offset + 1, bytes, limit),
      bytesRead: 1 + bytes,
    };
  }

  protected readInt(offset: number, bytes: number, limit: number) {
    this.ensureAvailable(offset, bytes, limit, 'int');

    let value: bigint;
    switch (bytes) {
      case 1:
        value = BigInt(getDeStructReaderBySize(8)(this.view, offset).value);
        break;
      case 2:
        value = BigInt(getDeStructReaderBySize(16)(this.view, offset).value);
        break;
      case 4:
        value = BigInt(getDeStructReaderBySize(32)(this.view, offset).value);
        break;
      case 8:
        value = getDeStructReaderBySize(-64)(this.view, offset).value;
        break;
      case 16:
        value = getDeStructReaderBySize(-128)(this.view, offset).value;
        break;
      default:
        value = readBigIntBE(this.view, offset, bytes, true);
    }

    if (!isIntegerInRange(value, this.integerRange)) {
      throw new ParseError(ParseErrorKind.IntegerOverflow, `${bytes}-byte int ${value} is outside the accepted range`, { byteOffset: offset });
    }
    return value;
  }

  /**
   * Applies the general size rule: a lower nibble below 0xF is the size itself,
   * 0xF means an int object holding the size follows the marker.
   */
  protected readObjectLength(lowerNibble: number, offset: number, limit: number) {
    if (lowerNibble !== extendedSizeNibble) {
      return { length: lowerNibble, bytesRead: 0 };
    }
    const { value, bytesRead } = this.readIntObject(offset, limit);
    if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new ParseError(ParseErrorKind.InvalidObjectLength, `object length ${value} is not usable`, { byteOffset: offset });
    }
    return { length: Number(value), bytesRead };
  }

  protected readReal(offset: number, bytes: number, limit: number) {
    this.ensureAvailable(offset, bytes, limit, 'real');
    switch (bytes) {
      case 4:
        return this.view.getFloat32(offset);
      case 8:
        return this.view.getFloat64(offset);
    }

    throw new ParseError(ParseErrorKind.InvalidObjectLength, `unexpected byte length for real: ${bytes}`, { byteOffset: offset });
  }

  protected readDate(offset: number, bytes: number, limit: number) {
    const secondsSinceEpoch = this.readReal(offset, bytes, limit);
    if (!PlistDate.isRepresentable(secondsSinceEpoch)) {
      throw new ParseError(ParseErrorKind.InvalidDate, `date ${secondsSinceEpoch} is not finite or out of range`, { byteOffset: offset });
    }
    return new PlistDate(secondsSinceEpoch);
  }

  protected readData(offset: number, size: number, limit: number) {
    this.ensureAvailable(offset, size, limit, 'data');
    return this.bytes.slice(offset, offset + size);
  }

  /**
   * Single-byte strings are ASCII when written by Apple's tools; bytes above 0x7F are taken as Latin-1.
   */
  protected readAscii(offset: number, bytes: number, limit: number) {
    this.ensureAvailable(offset, bytes, limit, 'string');
    return charCodesToString(this.bytes.subarray(offset, offset + bytes));
  }

  protected readUnicode16(offset: number, count: number, limit: number) {
    // damn you little-endian; if Uint16Array were bigendian we could just read that
    this.ensureAvailable(offset, count * 2, limit, 'UTF-16 string');
    const codeUnits = deStructRepeated(getDeStructReaderBySize(16), count, this.view, offset);
    return charCodesToString(codeUnits);
  }

  protected readUid(offset: number, bytes: number, limit: number) {
    this.ensureAvailable(offset, bytes, limit, 'UID');
    const value = readBigIntBE(this.view, offset, bytes, false);
    if (value > U64_MAX) {
      throw new ParseError(ParseErrorKind.IntegerOverflow, `UID ${value} does not fit in 64 bits`, { byteOffset: offset });
    }
    return new Uid(value);
  }

  protected readObjRefs(offset: number, count: number, objectRefSize: AcceptedRefByteWidth, limit: number) {
    this.ensureAvailable(offset, count * objectRefSize, limit, 'object references');
    return deStructRepeated(getRefReaderByWidth(objectRefSize), count, this.view, offset);
  }
}

function charCodesToString(codes: ArrayLike<number>) {
  let result = '';
  for (let start = 0; start < codes.length; start += charCodeChunkLength) {
    const chunk = Array.from({ length: Math.min(charCodeChunkLength, codes.length - start) }, (_, i) => codes[start + i]);
    result += String.fromCharCode(...chunk);
  }
  return result;
}
