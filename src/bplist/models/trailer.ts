import { ParseError, ParseErrorKind } from "../../errors/parse-error";
import { headerByteLength } from "../constants/magic-number";
import { AcceptedRefByteWidth, acceptedRefByteWidths, getDeStructReaderBySize } from "../de-struct";

function isAcceptedWidth(width: number): width is AcceptedRefByteWidth {
  return acceptedRefByteWidths.some(accepted => accepted === width);
}

export class Trailer {
  static readonly trailerByteLength = 32;
  static readonly unusedLeadingBytes = 5;

  constructor(
    readonly sortVersion: number,
    /** size of offsets found in offsetTable that point to objects in object table */
    readonly offsetIntSize: AcceptedRefByteWidth,
    /** size of objectRefs that are found in arrays/dicts */
    readonly objectRefSize: AcceptedRefByteWidth,
    readonly numObjects: number,
    readonly topObject: number,
    readonly offsetTableOffset: number,
    readonly _trailerOffset: number,
  ) { }

  get offsetTableByteLength() {
    return this.numObjects * this.offsetIntSize;
  }

  static fromBuffer(view: DataView) {
    const trailerOffset = view.byteLength - this.trailerByteLength;
    if (trailerOffset < headerByteLength) {
      throw new ParseError(ParseErrorKind.TruncatedInput, `${view.byteLength} bytes is too short to hold a header and trailer`, { byteOffset: 0 });
    }

    const fieldsOffset = trailerOffset + this.unusedLeadingBytes;
    const u8 = getDeStructReaderBySize(8);
    const u64 = getDeStructReaderBySize(64);

    const sortVersion = u8(view, fieldsOffset).value;
    const offsetIntSize = u8(view, fieldsOffset + 1).value;
    const objectRefSize = u8(view, fieldsOffset + 2).value;
    const numObjects = u64(view, fieldsOffset + 3).value;
    const topObject = u64(view, fieldsOffset + 11).value;
    const offsetTableOffset = u64(view, fieldsOffset + 19).value;

    if (!isAcceptedWidth(offsetIntSize)) {
      throw new ParseError(ParseErrorKind.UnsupportedWidth, `offset size must be one of ${acceptedRefByteWidths.join(', ')} but is ${offsetIntSize}`, { byteOffset: fieldsOffset + 1 });
    }
    if (!isAcceptedWidth(objectRefSize)) {
      throw new ParseError(ParseErrorKind.UnsupportedWidth, `object reference size must be one of ${acceptedRefByteWidths.join(', ')} but is ${objectRefSize}`, { byteOffset: fieldsOffset + 2 });
    }
    if (numObjects === 0n) {
      throw new ParseError(ParseErrorKind.MalformedTrailer, 'trailer declares zero objects', { byteOffset: fieldsOffset + 3 });
    }
    if (topObject >= numObjects) {
      throw new ParseError(ParseErrorKind.InvalidObjectReference, `top object ${topObject} is not below the object count ${numObjects}`, { byteOffset: fieldsOffset + 11 });
    }
    if (offsetTableOffset <= BigInt(headerByteLength)) {
      throw new ParseError(ParseErrorKind.MalformedTrailer, `offset table cannot start at ${offsetTableOffset}, inside the header or an empty object table`, { byteOffset: fieldsOffset + 19 });
    }

    const available = BigInt(view.byteLength);
    if (numObjects * BigInt(offsetIntSize) + offsetTableOffset > available) {
      throw new ParseError(ParseErrorKind.TruncatedInput, `offset table of ${numObjects} x ${offsetIntSize} bytes at ${offsetTableOffset} runs past the end of the input`, { byteOffset: fieldsOffset + 3 });
    }

    return new Trailer(
      sortVersion,
      offsetIntSize,
      objectRefSize,
      Number(numObjects),
      Number(topObject),
      Number(offsetTableOffset),
      trailerOffset,
    );
  }
}
