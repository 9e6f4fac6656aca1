import { assert } from "../../assert";
import { ParseError, ParseErrorKind } from "../../errors/parse-error";
import { headerByteLength } from "../constants/magic-number";
import { deStructRepeated, getRefReaderByWidth } from "../de-struct";
import { ObjRef, ObjectTableOffset } from "../types/bplist-index-aliases";
import { Trailer } from "./trailer";

/**
 * Maps ObjRefs (indices) to full-file-offsets pointing to objects
 */
export class OffsetTable {
  readonly offsetTableOffset: number;
  readonly offsetIntSize: number;
  readonly offsetTableByteLength: number;
  readonly count: number;

  private readonly _table: readonly ObjectTableOffset[];

  constructor(view: DataView, trailer: Trailer) {
    const { offsetTableOffset, offsetIntSize, numObjects, _trailerOffset: trailerOffset } = trailer;

    this.offsetTableOffset = offsetTableOffset;
    this.offsetIntSize = offsetIntSize;
    this.offsetTableByteLength = trailer.offsetTableByteLength;
    this.count = numObjects;

    const offsetTableEnd = offsetTableOffset + this.offsetTableByteLength;
    if (offsetTableEnd > trailerOffset) {
      throw new ParseError(ParseErrorKind.TruncatedInput, `offset table ends at ${offsetTableEnd}, inside the trailer at ${trailerOffset}`, { byteOffset: offsetTableOffset });
    }
    if (offsetTableEnd < trailerOffset) {
      throw new ParseError(ParseErrorKind.TrailingData, `${trailerOffset - offsetTableEnd} unused bytes between the offset table and the trailer`, { byteOffset: offsetTableEnd });
    }

    this._table = deStructRepeated(getRefReaderByWidth(offsetIntSize), this.count, view, offsetTableOffset);

    this._table.forEach((objectOffset, objRef) => {
      if (objectOffset < headerByteLength || objectOffset >= offsetTableOffset) {
        throw new ParseError(ParseErrorKind.ObjectOffsetOutOfBounds, `offset ${objectOffset} is outside the object table [${headerByteLength}, ${offsetTableOffset})`, { objRef, byteOffset: offsetTableOffset + objRef * offsetIntSize });
      }
    });
  }

  getObjectTableOffsetByObjRef(ref: ObjRef): ObjectTableOffset {
    assert(ref >= 0 && ref < this.count, () => `Ref ${ref} not in OffsetTable`);

    return this._table[ref];
  }
}
