import { ParseError, ParseErrorKind } from "../../errors/parse-error";
import { ILogger } from "../../shared/logger";
import { BaseReader } from "../base-reader";
import { Marker, byteToMarker } from "../markers";
import { ObjRef, ObjectTableOffset } from "../types/bplist-index-aliases";
import { ObjectTableArray, ObjectTableDict, ObjectTableEntry } from "./object-table-entries";
import { OffsetTable } from "./offset-table";
import { Trailer } from "./trailer";

/**
 * The object records of a file, parsed on first access.
 * Only records reachable from the top object are ever read.
 */
export class ObjectTable extends BaseReader {

  readonly objectTableEnd: number;

  /** furthest byte (exclusive) covered by any record parsed so far */
  get furthestRecordEnd() {
    return this._furthestRecordEnd;
  }

  private readonly _table = new Map<ObjRef, ObjectTableEntry>();
  private _furthestRecordEnd = 0;

  constructor(
    bytes: Uint8Array,
    private readonly trailer: Trailer,
    private readonly offsetTable: OffsetTable,
    logger: ILogger,
    wideIntegers: boolean,
  ) {
    super(bytes, logger, wideIntegers);
    this.objectTableEnd = trailer.offsetTableOffset;
  }

  getEntryByObjRef(ref: ObjRef): ObjectTableEntry {
    if (!Number.isSafeInteger(ref) || ref < 0 || ref >= this.trailer.numObjects) {
      throw new ParseError(ParseErrorKind.InvalidObjectReference, `reference ${ref} is not below the object count ${this.trailer.numObjects}`, { objRef: ref });
    }

    const existing = this._table.get(ref);
    if (existing !== undefined) {
      return existing;
    }

    const offset = this.offsetTable.getObjectTableOffsetByObjRef(ref);
    const { entry, bytesRead } = this.parseObjectTableEntry(offset, ref);
    this._furthestRecordEnd = Math.max(this._furthestRecordEnd, offset + bytesRead);
    this._table.set(ref, entry);
    return entry;
  }

  parseObjectTableEntry(
    offset: ObjectTableOffset,
    objRef: ObjRef,
  ): { entry: ObjectTableEntry, bytesRead: number } {
    const limit = this.objectTableEnd;
    const { marker, lowerNibble } = byteToMarker(this.readByte(offset, limit), { byteOffset: offset, objRef });
    this.logger.debug('DBG: offset=%d found marker=%s with lowerNibble=0x%s', offset, Marker[marker], lowerNibble.toString(16));

    let bytesRead = 1;
    let entry: ObjectTableEntry;

    switch (marker) {
      case Marker.false:
      case Marker.true:
        entry = marker === Marker.true;
        break;

      case Marker.int: {
        const bytes = 2 ** lowerNibble;
        entry = this.readInt(offset + bytesRead, bytes, limit);
        bytesRead += bytes;
        break;
      }

      case Marker.real: {
        const bytes = 2 ** lowerNibble;
        entry = this.readReal(offset + bytesRead, bytes, limit);
        bytesRead += bytes;
        break;
      }

      case Marker.date: {
        // always 8 bytes when written by Apple's tools; a 4-byte float is read the same way a real is
        const bytes = 2 ** lowerNibble;
        entry = this.readDate(offset + bytesRead, bytes, limit);
        bytesRead += bytes;
        break;
      }

      case Marker.data: {
        const { length, bytesRead: lengthBytes } = this.readObjectLength(lowerNibble, offset + bytesRead, limit);
        bytesRead += lengthBytes;
        entry = this.readData(offset + bytesRead, length, limit);
        bytesRead += length;
        break;
      }

      case Marker.ascii: {
        const { length, bytesRead: lengthBytes } = this.readObjectLength(lowerNibble, offset + bytesRead, limit);
        bytesRead += lengthBytes;
        entry = this.readAscii(offset + bytesRead, length, limit);
        bytesRead += length;
        break;
      }

      case Marker.unicode: {
        const { length: charCount, bytesRead: lengthBytes } = this.readObjectLength(lowerNibble, offset + bytesRead, limit);
        bytesRead += lengthBytes;
        entry = this.readUnicode16(offset + bytesRead, charCount, limit);
        bytesRead += charCount * 2;
        break;
      }

      case Marker.uid: {
        const bytes = lowerNibble + 1;
        entry = this.readUid(offset + bytesRead, bytes, limit);
        bytesRead += bytes;
        break;
      }

      case Marker.array: {
        const { length: size, bytesRead: lengthBytes } = this.readObjectLength(lowerNibble, offset + bytesRead, limit);
        bytesRead += lengthBytes;
        const objrefs = this.readObjRefs(offset + bytesRead, size, this.trailer.objectRefSize, limit);
        this._validateRefs(objrefs, offset, objRef);
        entry = new ObjectTableArray(objrefs);
        bytesRead += size * this.trailer.objectRefSize;
        break;
      }

      case Marker.dict: {
        const { length: size, bytesRead: lengthBytes } = this.readObjectLength(lowerNibble, offset + bytesRead, limit);
        bytesRead += lengthBytes;
        const refSize = this.trailer.objectRefSize;
        this.ensureAvailable(offset + bytesRead, size * refSize * 2, limit, 'dictionary references');
        const keyRefs = this.readObjRefs(offset + bytesRead, size, refSize, limit);
        const valueRefs = this.readObjRefs(offset + bytesRead + size * refSize, size, refSize, limit);
        this._validateRefs(keyRefs, offset, objRef);
        this._validateRefs(valueRefs, offset, objRef);
        entry = new ObjectTableDict(keyRefs, valueRefs);
        bytesRead += size * refSize * 2;
        break;
      }

      default:
        throw new ParseError(ParseErrorKind.UnknownObjectType, `marker ${Marker[marker]} is not a value`, { byteOffset: offset, objRef });
    }

    this.logger.debug('DBG: offset=%d done, read %d bytes and found %O', offset, bytesRead, entry);

    return {
      entry,
      bytesRead,
    }
  }

  private _validateRefs(refs: readonly ObjRef[], byteOffset: number, objRef: ObjRef) {
    const invalid = refs.find(ref => ref >= this.trailer.numObjects);
    if (invalid !== undefined) {
      throw new ParseError(ParseErrorKind.InvalidObjectReference, `child reference ${invalid} is not below the object count ${this.trailer.numObjects}`, { byteOffset, objRef });
    }
  }
}
