import { ParseError, ParseErrorKind } from "../errors/parse-error";
import { EventProducer, PlistEvent } from "../events/event";
import { scalarToEvent } from "../events/value-events";
import { ILogger } from "../shared/logger";
import { PlistOptions, resolveOptions } from "../shared/options";
import { bplistMagicNumber, bplistVersion, headerByteLength, versionByteLength } from "./constants/magic-number";
import { ObjectTable } from "./models/object-table";
import { ObjectTableArray, ObjectTableDict } from "./models/object-table-entries";
import { OffsetTable } from "./models/offset-table";
import { Trailer } from "./models/trailer";
import { ObjRef } from "./types/bplist-index-aliases";

type Frame = {
  readonly objRef: ObjRef;
  readonly isDict: boolean;
  /** children in emission order; for dictionaries key and value references alternate */
  readonly refs: readonly ObjRef[];
  index: number;
};

/** a plain `Uint8Array` view, so slices taken from it are never Node `Buffer`s */
export function toUint8Array(input: Uint8Array | ArrayBuffer) {
  return input instanceof Uint8Array
    ? new Uint8Array(input.buffer, input.byteOffset, input.byteLength)
    : new Uint8Array(input);
}

export function hasBinaryHeader(bytes: Uint8Array) {
  if (bytes.byteLength < bplistMagicNumber.length) {
    return false;
  }
  return String.fromCharCode(...bytes.subarray(0, bplistMagicNumber.length)) === bplistMagicNumber;
}

/**
 * Producer for `bplist00` files.
 *
 * The header, trailer and offset table are validated on construction; object records are read while iterating,
 * so most malformed records surface as a {@link ParseError} thrown from the iterator.
 */
export class BinaryReader implements EventProducer {
  readonly version: string;

  readonly trailer: Trailer;
  readonly offsetTable: OffsetTable;
  readonly objectTable: ObjectTable;

  readonly logger: ILogger;

  constructor(input: Uint8Array | ArrayBuffer, options?: PlistOptions) {
    const { logger, wideIntegers } = resolveOptions(options);
    this.logger = logger;

    const bytes = toUint8Array(input);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    if (bytes.byteLength < headerByteLength + Trailer.trailerByteLength) {
      throw new ParseError(ParseErrorKind.TruncatedInput, `${bytes.byteLength} bytes is too short to be a binary plist`, { byteOffset: 0 });
    }

    if (!hasBinaryHeader(bytes)) {
      const found = String.fromCharCode(...bytes.subarray(0, bplistMagicNumber.length));
      throw new ParseError(ParseErrorKind.MalformedHeader, `Invalid magicNumber (at start of file); must be ${bplistMagicNumber} but got ${JSON.stringify(found)}`, { byteOffset: 0 });
    }
    this.version = String.fromCharCode(...bytes.subarray(bplistMagicNumber.length, bplistMagicNumber.length + versionByteLength));
    if (this.version[0] !== bplistVersion[0]) {
      throw new ParseError(ParseErrorKind.MalformedHeader, `unsupported binary plist version ${JSON.stringify(this.version)}`, { byteOffset: bplistMagicNumber.length });
    }
    if (this.version !== bplistVersion) {
      logger.warn('WARN: version is not %s and may not decode correctly! version = %s', bplistVersion, this.version);
    }

    this.trailer = Trailer.fromBuffer(view);
    logger.debug('DBG: Trailer found: %O', this.trailer);
    this.offsetTable = new OffsetTable(view, this.trailer);
    this.objectTable = new ObjectTable(bytes, this.trailer, this.offsetTable, logger, wideIntegers);
  }

  [Symbol.iterator]() {
    return this.events();
  }

  /**
   * Walks the object graph from the top object with an explicit stack.
   * A collection that (directly or not) contains itself is reported as an invalid reference;
   * an object shared by several parents is simply emitted once per parent.
   */
  *events(): Generator<PlistEvent, void, undefined> {
    const stack: Frame[] = [];
    const ancestors = new Set<ObjRef>();

    const enter = (objRef: ObjRef, asKey: boolean): PlistEvent => {
      const entry = this.objectTable.getEntryByObjRef(objRef);

      if (asKey && typeof entry !== 'string') {
        throw new ParseError(ParseErrorKind.InvalidDictionaryKey, 'dictionary key is not a string', { objRef, byteOffset: this.offsetTable.getObjectTableOffsetByObjRef(objRef) });
      }

      if (entry instanceof ObjectTableArray || entry instanceof ObjectTableDict) {
        if (ancestors.has(objRef)) {
          throw new ParseError(ParseErrorKind.InvalidObjectReference, `object ${objRef} contains itself`, { objRef, byteOffset: this.offsetTable.getObjectTableOffsetByObjRef(objRef) });
        }
        ancestors.add(objRef);

        if (entry instanceof ObjectTableArray) {
          stack.push({ objRef, isDict: false, refs: entry.objrefs, index: 0 });
          return { type: 'startArray', size: entry.objrefs.length };
        }
        stack.push({ objRef, isDict: true, refs: interleave(entry.keyRefs, entry.valueRefs), index: 0 });
        return { type: 'startDictionary', size: entry.size };
      }

      return scalarToEvent(entry);
    };

    yield enter(this.trailer.topObject, false);

    while (stack.length) {
      const top = stack[stack.length - 1];
      if (top.index < top.refs.length) {
        const asKey = top.isDict && top.index % 2 === 0;
        yield enter(top.refs[top.index++], asKey);
        continue;
      }

      stack.pop();
      ancestors.delete(top.objRef);
      yield { type: 'endCollection' };
    }

    const { furthestRecordEnd, objectTableEnd } = this.objectTable;
    if (furthestRecordEnd < objectTableEnd) {
      throw new ParseError(ParseErrorKind.TrailingData, `${objectTableEnd - furthestRecordEnd} bytes after the last object are never read`, { byteOffset: furthestRecordEnd });
    }
  }
}

function interleave(keys: readonly ObjRef[], values: readonly ObjRef[]) {
  const refs: ObjRef[] = [];
  keys.forEach((key, idx) => refs.push(key, values[idx]));
  return refs;
}
