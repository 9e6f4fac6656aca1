import { PlistScalar } from "../../value/value";
import { ObjRef } from "../types/bplist-index-aliases";

export class ObjectTableArray {
  constructor(
    readonly objrefs: readonly ObjRef[],
  ) { }
}

export class ObjectTableDict {
  constructor(
    readonly keyRefs: readonly ObjRef[],
    readonly valueRefs: readonly ObjRef[],
  ) { }

  get size() {
    return this.keyRefs.length;
  }
}

export type ObjectTableEntry = PlistScalar | ObjectTableArray | ObjectTableDict;
