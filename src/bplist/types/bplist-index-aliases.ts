/** index into the offset table; what collections store for their children */
export type ObjRef = number & {};
/** absolute byte offset of an object record within the file */
export type ObjectTableOffset = number & {};
