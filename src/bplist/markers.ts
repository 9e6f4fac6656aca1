import { ParseError, ParseErrorKind } from "../errors/parse-error";
import { IParseContext } from "../parse-context";

export enum Marker {
  null = 0b0000_0000, // 0x00
  false = 0b0000_1000, // 0x08
  true = 0b0000_1001, // 0x09
  fill = 0b0000_1111, // 0x0F
  /** lower nibble is exponent of byte-size of the int */
  int = 0b0001_0000, // 0x10
  /** lower nibble is exponent of byte-size of the real */
  real = 0b0010_0000, // 0x20
  /** lower nibble is exponent of byte-size of the float seconds, always 3 when written */
  date = 0b0011_0000, // 0x30
  /** lower nibble is byte-size or 1111 for trailing int-based size, then bytes */
  data = 0b0100_0000, // 0x40
  /** lower nibble is byte-size or 1111 for trailing int-based size, then bytes */
  ascii = 0b0101_0000, // 0x50
  /** lower nibble is UTF-16 code-unit count or 1111 for trailing int-based count, then big-endian code units */
  unicode = 0b0110_0000, // 0x60
  /** lower nibble is byte-size minus 1 */
  uid = 0b1000_0000, // 0x80
  /** lower nibble is count or 1111 for trailing int-based count, then objrefs */
  array = 0b1010_0000, // 0xA0
  /** lower nibble is count or 1111 for trailing int-based count, then keyrefs and objrefs */
  dict = 0b1101_0000, // 0xD0
}

/** lower-nibble value meaning "the size follows as an int object" */
export const extendedSizeNibble = 0xF;

export type MarkerByteParts = {
  readonly marker: Marker;
  readonly lowerNibble: number;
}

/**
 * Splits a type byte into its marker and size nibble.
 * Markers this codec does not support (null, fill, sets, ...) are rejected here.
 */
export function byteToMarker(byte: number, pc: IParseContext): MarkerByteParts {
  const upperNibbleMasked = byte & 0xF0;
  const lowerNibbleMasked = byte & 0x0F;

  if (upperNibbleMasked === 0) {
    if (byte !== Marker.false && byte !== Marker.true) {
      throw new ParseError(ParseErrorKind.UnknownObjectType, `unsupported simple object 0x${byte.toString(16).padStart(2, '0')}`, pc);
    }
    return {
      marker: byte,
      lowerNibble: lowerNibbleMasked,
    };
  }

  switch (upperNibbleMasked) {
    case Marker.int:
    case Marker.real:
    case Marker.date:
    case Marker.data:
    case Marker.ascii:
    case Marker.unicode:
    case Marker.uid:
    case Marker.array:
    case Marker.dict:
      // `byte` is a complex type marker with some dynamic sizing
      return {
        marker: upperNibbleMasked,
        lowerNibble: lowerNibbleMasked,
      };
  }

  throw new ParseError(ParseErrorKind.UnknownObjectType, `unknown object type 0x${byte.toString(16).padStart(2, '0')}`, pc);
}
