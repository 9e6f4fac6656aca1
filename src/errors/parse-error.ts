import { IParseContext } from "../parse-context";

export enum ParseErrorKind {
  TruncatedInput = 'TruncatedInput',
  MalformedHeader = 'MalformedHeader',
  MalformedTrailer = 'MalformedTrailer',
  UnsupportedWidth = 'UnsupportedWidth',
  InvalidObjectReference = 'InvalidObjectReference',
  ObjectOffsetOutOfBounds = 'ObjectOffsetOutOfBounds',
  UnknownObjectType = 'UnknownObjectType',
  InvalidObjectLength = 'InvalidObjectLength',
  InvalidDictionaryKey = 'InvalidDictionaryKey',
  InvalidDate = 'InvalidDate',
  IntegerOverflow = 'IntegerOverflow',
  TrailingData = 'TrailingData',

  InvalidXmlSyntax = 'InvalidXmlSyntax',
  UnexpectedXmlElement = 'UnexpectedXmlElement',
  UnclosedXmlElement = 'UnclosedXmlElement',
  InvalidIntegerString = 'InvalidIntegerString',
  InvalidRealString = 'InvalidRealString',
  InvalidDateString = 'InvalidDateString',
  InvalidDataString = 'InvalidDataString',
}

function describeContext(pc: IParseContext) {
  const parts: string[] = [];
  if (pc.byteOffset !== undefined) {
    parts.push(`offset ${pc.byteOffset}`);
  }
  if (pc.objRef !== undefined) {
    parts.push(`object ${pc.objRef}`);
  }
  if (pc.element !== undefined) {
    parts.push(`<${pc.element}>`);
  }
  return parts.length ? ` (${parts.join(', ')})` : '';
}

export class ParseError extends Error {
  readonly name = 'ParseError';

  constructor(readonly kind: ParseErrorKind, message: string, readonly pc: IParseContext = {}) {
    super(`${kind}: ${message}${describeContext(pc)}`);
  }
}
