export { AssertError } from './assert';
export { EncodeError, EncodeErrorKind } from './errors/encode-error';
export { EventStreamError, EventStreamErrorKind } from './errors/event-stream-error';
export { ParseError, ParseErrorKind } from './errors/parse-error';
export type { IParseContext } from './parse-context';

export { describeEvent, pipeEvents } from './events/event';
export type { EventConsumer, EventProducer, PlistEvent, PlistEventType, ScalarEvent } from './events/event';
export { EventStreamValidator } from './events/stream-validator';
export { buildValue, ValueBuilder } from './events/value-builder';
export { valueToEvents } from './events/value-events';

export { BinaryReader, BinaryWriter, decodeBinary, encodeBinary, hasBinaryHeader } from './bplist';
export { decodeXml, encodeXml, formatReal, XmlReader, XmlWriter } from './xml';
export type { XmlWriteOptions } from './xml';

export { binaryFormat, createDefaultRegistry, FormatRegistry, readPlist, UnknownFormatError, xmlFormat } from './registry';
export type { PlistFormat, ReadPlistOptions } from './registry';
export { readPlistFile, writePlistFile } from './fs';
export type { WritePlistFileOptions } from './fs';

export { buildLeveledLogger, defaultLogConfig, LogLevel } from './shared/logger';
export type { ILogConfig, ILogger } from './shared/logger';
export type { IUnstableFeatures, PlistOptions } from './shared/options';

export { integerRangeFor, isIntegerInRange, I64_MAX, I64_MIN, I128_MAX, I128_MIN, U64_MAX } from './value/integer';
export type { IntegerRange } from './value/integer';
export { PlistDate } from './value/plist-date';
export { Uid } from './value/uid';
export { bytesEqual, valueKind, valuesEqual } from './value/value';
export type { PlistArray, PlistDictionary, PlistScalar, PlistValue, PlistValueKind } from './value/value';
