import { BinaryReader } from '../bplist/reader';
import { BinaryWriter } from '../bplist/writer';
import { EventConsumer, EventProducer } from '../events/event';
import { PlistOptions } from '../shared/options';
import { XmlReader } from '../xml/reader';
import { XmlWriteOptions, XmlWriter } from '../xml/writer';
import { array, dictionary, optional, struct, value } from './collections';
import { EventCursor } from './cursor';
import { bigint, boolean, data, date, int, real, string, uid } from './primitives';
import { PlistType } from './types';

export { EventCursor, fieldPath, indexPath } from './cursor';
export { DeserializeError, DeserializeErrorKind, TypeMismatchError } from './errors';
export type { Infer, OptionalPlistType, PlistType, StructFields, StructValue } from './types';

export const t = {
  // Scalars
  boolean,
  string,
  real,
  int,
  bigint,
  date,
  data,
  uid,

  // Composites
  array,
  dictionary,
  struct,
  optional,
  value,
} as const;

/**
 * Reads exactly one value of `type` from `producer`.
 */
export function fromEvents<T>(type: PlistType<T>, producer: EventProducer): T {
  const cursor = new EventCursor(producer);
  const result = type.deserialize(cursor, '');
  cursor.finish();
  return result;
}

export function toEvents<T>(type: PlistType<T>, value: T, consumer: EventConsumer) {
  type.serialize(value, consumer);
}

export function fromBinary<T>(type: PlistType<T>, input: Uint8Array | ArrayBuffer, options?: PlistOptions): T {
  return fromEvents(type, new BinaryReader(input, options));
}

export function toBinary<T>(type: PlistType<T>, value: T, options?: PlistOptions): Uint8Array {
  const writer = new BinaryWriter(options);
  toEvents(type, value, writer);
  return writer.finish();
}

export function fromXml<T>(type: PlistType<T>, input: string | Uint8Array, options?: PlistOptions): T {
  return fromEvents(type, new XmlReader(input, options));
}

export function toXml<T>(type: PlistType<T>, value: T, options?: XmlWriteOptions): string {
  const writer = new XmlWriter(options);
  toEvents(type, value, writer);
  return writer.finish();
}
