import { AssertError } from "../assert";
import { EncodeError, EncodeErrorKind } from "../errors/encode-error";
import { pipeEvents } from "../events/event";
import { valueToEvents } from "../events/value-events";
import { PlistValue } from "../value/value";
import { describeFound, EventCursor, fieldPath, indexPath } from "./cursor";
import { DeserializeError, DeserializeErrorKind, TypeMismatchError } from "./errors";
import { expectScalar } from "./primitives";
import { OptionalPlistType, PlistType, StructFields, StructValue } from "./types";

function expectStart(cursor: EventCursor, path: string, type: 'startArray' | 'startDictionary', expected: string) {
  const event = cursor.next(path);
  if (event.type !== type) {
    throw new TypeMismatchError(path, expected, describeFound(event));
  }
}

/**
 * Reads dictionary entries up to and including the closing event, handing each key to `onEntry`,
 * which must consume exactly one value.
 */
function readEntries(cursor: EventCursor, path: string, onEntry: (key: string) => void) {
  for (; ;) {
    if (cursor.peek(path).type === 'endCollection') {
      cursor.next(path);
      return;
    }
    onEntry(expectScalar(cursor, path, 'string', 'dictionary key'));
  }
}

export function array<T>(of: PlistType<T>): PlistType<T[]> {
  return {
    name: `array of ${of.name}`,
    deserialize(cursor, path) {
      expectStart(cursor, path, 'startArray', this.name);
      const items: T[] = [];
      while (cursor.peek(path).type !== 'endCollection') {
        items.push(of.deserialize(cursor, indexPath(path, items.length)));
      }
      cursor.next(path);
      return items;
    },
    serialize(value, consumer) {
      consumer.write({ type: 'startArray', size: value.length });
      value.forEach(item => of.serialize(item, consumer));
      consumer.write({ type: 'endCollection' });
    },
  };
}

export function dictionary<T>(of: PlistType<T>): PlistType<Map<string, T>> {
  return {
    name: `dictionary of ${of.name}`,
    deserialize(cursor, path) {
      expectStart(cursor, path, 'startDictionary', this.name);
      const entries = new Map<string, T>();
      readEntries(cursor, path, key => {
        entries.set(key, of.deserialize(cursor, fieldPath(path, key)));
      });
      return entries;
    },
    serialize(value, consumer) {
      consumer.write({ type: 'startDictionary', size: value.size });
      value.forEach((item, key) => {
        consumer.write({ type: 'string', value: key });
        of.serialize(item, consumer);
      });
      consumer.write({ type: 'endCollection' });
    },
  };
}

/**
 * A struct field that may be missing; `undefined` is never written.
 */
export function optional<T>(of: PlistType<T>): OptionalPlistType<T> {
  return {
    name: of.name,
    isOptional: true,
    deserialize: (cursor, path) => of.deserialize(cursor, path),
    serialize(value, consumer) {
      if (value === undefined) {
        throw new EncodeError(EncodeErrorKind.InvalidValue, 'an optional value outside a struct cannot be undefined');
      }
      of.serialize(value, consumer);
    },
  };
}

function isStructValue<F extends StructFields>(fields: F, record: Record<string, unknown>): record is Record<string, unknown> & StructValue<F> {
  return Object.entries(fields).every(([field, type]) => type.isOptional || Object.hasOwn(record, field));
}

/**
 * A dictionary with known keys, read into a plain object.
 *
 * Fields are written in declaration order. Unknown keys are skipped on read;
 * the object is only assembled once every entry has been read.
 *
 * @example
 * ```typescript
 * const Item = t.struct({
 *   name: t.string,
 *   count: t.int,
 *   note: t.optional(t.string),
 * });
 * ```
 */
export function struct<F extends StructFields>(fields: F): PlistType<StructValue<F>> {
  return {
    name: 'struct',
    deserialize(cursor, path) {
      expectStart(cursor, path, 'startDictionary', this.name);
      const values = new Map<string, unknown>();
      readEntries(cursor, path, key => {
        const type = Object.hasOwn(fields, key) ? fields[key] : undefined;
        if (type === undefined) {
          cursor.skipValue(fieldPath(path, key));
          return;
        }
        values.set(key, type.deserialize(cursor, fieldPath(path, key)));
      });

      for (const [field, type] of Object.entries(fields)) {
        if (!type.isOptional && !values.has(field)) {
          throw new DeserializeError(DeserializeErrorKind.MissingField, fieldPath(path, field), `missing required field ${JSON.stringify(field)}`);
        }
      }

      const record: Record<string, unknown> = Object.fromEntries(values);
      if (!isStructValue(fields, record)) {
        throw new AssertError('struct assembled without all of its required fields');
      }
      return record;
    },
    serialize(value, consumer) {
      const present = new Map<string, unknown>(Object.entries(value));
      const entries = Object.entries(fields).filter(([field]) => present.get(field) !== undefined);
      for (const [field, type] of Object.entries(fields)) {
        if (!type.isOptional && present.get(field) === undefined) {
          throw new EncodeError(EncodeErrorKind.InvalidValue, `required field ${JSON.stringify(field)} is undefined`);
        }
      }

      consumer.write({ type: 'startDictionary', size: entries.length });
      for (const [field, type] of entries) {
        consumer.write({ type: 'string', value: field });
        type.serialize(present.get(field), consumer);
      }
      consumer.write({ type: 'endCollection' });
    },
  };
}

/** any plist value, kept as a {@link PlistValue} tree */
export const value: PlistType<PlistValue> = {
  name: 'value',
  deserialize: (cursor, path) => cursor.readValue(path),
  serialize(item, consumer) {
    pipeEvents(valueToEvents(item), consumer);
  },
};
