import { EncodeError, EncodeErrorKind } from "../errors/encode-error";
import { PlistEvent, ScalarEvent } from "../events/event";
import { PlistDate } from "../value/plist-date";
import { Uid } from "../value/uid";
import { describeFound, EventCursor } from "./cursor";
import { DeserializeError, DeserializeErrorKind, TypeMismatchError } from "./errors";
import { PlistType } from "./types";

type ScalarEventType = ScalarEvent['type'];
type ScalarOf<E extends ScalarEventType> = Extract<ScalarEvent, { type: E }>['value'];

function isEventOf<E extends ScalarEventType>(event: PlistEvent, type: E): event is Extract<ScalarEvent, { type: E }> {
  return event.type === type;
}

/**
 * Reads the next event and fails with a {@link TypeMismatchError} unless it has the given type.
 */
export function expectScalar<E extends ScalarEventType>(cursor: EventCursor, path: string, type: E, expected: string = type): ScalarOf<E> {
  const event = cursor.next(path);
  if (!isEventOf(event, type)) {
    throw new TypeMismatchError(path, expected, describeFound(event));
  }
  return event.value;
}

function scalarType<E extends ScalarEventType>(type: E, name: string = type): PlistType<ScalarOf<E>> {
  return {
    name,
    deserialize: (cursor, path) => expectScalar(cursor, path, type, name),
    serialize(value, consumer) {
      consumer.write(toScalarEvent(type, value));
    },
  };
}

// the union of single-type events cannot be built from a generic `type` without help
function toScalarEvent<E extends ScalarEventType>(type: E, value: ScalarOf<E>): ScalarEvent {
  const event = { type, value };
  if (!isScalarEvent(event)) {
    throw new EncodeError(EncodeErrorKind.InvalidValue, `cannot write ${String(value)} as ${type}`);
  }
  return event;
}

function isScalarEvent(event: { type: ScalarEventType, value: unknown }): event is ScalarEvent {
  const { type, value } = event;
  switch (type) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'string':
      return typeof value === 'string';
    case 'real':
      return typeof value === 'number';
    case 'integer':
      return typeof value === 'bigint';
    case 'data':
      return value instanceof Uint8Array;
    case 'date':
      return value instanceof PlistDate;
    case 'uid':
      return value instanceof Uid;
  }
}

export const boolean: PlistType<boolean> = scalarType('boolean');
export const string: PlistType<string> = scalarType('string');
/** any real; integers are a different kind and do not match */
export const real: PlistType<number> = scalarType('real');
export const bigint: PlistType<bigint> = scalarType('integer', 'bigint');
export const date: PlistType<PlistDate> = scalarType('date');
export const data: PlistType<Uint8Array> = scalarType('data');
export const uid: PlistType<Uid> = scalarType('uid');

/**
 * An Integer as a `number`; values outside the safe-integer range fail rather than lose precision.
 */
export const int: PlistType<number> = {
  name: 'integer',
  deserialize(cursor, path) {
    const value = expectScalar(cursor, path, 'integer');
    if (value < BigInt(Number.MIN_SAFE_INTEGER) || value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DeserializeError(DeserializeErrorKind.IntegerOverflow, path, `${value} is not a safe integer`);
    }
    return Number(value);
  },
  serialize(value, consumer) {
    if (!Number.isSafeInteger(value)) {
      throw new EncodeError(EncodeErrorKind.InvalidValue, `${value} is not a safe integer`);
    }
    consumer.write({ type: 'integer', value: BigInt(value) });
  },
};
