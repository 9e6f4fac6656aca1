import { PlistDate } from "./plist-date";
import { Uid } from "./uid";

/**
 * One property-list value.
 *
 * Integers are `bigint` and reals are `number`, so the two kinds never collapse into each other.
 * Dictionaries are `Map`s because plain objects would reorder integer-like keys.
 */
export type PlistValue =
  | PlistArray
  | PlistDictionary
  | string
  | boolean
  | number
  | bigint
  | Uint8Array
  | PlistDate
  | Uid;

export interface PlistArray extends Array<PlistValue> { }
export interface PlistDictionary extends Map<string, PlistValue> { }

export type PlistScalar = Exclude<PlistValue, PlistArray | PlistDictionary>;

export type PlistValueKind =
  | 'array'
  | 'dictionary'
  | 'string'
  | 'boolean'
  | 'real'
  | 'integer'
  | 'data'
  | 'date'
  | 'uid';

export function valueKind(value: PlistValue): PlistValueKind {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'real';
    case 'bigint':
      return 'integer';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Map) {
    return 'dictionary';
  }
  if (value instanceof Uint8Array) {
    return 'data';
  }
  if (value instanceof PlistDate) {
    return 'date';
  }
  return 'uid';
}

export function bytesEqual(a: Uint8Array, b: Uint8Array) {
  if (a.byteLength !== b.byteLength) {
    return false;
  }
  for (let i = 0; i < a.byteLength; ++i) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Structural equality. Reals compare with `Object.is` (so `NaN` equals itself and `0` differs from `-0`),
 * dictionaries must hold the same entries in the same order.
 *
 * Nested collections are compared from an explicit stack, so depth is not limited by the call stack.
 */
export function valuesEqual(a: PlistValue, b: PlistValue): boolean {
  const pending: [PlistValue, PlistValue][] = [[a, b]];

  for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
    const [left, right] = pair;
    if (typeof left !== 'object' || typeof right !== 'object') {
      if (!Object.is(left, right)) {
        return false;
      }
      continue;
    }

    if (Array.isArray(left)) {
      if (!Array.isArray(right) || left.length !== right.length) {
        return false;
      }
      left.forEach((item, idx) => pending.push([item, right[idx]]));
      continue;
    }
    if (left instanceof Map) {
      if (!(right instanceof Map) || left.size !== right.size) {
        return false;
      }
      const rightEntries = [...right];
      let idx = 0;
      for (const [key, item] of left) {
        const [rightKey, rightItem] = rightEntries[idx++];
        if (key !== rightKey) {
          return false;
        }
        pending.push([item, rightItem]);
      }
      continue;
    }

    if (!scalarObjectsEqual(left, right)) {
      return false;
    }
  }
  return true;
}

function scalarObjectsEqual(left: Uint8Array | PlistDate | Uid, right: PlistValue) {
  if (left instanceof Uint8Array) {
    return right instanceof Uint8Array && bytesEqual(left, right);
  }
  if (left instanceof PlistDate) {
    return right instanceof PlistDate && left.equals(right);
  }
  return right instanceof Uid && left.equals(right);
}
