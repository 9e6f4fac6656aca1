import { PlistDate } from "../value/plist-date";
import { PlistScalar, PlistValue } from "../value/value";
import { PlistEvent, ScalarEvent } from "./event";

type Frame =
  | { readonly type: 'array'; readonly items: readonly PlistValue[]; index: number }
  | { readonly type: 'dictionary'; readonly entries: readonly (readonly [string, PlistValue])[]; index: number; pendingValue: PlistValue | undefined };

/**
 * Walks a value depth-first and yields its events. Uses an explicit stack, so deeply nested values are fine.
 */
export function* valueToEvents(root: PlistValue): Generator<PlistEvent, void, undefined> {
  const stack: Frame[] = [];

  function enter(value: PlistValue): PlistEvent {
    if (Array.isArray(value)) {
      stack.push({ type: 'array', items: value, index: 0 });
      return { type: 'startArray', size: value.length };
    }
    if (value instanceof Map) {
      stack.push({ type: 'dictionary', entries: [...value], index: 0, pendingValue: undefined });
      return { type: 'startDictionary', size: value.size };
    }
    return scalarToEvent(value);
  }

  yield enter(root);

  while (stack.length) {
    const top = stack[stack.length - 1];

    if (top.type === 'array') {
      if (top.index < top.items.length) {
        yield enter(top.items[top.index++]);
        continue;
      }
    }
    else if (top.pendingValue !== undefined) {
      const value = top.pendingValue;
      top.pendingValue = undefined;
      yield enter(value);
      continue;
    }
    else if (top.index < top.entries.length) {
      const [key, value] = top.entries[top.index++];
      top.pendingValue = value;
      yield { type: 'string', value: key };
      continue;
    }

    stack.pop();
    yield { type: 'endCollection' };
  }
}

export function scalarToEvent(value: PlistScalar): ScalarEvent {
  switch (typeof value) {
    case 'string':
      return { type: 'string', value };
    case 'boolean':
      return { type: 'boolean', value };
    case 'number':
      return { type: 'real', value };
    case 'bigint':
      return { type: 'integer', value };
  }
  if (value instanceof Uint8Array) {
    return { type: 'data', value };
  }
  if (value instanceof PlistDate) {
    return { type: 'date', value };
  }
  return { type: 'uid', value };
}
