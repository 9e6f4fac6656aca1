import { assert } from "../assert";
import { PlistArray, PlistDictionary, PlistValue } from "../value/value";
import { EventConsumer, EventProducer, PlistEvent, pipeEvents } from "./event";
import { EventStreamValidator } from "./stream-validator";

type Frame =
  | { readonly type: 'array'; readonly items: PlistArray }
  | { readonly type: 'dictionary'; readonly entries: PlistDictionary; pendingKey: string | undefined };

/**
 * Consumer that materializes the events of one value into a {@link PlistValue} tree.
 */
export class ValueBuilder implements EventConsumer {
  private readonly _validator = new EventStreamValidator();
  private readonly _stack: Frame[] = [];
  private _root: PlistValue | undefined;

  write(event: PlistEvent) {
    const keyPosition = this._validator.isExpectingKey;
    this._validator.accept(event);

    const top = this._stack.at(-1);
    if (keyPosition && top?.type === 'dictionary' && event.type === 'string') {
      top.pendingKey = event.value;
      return;
    }

    switch (event.type) {
      case 'startArray':
        this._stack.push({ type: 'array', items: [] });
        return;
      case 'startDictionary':
        this._stack.push({ type: 'dictionary', entries: new Map(), pendingKey: undefined });
        return;
      case 'endCollection': {
        const frame = this._stack.pop();
        assert(frame !== undefined, 'endCollection without an open collection');
        this._attach(frame.type === 'array' ? frame.items : frame.entries);
        return;
      }
      default:
        this._attach(event.value);
    }
  }

  build(): PlistValue {
    this._validator.finish();
    assert(this._root !== undefined, 'completed event stream produced no value');
    return this._root;
  }

  private _attach(value: PlistValue) {
    const top = this._stack.at(-1);
    if (top === undefined) {
      this._root = value;
    }
    else if (top.type === 'array') {
      top.items.push(value);
    }
    else {
      assert(top.pendingKey !== undefined, 'dictionary value without a key');
      top.entries.set(top.pendingKey, value);
      top.pendingKey = undefined;
    }
  }
}

/** Builds a value from any producer (binary reader, XML reader, ...). */
export function buildValue(producer: EventProducer): PlistValue {
  const builder = new ValueBuilder();
  pipeEvents(producer, builder);
  return builder.build();
}
