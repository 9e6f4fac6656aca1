import { EventStreamError } from "../errors/event-stream-error";
import { PlistEvent } from "./event";

type Frame =
  | { readonly type: 'array' }
  | { readonly type: 'dictionary'; expectingKey: boolean };

/**
 * Tracks nesting of an event stream and rejects anything that is not exactly one well-formed value.
 * Consumers call {@link accept} before acting on an event and {@link finish} once the producer is exhausted.
 */
export class EventStreamValidator {
  private readonly _stack: Frame[] = [];
  private _complete = false;

  get depth() {
    return this._stack.length;
  }

  get isComplete() {
    return this._complete;
  }

  /** true when the next event must be a dictionary key (or the dictionary's end) */
  get isExpectingKey() {
    const top = this._stack.at(-1);
    return top?.type === 'dictionary' && top.expectingKey;
  }

  accept(event: PlistEvent) {
    if (this._complete) {
      throw EventStreamError.unexpectedEvent('end of event stream', event.type);
    }

    const top = this._stack.at(-1);
    if (top?.type === 'dictionary' && top.expectingKey) {
      if (event.type === 'endCollection') {
        this._stack.pop();
        this._valueCompleted();
        return;
      }
      if (event.type !== 'string') {
        throw EventStreamError.unexpectedEvent('dictionary key or end collection', event.type);
      }
      top.expectingKey = false;
      return;
    }

    switch (event.type) {
      case 'startArray':
        this._stack.push({ type: 'array' });
        return;
      case 'startDictionary':
        this._stack.push({ type: 'dictionary', expectingKey: true });
        return;
      case 'endCollection':
        if (top?.type !== 'array') {
          throw EventStreamError.unexpectedEvent('value or start collection', event.type);
        }
        this._stack.pop();
        this._valueCompleted();
        return;
      default:
        this._valueCompleted();
    }
  }

  finish() {
    if (!this._complete) {
      throw EventStreamError.unexpectedEnd(this._stack.length ? 'end collection' : 'value or start collection');
    }
  }

  private _valueCompleted() {
    const top = this._stack.at(-1);
    if (top === undefined) {
      this._complete = true;
    }
    else if (top.type === 'dictionary') {
      top.expectingKey = true;
    }
  }
}
