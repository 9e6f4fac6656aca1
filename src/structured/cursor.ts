import { EventProducer, PlistEvent } from "../events/event";
import { EventStreamValidator } from "../events/stream-validator";
import { ValueBuilder } from "../events/value-builder";
import { PlistValue } from "../value/value";
import { DeserializeError, DeserializeErrorKind } from "./errors";

export function fieldPath(path: string, field: string) {
  return path === '' ? field : `${path}.${field}`;
}

export function indexPath(path: string, index: number) {
  return `${path}[${index}]`;
}

/** what a deserializer saw, in the words used by {@link TypeMismatchError} */
export function describeFound(event: PlistEvent) {
  switch (event.type) {
    case 'startArray':
      return 'array';
    case 'startDictionary':
      return 'dictionary';
    case 'endCollection':
      return 'end of collection';
    default:
      return event.type;
  }
}

/**
 * Pull-style view of a producer with one event of lookahead.
 * Every event passes through an {@link EventStreamValidator} before a deserializer sees it.
 */
export class EventCursor {
  private readonly _iterator: Iterator<PlistEvent>;
  private readonly _validator = new EventStreamValidator();
  private _peeked: PlistEvent | undefined;

  constructor(producer: EventProducer) {
    this._iterator = producer[Symbol.iterator]();
  }

  peek(path: string): PlistEvent {
    if (this._peeked === undefined) {
      this._peeked = this._pull(path);
    }
    return this._peeked;
  }

  next(path: string): PlistEvent {
    const event = this.peek(path);
    this._peeked = undefined;
    return event;
  }

  /** consumes one complete value, nested collections included */
  skipValue(path: string) {
    this._consumeValue(path, () => { });
  }

  readValue(path: string): PlistValue {
    const builder = new ValueBuilder();
    this._consumeValue(path, event => builder.write(event));
    return builder.build();
  }

  /**
   * Drains the producer, which lets it report problems found after its last event,
   * and fails if anything follows the root value.
   */
  finish() {
    if (this._peeked !== undefined) {
      throw trailingEvent(this._peeked);
    }
    const result = this._iterator.next();
    if (!result.done) {
      throw trailingEvent(result.value);
    }
  }

  private _consumeValue(path: string, onEvent: (event: PlistEvent) => void) {
    let depth = 0;
    do {
      const event = this.next(path);
      onEvent(event);
      if (event.type === 'startArray' || event.type === 'startDictionary') {
        ++depth;
      }
      else if (event.type === 'endCollection') {
        --depth;
      }
    } while (depth > 0);
  }

  private _pull(path: string): PlistEvent {
    const result = this._iterator.next();
    if (result.done) {
      throw new DeserializeError(DeserializeErrorKind.UnexpectedEndOfEventStream, path, 'the event stream ended early');
    }
    this._validator.accept(result.value);
    return result.value;
  }
}

function trailingEvent(event: PlistEvent) {
  return new DeserializeError(DeserializeErrorKind.TrailingEvents, '', `unexpected ${describeFound(event)} after the root value`);
}
