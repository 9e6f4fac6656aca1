import { PlistDate } from "../value/plist-date";
import { Uid } from "../value/uid";

/**
 * A single token of the format-neutral stream every reader produces and every writer consumes.
 *
 * Dictionaries are flattened into alternating key (`string`) and value events:
 *
 * ```
 * startDictionary(2)
 * string("Height")  // key
 * real(1.6)         // value
 * string("Age")     // key
 * integer(28n)      // value
 * endCollection
 * ```
 *
 * `size` on the start events is a hint only.
 */
export type PlistEvent =
  | { readonly type: 'startArray'; readonly size?: number }
  | { readonly type: 'startDictionary'; readonly size?: number }
  | { readonly type: 'endCollection' }
  | ScalarEvent;

export type ScalarEvent =
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'data'; readonly value: Uint8Array }
  | { readonly type: 'date'; readonly value: PlistDate }
  | { readonly type: 'integer'; readonly value: bigint }
  | { readonly type: 'real'; readonly value: number }
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'uid'; readonly value: Uid };

export type PlistEventType = PlistEvent['type'];

/** Emits one plist value as a well-nested, depth-first sequence of events. */
export type EventProducer = Iterable<PlistEvent>;

/** Accepts the events of one plist value, in producer order. */
export interface EventConsumer {
  write(event: PlistEvent): void;
}

export function pipeEvents(producer: EventProducer, consumer: EventConsumer) {
  for (const event of producer) {
    consumer.write(event);
  }
}

export function describeEvent(event: PlistEvent) {
  switch (event.type) {
    case 'startArray':
    case 'startDictionary':
    case 'endCollection':
      return event.type;
    case 'string':
      return `string(${JSON.stringify(event.value)})`;
    case 'data':
      return `data(${event.value.byteLength} bytes)`;
    case 'date':
    case 'uid':
      return event.value.toString();
    case 'boolean':
    case 'integer':
    case 'real':
      return `${event.type}(${event.value})`;
  }
}
