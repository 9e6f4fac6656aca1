export enum EventStreamErrorKind {
  UnexpectedEventType = 'UnexpectedEventType',
  UnexpectedEndOfEventStream = 'UnexpectedEndOfEventStream',
}

/**
 * Raised by consumers when the events they are fed do not nest the way a single plist value must.
 */
export class EventStreamError extends Error {
  readonly name = 'EventStreamError';

  constructor(
    readonly kind: EventStreamErrorKind,
    readonly expected: string,
    readonly found: string,
  ) {
    super(`${kind}: expected ${expected} but found ${found}`);
  }

  static unexpectedEvent(expected: string, found: string) {
    return new EventStreamError(EventStreamErrorKind.UnexpectedEventType, expected, found);
  }

  static unexpectedEnd(expected: string) {
    return new EventStreamError(EventStreamErrorKind.UnexpectedEndOfEventStream, expected, 'end of event stream');
  }
}
