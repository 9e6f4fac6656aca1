/**
 * Thrown when an internal invariant of the codec does not hold.
 * Malformed input is reported with {@link ParseError} instead; an AssertError always means a bug.
 */
export class AssertError extends Error {
  readonly name = 'AssertError';

  constructor(message: string) {
    super(message);
  }
}

export function assert(condition: boolean, message: string | (() => string)): asserts condition {
  if (!condition) {
    throw new AssertError(typeof message === 'string' ? message : message());
  }
}
