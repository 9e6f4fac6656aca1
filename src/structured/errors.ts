export enum DeserializeErrorKind {
  TypeMismatch = 'TypeMismatch',
  MissingField = 'MissingField',
  IntegerOverflow = 'IntegerOverflow',
  UnexpectedEndOfEventStream = 'UnexpectedEndOfEventStream',
  TrailingEvents = 'TrailingEvents',
}

/**
 * Raised when an event stream does not fit the requested {@link PlistType}.
 * `path` locates the failing value, e.g. `items[2].count`; the root is `''`.
 */
export class DeserializeError extends Error {
  readonly name: string = 'DeserializeError';

  constructor(readonly kind: DeserializeErrorKind, readonly path: string, message: string) {
    super(`${kind} at ${path === '' ? '(root)' : path}: ${message}`);
  }
}

export class TypeMismatchError extends DeserializeError {
  readonly name: string = 'TypeMismatchError';

  constructor(path: string, readonly expected: string, readonly found: string) {
    super(DeserializeErrorKind.TypeMismatch, path, `expected ${expected} but found ${found}`);
  }
}
