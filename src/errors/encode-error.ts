export enum EncodeErrorKind {
  IntegerOverflow = 'IntegerOverflow',
  UidNotSupportedInXml = 'UidNotSupportedInXml',
  InvalidValue = 'InvalidValue',
}

export class EncodeError extends Error {
  readonly name = 'EncodeError';

  constructor(readonly kind: EncodeErrorKind, message: string) {
    super(`${kind}: ${message}`);
  }
}
