/**
 * Decode errors - the only failures the decoding path raises
 */

export enum DecodeErrorKind {
  MISSING_TIME_GROUP = 'MissingTimeGroup',
  OUT_OF_RANGE = 'OutOfRange'
}

export class DecodeError extends Error {
  constructor(public readonly kind: DecodeErrorKind, message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class MissingTimeGroupError extends DecodeError {
  constructor(public readonly text: string) {
    super(DecodeErrorKind.MISSING_TIME_GROUP, `No DDHHMMZ time group found in report: ${text}`);
    this.name = 'MissingTimeGroupError';
  }
}

export class DateCompositionError extends DecodeError {
  constructor(message: string) {
    super(DecodeErrorKind.OUT_OF_RANGE, message);
    this.name = 'DateCompositionError';
  }
}
