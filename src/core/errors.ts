export type FailureKind =
  | 'MalformedTimestamp'
  | 'AmbiguousLocalTime'
  | 'EmptyDescription'
  | 'FeedUnavailable'
  | 'StoreUnavailable'
  | 'ConstraintViolation'
  | 'DeliveryFailed';

/** Base of every failure that ends a run in `Failed(reason)`. */
export abstract class EngineError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class MalformedTimestampError extends EngineError {
  readonly kind = 'MalformedTimestamp';
}

export class AmbiguousLocalTimeError extends EngineError {
  readonly kind = 'AmbiguousLocalTime';
}

export class EmptyDescriptionError extends EngineError {
  readonly kind = 'EmptyDescription';
}

export class FeedUnavailableError extends EngineError {
  readonly kind = 'FeedUnavailable';
}

export class StoreUnavailableError extends EngineError {
  readonly kind = 'StoreUnavailable';
}

export class ConstraintViolationError extends EngineError {
  readonly kind = 'ConstraintViolation';
}

export class DeliveryFailedError extends EngineError {
  readonly kind = 'DeliveryFailed';
}

/** Feed data defects; the only kinds the skip policy may drop. */
export type InputDefect = MalformedTimestampError | AmbiguousLocalTimeError | EmptyDescriptionError;

export function isInputDefect(err: unknown): err is InputDefect {
  return (
    err instanceof MalformedTimestampError ||
    err instanceof AmbiguousLocalTimeError ||
    err instanceof EmptyDescriptionError
  );
}
