import type { ErrorKind } from './types';

/** A rejected action. Thrown while validating; the engine turns it into a failed result. */
export class ActionError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'ActionError';
    this.kind = kind;
  }
}

/** The engine broke one of its own ledger rules. Never reported as a normal failure. */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}
