/**
 * Errors raised by the pair reduction protocol.
 */

export type ReducerOperation = 'begin' | 'step' | 'finish';

/**
 * Raised when begin/step/finish are called out of order, or on a reducer
 * that has already failed.
 */
export class MisuseError extends Error {
  readonly operation: ReducerOperation;

  constructor(operation: ReducerOperation, message: string) {
    super(message);
    this.name = 'MisuseError';
    this.operation = operation;
  }
}

/**
 * Raised when the digest function cannot produce a result.
 * The reducer that raised it must be discarded.
 */
export class DigestFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DigestFailure';
  }
}
