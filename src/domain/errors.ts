export type FieldErrors = Record<string, string[]>;

/** Bad input from the caller. Nothing was written. */
export class ValidationError extends Error {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, readonly fieldErrors: FieldErrors = {}) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  readonly code = 'NOT_FOUND';

  constructor(readonly entity: string, readonly id: number) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

/** Lock contention that outlasted the retry budget */
export class TransientStoreError extends Error {
  readonly code = 'STORE_BUSY';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientStoreError';
  }
}
