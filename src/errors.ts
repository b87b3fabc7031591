export type ErrorKind =
  | 'not_found'
  | 'invalid_reference'
  | 'constraint_violation'
  | 'conflict'
  | 'unavailable'
  | 'aborted';

export type EntityName = 'column' | 'task' | 'user' | 'todo';

export abstract class BoardError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The operation targets an id that is not in the store. */
export class NotFoundError extends BoardError {
  readonly kind = 'not_found';

  constructor(readonly entity: EntityName, readonly id: number) {
    super(`${capitalize(entity)} not found: ${id}`);
  }
}

/** A create or move names a container that does not exist. */
export class ReferenceInvalidError extends BoardError {
  readonly kind = 'invalid_reference';

  constructor(readonly entity: EntityName, readonly id: number, options?: { cause?: unknown }) {
    super(`Referenced ${entity} does not exist: ${id}`, options);
  }
}

/**
 * Two siblings ended up sharing an order value. Never repaired; the whole
 * transaction is rolled back.
 */
export class ConstraintViolationError extends BoardError {
  readonly kind = 'constraint_violation';

  constructor(readonly container: string, detail: string, options?: { cause?: unknown }) {
    super(`Order constraint violated in ${container}: ${detail}`, options);
  }
}

export class ConflictError extends BoardError {
  readonly kind = 'conflict';
}

/** No transaction slot became free within the acquire timeout. */
export class PoolTimeoutError extends BoardError {
  readonly kind = 'unavailable';

  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for a database slot`);
  }
}

/** The database aborted the transaction over a deadlock or serialization failure. */
export class ContentionError extends BoardError {
  readonly kind = 'unavailable';

  constructor(options?: { cause?: unknown }) {
    super('Transaction aborted by a concurrent writer; retry the operation', options);
  }
}

export class RequestAbortedError extends BoardError {
  readonly kind = 'aborted';

  constructor() {
    super('Request was abandoned before its transaction started');
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
