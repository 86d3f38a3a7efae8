export type StoreErrorCode = 'NOT_FOUND' | 'NOT_INITIALIZED' | 'CONNECTION_FAILED';

/**
 * Sentinel conditions callers branch on. Anything else a backend hits is
 * surfaced as a StoreOperationError.
 */
export abstract class StoreError extends Error {
  abstract readonly code: StoreErrorCode;
}

export class NotFoundError extends StoreError {
  readonly code = 'NOT_FOUND';

  constructor(readonly resource: string, readonly id: string) {
    super(`${resource} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export class NotInitializedError extends StoreError {
  readonly code = 'NOT_INITIALIZED';

  constructor() {
    super('store not initialized');
    this.name = 'NotInitializedError';
  }
}

export class ConnectionFailedError extends StoreError {
  readonly code = 'CONNECTION_FAILED';

  constructor(readonly target: string, cause?: unknown) {
    super(`failed to connect to store at ${target}`, { cause });
    this.name = 'ConnectionFailedError';
  }
}

export class StoreOperationError extends Error {
  constructor(readonly operation: string, message: string, cause?: unknown) {
    super(`${operation}: ${message}`, { cause });
    this.name = 'StoreOperationError';
  }
}

export function isNotFound(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError;
}

export function isNotInitialized(err: unknown): err is NotInitializedError {
  return err instanceof NotInitializedError;
}

export function isConnectionFailed(err: unknown): err is ConnectionFailedError {
  return err instanceof ConnectionFailedError;
}

/**
 * Pass sentinels and aborts through untouched; wrap everything else with the
 * failing operation's name.
 */
export function wrapError(operation: string, err: unknown): Error {
  if (err instanceof StoreError || err instanceof StoreOperationError) {
    return err;
  }
  if (err instanceof Error && err.name === 'AbortError') {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new StoreOperationError(operation, message, err);
}
