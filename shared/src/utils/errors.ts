/**
 * Raised when the session store cannot be opened or queried.
 * Fatal at startup; during a sweep the next scheduled run retries.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Raised when a session write keeps losing compare-and-swap races with
 * another process.
 */
export class SessionConflictError extends Error {
  constructor(
    public readonly userId: string,
    public readonly operation: string,
    public readonly attempts: number
  ) {
    super(`Gave up on ${operation} for session ${userId} after ${attempts} conflicting writes`);
    this.name = 'SessionConflictError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
