/**
 * Lease contention and lease loss signals. None of these means the locked
 * work failed: the caller skips or abandons its cycle.
 */
export class AlreadyLockedError extends Error {
  public readonly resource: string;

  constructor(resource: string) {
    super(`Lease for ${resource} is held by another worker`);
    this.name = 'AlreadyLockedError';
    this.resource = resource;
  }
}

export class TokenMismatchError extends Error {
  public readonly resource: string;

  constructor(resource: string) {
    super(`Lease for ${resource} is held under a different token`);
    this.name = 'TokenMismatchError';
    this.resource = resource;
  }
}

export class LeaseExpiredError extends Error {
  public readonly resource: string;

  constructor(resource: string) {
    super(`Lease for ${resource} has already expired`);
    this.name = 'LeaseExpiredError';
    this.resource = resource;
  }
}

export function isLeaseLostError(
  error: unknown,
): error is TokenMismatchError | LeaseExpiredError {
  return error instanceof TokenMismatchError || error instanceof LeaseExpiredError;
}
