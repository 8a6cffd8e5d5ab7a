export class RemoteUnavailableError extends Error {
  public readonly operation: string;

  constructor(operation: string, detail: string) {
    super(`Mail admin API unavailable during ${operation}: ${detail}`);
    this.name = 'RemoteUnavailableError';
    this.operation = operation;
  }
}

export class QuotaExceededError extends Error {
  public readonly statusCode: number;

  constructor(statusCode: number, detail: string) {
    super(`Mail server refused the mailbox, quota exceeded: ${detail}`);
    this.name = 'QuotaExceededError';
    this.statusCode = statusCode;
  }
}

export class MailAdminNotFoundError extends Error {
  public readonly resource: string;

  constructor(resource: string) {
    super(`Mail admin resource not found: ${resource}`);
    this.name = 'MailAdminNotFoundError';
    this.resource = resource;
  }
}

/** A message could not be fetched this cycle; the next cycle retries it. */
export class TransientFetchError extends Error {
  public readonly messageId: string;

  constructor(messageId: string, detail: string) {
    super(`Message ${messageId} could not be fetched: ${detail}`);
    this.name = 'TransientFetchError';
    this.messageId = messageId;
  }
}

export class MailAdminRequestError extends Error {
  public readonly statusCode: number;

  constructor(operation: string, statusCode: number, detail: string) {
    super(`Mail admin API rejected ${operation}: ${detail}`);
    this.name = 'MailAdminRequestError';
    this.statusCode = statusCode;
  }
}

export function isRemoteUnavailableError(
  error: unknown,
): error is RemoteUnavailableError {
  return error instanceof RemoteUnavailableError;
}
