export type ProvisionFailureReason =
  | 'invalid_request'
  | 'remote_unavailable'
  | 'quota_exceeded'
  | 'remote_rejected'
  | 'address_exhausted'
  | 'persistence_failed';

/** Provisioning did not produce a mailbox; nothing was persisted. */
export class ProvisionError extends Error {
  public readonly reason: ProvisionFailureReason;

  constructor(reason: ProvisionFailureReason, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ProvisionError';
    this.reason = reason;
  }
}

export class MailboxNotFoundError extends Error {
  public readonly mailboxFingerprint: string;

  constructor(mailboxFingerprint: string) {
    super(`Mailbox ${mailboxFingerprint} does not exist`);
    this.name = 'MailboxNotFoundError';
    this.mailboxFingerprint = mailboxFingerprint;
  }
}
