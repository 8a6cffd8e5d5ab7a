import { CachedLatestCode } from '../cache/verification-cache.types';
import { MailboxStatus } from '../mailbox/entities/mailbox.entity';

export type MailboxView = {
  mailboxId: string;
  address: string;
  domain: string;
  status: MailboxStatus;
  createdAt: string;
  expiresAt: string;
};

/** Returned once at provisioning; the password is never stored locally. */
export type ProvisionedMailboxView = MailboxView & {
  password: string;
};

export type LatestCode = CachedLatestCode & {
  address: string;
};

export type VerificationView = {
  id: string;
  code: string;
  patternName: string;
  sourceMessageId: string;
  sender: string | null;
  subject: string | null;
  content: string | null;
  receivedAt: string;
  extractedAt: string;
  isRead: boolean;
};

export type MailboxVerificationsOverview = {
  address: string;
  verifications: VerificationView[];
};

export type MarkReadResult = {
  address: string;
  verificationId: string;
  isRead: true;
};
