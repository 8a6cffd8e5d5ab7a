import { MailboxStatus } from '../mailbox/entities/mailbox.entity';

export type CachedLatestCode = {
  verificationId: string;
  code: string;
  patternName: string;
  sourceMessageId: string;
  receivedAt: string;
  extractedAt: string;
};

export type CachedMailboxMeta = {
  mailboxId: string;
  address: string;
  domain: string;
  status: MailboxStatus;
  createdAt: string;
  expiresAt: string;
};

export type StatsSnapshot = {
  activeMailboxCount: number;
  totalMailboxCount: number;
  totalCodesExtracted: number;
  lastRefreshedAt: string;
};

export type LatestCodeWriteOutcome = 'written' | 'kept_newer' | 'failed';
