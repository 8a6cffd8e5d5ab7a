export type ScanOutcome =
  | 'COMPLETED'
  | 'PARTIAL'
  | 'SKIPPED'
  | 'ABANDONED'
  | 'FAILED';

export type ScanSkipReason = 'locked' | 'missing' | 'deleted';

export type ScanAbandonReason =
  | 'list_failed'
  | 'lease_budget_exhausted'
  | 'lease_lost';

export type MessageFailureKind =
  | 'transient'
  | 'not_found'
  | 'rejected'
  | 'extraction';

export type MessageFailure = {
  messageId: string;
  kind: MessageFailureKind;
  error: string;
};

export type MailboxScanResult = {
  address: string;
  mailboxId: string | null;
  outcome: ScanOutcome;
  skipReason: ScanSkipReason | null;
  abandonReason: ScanAbandonReason | null;
  listedMessages: number;
  newVerifications: number;
  duplicateMessages: number;
  messagesWithoutCode: number;
  failures: MessageFailure[];
};

export type ScanRunSummary = {
  runCorrelationId: string;
  dueMailboxes: number;
  completed: number;
  partial: number;
  skipped: number;
  abandoned: number;
  failed: number;
  newVerifications: number;
};
