import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { subMilliseconds } from 'date-fns';
import { In, MoreThan, QueryFailedError, Repository } from 'typeorm';
import { VerificationCacheService } from '../cache/verification-cache.service';
import { CLOCK, Clock } from '../common/clock/clock';
import { BoundedWorkerPool } from '../common/concurrency/bounded-worker-pool';
import {
  describeUnknownError,
  fingerprintIdentifier,
  resolveCorrelationId,
  serializeStructuredLog,
} from '../common/logging/structured-log.util';
import { retryWithBackoff } from '../common/retry/retry.util';
import { TEMPMAIL_CONFIG, TempMailConfig } from '../config/temp-mail.config';
import {
  CodeCandidate,
  extractVerificationCodes,
} from '../code-extraction/verification-code.extractor';
import { LeaseHandle, LeaseLockService } from '../lock/lease-lock.service';
import { AlreadyLockedError, isLeaseLostError } from '../lock/lock.errors';
import { MailAdminApiClient } from '../mail-admin/mail-admin-api.client';
import {
  isRemoteUnavailableError,
  MailAdminNotFoundError,
  TransientFetchError,
} from '../mail-admin/mail-admin.errors';
import { MessageRef, RawMessage } from '../mail-admin/mail-admin.types';
import { Mailbox } from '../mailbox/entities/mailbox.entity';
import { VerificationRecord } from '../mailbox/entities/verification-record.entity';
import {
  MailboxScanResult,
  MessageFailure,
  ScanAbandonReason,
  ScanRunSummary,
  ScanSkipReason,
} from './mailbox-scan.types';

const UNIQUE_VIOLATION = '23505';

type LeaseBudget = {
  lease: LeaseHandle;
  expiresAtMs: number;
  renewals: number;
};

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}

function compareRefs(left: MessageRef, right: MessageRef): number {
  const delta = left.arrivedAt.getTime() - right.arrivedAt.getTime();
  if (delta !== 0) return delta;
  return left.id.localeCompare(right.id);
}

function classifyFetchFailure(error: unknown): MessageFailure['kind'] {
  if (error instanceof TransientFetchError) return 'transient';
  if (error instanceof MailAdminNotFoundError) return 'not_found';
  return 'rejected';
}

class ScanAbandonedSignal extends Error {
  constructor(public readonly reason: ScanAbandonReason) {
    super(`scan abandoned: ${reason}`);
    this.name = 'ScanAbandonedSignal';
  }
}

/**
 * One scan cycle per mailbox: list new messages, extract codes, persist one
 * record per message and keep the cached latest code pointing at the newest
 * arrival. Exclusion between workers comes only from the per-mailbox lease.
 */
@Injectable()
export class MailboxScanService {
  private readonly logger = new Logger(MailboxScanService.name);

  constructor(
    @InjectRepository(Mailbox)
    private readonly mailboxRepo: Repository<Mailbox>,
    @InjectRepository(VerificationRecord)
    private readonly verificationRepo: Repository<VerificationRecord>,
    private readonly mailAdmin: MailAdminApiClient,
    private readonly leaseLock: LeaseLockService,
    private readonly cache: VerificationCacheService,
    @Inject(TEMPMAIL_CONFIG) private readonly config: TempMailConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  private buildResult(
    address: string,
    mailboxId: string | null,
  ): MailboxScanResult {
    return {
      address,
      mailboxId,
      outcome: 'COMPLETED',
      skipReason: null,
      abandonReason: null,
      listedMessages: 0,
      newVerifications: 0,
      duplicateMessages: 0,
      messagesWithoutCode: 0,
      failures: [],
    };
  }

  private skipped(
    address: string,
    mailboxId: string | null,
    skipReason: ScanSkipReason,
  ): MailboxScanResult {
    return {
      ...this.buildResult(address, mailboxId),
      outcome: 'SKIPPED',
      skipReason,
    };
  }

  /**
   * Renews the lease when the next remote call could outlive it. Throws
   * `ScanAbandonedSignal` once the renewal budget is spent.
   */
  private async ensureLeaseBudget(budget: LeaseBudget): Promise<void> {
    const nowMs = this.clock.now().getTime();
    if (budget.expiresAtMs - nowMs > this.config.mailAdmin.timeoutMs) return;
    if (budget.renewals >= this.config.scan.maxLeaseRenewals) {
      throw new ScanAbandonedSignal('lease_budget_exhausted');
    }
    try {
      await this.leaseLock.renew(
        budget.lease.resource,
        budget.lease.token,
        budget.lease.leaseMs,
      );
    } catch (error: unknown) {
      if (isLeaseLostError(error)) throw new ScanAbandonedSignal('lease_lost');
      throw error;
    }
    budget.renewals += 1;
    budget.expiresAtMs = nowMs + budget.lease.leaseMs;
  }

  private async releaseLease(
    lease: LeaseHandle,
    runCorrelationId: string,
    address: string,
  ): Promise<void> {
    try {
      await this.leaseLock.release(lease.resource, lease.token);
    } catch (error: unknown) {
      this.logger.warn(
        serializeStructuredLog({
          event: isLeaseLostError(error)
            ? 'mailbox_scan_lease_lost'
            : 'mailbox_scan_lease_release_failed',
          runCorrelationId,
          mailboxFingerprint: fingerprintIdentifier(address),
          error: describeUnknownError(error),
        }),
      );
    }
  }

  private async listMessagesWithRetry(
    mailbox: Mailbox,
    since: Date,
    runCorrelationId: string,
  ): Promise<MessageRef[]> {
    return retryWithBackoff({
      operation: () =>
        this.mailAdmin.listMessages(
          mailbox.address,
          since,
          this.config.scan.messageLimit,
        ),
      policy: this.config.remoteRetry,
      isRetryable: isRemoteUnavailableError,
      onRetry: (info) =>
        this.logger.warn(
          serializeStructuredLog({
            event: 'mailbox_scan_list_retry_scheduled',
            runCorrelationId,
            mailboxId: mailbox.id,
            attemptNumber: info.attemptNumber,
            maxAttempts: info.maxAttempts,
            waitMs: info.waitMs,
            error: describeUnknownError(info.error),
          }),
        ),
    });
  }

  private async findKnownMessageIds(
    address: string,
    refs: MessageRef[],
  ): Promise<Set<string>> {
    if (!refs.length) return new Set();
    const known = await this.verificationRepo.find({
      where: {
        mailboxAddress: address,
        sourceMessageId: In(refs.map((ref) => ref.id)),
      },
    });
    return new Set(known.map((record) => record.sourceMessageId));
  }

  /** Inserts the record unless the message is already represented. */
  private async persistVerification(input: {
    mailbox: Mailbox;
    message: RawMessage;
    candidate: CodeCandidate;
  }): Promise<VerificationRecord | null> {
    try {
      return await this.verificationRepo.manager.transaction(async (em) => {
        const repo = em.getRepository(VerificationRecord);
        const existing = await repo.findOne({
          where: {
            mailboxAddress: input.mailbox.address,
            sourceMessageId: input.message.id,
          },
        });
        if (existing) return null;
        return repo.save(
          repo.create({
            mailboxAddress: input.mailbox.address,
            code: input.candidate.code,
            patternName: input.candidate.patternName,
            sourceMessageId: input.message.id,
            sender: input.message.sender,
            subject: input.message.subject,
            content: input.message.text,
            receivedAt: input.message.arrivedAt,
            extractedAt: this.clock.now(),
            isRead: false,
          }),
        );
      });
    } catch (error: unknown) {
      if (isUniqueViolation(error)) return null;
      throw error;
    }
  }

  /**
   * A full page means more messages are waiting. An oldest-first page left
   * only newer ones unlisted, so the next listing starts at its last
   * arrival. Any other order may have left older ones behind, so the
   * watermark stays where this listing started.
   */
  private resolveWatermark(input: {
    cycleStartedAt: Date;
    listedSince: Date;
    listedOldestFirst: boolean;
    refs: MessageRef[];
    transientFailures: Date[];
  }): Date {
    let watermark = input.cycleStartedAt;
    const lastRef = input.refs[input.refs.length - 1];
    if (lastRef && input.refs.length >= this.config.scan.messageLimit) {
      watermark = input.listedOldestFirst
        ? lastRef.arrivedAt
        : input.listedSince;
    }
    for (const arrivedAt of input.transientFailures) {
      if (arrivedAt < watermark) watermark = arrivedAt;
    }
    return watermark;
  }

  private async processMessages(input: {
    mailbox: Mailbox;
    refs: MessageRef[];
    budget: LeaseBudget;
    result: MailboxScanResult;
    transientFailures: Date[];
  }): Promise<void> {
    const { mailbox, result } = input;
    const known = await this.findKnownMessageIds(mailbox.address, input.refs);

    for (const ref of input.refs) {
      if (known.has(ref.id)) {
        result.duplicateMessages += 1;
        continue;
      }
      await this.ensureLeaseBudget(input.budget);

      let message: RawMessage;
      try {
        message = await this.mailAdmin.fetchMessage(mailbox.address, ref);
      } catch (error: unknown) {
        const kind = classifyFetchFailure(error);
        if (kind === 'transient') input.transientFailures.push(ref.arrivedAt);
        result.failures.push({
          messageId: ref.id,
          kind,
          error: describeUnknownError(error),
        });
        continue;
      }

      let candidates: CodeCandidate[];
      try {
        candidates = extractVerificationCodes(message);
      } catch (error: unknown) {
        result.failures.push({
          messageId: ref.id,
          kind: 'extraction',
          error: describeUnknownError(error),
        });
        continue;
      }
      const [candidate] = candidates;
      if (!candidate) {
        result.messagesWithoutCode += 1;
        continue;
      }

      const record = await this.persistVerification({
        mailbox,
        message,
        candidate,
      });
      if (!record) {
        result.duplicateMessages += 1;
        continue;
      }
      result.newVerifications += 1;
      await this.cache.cacheLatestCodeIfNewer(mailbox.address, {
        verificationId: record.id,
        code: record.code,
        patternName: record.patternName,
        sourceMessageId: record.sourceMessageId,
        receivedAt: record.receivedAt.toISOString(),
        extractedAt: record.extractedAt.toISOString(),
      });
    }
  }

  async scanMailbox(
    address: string,
    options: { runCorrelationId?: string } = {},
  ): Promise<MailboxScanResult> {
    const runCorrelationId = resolveCorrelationId(options.runCorrelationId);
    const mailboxFingerprint = fingerprintIdentifier(address);
    const cycleStartedAt = this.clock.now();

    let lease: LeaseHandle;
    try {
      lease = await this.leaseLock.tryAcquire(
        `scan:${address}`,
        this.config.scan.leaseMs,
      );
    } catch (error: unknown) {
      if (error instanceof AlreadyLockedError) {
        this.logger.debug(
          serializeStructuredLog({
            event: 'mailbox_scan_skipped_locked',
            runCorrelationId,
            mailboxFingerprint,
          }),
        );
        return this.skipped(address, null, 'locked');
      }
      throw error;
    }

    const budget: LeaseBudget = {
      lease,
      expiresAtMs: cycleStartedAt.getTime() + lease.leaseMs,
      renewals: 0,
    };
    try {
      const mailbox = await this.mailboxRepo.findOne({ where: { address } });
      if (!mailbox) return this.skipped(address, null, 'missing');
      if (mailbox.status === 'DELETED') {
        return this.skipped(address, mailbox.id, 'deleted');
      }
      const result = this.buildResult(address, mailbox.id);

      const listedSince = mailbox.scanWatermarkAt ?? mailbox.createdAt;
      let refs: MessageRef[];
      try {
        refs = await this.listMessagesWithRetry(
          mailbox,
          listedSince,
          runCorrelationId,
        );
      } catch (error: unknown) {
        this.logger.warn(
          serializeStructuredLog({
            event: 'mailbox_scan_list_abandoned',
            runCorrelationId,
            mailboxId: mailbox.id,
            mailboxFingerprint,
            error: describeUnknownError(error),
          }),
        );
        return { ...result, outcome: 'ABANDONED', abandonReason: 'list_failed' };
      }
      const listedOldestFirst = refs.every(
        (ref, index) =>
          index === 0 || refs[index - 1].arrivedAt <= ref.arrivedAt,
      );
      if (!listedOldestFirst && refs.length >= this.config.scan.messageLimit) {
        this.logger.warn(
          serializeStructuredLog({
            event: 'mailbox_scan_full_page_out_of_order',
            runCorrelationId,
            mailboxId: mailbox.id,
            mailboxFingerprint,
            listedMessages: refs.length,
          }),
        );
      }
      refs.sort(compareRefs);
      result.listedMessages = refs.length;

      const transientFailures: Date[] = [];
      try {
        await this.processMessages({
          mailbox,
          refs,
          budget,
          result,
          transientFailures,
        });
      } catch (error: unknown) {
        if (!(error instanceof ScanAbandonedSignal)) throw error;
        this.logger.warn(
          serializeStructuredLog({
            event: 'mailbox_scan_abandoned',
            runCorrelationId,
            mailboxId: mailbox.id,
            mailboxFingerprint,
            reason: error.reason,
            newVerifications: result.newVerifications,
          }),
        );
        return { ...result, outcome: 'ABANDONED', abandonReason: error.reason };
      }

      await this.mailboxRepo.update(
        { id: mailbox.id },
        {
          lastScannedAt: cycleStartedAt,
          scanWatermarkAt: this.resolveWatermark({
            cycleStartedAt,
            listedSince,
            listedOldestFirst,
            refs,
            transientFailures,
          }),
        },
      );
      result.outcome = result.failures.length ? 'PARTIAL' : 'COMPLETED';
      this.logger.log(
        serializeStructuredLog({
          event: 'mailbox_scan_completed',
          runCorrelationId,
          mailboxId: mailbox.id,
          mailboxFingerprint,
          outcome: result.outcome,
          listedMessages: result.listedMessages,
          newVerifications: result.newVerifications,
          duplicateMessages: result.duplicateMessages,
          failedMessages: result.failures.length,
          durationMs: this.clock.now().getTime() - cycleStartedAt.getTime(),
        }),
      );
      return result;
    } catch (error: unknown) {
      this.logger.error(
        serializeStructuredLog({
          event: 'mailbox_scan_failed',
          runCorrelationId,
          mailboxFingerprint,
          error: describeUnknownError(error),
        }),
      );
      return { ...this.buildResult(address, null), outcome: 'FAILED' };
    } finally {
      await this.releaseLease(lease, runCorrelationId, address);
    }
  }

  /**
   * Scans ACTIVE mailboxes and EXPIRED ones still inside the grace period,
   * least recently scanned first.
   */
  async scanDueMailboxes(
    options: { runCorrelationId?: string } = {},
  ): Promise<ScanRunSummary> {
    const runCorrelationId = resolveCorrelationId(options.runCorrelationId);
    const graceFloor = subMilliseconds(
      this.clock.now(),
      this.config.lifecycle.expiryGraceMs,
    );
    const due = await this.mailboxRepo.find({
      where: [
        { status: 'ACTIVE' },
        { status: 'EXPIRED', expiresAt: MoreThan(graceFloor) },
      ],
      order: {
        lastScannedAt: { direction: 'ASC', nulls: 'FIRST' },
        createdAt: 'ASC',
      },
      take: this.config.scan.maxMailboxesPerRun,
    });

    const pool = new BoundedWorkerPool(this.config.scan.concurrency);
    const results = await pool.run(due, (mailbox) =>
      this.scanMailbox(mailbox.address, { runCorrelationId }),
    );

    const summary: ScanRunSummary = {
      runCorrelationId,
      dueMailboxes: due.length,
      completed: 0,
      partial: 0,
      skipped: 0,
      abandoned: 0,
      failed: 0,
      newVerifications: 0,
    };
    for (const entry of results) {
      if (!entry.ok) {
        summary.failed += 1;
        this.logger.error(
          serializeStructuredLog({
            event: 'mailbox_scan_worker_failed',
            runCorrelationId,
            mailboxId: entry.job.id,
            error: describeUnknownError(entry.error),
          }),
        );
        continue;
      }
      summary.newVerifications += entry.value.newVerifications;
      if (entry.value.outcome === 'COMPLETED') summary.completed += 1;
      if (entry.value.outcome === 'PARTIAL') summary.partial += 1;
      if (entry.value.outcome === 'SKIPPED') summary.skipped += 1;
      if (entry.value.outcome === 'ABANDONED') summary.abandoned += 1;
      if (entry.value.outcome === 'FAILED') summary.failed += 1;
    }
    return summary;
  }
}
