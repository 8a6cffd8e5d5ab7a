import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, LessThan, Repository } from 'typeorm';
import { VerificationCacheService } from '../cache/verification-cache.service';
import { CLOCK, Clock } from '../common/clock/clock';
import {
  describeUnknownError,
  fingerprintIdentifier,
  resolveCorrelationId,
  serializeStructuredLog,
} from '../common/logging/structured-log.util';
import { retryWithBackoff } from '../common/retry/retry.util';
import { TEMPMAIL_CONFIG, TempMailConfig } from '../config/temp-mail.config';
import { MailAdminApiClient } from '../mail-admin/mail-admin-api.client';
import {
  isRemoteUnavailableError,
  MailAdminNotFoundError,
} from '../mail-admin/mail-admin.errors';
import { Mailbox, MailboxStatus } from './entities/mailbox.entity';

export type ReconciliationResult = {
  status: 'COMPLETED' | 'SKIPPED';
  remoteMailboxes: number;
  markedDeleted: number;
  remoteDeleted: number;
  failed: number;
};

/**
 * Resolves drift between local mailbox rows and the mail server by trusting
 * the remote side for existence.
 */
@Injectable()
export class MailboxReconciliationService {
  private readonly logger = new Logger(MailboxReconciliationService.name);

  constructor(
    @InjectRepository(Mailbox)
    private readonly mailboxRepo: Repository<Mailbox>,
    private readonly mailAdmin: MailAdminApiClient,
    private readonly cache: VerificationCacheService,
    @Inject(TEMPMAIL_CONFIG) private readonly config: TempMailConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async reconcileWithRemote(): Promise<ReconciliationResult> {
    const runCorrelationId = resolveCorrelationId(undefined);
    const listedAt = this.clock.now();
    const result: ReconciliationResult = {
      status: 'COMPLETED',
      remoteMailboxes: 0,
      markedDeleted: 0,
      remoteDeleted: 0,
      failed: 0,
    };

    let remoteAddresses: Set<string>;
    try {
      const remote = await retryWithBackoff({
        operation: () => this.mailAdmin.listMailboxes(),
        policy: this.config.remoteRetry,
        isRetryable: isRemoteUnavailableError,
      });
      remoteAddresses = new Set(remote.map((mailbox) => mailbox.address));
    } catch (error: unknown) {
      this.logger.warn(
        serializeStructuredLog({
          event: 'mailbox_reconciliation_remote_list_failed',
          runCorrelationId,
          error: describeUnknownError(error),
        }),
      );
      return { ...result, status: 'SKIPPED' };
    }
    result.remoteMailboxes = remoteAddresses.size;

    // Rows created after the listing started may not be visible remotely yet.
    const live = await this.mailboxRepo.find({
      where: {
        status: In<MailboxStatus>(['ACTIVE', 'EXPIRED']),
        createdAt: LessThan(listedAt),
      },
    });
    for (const mailbox of live) {
      if (remoteAddresses.has(mailbox.address)) continue;
      try {
        const update = await this.mailboxRepo.update(
          { id: mailbox.id, status: mailbox.status },
          { status: 'DELETED', deletedAt: this.clock.now() },
        );
        if (!update.affected) continue;
        await this.cache.clearMailbox(mailbox.address);
        result.markedDeleted += 1;
        this.logger.warn(
          serializeStructuredLog({
            event: 'mailbox_reconciliation_missing_remotely',
            runCorrelationId,
            mailboxId: mailbox.id,
            mailboxFingerprint: fingerprintIdentifier(mailbox.address),
            previousStatus: mailbox.status,
          }),
        );
      } catch (error: unknown) {
        result.failed += 1;
        this.logger.error(
          serializeStructuredLog({
            event: 'mailbox_reconciliation_mark_deleted_failed',
            runCorrelationId,
            mailboxId: mailbox.id,
            error: describeUnknownError(error),
          }),
        );
      }
    }

    const deleted = await this.mailboxRepo.find({
      where: { status: 'DELETED' },
    });
    for (const mailbox of deleted) {
      if (!remoteAddresses.has(mailbox.address)) continue;
      try {
        await this.mailAdmin.deleteMailbox(mailbox.address);
        result.remoteDeleted += 1;
      } catch (error: unknown) {
        if (error instanceof MailAdminNotFoundError) {
          result.remoteDeleted += 1;
          continue;
        }
        result.failed += 1;
        this.logger.warn(
          serializeStructuredLog({
            event: 'mailbox_reconciliation_remote_delete_failed',
            runCorrelationId,
            mailboxId: mailbox.id,
            mailboxFingerprint: fingerprintIdentifier(mailbox.address),
            error: describeUnknownError(error),
          }),
        );
      }
    }

    this.logger.log(
      serializeStructuredLog({
        event: 'mailbox_reconciliation_completed',
        runCorrelationId,
        ...result,
      }),
    );
    return result;
  }
}
