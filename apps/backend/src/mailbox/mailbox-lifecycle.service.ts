import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { addSeconds, subMilliseconds } from 'date-fns';
import { In, LessThan, LessThanOrEqual, Repository } from 'typeorm';
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
  QuotaExceededError,
  RemoteUnavailableError,
} from '../mail-admin/mail-admin.errors';
import { Mailbox, MailboxStatus } from './entities/mailbox.entity';
import { VerificationRecord } from './entities/verification-record.entity';
import { MailboxCredentialsGenerator } from './mailbox-credentials.generator';
import { MailboxNotFoundError, ProvisionError } from './mailbox.errors';
import { toCachedMailboxMeta } from './mailbox-meta.mapper';

const MAX_LOCAL_PART_ATTEMPTS = 5;
const EXPIRY_BATCH_SIZE = 500;

export type ProvisionMailboxInput = {
  domain?: string;
  ttlSeconds?: number;
};

export type ProvisionedMailbox = {
  mailbox: Mailbox;
  password: string;
};

export type DestroyMailboxResult = {
  address: string;
  alreadyDeleted: boolean;
  remoteDeleted: boolean;
};

export type CleanupResult = {
  purgedMailboxes: number;
  purgedVerifications: number;
  skippedMailboxes: number;
  failedMailboxes: number;
};

@Injectable()
export class MailboxLifecycleService {
  private readonly logger = new Logger(MailboxLifecycleService.name);

  constructor(
    @InjectRepository(Mailbox)
    private readonly mailboxRepo: Repository<Mailbox>,
    private readonly mailAdmin: MailAdminApiClient,
    private readonly cache: VerificationCacheService,
    private readonly credentials: MailboxCredentialsGenerator,
    @Inject(TEMPMAIL_CONFIG) private readonly config: TempMailConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  private resolveDomain(rawDomain: string | undefined): string {
    const domain = (rawDomain ?? this.config.mailbox.defaultDomain)
      .trim()
      .toLowerCase();
    if (!this.config.mailbox.allowedDomains.includes(domain)) {
      throw new ProvisionError(
        'invalid_request',
        `Domain ${domain} is not served by this relay`,
      );
    }
    return domain;
  }

  private resolveTtlSeconds(rawTtl: number | undefined): number {
    const { defaultTtlSeconds, minTtlSeconds, maxTtlSeconds } =
      this.config.mailbox;
    const ttlSeconds = rawTtl ?? defaultTtlSeconds;
    if (
      !Number.isInteger(ttlSeconds) ||
      ttlSeconds < minTtlSeconds ||
      ttlSeconds > maxTtlSeconds
    ) {
      throw new ProvisionError(
        'invalid_request',
        `ttlSeconds must be an integer between ${minTtlSeconds} and ${maxTtlSeconds}`,
      );
    }
    return ttlSeconds;
  }

  private async reserveLocalPart(
    domain: string,
  ): Promise<{ localPart: string; address: string }> {
    for (let attempt = 1; attempt <= MAX_LOCAL_PART_ATTEMPTS; attempt += 1) {
      const localPart = this.credentials.generateLocalPart();
      const address = `${localPart}@${domain}`;
      const existing = await this.mailboxRepo.findOne({ where: { address } });
      if (!existing) return { localPart, address };
    }
    throw new ProvisionError(
      'address_exhausted',
      `No free address found on ${domain} after ${MAX_LOCAL_PART_ATTEMPTS} attempts`,
    );
  }

  private toProvisionError(error: unknown): ProvisionError {
    if (error instanceof QuotaExceededError) {
      return new ProvisionError('quota_exceeded', error.message, error);
    }
    if (error instanceof RemoteUnavailableError) {
      return new ProvisionError('remote_unavailable', error.message, error);
    }
    return new ProvisionError(
      'remote_rejected',
      describeUnknownError(error),
      error,
    );
  }

  private async deleteRemoteWithRetry(address: string): Promise<void> {
    await retryWithBackoff({
      operation: () => this.mailAdmin.deleteMailbox(address),
      policy: this.config.remoteRetry,
      isRetryable: isRemoteUnavailableError,
    });
  }

  private async rollbackRemoteMailbox(address: string): Promise<void> {
    try {
      await this.mailAdmin.deleteMailbox(address);
      this.logger.warn(
        serializeStructuredLog({
          event: 'mailbox_remote_rollback_succeeded',
          mailboxFingerprint: fingerprintIdentifier(address),
        }),
      );
    } catch (error: unknown) {
      this.logger.warn(
        serializeStructuredLog({
          event: 'mailbox_remote_rollback_failed',
          mailboxFingerprint: fingerprintIdentifier(address),
          error: describeUnknownError(error),
        }),
      );
    }
  }

  async provision(
    input: ProvisionMailboxInput = {},
  ): Promise<ProvisionedMailbox> {
    const runCorrelationId = resolveCorrelationId(undefined);
    const domain = this.resolveDomain(input.domain);
    const ttlSeconds = this.resolveTtlSeconds(input.ttlSeconds);
    const { localPart, address } = await this.reserveLocalPart(domain);
    const mailboxFingerprint = fingerprintIdentifier(address);
    const password = this.credentials.generatePassword();

    try {
      await retryWithBackoff({
        operation: () =>
          this.mailAdmin.createMailbox({
            address,
            localPart,
            domain,
            password,
            ttlSeconds,
          }),
        policy: this.config.remoteRetry,
        isRetryable: isRemoteUnavailableError,
        onRetry: (info) =>
          this.logger.warn(
            serializeStructuredLog({
              event: 'mailbox_provision_retry_scheduled',
              runCorrelationId,
              mailboxFingerprint,
              attemptNumber: info.attemptNumber,
              maxAttempts: info.maxAttempts,
              waitMs: info.waitMs,
              error: describeUnknownError(info.error),
            }),
          ),
      });
    } catch (error: unknown) {
      const provisionError = this.toProvisionError(error);
      this.logger.error(
        serializeStructuredLog({
          event: 'mailbox_provision_failed',
          runCorrelationId,
          mailboxFingerprint,
          reason: provisionError.reason,
          error: provisionError.message,
        }),
      );
      throw provisionError;
    }

    const createdAt = this.clock.now();
    let mailbox: Mailbox;
    try {
      mailbox = await this.mailboxRepo.save(
        this.mailboxRepo.create({
          address,
          localPart,
          domain,
          status: 'ACTIVE',
          createdAt,
          expiresAt: addSeconds(createdAt, ttlSeconds),
          expiredAt: null,
          deletedAt: null,
          lastScannedAt: null,
          scanWatermarkAt: null,
        }),
      );
    } catch (error: unknown) {
      this.logger.error(
        serializeStructuredLog({
          event: 'mailbox_provision_persistence_failed',
          runCorrelationId,
          mailboxFingerprint,
          error: describeUnknownError(error),
        }),
      );
      await this.rollbackRemoteMailbox(address);
      throw new ProvisionError(
        'persistence_failed',
        'Mailbox row could not be persisted',
        error,
      );
    }

    await this.cache.setMailboxMeta(toCachedMailboxMeta(mailbox));
    this.logger.log(
      serializeStructuredLog({
        event: 'mailbox_provision_completed',
        runCorrelationId,
        mailboxId: mailbox.id,
        mailboxFingerprint,
        ttlSeconds,
      }),
    );
    return { mailbox, password };
  }

  private async findByAddressOrFail(address: string): Promise<Mailbox> {
    const mailbox = await this.mailboxRepo.findOne({ where: { address } });
    if (!mailbox) {
      throw new MailboxNotFoundError(fingerprintIdentifier(address));
    }
    return mailbox;
  }

  /** Moves a due ACTIVE mailbox to EXPIRED. Returns false when nothing changed. */
  async expire(address: string): Promise<boolean> {
    const mailbox = await this.findByAddressOrFail(address);
    const now = this.clock.now();
    if (mailbox.status !== 'ACTIVE' || mailbox.expiresAt > now) return false;

    const result = await this.mailboxRepo.update(
      { id: mailbox.id, status: 'ACTIVE' },
      { status: 'EXPIRED', expiredAt: now },
    );
    if (!result.affected) return false;

    await this.cache.deleteMailboxMeta(address);
    this.logger.log(
      serializeStructuredLog({
        event: 'mailbox_expired',
        mailboxId: mailbox.id,
        mailboxFingerprint: fingerprintIdentifier(address),
      }),
    );
    return true;
  }

  async expireDueMailboxes(): Promise<number> {
    const due = await this.mailboxRepo.find({
      where: { status: 'ACTIVE', expiresAt: LessThanOrEqual(this.clock.now()) },
      order: { expiresAt: 'ASC' },
      take: EXPIRY_BATCH_SIZE,
    });
    let expired = 0;
    for (const mailbox of due) {
      if (await this.expire(mailbox.address)) expired += 1;
    }
    return expired;
  }

  async destroy(address: string): Promise<DestroyMailboxResult> {
    const mailbox = await this.findByAddressOrFail(address);
    const mailboxFingerprint = fingerprintIdentifier(address);
    if (mailbox.status === 'DELETED') {
      return { address, alreadyDeleted: true, remoteDeleted: false };
    }

    await this.mailboxRepo.update(
      { id: mailbox.id },
      { status: 'DELETED', deletedAt: this.clock.now() },
    );
    await this.cache.clearMailbox(address);

    let remoteDeleted = true;
    try {
      await this.deleteRemoteWithRetry(address);
    } catch (error: unknown) {
      if (!(error instanceof MailAdminNotFoundError)) {
        remoteDeleted = false;
        this.logger.warn(
          serializeStructuredLog({
            event: 'mailbox_remote_delete_failed',
            mailboxId: mailbox.id,
            mailboxFingerprint,
            error: describeUnknownError(error),
          }),
        );
      }
    }

    this.logger.log(
      serializeStructuredLog({
        event: 'mailbox_deleted',
        mailboxId: mailbox.id,
        mailboxFingerprint,
        remoteDeleted,
      }),
    );
    return { address, alreadyDeleted: false, remoteDeleted };
  }

  /**
   * Hard-deletes DELETED mailboxes and EXPIRED mailboxes past their grace
   * period, together with their verification records. A mailbox whose remote
   * delete cannot be confirmed stays for the next run.
   */
  async cleanup(olderThan: Date): Promise<CleanupResult> {
    const runCorrelationId = resolveCorrelationId(undefined);
    const graceCutoff = subMilliseconds(
      this.clock.now(),
      this.config.lifecycle.expiryGraceMs,
    );
    const expiredCutoff =
      graceCutoff < olderThan ? graceCutoff : olderThan;

    const candidates = [
      ...(await this.mailboxRepo.find({
        where: { status: 'DELETED', deletedAt: LessThan(olderThan) },
      })),
      ...(await this.mailboxRepo.find({
        where: { status: 'EXPIRED', expiresAt: LessThan(expiredCutoff) },
      })),
    ];

    const result: CleanupResult = {
      purgedMailboxes: 0,
      purgedVerifications: 0,
      skippedMailboxes: 0,
      failedMailboxes: 0,
    };

    for (const mailbox of candidates) {
      const mailboxFingerprint = fingerprintIdentifier(mailbox.address);
      try {
        await this.deleteRemoteWithRetry(mailbox.address);
      } catch (error: unknown) {
        if (!(error instanceof MailAdminNotFoundError)) {
          result.skippedMailboxes += 1;
          this.logger.warn(
            serializeStructuredLog({
              event: 'mailbox_cleanup_remote_delete_deferred',
              runCorrelationId,
              mailboxId: mailbox.id,
              mailboxFingerprint,
              error: describeUnknownError(error),
            }),
          );
          continue;
        }
      }

      try {
        const purgedVerifications = await this.mailboxRepo.manager.transaction(
          async (em) => {
            const deletedRecords = await em
              .getRepository(VerificationRecord)
              .delete({ mailboxAddress: mailbox.address });
            await em.getRepository(Mailbox).delete({
              id: mailbox.id,
              status: In<MailboxStatus>(['DELETED', 'EXPIRED']),
            });
            return deletedRecords.affected ?? 0;
          },
        );
        await this.cache.clearMailbox(mailbox.address);
        result.purgedMailboxes += 1;
        result.purgedVerifications += purgedVerifications;
      } catch (error: unknown) {
        result.failedMailboxes += 1;
        this.logger.error(
          serializeStructuredLog({
            event: 'mailbox_cleanup_purge_failed',
            runCorrelationId,
            mailboxId: mailbox.id,
            mailboxFingerprint,
            error: describeUnknownError(error),
          }),
        );
      }
    }

    this.logger.log(
      serializeStructuredLog({
        event: 'mailbox_cleanup_completed',
        runCorrelationId,
        ...result,
      }),
    );
    return result;
  }
}
