import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { Repository } from 'typeorm';
import { VerificationCacheService } from '../cache/verification-cache.service';
import {
  CachedLatestCode,
  StatsSnapshot,
} from '../cache/verification-cache.types';
import {
  fingerprintIdentifier,
  serializeStructuredLog,
} from '../common/logging/structured-log.util';
import { Mailbox } from '../mailbox/entities/mailbox.entity';
import { VerificationRecord } from '../mailbox/entities/verification-record.entity';
import {
  isValidMailboxAddress,
  normalizeMailboxAddress,
} from '../mailbox/mailbox-credentials.generator';
import {
  DestroyMailboxResult,
  MailboxLifecycleService,
} from '../mailbox/mailbox-lifecycle.service';
import { toCachedMailboxMeta } from '../mailbox/mailbox-meta.mapper';
import { MailboxStatsService } from '../mailbox/mailbox-stats.service';
import {
  MailboxNotFoundError,
  ProvisionError,
} from '../mailbox/mailbox.errors';
import {
  SchedulerStatus,
  TempMailScheduler,
} from '../scheduler/temp-mail.scheduler';
import {
  ListVerificationsInput,
  RecentVerificationsInput,
} from './dto/list-verifications.input';
import { RequestMailboxInput } from './dto/request-mailbox.input';
import {
  LatestCode,
  MailboxVerificationsOverview,
  MailboxView,
  MarkReadResult,
  ProvisionedMailboxView,
  VerificationView,
} from './temp-mail.types';

const CONTENT_PREVIEW_LENGTH = 200;
const DEFAULT_VERIFICATION_LIMIT = 50;
const DEFAULT_RECENT_PER_MAILBOX = 5;

function toIsoString(value: Date): string {
  return value.toISOString();
}

function truncateContent(content: string | null | undefined): string | null {
  if (content === null || content === undefined) return null;
  if (content.length <= CONTENT_PREVIEW_LENGTH) return content;
  return `${content.slice(0, CONTENT_PREVIEW_LENGTH)}...`;
}

function toVerificationView(record: VerificationRecord): VerificationView {
  return {
    id: record.id,
    code: record.code,
    patternName: record.patternName,
    sourceMessageId: record.sourceMessageId,
    sender: record.sender ?? null,
    subject: record.subject ?? null,
    content: truncateContent(record.content),
    receivedAt: toIsoString(record.receivedAt),
    extractedAt: toIsoString(record.extractedAt),
    isRead: record.isRead,
  };
}

function toCachedLatestCode(record: VerificationRecord): CachedLatestCode {
  return {
    verificationId: record.id,
    code: record.code,
    patternName: record.patternName,
    sourceMessageId: record.sourceMessageId,
    receivedAt: toIsoString(record.receivedAt),
    extractedAt: toIsoString(record.extractedAt),
  };
}

/**
 * In-process consumer surface of the relay. Reads go cache-first and fall
 * back to the database, which stays authoritative.
 */
@Injectable()
export class TempMailService {
  private readonly logger = new Logger(TempMailService.name);

  constructor(
    @InjectRepository(Mailbox)
    private readonly mailboxRepo: Repository<Mailbox>,
    @InjectRepository(VerificationRecord)
    private readonly verificationRepo: Repository<VerificationRecord>,
    private readonly lifecycle: MailboxLifecycleService,
    private readonly stats: MailboxStatsService,
    private readonly cache: VerificationCacheService,
    private readonly scheduler: TempMailScheduler,
  ) {}

  private resolveAddress(rawAddress: string): string {
    const address = normalizeMailboxAddress(rawAddress);
    if (!isValidMailboxAddress(address)) {
      throw new BadRequestException('Invalid mailbox address');
    }
    return address;
  }

  private async validateInput<T extends object>(
    inputClass: ClassConstructor<T>,
    rawInput: object,
  ): Promise<T> {
    const input = plainToInstance(inputClass, rawInput);
    const errors = await validate(input, { whitelist: true });
    if (errors.length) {
      throw new BadRequestException(
        errors.flatMap((error) => Object.values(error.constraints ?? {})),
      );
    }
    return input;
  }

  private async findMailboxOrFail(address: string): Promise<Mailbox> {
    const mailbox = await this.mailboxRepo.findOne({ where: { address } });
    if (!mailbox) throw new NotFoundException('Mailbox not found');
    return mailbox;
  }

  async requestMailbox(
    rawInput: RequestMailboxInput = {},
  ): Promise<ProvisionedMailboxView> {
    const input = await this.validateInput(RequestMailboxInput, rawInput);
    try {
      const { mailbox, password } = await this.lifecycle.provision({
        domain: input.domain,
        ttlSeconds: input.ttlSeconds,
      });
      return { ...toCachedMailboxMeta(mailbox), password };
    } catch (error: unknown) {
      if (error instanceof ProvisionError && error.reason === 'invalid_request') {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  async getLatestCode(rawAddress: string): Promise<LatestCode | null> {
    const address = this.resolveAddress(rawAddress);
    const cached = await this.cache.getLatestCode(address);
    if (cached) return { address, ...cached };

    const record = await this.verificationRepo.findOne({
      where: { mailboxAddress: address },
      order: { receivedAt: 'DESC', extractedAt: 'DESC' },
    });
    if (!record) {
      await this.findMailboxOrFail(address);
      return null;
    }
    const latest = toCachedLatestCode(record);
    const outcome = await this.cache.cacheLatestCodeIfNewer(address, latest);
    this.logger.debug(
      serializeStructuredLog({
        event: 'temp_mail_latest_code_cache_refilled',
        mailboxFingerprint: fingerprintIdentifier(address),
        outcome,
      }),
    );
    return { address, ...latest };
  }

  async listVerifications(
    rawAddress: string,
    rawInput: ListVerificationsInput = {},
  ): Promise<VerificationView[]> {
    const address = this.resolveAddress(rawAddress);
    const input = await this.validateInput(ListVerificationsInput, rawInput);
    await this.findMailboxOrFail(address);
    const records = await this.verificationRepo.find({
      where: { mailboxAddress: address },
      order: { receivedAt: 'DESC', extractedAt: 'DESC' },
      take: input.limit ?? DEFAULT_VERIFICATION_LIMIT,
    });
    return records.map(toVerificationView);
  }

  async markRead(
    rawAddress: string,
    verificationId: string,
  ): Promise<MarkReadResult> {
    const address = this.resolveAddress(rawAddress);
    const record = await this.verificationRepo.findOne({
      where: { id: verificationId, mailboxAddress: address },
    });
    if (!record) throw new NotFoundException('Verification not found');
    if (!record.isRead) {
      await this.verificationRepo.update({ id: record.id }, { isRead: true });
    }
    return { address, verificationId: record.id, isRead: true };
  }

  getStats(): Promise<StatsSnapshot> {
    return this.stats.getStats();
  }

  async deleteMailbox(rawAddress: string): Promise<DestroyMailboxResult> {
    const address = this.resolveAddress(rawAddress);
    try {
      return await this.lifecycle.destroy(address);
    } catch (error: unknown) {
      if (error instanceof MailboxNotFoundError) {
        throw new NotFoundException('Mailbox not found');
      }
      throw error;
    }
  }

  async getMailbox(rawAddress: string): Promise<MailboxView> {
    const address = this.resolveAddress(rawAddress);
    const cached = await this.cache.getMailboxMeta(address);
    if (cached) return cached;
    const mailbox = await this.findMailboxOrFail(address);
    const meta = toCachedMailboxMeta(mailbox);
    await this.cache.setMailboxMeta(meta);
    return meta;
  }

  async listActiveMailboxes(): Promise<MailboxView[]> {
    const mailboxes = await this.mailboxRepo.find({
      where: { status: 'ACTIVE' },
      order: { createdAt: 'DESC' },
    });
    return mailboxes.map(toCachedMailboxMeta);
  }

  async listRecentVerifications(
    rawInput: RecentVerificationsInput = {},
  ): Promise<MailboxVerificationsOverview[]> {
    const input = await this.validateInput(RecentVerificationsInput, rawInput);
    const take = input.perMailbox ?? DEFAULT_RECENT_PER_MAILBOX;
    const mailboxes = await this.mailboxRepo.find({
      where: { status: 'ACTIVE' },
      order: { createdAt: 'DESC' },
    });
    const overview: MailboxVerificationsOverview[] = [];
    for (const mailbox of mailboxes) {
      const records = await this.verificationRepo.find({
        where: { mailboxAddress: mailbox.address },
        order: { receivedAt: 'DESC', extractedAt: 'DESC' },
        take,
      });
      overview.push({
        address: mailbox.address,
        verifications: records.map(toVerificationView),
      });
    }
    return overview;
  }

  getSchedulerStatus(): SchedulerStatus {
    return this.scheduler.getStatus();
  }
}
