import { RedisClientType } from 'redis';
import { Repository } from 'typeorm';
import { VerificationCacheService } from '../../src/cache/verification-cache.service';
import { Clock } from '../../src/common/clock/clock';
import {
  resolveTempMailConfig,
  TempMailConfig,
} from '../../src/config/temp-mail.config';
import { Mailbox } from '../../src/mailbox/entities/mailbox.entity';
import { VerificationRecord } from '../../src/mailbox/entities/verification-record.entity';
import { InMemoryRedisFake } from './in-memory-redis.fake';
import {
  InMemoryRepositoryFake,
  RepositoryRegistry,
} from './in-memory-repository.fake';

export const FIXED_NOW = new Date('2026-01-01T00:00:00.000Z');

export class FakeClock implements Clock {
  private current: Date;

  constructor(start: Date = FIXED_NOW) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function buildTestConfig(env: NodeJS.ProcessEnv = {}): TempMailConfig {
  return resolveTempMailConfig({
    TEMPMAIL_DEFAULT_DOMAIN: 'x.test',
    TEMPMAIL_MAIL_ADMIN_API_URL: 'https://admin.test/api',
    TEMPMAIL_REMOTE_RETRY_BACKOFF_MS: '0',
    TEMPMAIL_REMOTE_RETRY_JITTER_MS: '0',
    ...env,
  });
}

export type StoreFakes = {
  mailboxes: InMemoryRepositoryFake<Mailbox>;
  verifications: InMemoryRepositoryFake<VerificationRecord>;
  mailboxRepo: Repository<Mailbox>;
  verificationRepo: Repository<VerificationRecord>;
};

export function buildStoreFakes(): StoreFakes {
  const registry = new RepositoryRegistry();
  const mailboxes = new InMemoryRepositoryFake<Mailbox>(
    Mailbox,
    () => new Mailbox(),
    'mailbox',
    [['address']],
    registry,
  );
  const verifications = new InMemoryRepositoryFake<VerificationRecord>(
    VerificationRecord,
    () => new VerificationRecord(),
    'verification',
    [['mailboxAddress', 'sourceMessageId']],
    registry,
  );
  return {
    mailboxes,
    verifications,
    mailboxRepo: mailboxes as unknown as Repository<Mailbox>,
    verificationRepo: verifications as unknown as Repository<VerificationRecord>,
  };
}

export function buildCacheFake(config: TempMailConfig): {
  redis: InMemoryRedisFake;
  cache: VerificationCacheService;
} {
  const redis = new InMemoryRedisFake(FIXED_NOW.getTime());
  return {
    redis,
    cache: new VerificationCacheService(
      redis as unknown as RedisClientType,
      config,
    ),
  };
}

export function seedMailbox(
  store: StoreFakes,
  overrides: Partial<Mailbox> = {},
): Mailbox {
  const mailbox = Object.assign(new Mailbox(), {
    id: `mailbox-${store.mailboxes.rows.length + 100}`,
    address: 'a@x.test',
    localPart: 'a',
    domain: 'x.test',
    status: 'ACTIVE',
    createdAt: FIXED_NOW,
    expiresAt: new Date(FIXED_NOW.getTime() + 3_600_000),
    expiredAt: null,
    deletedAt: null,
    lastScannedAt: null,
    scanWatermarkAt: null,
    updatedAt: FIXED_NOW,
    ...overrides,
  });
  store.mailboxes.rows.push(mailbox);
  return mailbox;
}
