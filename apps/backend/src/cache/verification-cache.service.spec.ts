import { RedisClientType } from 'redis';
import { InMemoryRedisFake } from '../../test/helpers/in-memory-redis.fake';
import { resolveTempMailConfig } from '../config/temp-mail.config';
import { VerificationCacheService } from './verification-cache.service';
import { CachedLatestCode } from './verification-cache.types';

function buildEntry(overrides: Partial<CachedLatestCode> = {}): CachedLatestCode {
  return {
    verificationId: 'verification-1',
    code: '111111',
    patternName: 'bare_digits',
    sourceMessageId: 'msg-1',
    receivedAt: '2026-01-01T00:00:10.000Z',
    extractedAt: '2026-01-01T00:00:30.000Z',
    ...overrides,
  };
}

describe('VerificationCacheService', () => {
  let redis: InMemoryRedisFake;
  let service: VerificationCacheService;

  beforeEach(() => {
    redis = new InMemoryRedisFake();
    service = new VerificationCacheService(
      redis as unknown as RedisClientType,
      resolveTempMailConfig({}),
    );
  });

  it('stores the latest code with the configured ttl', async () => {
    await service.setLatestCode('a@x.test', buildEntry());

    await expect(service.getLatestCode('a@x.test')).resolves.toEqual(
      buildEntry(),
    );
    expect(redis.remainingTtlMs('code:a@x.test')).toBe(3_600_000);
  });

  it('keeps a newer cached code over an older arrival', async () => {
    await service.setLatestCode(
      'a@x.test',
      buildEntry({ code: '222222', receivedAt: '2026-01-01T00:00:20.000Z' }),
    );

    const outcome = await service.cacheLatestCodeIfNewer(
      'a@x.test',
      buildEntry({ code: '111111', receivedAt: '2026-01-01T00:00:10.000Z' }),
    );

    expect(outcome).toBe('kept_newer');
    const cached = await service.getLatestCode('a@x.test');
    expect(cached?.code).toBe('222222');
  });

  it('replaces the cached code when the arrival is not older', async () => {
    await service.setLatestCode('a@x.test', buildEntry());

    const outcome = await service.cacheLatestCodeIfNewer(
      'a@x.test',
      buildEntry({ code: '222222', receivedAt: '2026-01-01T00:00:20.000Z' }),
    );

    expect(outcome).toBe('written');
    const cached = await service.getLatestCode('a@x.test');
    expect(cached?.code).toBe('222222');
  });

  it('keeps the newer code when writers race each other', async () => {
    const outcomes = await Promise.all([
      service.cacheLatestCodeIfNewer(
        'a@x.test',
        buildEntry({ code: '222222', receivedAt: '2026-01-01T00:00:20.000Z' }),
      ),
      service.cacheLatestCodeIfNewer(
        'a@x.test',
        buildEntry({ code: '111111', receivedAt: '2026-01-01T00:00:10.000Z' }),
      ),
    ]);

    expect(outcomes).toEqual(['written', 'kept_newer']);
    const cached = await service.getLatestCode('a@x.test');
    expect(cached?.code).toBe('222222');
    expect(redis.remainingTtlMs('code:a@x.test')).toBe(3_600_000);
  });

  it('drops malformed cache entries and reports a miss', async () => {
    await redis.set('code:a@x.test', '{"code":42}');

    await expect(service.getLatestCode('a@x.test')).resolves.toBeNull();
    expect(redis.keys()).toEqual([]);
  });

  it('treats redis failures as cache misses', async () => {
    redis.failCommandsWith(new Error('connection reset'));

    await expect(service.getLatestCode('a@x.test')).resolves.toBeNull();
    await expect(
      service.cacheLatestCodeIfNewer('a@x.test', buildEntry()),
    ).resolves.toBe('failed');
    await expect(service.getStats()).resolves.toBeNull();
  });

  it('clears both mailbox keys', async () => {
    await service.setLatestCode('a@x.test', buildEntry());
    await service.setMailboxMeta({
      mailboxId: 'mailbox-1',
      address: 'a@x.test',
      domain: 'x.test',
      status: 'ACTIVE',
      createdAt: '2026-01-01T00:00:00.000Z',
      expiresAt: '2026-01-02T00:00:00.000Z',
    });

    await service.clearMailbox('a@x.test');

    expect(redis.keys()).toEqual([]);
  });

  it('round-trips mailbox meta and rejects unknown statuses', async () => {
    const meta = {
      mailboxId: 'mailbox-1',
      address: 'a@x.test',
      domain: 'x.test',
      status: 'ACTIVE' as const,
      createdAt: '2026-01-01T00:00:00.000Z',
      expiresAt: '2026-01-02T00:00:00.000Z',
    };
    await service.setMailboxMeta(meta);
    await expect(service.getMailboxMeta('a@x.test')).resolves.toEqual(meta);
    expect(redis.remainingTtlMs('meta:a@x.test')).toBe(86_400_000);

    await redis.set(
      'meta:a@x.test',
      JSON.stringify({ ...meta, status: 'SUSPENDED' }),
    );
    await expect(service.getMailboxMeta('a@x.test')).resolves.toBeNull();
  });

  it('caches stats snapshots', async () => {
    const snapshot = {
      activeMailboxCount: 2,
      totalMailboxCount: 3,
      totalCodesExtracted: 5,
      lastRefreshedAt: '2026-01-01T00:00:00.000Z',
    };
    await service.setStats(snapshot);

    await expect(service.getStats()).resolves.toEqual(snapshot);
    expect(redis.remainingTtlMs('stats:global')).toBe(600_000);
  });
});
