import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import {
  buildCacheFake,
  buildStoreFakes,
  buildTestConfig,
  FakeClock,
  FIXED_NOW,
  seedMailbox,
  StoreFakes,
} from '../../test/helpers/temp-mail.fixtures';
import { VerificationCacheService } from '../cache/verification-cache.service';
import { Mailbox } from '../mailbox/entities/mailbox.entity';
import { VerificationRecord } from '../mailbox/entities/verification-record.entity';
import { MailboxLifecycleService } from '../mailbox/mailbox-lifecycle.service';
import { MailboxStatsService } from '../mailbox/mailbox-stats.service';
import {
  MailboxNotFoundError,
  ProvisionError,
} from '../mailbox/mailbox.errors';
import { TempMailScheduler } from '../scheduler/temp-mail.scheduler';
import { TempMailService } from './temp-mail.service';

describe('TempMailService', () => {
  const config = buildTestConfig();
  const lifecycle = {
    provision: jest.fn(),
    destroy: jest.fn(),
  };
  const scheduler = {
    getStatus: jest.fn(),
  };
  let store: StoreFakes;
  let cache: VerificationCacheService;
  let service: TempMailService;

  const seedVerification = (
    overrides: Partial<VerificationRecord>,
  ): VerificationRecord => {
    const record = Object.assign(new VerificationRecord(), {
      id: `verification-${store.verifications.rows.length + 100}`,
      mailboxAddress: 'a@x.test',
      code: '482913',
      patternName: 'labeled_code',
      sourceMessageId: `msg-${store.verifications.rows.length + 1}`,
      sender: 'noreply@service.test',
      subject: 'Your code',
      content: 'Your code: 482913',
      receivedAt: new Date('2026-01-01T00:05:00.000Z'),
      extractedAt: new Date('2026-01-01T00:05:30.000Z'),
      isRead: false,
      ...overrides,
    });
    store.verifications.rows.push(record);
    return record;
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    store = buildStoreFakes();
    cache = buildCacheFake(config).cache;
    const stats = new MailboxStatsService(
      store.mailboxRepo,
      store.verificationRepo,
      cache,
      new FakeClock(),
    );

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TempMailService,
        { provide: getRepositoryToken(Mailbox), useValue: store.mailboxRepo },
        {
          provide: getRepositoryToken(VerificationRecord),
          useValue: store.verificationRepo,
        },
        { provide: MailboxLifecycleService, useValue: lifecycle },
        { provide: MailboxStatsService, useValue: stats },
        { provide: VerificationCacheService, useValue: cache },
        { provide: TempMailScheduler, useValue: scheduler },
      ],
    }).compile();

    service = module.get<TempMailService>(TempMailService);
  });

  describe('getLatestCode', () => {
    it('answers from the cache without touching the database', async () => {
      const findOne = jest.spyOn(store.verifications, 'findOne');
      await cache.setLatestCode('a@x.test', {
        verificationId: 'verification-7',
        code: '482913',
        patternName: 'labeled_code',
        sourceMessageId: 'msg-7',
        receivedAt: '2026-01-01T00:05:00.000Z',
        extractedAt: '2026-01-01T00:05:30.000Z',
      });

      await expect(service.getLatestCode(' A@X.test ')).resolves.toEqual({
        address: 'a@x.test',
        verificationId: 'verification-7',
        code: '482913',
        patternName: 'labeled_code',
        sourceMessageId: 'msg-7',
        receivedAt: '2026-01-01T00:05:00.000Z',
        extractedAt: '2026-01-01T00:05:30.000Z',
      });
      expect(findOne).not.toHaveBeenCalled();
    });

    it('falls back to the newest record and refills the cache', async () => {
      seedMailbox(store);
      seedVerification({ code: '111111', sourceMessageId: 'msg-old' });
      const newest = seedVerification({
        code: '222222',
        sourceMessageId: 'msg-new',
        receivedAt: new Date('2026-01-01T00:09:00.000Z'),
        extractedAt: new Date('2026-01-01T00:09:10.000Z'),
      });

      const latest = await service.getLatestCode('a@x.test');

      expect(latest).toEqual({
        address: 'a@x.test',
        verificationId: newest.id,
        code: '222222',
        patternName: 'labeled_code',
        sourceMessageId: 'msg-new',
        receivedAt: '2026-01-01T00:09:00.000Z',
        extractedAt: '2026-01-01T00:09:10.000Z',
      });
      await expect(cache.getLatestCode('a@x.test')).resolves.toMatchObject({
        code: '222222',
      });
    });

    it('does not overwrite a code cached while the refill was reading', async () => {
      seedMailbox(store);
      seedVerification({ code: '111111', sourceMessageId: 'msg-old' });
      const readNewest = store.verifications.findOne.bind(store.verifications);
      jest
        .spyOn(store.verifications, 'findOne')
        .mockImplementationOnce(async (options) => {
          const record = await readNewest(options);
          await cache.cacheLatestCodeIfNewer('a@x.test', {
            verificationId: 'verification-9',
            code: '222222',
            patternName: 'labeled_code',
            sourceMessageId: 'msg-new',
            receivedAt: '2026-01-01T00:09:00.000Z',
            extractedAt: '2026-01-01T00:09:10.000Z',
          });
          return record;
        });

      const latest = await service.getLatestCode('a@x.test');

      expect(latest?.code).toBe('111111');
      await expect(cache.getLatestCode('a@x.test')).resolves.toMatchObject({
        code: '222222',
        sourceMessageId: 'msg-new',
      });
    });

    it('returns null for a known mailbox without codes', async () => {
      seedMailbox(store);

      await expect(service.getLatestCode('a@x.test')).resolves.toBeNull();
    });

    it('rejects unknown mailboxes and malformed addresses', async () => {
      await expect(service.getLatestCode('b@x.test')).rejects.toBeInstanceOf(
        NotFoundException,
      );
      await expect(
        service.getLatestCode('not-an-address'),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  describe('listVerifications', () => {
    it('lists newest first and truncates long content', async () => {
      seedMailbox(store);
      seedVerification({
        sourceMessageId: 'msg-old',
        content: 'x'.repeat(250),
      });
      seedVerification({
        sourceMessageId: 'msg-new',
        receivedAt: new Date('2026-01-01T00:07:00.000Z'),
      });

      const views = await service.listVerifications('a@x.test');

      expect(views.map((view) => view.sourceMessageId)).toEqual([
        'msg-new',
        'msg-old',
      ]);
      expect(views[1].content).toBe(`${'x'.repeat(200)}...`);
      expect(views[0].content).toBe('Your code: 482913');
    });

    it('rejects a limit outside the accepted range', async () => {
      seedMailbox(store);

      await expect(
        service.listVerifications('a@x.test', { limit: 0 }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('honours the limit', async () => {
      seedMailbox(store);
      seedVerification({ sourceMessageId: 'msg-old' });
      seedVerification({
        sourceMessageId: 'msg-new',
        receivedAt: new Date('2026-01-01T00:07:00.000Z'),
      });

      const views = await service.listVerifications('a@x.test', { limit: 1 });

      expect(views.map((view) => view.sourceMessageId)).toEqual(['msg-new']);
    });
  });

  describe('markRead', () => {
    it('marks a verification of the mailbox as read', async () => {
      seedMailbox(store);
      const record = seedVerification({});

      await expect(service.markRead('a@x.test', record.id)).resolves.toEqual({
        address: 'a@x.test',
        verificationId: record.id,
        isRead: true,
      });
      expect(store.verifications.rows[0].isRead).toBe(true);
    });

    it('does not reach records of another mailbox', async () => {
      seedMailbox(store);
      seedMailbox(store, { address: 'b@x.test', localPart: 'b' });
      const record = seedVerification({ mailboxAddress: 'b@x.test' });

      await expect(
        service.markRead('a@x.test', record.id),
      ).rejects.toBeInstanceOf(NotFoundException);
      expect(store.verifications.rows[0].isRead).toBe(false);
    });
  });

  describe('requestMailbox', () => {
    it('returns the mailbox view with its one-time password', async () => {
      const mailbox = Object.assign(new Mailbox(), {
        id: 'mailbox-1',
        address: 'k3v9q2xa@x.test',
        localPart: 'k3v9q2xa',
        domain: 'x.test',
        status: 'ACTIVE',
        createdAt: FIXED_NOW,
        expiresAt: new Date('2026-01-02T00:00:00.000Z'),
      });
      lifecycle.provision.mockResolvedValue({
        mailbox,
        password: 'test-secret',
      });

      await expect(service.requestMailbox({})).resolves.toEqual({
        mailboxId: 'mailbox-1',
        address: 'k3v9q2xa@x.test',
        domain: 'x.test',
        status: 'ACTIVE',
        createdAt: '2026-01-01T00:00:00.000Z',
        expiresAt: '2026-01-02T00:00:00.000Z',
        password: 'test-secret',
      });
    });

    it('rejects a malformed ttl before provisioning', async () => {
      await expect(
        service.requestMailbox({ ttlSeconds: 1.5 }),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(lifecycle.provision).not.toHaveBeenCalled();
    });

    it('maps invalid requests to BadRequestException', async () => {
      lifecycle.provision.mockRejectedValue(
        new ProvisionError('invalid_request', 'ttlSeconds out of range'),
      );

      await expect(
        service.requestMailbox({ ttlSeconds: 1 }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('propagates other provisioning failures', async () => {
      const failure = new ProvisionError('quota_exceeded', 'quota reached');
      lifecycle.provision.mockRejectedValue(failure);

      await expect(service.requestMailbox({})).rejects.toBe(failure);
    });
  });

  it('maps a missing mailbox on delete to NotFoundException', async () => {
    lifecycle.destroy.mockRejectedValue(new MailboxNotFoundError('abc123'));

    await expect(service.deleteMailbox('a@x.test')).rejects.toBeInstanceOf(
      NotFoundException,
    );
    expect(lifecycle.destroy).toHaveBeenCalledWith('a@x.test');
  });

  it('reads mailbox metadata through the cache', async () => {
    seedMailbox(store);
    const expected = {
      mailboxId: 'mailbox-100',
      address: 'a@x.test',
      domain: 'x.test',
      status: 'ACTIVE',
      createdAt: '2026-01-01T00:00:00.000Z',
      expiresAt: '2026-01-01T01:00:00.000Z',
    };

    await expect(service.getMailbox('a@x.test')).resolves.toEqual(expected);
    await expect(cache.getMailboxMeta('a@x.test')).resolves.toEqual(expected);
  });

  it('lists the latest verifications of every active mailbox', async () => {
    seedMailbox(store);
    seedMailbox(store, {
      address: 'b@x.test',
      localPart: 'b',
      createdAt: new Date('2026-01-01T00:01:00.000Z'),
    });
    seedMailbox(store, {
      address: 'c@x.test',
      localPart: 'c',
      status: 'EXPIRED',
    });
    seedVerification({ sourceMessageId: 'msg-a1' });
    seedVerification({
      sourceMessageId: 'msg-a2',
      receivedAt: new Date('2026-01-01T00:06:00.000Z'),
    });
    seedVerification({ mailboxAddress: 'c@x.test', sourceMessageId: 'msg-c1' });

    const overview = await service.listRecentVerifications({ perMailbox: 1 });

    expect(
      overview.map((entry) => ({
        address: entry.address,
        messages: entry.verifications.map((view) => view.sourceMessageId),
      })),
    ).toEqual([
      { address: 'b@x.test', messages: [] },
      { address: 'a@x.test', messages: ['msg-a2'] },
    ]);
  });

  it('computes stats on a cache miss and serves them from the cache after', async () => {
    seedMailbox(store);
    seedMailbox(store, { address: 'b@x.test', status: 'DELETED' });
    seedVerification({});

    await expect(service.getStats()).resolves.toEqual({
      activeMailboxCount: 1,
      totalMailboxCount: 2,
      totalCodesExtracted: 1,
      lastRefreshedAt: '2026-01-01T00:00:00.000Z',
    });
    store.verifications.rows.length = 0;
    await expect(service.getStats()).resolves.toMatchObject({
      totalCodesExtracted: 1,
    });
  });

  it('exposes the scheduler status', () => {
    scheduler.getStatus.mockReturnValue({ enabled: false, triggers: [] });

    expect(service.getSchedulerStatus()).toEqual({
      enabled: false,
      triggers: [],
    });
  });
});
