import { MailAdminApiClient } from '../mail-admin/mail-admin-api.client';
import {
  MailAdminNotFoundError,
  QuotaExceededError,
  RemoteUnavailableError,
} from '../mail-admin/mail-admin.errors';
import {
  buildCacheFake,
  buildStoreFakes,
  buildTestConfig,
  FakeClock,
  FIXED_NOW,
  seedMailbox,
  StoreFakes,
} from '../../test/helpers/temp-mail.fixtures';
import { InMemoryRedisFake } from '../../test/helpers/in-memory-redis.fake';
import { VerificationRecord } from './entities/verification-record.entity';
import { MailboxCredentialsGenerator } from './mailbox-credentials.generator';
import { MailboxLifecycleService } from './mailbox-lifecycle.service';
import { MailboxNotFoundError, ProvisionError } from './mailbox.errors';

describe('MailboxLifecycleService', () => {
  let store: StoreFakes;
  let redis: InMemoryRedisFake;
  let clock: FakeClock;
  let mailAdmin: jest.Mocked<MailAdminApiClient>;
  let credentials: jest.Mocked<MailboxCredentialsGenerator>;
  let service: MailboxLifecycleService;

  const remoteUnavailable = () =>
    new RemoteUnavailableError('create_mailbox', 'status=503');

  beforeEach(() => {
    const config = buildTestConfig();
    const cacheFake = buildCacheFake(config);
    store = buildStoreFakes();
    redis = cacheFake.redis;
    clock = new FakeClock();
    mailAdmin = {
      createMailbox: jest.fn().mockResolvedValue({
        address: 'ab12cd34@x.test',
        enabled: true,
      }),
      deleteMailbox: jest.fn().mockResolvedValue(undefined),
    } as unknown as jest.Mocked<MailAdminApiClient>;
    credentials = {
      generateLocalPart: jest.fn().mockReturnValue('ab12cd34'),
      generatePassword: jest.fn().mockReturnValue('test-password'),
    } as unknown as jest.Mocked<MailboxCredentialsGenerator>;
    service = new MailboxLifecycleService(
      store.mailboxRepo,
      mailAdmin,
      cacheFake.cache,
      credentials,
      config,
      clock,
    );
  });

  const seedRecord = (mailboxAddress: string, sourceMessageId: string) =>
    store.verifications.rows.push(
      Object.assign(new VerificationRecord(), {
        id: `record-${sourceMessageId}`,
        mailboxAddress,
        code: '482913',
        patternName: 'labeled_code',
        sourceMessageId,
        receivedAt: FIXED_NOW,
        extractedAt: FIXED_NOW,
        isRead: false,
      }),
    );

  describe('provision', () => {
    it('creates the remote mailbox and persists an ACTIVE row', async () => {
      const result = await service.provision({ ttlSeconds: 3600 });

      expect(result.password).toBe('test-password');
      expect(result.mailbox).toEqual(
        expect.objectContaining({
          address: 'ab12cd34@x.test',
          localPart: 'ab12cd34',
          domain: 'x.test',
          status: 'ACTIVE',
          createdAt: FIXED_NOW,
          expiresAt: new Date('2026-01-01T01:00:00.000Z'),
        }),
      );
      expect(mailAdmin.createMailbox).toHaveBeenCalledWith({
        address: 'ab12cd34@x.test',
        localPart: 'ab12cd34',
        domain: 'x.test',
        password: 'test-password',
        ttlSeconds: 3600,
      });
      expect(store.mailboxes.rows).toHaveLength(1);
      expect(redis.keys()).toEqual(['meta:ab12cd34@x.test']);
    });

    it('regenerates the local part when the address is taken', async () => {
      seedMailbox(store, { address: 'ab12cd34@x.test', localPart: 'ab12cd34' });
      credentials.generateLocalPart
        .mockReturnValueOnce('ab12cd34')
        .mockReturnValueOnce('zz99yy88');

      const result = await service.provision();

      expect(result.mailbox.address).toBe('zz99yy88@x.test');
      expect(result.mailbox.expiresAt).toEqual(
        new Date('2026-01-02T00:00:00.000Z'),
      );
    });

    it('gives up after five colliding local parts', async () => {
      seedMailbox(store, { address: 'ab12cd34@x.test', localPart: 'ab12cd34' });

      await expect(service.provision()).rejects.toMatchObject({
        name: 'ProvisionError',
        reason: 'address_exhausted',
      });
      expect(credentials.generateLocalPart).toHaveBeenCalledTimes(5);
      expect(mailAdmin.createMailbox).not.toHaveBeenCalled();
    });

    it('retries an unavailable remote and persists nothing once the budget is spent', async () => {
      mailAdmin.createMailbox.mockRejectedValue(remoteUnavailable());

      await expect(service.provision()).rejects.toMatchObject({
        reason: 'remote_unavailable',
      });
      expect(mailAdmin.createMailbox).toHaveBeenCalledTimes(3);
      expect(store.mailboxes.rows).toEqual([]);
      expect(redis.keys()).toEqual([]);
    });

    it('recovers when a retry succeeds', async () => {
      mailAdmin.createMailbox
        .mockRejectedValueOnce(remoteUnavailable())
        .mockResolvedValueOnce({ address: 'ab12cd34@x.test', enabled: true });

      const result = await service.provision();

      expect(result.mailbox.status).toBe('ACTIVE');
      expect(mailAdmin.createMailbox).toHaveBeenCalledTimes(2);
    });

    it('does not retry quota rejections', async () => {
      mailAdmin.createMailbox.mockRejectedValue(
        new QuotaExceededError(507, 'status=507'),
      );

      await expect(service.provision()).rejects.toMatchObject({
        reason: 'quota_exceeded',
      });
      expect(mailAdmin.createMailbox).toHaveBeenCalledTimes(1);
    });

    it('rolls the remote mailbox back when the row cannot be saved', async () => {
      store.mailboxes.failSavesWith = new Error('connection terminated');

      await expect(service.provision()).rejects.toMatchObject({
        reason: 'persistence_failed',
      });
      expect(mailAdmin.deleteMailbox).toHaveBeenCalledWith('ab12cd34@x.test');
      expect(store.mailboxes.rows).toEqual([]);
    });

    it('rejects unknown domains and out of range ttls', async () => {
      await expect(
        service.provision({ domain: 'elsewhere.test' }),
      ).rejects.toMatchObject({ reason: 'invalid_request' });
      await expect(service.provision({ ttlSeconds: 10 })).rejects.toBeInstanceOf(
        ProvisionError,
      );
      expect(mailAdmin.createMailbox).not.toHaveBeenCalled();
    });
  });

  describe('expire', () => {
    it('expires due mailboxes and drops their meta cache', async () => {
      seedMailbox(store, { address: 'a@x.test' });
      await redis.set('meta:a@x.test', '{}');
      clock.advance(3_600_000);

      await expect(service.expireDueMailboxes()).resolves.toBe(1);

      expect(store.mailboxes.rows[0]).toEqual(
        expect.objectContaining({
          status: 'EXPIRED',
          expiredAt: new Date('2026-01-01T01:00:00.000Z'),
        }),
      );
      expect(redis.keys()).toEqual([]);
    });

    it('leaves mailboxes that are not yet due', async () => {
      seedMailbox(store, { address: 'a@x.test' });

      await expect(service.expire('a@x.test')).resolves.toBe(false);
      expect(store.mailboxes.rows[0].status).toBe('ACTIVE');
    });
  });

  describe('destroy', () => {
    it('marks the mailbox deleted, clears cache keys and deletes remotely', async () => {
      seedMailbox(store, { address: 'a@x.test' });
      await redis.set('code:a@x.test', '{}');
      await redis.set('meta:a@x.test', '{}');

      await expect(service.destroy('a@x.test')).resolves.toEqual({
        address: 'a@x.test',
        alreadyDeleted: false,
        remoteDeleted: true,
      });
      expect(store.mailboxes.rows[0]).toEqual(
        expect.objectContaining({ status: 'DELETED', deletedAt: FIXED_NOW }),
      );
      expect(redis.keys()).toEqual([]);
    });

    it('is a no-op for an already deleted mailbox', async () => {
      seedMailbox(store, { address: 'a@x.test', status: 'DELETED' });

      await expect(service.destroy('a@x.test')).resolves.toEqual({
        address: 'a@x.test',
        alreadyDeleted: true,
        remoteDeleted: false,
      });
      expect(mailAdmin.deleteMailbox).not.toHaveBeenCalled();
    });

    it('treats a missing remote mailbox as deleted', async () => {
      seedMailbox(store, { address: 'a@x.test' });
      mailAdmin.deleteMailbox.mockRejectedValue(
        new MailAdminNotFoundError('a'),
      );

      const result = await service.destroy('a@x.test');

      expect(result.remoteDeleted).toBe(true);
    });

    it('reports a failed remote delete without failing', async () => {
      seedMailbox(store, { address: 'a@x.test' });
      mailAdmin.deleteMailbox.mockRejectedValue(
        new RemoteUnavailableError('delete_mailbox', 'status=503'),
      );

      const result = await service.destroy('a@x.test');

      expect(result.remoteDeleted).toBe(false);
      expect(mailAdmin.deleteMailbox).toHaveBeenCalledTimes(3);
      expect(store.mailboxes.rows[0].status).toBe('DELETED');
    });

    it('rejects unknown mailboxes', async () => {
      await expect(service.destroy('nobody@x.test')).rejects.toBeInstanceOf(
        MailboxNotFoundError,
      );
    });
  });

  describe('cleanup', () => {
    it('leaves no rows for a mailbox expired beyond the grace period', async () => {
      seedMailbox(store, { address: 'a@x.test' });
      seedRecord('a@x.test', 'msg-1');
      seedRecord('a@x.test', 'msg-2');
      clock.advance(3_600_000);
      await service.expireDueMailboxes();
      clock.advance(120_001);

      const result = await service.cleanup(clock.now());

      expect(result).toEqual({
        purgedMailboxes: 1,
        purgedVerifications: 2,
        skippedMailboxes: 0,
        failedMailboxes: 0,
      });
      expect(store.mailboxes.rows).toEqual([]);
      expect(store.verifications.rows).toEqual([]);
      expect(mailAdmin.deleteMailbox).toHaveBeenCalledWith('a@x.test');
    });

    it('keeps expired mailboxes that are still within the grace period', async () => {
      seedMailbox(store, { address: 'a@x.test' });
      clock.advance(3_600_000);
      await service.expireDueMailboxes();
      clock.advance(60_000);

      const result = await service.cleanup(clock.now());

      expect(result.purgedMailboxes).toBe(0);
      expect(store.mailboxes.rows).toHaveLength(1);
    });

    it('purges deleted mailboxes older than the cutoff', async () => {
      seedMailbox(store, {
        address: 'gone@x.test',
        status: 'DELETED',
        deletedAt: FIXED_NOW,
      });
      seedMailbox(store, { address: 'live@x.test' });
      clock.advance(1_000);

      const result = await service.cleanup(clock.now());

      expect(result.purgedMailboxes).toBe(1);
      expect(store.mailboxes.rows.map((row) => row.address)).toEqual([
        'live@x.test',
      ]);
    });

    it('defers mailboxes whose remote delete is unavailable', async () => {
      seedMailbox(store, {
        address: 'gone@x.test',
        status: 'DELETED',
        deletedAt: FIXED_NOW,
      });
      mailAdmin.deleteMailbox.mockRejectedValue(
        new RemoteUnavailableError('delete_mailbox', 'status=503'),
      );
      clock.advance(1_000);

      const result = await service.cleanup(clock.now());

      expect(result.skippedMailboxes).toBe(1);
      expect(store.mailboxes.rows).toHaveLength(1);
    });
  });
});
