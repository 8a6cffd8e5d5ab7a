import { Inject, Injectable, Logger } from '@nestjs/common';
import { RedisClientType } from 'redis';
import {
  describeUnknownError,
  fingerprintIdentifier,
  serializeStructuredLog,
} from '../common/logging/structured-log.util';
import { TEMPMAIL_CONFIG, TempMailConfig } from '../config/temp-mail.config';
import { MAILBOX_STATUSES } from '../mailbox/entities/mailbox.entity';
import { REDIS_CLIENT } from '../redis/redis.constants';
import {
  CachedLatestCode,
  CachedMailboxMeta,
  LatestCodeWriteOutcome,
  StatsSnapshot,
} from './verification-cache.types';

const STATS_KEY = 'stats:global';

// Answers 0 when the stored entry arrived later than ARGV[2], 1 after a write.
// Arrival times are ISO-8601 UTC strings, so string order is time order.
export const CACHE_LATEST_CODE_IF_NEWER_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current then
  local ok, stored = pcall(cjson.decode, current)
  if ok and type(stored) == 'table' and type(stored.receivedAt) == 'string'
    and stored.receivedAt > ARGV[2] then
    return 0
  end
end
redis.call('SET', KEYS[1], ARGV[1], 'EX', ARGV[3])
return 1
`;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasStringFields(record: UnknownRecord, fields: string[]): boolean {
  return fields.every((field) => typeof record[field] === 'string');
}

function parseLatestCode(value: unknown): CachedLatestCode | null {
  if (!isRecord(value)) return null;
  const {
    verificationId,
    code,
    patternName,
    sourceMessageId,
    receivedAt,
    extractedAt,
  } = value;
  if (
    typeof verificationId !== 'string' ||
    typeof code !== 'string' ||
    typeof patternName !== 'string' ||
    typeof sourceMessageId !== 'string' ||
    typeof receivedAt !== 'string' ||
    typeof extractedAt !== 'string'
  ) {
    return null;
  }
  return {
    verificationId,
    code,
    patternName,
    sourceMessageId,
    receivedAt,
    extractedAt,
  };
}

function parseMailboxMeta(value: unknown): CachedMailboxMeta | null {
  if (!isRecord(value)) return null;
  if (
    !hasStringFields(value, [
      'mailboxId',
      'address',
      'domain',
      'createdAt',
      'expiresAt',
    ])
  ) {
    return null;
  }
  const status = MAILBOX_STATUSES.find((entry) => entry === value.status);
  if (!status) return null;
  return {
    mailboxId: String(value.mailboxId),
    address: String(value.address),
    domain: String(value.domain),
    status,
    createdAt: String(value.createdAt),
    expiresAt: String(value.expiresAt),
  };
}

function parseStatsSnapshot(value: unknown): StatsSnapshot | null {
  if (!isRecord(value)) return null;
  const {
    activeMailboxCount,
    totalMailboxCount,
    totalCodesExtracted,
    lastRefreshedAt,
  } = value;
  if (
    typeof activeMailboxCount !== 'number' ||
    typeof totalMailboxCount !== 'number' ||
    typeof totalCodesExtracted !== 'number' ||
    typeof lastRefreshedAt !== 'string'
  ) {
    return null;
  }
  return {
    activeMailboxCount,
    totalMailboxCount,
    totalCodesExtracted,
    lastRefreshedAt,
  };
}

/**
 * Advisory cache in front of the relational store. Every read may miss and
 * every failure degrades to a miss; callers fall back to the database.
 */
@Injectable()
export class VerificationCacheService {
  private readonly logger = new Logger(VerificationCacheService.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redisClient: RedisClientType,
    @Inject(TEMPMAIL_CONFIG) private readonly config: TempMailConfig,
  ) {}

  private resolveCodeKey(address: string): string {
    return `code:${address}`;
  }

  private resolveMetaKey(address: string): string {
    return `meta:${address}`;
  }

  private warnCacheFailure(
    operation: string,
    error: unknown,
    address?: string,
  ): void {
    this.logger.warn(
      serializeStructuredLog({
        event: 'verification_cache_operation_failed',
        operation,
        mailboxFingerprint: address ? fingerprintIdentifier(address) : null,
        error: describeUnknownError(error),
      }),
    );
  }

  private async readJson<T>(
    key: string,
    parse: (value: unknown) => T | null,
  ): Promise<T | null> {
    const raw = await this.redisClient.get(key);
    if (!raw) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = null;
    }
    const value = parse(parsed);
    if (value === null) {
      await this.redisClient.del(key);
    }
    return value;
  }

  async getLatestCode(address: string): Promise<CachedLatestCode | null> {
    try {
      return await this.readJson(this.resolveCodeKey(address), parseLatestCode);
    } catch (error: unknown) {
      this.warnCacheFailure('get_latest_code', error, address);
      return null;
    }
  }

  async setLatestCode(
    address: string,
    entry: CachedLatestCode,
  ): Promise<boolean> {
    try {
      await this.redisClient.set(
        this.resolveCodeKey(address),
        JSON.stringify(entry),
        { EX: this.config.cache.codeTtlSeconds },
      );
      return true;
    } catch (error: unknown) {
      this.warnCacheFailure('set_latest_code', error, address);
      return false;
    }
  }

  /**
   * Keeps the cached code pointing at the most recently arrived message,
   * whatever order writers reach Redis in. The compare and the write run as
   * one script.
   */
  async cacheLatestCodeIfNewer(
    address: string,
    entry: CachedLatestCode,
  ): Promise<LatestCodeWriteOutcome> {
    const normalized: CachedLatestCode = {
      ...entry,
      receivedAt: new Date(entry.receivedAt).toISOString(),
    };
    try {
      const reply = await this.redisClient.eval(
        CACHE_LATEST_CODE_IF_NEWER_SCRIPT,
        {
          keys: [this.resolveCodeKey(address)],
          arguments: [
            JSON.stringify(normalized),
            normalized.receivedAt,
            String(this.config.cache.codeTtlSeconds),
          ],
        },
      );
      return Number(reply) === 1 ? 'written' : 'kept_newer';
    } catch (error: unknown) {
      this.warnCacheFailure('cache_latest_code_if_newer', error, address);
      return 'failed';
    }
  }

  async getMailboxMeta(address: string): Promise<CachedMailboxMeta | null> {
    try {
      return await this.readJson(this.resolveMetaKey(address), parseMailboxMeta);
    } catch (error: unknown) {
      this.warnCacheFailure('get_mailbox_meta', error, address);
      return null;
    }
  }

  async setMailboxMeta(meta: CachedMailboxMeta): Promise<void> {
    try {
      await this.redisClient.set(
        this.resolveMetaKey(meta.address),
        JSON.stringify(meta),
        { EX: this.config.cache.metaTtlSeconds },
      );
    } catch (error: unknown) {
      this.warnCacheFailure('set_mailbox_meta', error, meta.address);
    }
  }

  async deleteMailboxMeta(address: string): Promise<void> {
    try {
      await this.redisClient.del(this.resolveMetaKey(address));
    } catch (error: unknown) {
      this.warnCacheFailure('delete_mailbox_meta', error, address);
    }
  }

  async clearMailbox(address: string): Promise<void> {
    try {
      await this.redisClient.del([
        this.resolveCodeKey(address),
        this.resolveMetaKey(address),
      ]);
    } catch (error: unknown) {
      this.warnCacheFailure('clear_mailbox', error, address);
    }
  }

  async getStats(): Promise<StatsSnapshot | null> {
    try {
      return await this.readJson(STATS_KEY, parseStatsSnapshot);
    } catch (error: unknown) {
      this.warnCacheFailure('get_stats', error);
      return null;
    }
  }

  async setStats(snapshot: StatsSnapshot): Promise<void> {
    try {
      await this.redisClient.set(STATS_KEY, JSON.stringify(snapshot), {
        EX: this.config.cache.statsTtlSeconds,
      });
    } catch (error: unknown) {
      this.warnCacheFailure('set_stats', error);
    }
  }
}
