import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { RedisClientType } from 'redis';
import {
  fingerprintIdentifier,
  serializeStructuredLog,
} from '../common/logging/structured-log.util';
import { REDIS_CLIENT } from '../redis/redis.constants';
import {
  AlreadyLockedError,
  LeaseExpiredError,
  TokenMismatchError,
} from './lock.errors';

// Both scripts answer -1 when the key is gone and 0 when another token holds it.
export const RELEASE_LEASE_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
if current ~= ARGV[1] then return 0 end
return redis.call('DEL', KEYS[1])
`;

export const RENEW_LEASE_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
if current ~= ARGV[1] then return 0 end
return redis.call('PEXPIRE', KEYS[1], ARGV[2])
`;

const MIN_LEASE_MS = 1_000;
const MAX_LEASE_MS = 6 * 60 * 60 * 1000;

export type LeaseHandle = {
  resource: string;
  token: string;
  leaseMs: number;
};

@Injectable()
export class LeaseLockService {
  private readonly logger = new Logger(LeaseLockService.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redisClient: RedisClientType,
  ) {}

  private resolveLockKey(resource: string): string {
    return `lock:${resource}`;
  }

  private resolveLeaseMs(leaseMs: number): number {
    const normalized = Number.isFinite(leaseMs)
      ? Math.floor(leaseMs)
      : MIN_LEASE_MS;
    return Math.min(Math.max(normalized, MIN_LEASE_MS), MAX_LEASE_MS);
  }

  private assertScriptReply(resource: string, reply: unknown): void {
    const outcome = Number(reply);
    if (outcome === -1) throw new LeaseExpiredError(resource);
    if (outcome !== 1) throw new TokenMismatchError(resource);
  }

  async tryAcquire(resource: string, leaseMs: number): Promise<LeaseHandle> {
    const token = randomUUID();
    const resolvedLeaseMs = this.resolveLeaseMs(leaseMs);
    const reply = await this.redisClient.set(
      this.resolveLockKey(resource),
      token,
      { NX: true, PX: resolvedLeaseMs },
    );
    if (reply !== 'OK') {
      this.logger.debug(
        serializeStructuredLog({
          event: 'lease_lock_contended',
          resourceFingerprint: fingerprintIdentifier(resource),
        }),
      );
      throw new AlreadyLockedError(resource);
    }
    return { resource, token, leaseMs: resolvedLeaseMs };
  }

  async release(resource: string, token: string): Promise<void> {
    const reply: unknown = await this.redisClient.eval(RELEASE_LEASE_SCRIPT, {
      keys: [this.resolveLockKey(resource)],
      arguments: [token],
    });
    this.assertScriptReply(resource, reply);
  }

  async renew(resource: string, token: string, leaseMs: number): Promise<void> {
    const reply: unknown = await this.redisClient.eval(RENEW_LEASE_SCRIPT, {
      keys: [this.resolveLockKey(resource)],
      arguments: [token, String(this.resolveLeaseMs(leaseMs))],
    });
    this.assertScriptReply(resource, reply);
  }
}
