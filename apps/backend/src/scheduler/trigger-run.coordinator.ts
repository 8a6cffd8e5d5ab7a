import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../common/clock/clock';
import {
  describeUnknownError,
  resolveCorrelationId,
  serializeStructuredLog,
} from '../common/logging/structured-log.util';
import { TEMPMAIL_CONFIG, TempMailConfig } from '../config/temp-mail.config';
import { LeaseHandle, LeaseLockService } from '../lock/lease-lock.service';
import { AlreadyLockedError } from '../lock/lock.errors';

export const TRIGGER_NAMES = [
  'scan-all',
  'data-sync',
  'stats-refresh',
  'cleanup',
] as const;
export type TriggerName = (typeof TRIGGER_NAMES)[number];

const TRIGGER_LEASE_INTERVAL_FACTOR = 4;
const MIN_TRIGGER_LEASE_MS = 60_000;
const MAX_TRIGGER_LEASE_MS = 3_600_000;
const TRIGGER_LEASE_RENEWALS_PER_LEASE = 3;

export type TriggerRunStatus = 'COMPLETED' | 'FAILED' | 'SKIPPED';
export type TriggerSkipReason = 'in_flight' | 'locked';

export type TriggerRunOutcome<T> =
  | { status: 'COMPLETED'; runCorrelationId: string; value: T }
  | { status: 'FAILED'; runCorrelationId: string; error: string }
  | { status: 'SKIPPED'; runCorrelationId: string; reason: TriggerSkipReason };

export type TriggerRunState = {
  name: TriggerName;
  intervalMs: number;
  inFlight: boolean;
  runCount: number;
  skipCount: number;
  lastStatus: TriggerRunStatus | null;
  lastSkipReason: TriggerSkipReason | null;
  lastError: string | null;
  lastStartedAt: string | null;
  lastFinishedAt: string | null;
};

/**
 * Holds per-trigger run state for this process and guards every run with
 * an in-flight flag plus a cluster-wide `trigger:{name}` lease, renewed
 * while the run lasts.
 */
@Injectable()
export class TriggerRunCoordinator {
  private readonly logger = new Logger(TriggerRunCoordinator.name);
  private readonly states = new Map<TriggerName, TriggerRunState>();

  constructor(
    private readonly leaseLock: LeaseLockService,
    @Inject(TEMPMAIL_CONFIG) private readonly config: TempMailConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    for (const name of TRIGGER_NAMES) {
      this.states.set(name, {
        name,
        intervalMs: this.resolveIntervalMs(name),
        inFlight: false,
        runCount: 0,
        skipCount: 0,
        lastStatus: null,
        lastSkipReason: null,
        lastError: null,
        lastStartedAt: null,
        lastFinishedAt: null,
      });
    }
  }

  resolveIntervalMs(name: TriggerName): number {
    const { scheduler } = this.config;
    switch (name) {
      case 'scan-all':
        return scheduler.scanAllIntervalMs;
      case 'data-sync':
        return scheduler.dataSyncIntervalMs;
      case 'stats-refresh':
        return scheduler.statsRefreshIntervalMs;
      case 'cleanup':
        return scheduler.cleanupIntervalMs;
    }
  }

  resolveLeaseMs(name: TriggerName): number {
    const leaseMs =
      this.resolveIntervalMs(name) * TRIGGER_LEASE_INTERVAL_FACTOR;
    return Math.min(
      Math.max(leaseMs, MIN_TRIGGER_LEASE_MS),
      MAX_TRIGGER_LEASE_MS,
    );
  }

  private getState(name: TriggerName): TriggerRunState {
    const state = this.states.get(name);
    if (!state) throw new Error(`Unknown trigger ${name}`);
    return state;
  }

  private markSkipped<T>(
    state: TriggerRunState,
    runCorrelationId: string,
    reason: TriggerSkipReason,
  ): TriggerRunOutcome<T> {
    state.skipCount += 1;
    state.lastStatus = 'SKIPPED';
    state.lastSkipReason = reason;
    this.logger.log(
      serializeStructuredLog({
        event: 'temp_mail_trigger_skipped',
        trigger: state.name,
        runCorrelationId,
        reason,
      }),
    );
    return { status: 'SKIPPED', runCorrelationId, reason };
  }

  async run<T>(
    name: TriggerName,
    work: (runCorrelationId: string) => Promise<T>,
  ): Promise<TriggerRunOutcome<T>> {
    const state = this.getState(name);
    const runCorrelationId = resolveCorrelationId(undefined);
    if (state.inFlight) {
      return this.markSkipped(state, runCorrelationId, 'in_flight');
    }
    state.inFlight = true;

    let lease: LeaseHandle | null = null;
    let stopRenewal: () => void = () => undefined;
    try {
      lease = await this.leaseLock.tryAcquire(
        `trigger:${name}`,
        this.resolveLeaseMs(name),
      );
      stopRenewal = this.startLeaseRenewal(lease, runCorrelationId);
      const startedAt = this.clock.now();
      state.lastStartedAt = startedAt.toISOString();
      state.runCount += 1;
      this.logger.log(
        serializeStructuredLog({
          event: 'temp_mail_trigger_start',
          trigger: name,
          runCorrelationId,
        }),
      );
      const value = await work(runCorrelationId);
      state.lastStatus = 'COMPLETED';
      state.lastError = null;
      this.logger.log(
        serializeStructuredLog({
          event: 'temp_mail_trigger_completed',
          trigger: name,
          runCorrelationId,
          durationMs: this.clock.now().getTime() - startedAt.getTime(),
        }),
      );
      return { status: 'COMPLETED', runCorrelationId, value };
    } catch (error: unknown) {
      if (error instanceof AlreadyLockedError) {
        return this.markSkipped(state, runCorrelationId, 'locked');
      }
      const message = describeUnknownError(error);
      state.lastStatus = 'FAILED';
      state.lastError = message;
      this.logger.warn(
        serializeStructuredLog({
          event: 'temp_mail_trigger_failed',
          trigger: name,
          runCorrelationId,
          error: message,
        }),
      );
      return { status: 'FAILED', runCorrelationId, error: message };
    } finally {
      stopRenewal();
      if (lease) {
        state.lastFinishedAt = this.clock.now().toISOString();
        await this.releaseLease(lease, runCorrelationId);
      }
      state.inFlight = false;
    }
  }

  private startLeaseRenewal(
    lease: LeaseHandle,
    runCorrelationId: string,
  ): () => void {
    let renewing = true;
    const handle = setInterval(() => {
      void this.renewLease(lease, runCorrelationId).then((renewed) => {
        if (!renewed && renewing) {
          renewing = false;
          clearInterval(handle);
        }
      });
    }, Math.floor(lease.leaseMs / TRIGGER_LEASE_RENEWALS_PER_LEASE));
    handle.unref();
    return () => {
      renewing = false;
      clearInterval(handle);
    };
  }

  private async renewLease(
    lease: LeaseHandle,
    runCorrelationId: string,
  ): Promise<boolean> {
    try {
      await this.leaseLock.renew(lease.resource, lease.token, lease.leaseMs);
      return true;
    } catch (error: unknown) {
      this.logger.warn(
        serializeStructuredLog({
          event: 'temp_mail_trigger_lease_renew_failed',
          trigger: lease.resource,
          runCorrelationId,
          error: describeUnknownError(error),
        }),
      );
      return false;
    }
  }

  private async releaseLease(
    lease: LeaseHandle,
    runCorrelationId: string,
  ): Promise<void> {
    try {
      await this.leaseLock.release(lease.resource, lease.token);
    } catch (error: unknown) {
      this.logger.warn(
        serializeStructuredLog({
          event: 'temp_mail_trigger_lease_release_failed',
          trigger: lease.resource,
          runCorrelationId,
          error: describeUnknownError(error),
        }),
      );
    }
  }

  getSnapshot(): TriggerRunState[] {
    return TRIGGER_NAMES.map((name) => ({ ...this.getState(name) }));
  }
}
