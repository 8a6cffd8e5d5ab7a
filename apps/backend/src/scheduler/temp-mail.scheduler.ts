import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { subMilliseconds } from 'date-fns';
import { CLOCK, Clock } from '../common/clock/clock';
import { serializeStructuredLog } from '../common/logging/structured-log.util';
import { TEMPMAIL_CONFIG, TempMailConfig } from '../config/temp-mail.config';
import { MailboxLifecycleService } from '../mailbox/mailbox-lifecycle.service';
import { MailboxReconciliationService } from '../mailbox/mailbox-reconciliation.service';
import { MailboxStatsService } from '../mailbox/mailbox-stats.service';
import { MailboxScanService } from '../scan/mailbox-scan.service';
import {
  TRIGGER_NAMES,
  TriggerName,
  TriggerRunCoordinator,
  TriggerRunOutcome,
  TriggerRunState,
} from './trigger-run.coordinator';

export type SchedulerStatus = {
  enabled: boolean;
  triggers: TriggerRunState[];
};

@Injectable()
export class TempMailScheduler
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(TempMailScheduler.name);

  constructor(
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly coordinator: TriggerRunCoordinator,
    private readonly lifecycle: MailboxLifecycleService,
    private readonly reconciliation: MailboxReconciliationService,
    private readonly stats: MailboxStatsService,
    private readonly scan: MailboxScanService,
    @Inject(TEMPMAIL_CONFIG) private readonly config: TempMailConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  private resolveIntervalName(name: TriggerName): string {
    return `temp-mail:${name}`;
  }

  onApplicationBootstrap(): void {
    if (!this.config.scheduler.enabled) {
      this.logger.log(
        serializeStructuredLog({ event: 'temp_mail_scheduler_disabled' }),
      );
      return;
    }
    for (const name of TRIGGER_NAMES) {
      const intervalMs = this.coordinator.resolveIntervalMs(name);
      const handle = setInterval(() => {
        void this.runTrigger(name);
      }, intervalMs);
      this.schedulerRegistry.addInterval(this.resolveIntervalName(name), handle);
      this.logger.log(
        serializeStructuredLog({
          event: 'temp_mail_scheduler_registered',
          trigger: name,
          intervalMs,
        }),
      );
    }
  }

  onModuleDestroy(): void {
    for (const name of TRIGGER_NAMES) {
      const intervalName = this.resolveIntervalName(name);
      if (this.schedulerRegistry.doesExist('interval', intervalName)) {
        this.schedulerRegistry.deleteInterval(intervalName);
      }
    }
  }

  runTrigger(name: TriggerName): Promise<TriggerRunOutcome<unknown>> {
    switch (name) {
      case 'scan-all':
        return this.runScanAll();
      case 'data-sync':
        return this.runDataSync();
      case 'stats-refresh':
        return this.runStatsRefresh();
      case 'cleanup':
        return this.runCleanup();
    }
  }

  runScanAll() {
    return this.coordinator.run('scan-all', async (runCorrelationId) => {
      const expiredMailboxes = await this.lifecycle.expireDueMailboxes();
      const summary = await this.scan.scanDueMailboxes({ runCorrelationId });
      return { expiredMailboxes, ...summary };
    });
  }

  runDataSync() {
    return this.coordinator.run('data-sync', () =>
      this.reconciliation.reconcileWithRemote(),
    );
  }

  runStatsRefresh() {
    return this.coordinator.run('stats-refresh', () =>
      this.stats.refreshStats(),
    );
  }

  runCleanup() {
    return this.coordinator.run('cleanup', async () => {
      const expiredMailboxes = await this.lifecycle.expireDueMailboxes();
      const olderThan = subMilliseconds(
        this.clock.now(),
        this.config.lifecycle.cleanupRetentionMs,
      );
      const result = await this.lifecycle.cleanup(olderThan);
      return { expiredMailboxes, ...result };
    });
  }

  getStatus(): SchedulerStatus {
    return {
      enabled: this.config.scheduler.enabled,
      triggers: this.coordinator.getSnapshot(),
    };
  }
}
