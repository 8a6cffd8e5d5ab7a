import { Module } from '@nestjs/common';
import { LockModule } from '../lock/lock.module';
import { MailboxModule } from '../mailbox/mailbox.module';
import { ScanModule } from '../scan/scan.module';
import { TempMailScheduler } from './temp-mail.scheduler';
import { TriggerRunCoordinator } from './trigger-run.coordinator';

@Module({
  imports: [LockModule, MailboxModule, ScanModule],
  providers: [TriggerRunCoordinator, TempMailScheduler],
  exports: [TempMailScheduler],
})
export class SchedulerModule {}
