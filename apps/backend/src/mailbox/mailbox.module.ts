import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '../cache/cache.module';
import { MailAdminModule } from '../mail-admin/mail-admin.module';
import { Mailbox } from './entities/mailbox.entity';
import { VerificationRecord } from './entities/verification-record.entity';
import { MailboxCredentialsGenerator } from './mailbox-credentials.generator';
import { MailboxLifecycleService } from './mailbox-lifecycle.service';
import { MailboxReconciliationService } from './mailbox-reconciliation.service';
import { MailboxStatsService } from './mailbox-stats.service';

/**
 * MailboxModule - temporary mailbox lifecycle
 * Provisioning, expiry, cleanup, remote reconciliation and stats.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Mailbox, VerificationRecord]),
    MailAdminModule,
    CacheModule,
  ],
  providers: [
    MailboxCredentialsGenerator,
    MailboxLifecycleService,
    MailboxReconciliationService,
    MailboxStatsService,
  ],
  exports: [
    MailboxLifecycleService,
    MailboxReconciliationService,
    MailboxStatsService,
  ],
})
export class MailboxModule {}
