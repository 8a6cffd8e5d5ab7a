import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '../cache/cache.module';
import { LockModule } from '../lock/lock.module';
import { MailAdminModule } from '../mail-admin/mail-admin.module';
import { Mailbox } from '../mailbox/entities/mailbox.entity';
import { VerificationRecord } from '../mailbox/entities/verification-record.entity';
import { MailboxScanService } from './mailbox-scan.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Mailbox, VerificationRecord]),
    MailAdminModule,
    LockModule,
    CacheModule,
  ],
  providers: [MailboxScanService],
  exports: [MailboxScanService],
})
export class ScanModule {}
