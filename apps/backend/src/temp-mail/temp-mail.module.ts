import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '../cache/cache.module';
import { Mailbox } from '../mailbox/entities/mailbox.entity';
import { VerificationRecord } from '../mailbox/entities/verification-record.entity';
import { MailboxModule } from '../mailbox/mailbox.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { TempMailService } from './temp-mail.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Mailbox, VerificationRecord]),
    MailboxModule,
    CacheModule,
    SchedulerModule,
  ],
  providers: [TempMailService],
  exports: [TempMailService],
})
export class TempMailModule {}
