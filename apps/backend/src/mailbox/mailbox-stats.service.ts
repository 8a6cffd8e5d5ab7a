import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { VerificationCacheService } from '../cache/verification-cache.service';
import { StatsSnapshot } from '../cache/verification-cache.types';
import { CLOCK, Clock } from '../common/clock/clock';
import { serializeStructuredLog } from '../common/logging/structured-log.util';
import { Mailbox } from './entities/mailbox.entity';
import { VerificationRecord } from './entities/verification-record.entity';

@Injectable()
export class MailboxStatsService {
  private readonly logger = new Logger(MailboxStatsService.name);

  constructor(
    @InjectRepository(Mailbox)
    private readonly mailboxRepo: Repository<Mailbox>,
    @InjectRepository(VerificationRecord)
    private readonly verificationRepo: Repository<VerificationRecord>,
    private readonly cache: VerificationCacheService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async refreshStats(): Promise<StatsSnapshot> {
    const [activeMailboxCount, totalMailboxCount, totalCodesExtracted] =
      await Promise.all([
        this.mailboxRepo.count({ where: { status: 'ACTIVE' } }),
        this.mailboxRepo.count(),
        this.verificationRepo.count(),
      ]);
    const snapshot: StatsSnapshot = {
      activeMailboxCount,
      totalMailboxCount,
      totalCodesExtracted,
      lastRefreshedAt: this.clock.now().toISOString(),
    };
    await this.cache.setStats(snapshot);
    this.logger.log(
      serializeStructuredLog({
        event: 'mailbox_stats_refreshed',
        ...snapshot,
      }),
    );
    return snapshot;
  }

  async getStats(): Promise<StatsSnapshot> {
    return (await this.cache.getStats()) ?? this.refreshStats();
  }
}
