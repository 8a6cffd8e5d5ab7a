import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { RedisClientType } from 'redis';
import { serializeStructuredLog } from '../common/logging/structured-log.util';
import { REDIS_CLIENT } from './redis.constants';

@Injectable()
export class RedisLifecycleService implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisLifecycleService.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redisClient: RedisClientType,
  ) {}

  async onApplicationShutdown(): Promise<void> {
    if (!this.redisClient.isOpen) return;
    await this.redisClient.quit();
    this.logger.log(serializeStructuredLog({ event: 'redis_client_closed' }));
  }
}
