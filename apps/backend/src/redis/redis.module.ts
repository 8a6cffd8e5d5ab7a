import { Global, Logger, Module } from '@nestjs/common';
import { createClient, RedisClientType } from 'redis';
import {
  describeUnknownError,
  serializeStructuredLog,
} from '../common/logging/structured-log.util';
import { TEMPMAIL_CONFIG, TempMailConfig } from '../config/temp-mail.config';
import { REDIS_CLIENT } from './redis.constants';
import { RedisLifecycleService } from './redis-lifecycle.service';

const redisLogger = new Logger('RedisClient');

async function connectRedisClient(
  config: TempMailConfig,
): Promise<RedisClientType> {
  const client: RedisClientType = createClient({ url: config.redisUrl });
  client.on('error', (error: unknown) => {
    redisLogger.warn(
      serializeStructuredLog({
        event: 'redis_client_error',
        error: describeUnknownError(error),
      }),
    );
  });
  await client.connect();
  redisLogger.log(serializeStructuredLog({ event: 'redis_client_connected' }));
  return client;
}

@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [TEMPMAIL_CONFIG],
      useFactory: connectRedisClient,
    },
    RedisLifecycleService,
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule {}
