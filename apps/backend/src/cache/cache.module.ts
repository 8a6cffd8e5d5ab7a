import { Module } from '@nestjs/common';
import { VerificationCacheService } from './verification-cache.service';

@Module({
  providers: [VerificationCacheService],
  exports: [VerificationCacheService],
})
export class CacheModule {}
