import { Module } from '@nestjs/common';
import { LeaseLockService } from './lease-lock.service';

@Module({
  providers: [LeaseLockService],
  exports: [LeaseLockService],
})
export class LockModule {}
