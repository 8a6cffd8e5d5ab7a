import { Module } from '@nestjs/common';
import { MailAdminApiClient } from './mail-admin-api.client';

@Module({
  providers: [MailAdminApiClient],
  exports: [MailAdminApiClient],
})
export class MailAdminModule {}
