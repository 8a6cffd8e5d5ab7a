import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import {
  describeUnknownError,
  serializeStructuredLog,
} from './common/logging/structured-log.util';
import {
  resolveTempMailConfig,
  TempMailConfig,
} from './config/temp-mail.config';

const bootstrapLogger = new Logger('Bootstrap');

function assertMailAdminConfiguration(config: TempMailConfig): void {
  if (!config.mailAdmin.adminApiBaseUrls.length) {
    throw new Error(
      'TEMPMAIL_MAIL_ADMIN_API_URL(S) is missing. Set the mail server admin API base URL in apps/backend/.env',
    );
  }
  if (!config.mailAdmin.apiToken) {
    bootstrapLogger.warn(
      serializeStructuredLog({
        event: 'temp_mail_admin_token_missing',
        provider: config.mailAdmin.provider,
      }),
    );
  }
}

async function bootstrap() {
  // ConfigModule has already loaded .env into process.env at import time.
  const config = resolveTempMailConfig(process.env);
  assertMailAdminConfiguration(config);

  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();

  bootstrapLogger.log(
    serializeStructuredLog({
      event: 'temp_mail_relay_started',
      provider: config.mailAdmin.provider,
      adminApiBaseUrlCount: config.mailAdmin.adminApiBaseUrls.length,
      defaultDomain: config.mailbox.defaultDomain,
      schedulerEnabled: config.scheduler.enabled,
    }),
  );
}

bootstrap().catch((error: unknown) => {
  bootstrapLogger.error(
    serializeStructuredLog({
      event: 'temp_mail_relay_bootstrap_failed',
      error: describeUnknownError(error),
    }),
  );
  process.exitCode = 1;
});
