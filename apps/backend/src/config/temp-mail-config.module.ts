import { Global, Module } from '@nestjs/common';
import { CLOCK, systemClock } from '../common/clock/clock';
import { resolveTempMailConfig, TEMPMAIL_CONFIG } from './temp-mail.config';

@Global()
@Module({
  providers: [
    {
      provide: TEMPMAIL_CONFIG,
      useFactory: () => resolveTempMailConfig(process.env),
    },
    {
      provide: CLOCK,
      useValue: systemClock,
    },
  ],
  exports: [TEMPMAIL_CONFIG, CLOCK],
})
export class TempMailConfigModule {}
