import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TempMailConfigModule } from './config/temp-mail-config.module';
import { buildTypeOrmModuleOptions } from './database/typeorm.config';
import { RedisModule } from './redis/redis.module';
import { TempMailModule } from './temp-mail/temp-mail.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),

    // Local-dev-only synchronize policy lives in the centralized config.
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        buildTypeOrmModuleOptions(configService),
    }),

    ScheduleModule.forRoot(),
    TempMailConfigModule,
    RedisModule,
    TempMailModule,
  ],
})
export class AppModule {}
