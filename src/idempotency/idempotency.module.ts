import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { CacheModule } from '@nestjs/cache-manager';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { IDEMPOTENCY_CONFIG, getIdempotencyConfig } from '../config/idempotency.config';
import { IdempotencyInterceptor } from './idempotency.interceptor';

@Module({
  imports: [ConfigModule, CacheModule.register()],
  providers: [
    {
      provide: IDEMPOTENCY_CONFIG,
      useFactory: (configService: ConfigService) => getIdempotencyConfig(configService),
      inject: [ConfigService],
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: IdempotencyInterceptor,
    },
  ],
})
export class IdempotencyModule {}
