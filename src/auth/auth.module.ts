import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AUTH_CONFIG, getAuthConfig } from '../config/auth.config';
import { AuthService } from './auth.service';
import { TokenAuthGuard } from './guards/token-auth.guard';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: AUTH_CONFIG,
      useFactory: (configService: ConfigService) => getAuthConfig(configService),
      inject: [ConfigService],
    },
    AuthService,
    TokenAuthGuard,
  ],
  exports: [AuthService, TokenAuthGuard],
})
export class AuthModule {}
