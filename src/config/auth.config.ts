import { ConfigService } from '@nestjs/config';

export const AUTH_CONFIG = Symbol('AUTH_CONFIG');

export interface AuthConfig {
  disable: boolean;
  token: string;
}

export const getAuthConfig = (configService: ConfigService): AuthConfig => {
  const disable = configService.get<string>('AUTH_DISABLE') === 'true';
  const token = configService.get<string>('AUTH_TOKEN') || '';

  // Без токена приложение не стартует, пока auth не отключен явно
  if (!disable && token === '') {
    throw new Error('AUTH_TOKEN is required when AUTH_DISABLE is not true');
  }

  return { disable, token };
};
