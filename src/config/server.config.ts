import { ConfigService } from '@nestjs/config';

export interface ServerConfig {
  port: number;
  corsOrigins: string[] | '*';
}

export const getServerConfig = (configService: ConfigService): ServerConfig => {
  const origins = (configService.get<string>('CORS_ORIGINS') || '*')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: parseInt(configService.get<string>('PORT') || '3001', 10),
    corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
  };
};
