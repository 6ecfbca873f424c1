import { ConfigService } from '@nestjs/config';

export const IDEMPOTENCY_CONFIG = Symbol('IDEMPOTENCY_CONFIG');

const FIVE_MINUTES = 5 * 60 * 1000;

export interface IdempotencyConfig {
  /** TTL сохраненного ответа, мс */
  ttl: number;
}

export const getIdempotencyConfig = (
  configService: ConfigService,
): IdempotencyConfig => {
  const ttl = parseInt(configService.get<string>('IDEMPOTENCY_TTL') || '', 10);

  return { ttl: Number.isInteger(ttl) && ttl > 0 ? ttl : FIVE_MINUTES };
};
