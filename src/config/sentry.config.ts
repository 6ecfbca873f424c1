import * as Sentry from '@sentry/node';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';

const SCRUBBED_HEADERS = ['authorization', 'cookie', 'x-idempotency-key'];

/**
 * Sentry получает только необработанные ошибки: AllExceptionsFilter
 * отдает доменные исключения клиенту и в Sentry их не отправляет.
 */
export const initializeSentry = (configService: ConfigService): void => {
  const dsn = configService.get<string>('SENTRY_DSN');
  if (!dsn) {
    new Logger('Sentry').warn('SENTRY_DSN is empty, error reporting is off');
    return;
  }

  const environment = configService.get<string>('NODE_ENV') || 'development';
  Sentry.init({
    dsn,
    environment,
    release: configService.get<string>('npm_package_version'),
    tracesSampleRate: environment === 'production' ? 0.1 : 1.0,
    sendDefaultPii: false,
    initialScope: { tags: { service: 'org-directory-api' } },
    beforeSend(event) {
      const headers = event.request?.headers;
      if (headers) {
        for (const header of SCRUBBED_HEADERS) {
          delete headers[header];
        }
      }
      return event;
    },
  });
};
