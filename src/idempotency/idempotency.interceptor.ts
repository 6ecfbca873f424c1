import {
  CallHandler,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import { Request, Response } from 'express';
import { mergeMap, Observable, of } from 'rxjs';
import { IDEMPOTENCY_CONFIG, IdempotencyConfig } from '../config/idempotency.config';
import {
  CachedResponse,
  IDEMPOTENCY_HEADER,
  IDEMPOTENT_METHODS,
  idempotencyCacheKey,
} from './idempotency-key';

/**
 * Повтор POST/PUT/PATCH с тем же X-Idempotency-Key и телом
 * получает сохраненный ответ, обработчик не вызывается.
 * Ошибки не кэшируются.
 */
@Injectable()
export class IdempotencyInterceptor implements NestInterceptor {
  private readonly logger = new Logger(IdempotencyInterceptor.name);

  constructor(
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
    @Inject(IDEMPOTENCY_CONFIG) private readonly config: IdempotencyConfig,
  ) {}

  async intercept(
    context: ExecutionContext,
    next: CallHandler<unknown>,
  ): Promise<Observable<unknown>> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const header = request.headers[IDEMPOTENCY_HEADER];
    const idempotencyKey = Array.isArray(header) ? header[0] : header;

    if (!idempotencyKey || !IDEMPOTENT_METHODS.has(request.method)) {
      return next.handle();
    }

    const cacheKey = idempotencyCacheKey(
      request.method,
      request.path,
      request.body,
      idempotencyKey,
    );
    const cached = await this.cache.get<CachedResponse>(cacheKey);

    if (cached) {
      this.logger.debug(`Replaying response for ${request.method} ${request.path}`);
      response.status(cached.statusCode);
      return of(cached.body);
    }

    return next.handle().pipe(
      mergeMap(async (body) => {
        const entry: CachedResponse = { statusCode: response.statusCode, body };
        await this.cache.set(cacheKey, entry, this.config.ttl);
        return body;
      }),
    );
  }
}
