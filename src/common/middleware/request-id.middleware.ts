import { Injectable, NestMiddleware } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { NextFunction, Request, Response } from 'express';
import * as Sentry from '@sentry/node';

export const REQUEST_ID_HEADER = 'x-request-id';

export const getRequestId = (request: Pick<Request, 'headers'>): string | undefined => {
  const value = request.headers[REQUEST_ID_HEADER];
  return Array.isArray(value) ? value[0] : value;
};

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(
    request: Pick<Request, 'headers'>,
    response: Pick<Response, 'setHeader'>,
    next: NextFunction,
  ): void {
    const requestId = getRequestId(request) || randomUUID();

    request.headers[REQUEST_ID_HEADER] = requestId;
    response.setHeader('X-Request-Id', requestId);
    Sentry.getCurrentScope().setTag('request_id', requestId);

    next();
  }
}
