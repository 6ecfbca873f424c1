import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import * as Sentry from '@sentry/node';
import {
  AdditionalInfo,
  DomainException,
  UnknownException,
} from '../exceptions/domain.exception';
import { getRequestId } from '../middleware/request-id.middleware';

export interface ErrorResponseBody {
  errorCode: string;
  detail: string;
  eventId: string | null;
  additionalInfo: AdditionalInfo;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const context = host.switchToHttp();
    const request = context.getRequest<Request>();
    const response = context.getResponse<Response>();
    const requestId = getRequestId(request) ?? null;

    const { status, body } = this.toErrorResponse(exception, request, requestId);
    response.status(status).json(body);
  }

  toErrorResponse(
    exception: unknown,
    request: Pick<Request, 'method' | 'originalUrl'>,
    requestId: string | null,
  ): { status: number; body: ErrorResponseBody } {
    if (exception instanceof DomainException) {
      return {
        status: exception.getStatus(),
        body: {
          errorCode: exception.errorCode,
          detail: exception.detail,
          eventId: requestId,
          additionalInfo: exception.additionalInfo,
        },
      };
    }

    if (exception instanceof HttpException) {
      return {
        status: exception.getStatus(),
        body: {
          errorCode: exception.name,
          detail: exception.message,
          eventId: requestId,
          additionalInfo: validationMessages(exception.getResponse()),
        },
      };
    }

    const unknown = new UnknownException();
    this.logger.error(
      `Unhandled error on ${request.method} ${request.originalUrl} (request ${requestId})`,
      exception instanceof Error ? exception.stack : String(exception),
    );
    const sentryEventId = Sentry.captureException(exception, {
      tags: requestId ? { request_id: requestId } : undefined,
    });

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        errorCode: unknown.errorCode,
        detail: unknown.detail,
        eventId: requestId ?? sentryEventId,
        additionalInfo: {},
      },
    };
  }
}

// ValidationPipe (см. main.ts) кладет список ошибок в response.messages
function validationMessages(response: string | object): AdditionalInfo {
  if (typeof response !== 'object' || !('messages' in response)) {
    return {};
  }
  const { messages } = response;
  return Array.isArray(messages) ? { messages } : {};
}
