import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { defer, lastValueFrom, Observable } from 'rxjs';
import { TransactionContext } from './transaction-context';

/**
 * Одна транзакция на HTTP-запрос: commit при успехе,
 * rollback при любом исключении из обработчика.
 */
@Injectable()
export class TransactionInterceptor implements NestInterceptor {
  constructor(private readonly transactionContext: TransactionContext) {}

  intercept(
    context: ExecutionContext,
    next: CallHandler<unknown>,
  ): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    return defer(() =>
      this.transactionContext.transaction(() =>
        lastValueFrom(next.handle(), { defaultValue: undefined }),
      ),
    );
  }
}
