import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { TransactionContext } from './transaction-context';
import { TransactionInterceptor } from './transaction.interceptor';

@Global()
@Module({
  providers: [
    TransactionContext,
    {
      provide: APP_INTERCEPTOR,
      useClass: TransactionInterceptor,
    },
  ],
  exports: [TransactionContext],
})
export class DatabaseModule {}
