import { CallHandler } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Test, TestingModule } from '@nestjs/testing';
import { defer, lastValueFrom, of, throwError } from 'rxjs';
import { DataSource } from 'typeorm';
import { TransactionContext } from './transaction-context';
import { TransactionInterceptor } from './transaction.interceptor';

describe('TransactionInterceptor', () => {
  let interceptor: TransactionInterceptor;
  let transactionContext: TransactionContext;

  const defaultManager = { name: 'default' };
  const transactionManager = { name: 'transaction' };
  const rolledBack: unknown[] = [];

  // Как DataSource.transaction: rollback и повторный throw при ошибке
  const mockDataSource = {
    manager: defaultManager,
    transaction: jest.fn(async (work: (manager: unknown) => Promise<unknown>) => {
      try {
        return await work(transactionManager);
      } catch (error) {
        rolledBack.push(error);
        throw error;
      }
    }),
  };

  const httpContext = () => new ExecutionContextHost([{}, {}]);

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TransactionInterceptor,
        TransactionContext,
        { provide: DataSource, useValue: mockDataSource },
      ],
    }).compile();

    interceptor = module.get<TransactionInterceptor>(TransactionInterceptor);
    transactionContext = module.get<TransactionContext>(TransactionContext);
  });

  afterEach(() => {
    rolledBack.length = 0;
    jest.clearAllMocks();
  });

  it('should run the handler with the transaction manager', async () => {
    const next: CallHandler<unknown> = {
      handle: () => defer(() => of(transactionContext.manager)),
    };

    const seen = await lastValueFrom(interceptor.intercept(httpContext(), next));

    expect(seen).toBe(transactionManager);
    expect(mockDataSource.transaction).toHaveBeenCalledTimes(1);
  });

  it('should use the default manager outside a request', () => {
    expect(transactionContext.isActive).toBe(false);
    expect(transactionContext.manager).toBe(defaultManager);
  });

  it('should roll back and rethrow when the handler fails', async () => {
    const failure = new Error('link insert failed');
    const next: CallHandler<unknown> = { handle: () => throwError(() => failure) };

    await expect(lastValueFrom(interceptor.intercept(httpContext(), next))).rejects.toBe(
      failure,
    );
    expect(rolledBack).toEqual([failure]);
    expect(transactionContext.manager).toBe(defaultManager);
  });

  it('should reuse the open transaction for nested calls', async () => {
    const inner = await transactionContext.transaction(() =>
      transactionContext.transaction(async () => transactionContext.manager),
    );

    expect(inner).toBe(transactionManager);
    expect(mockDataSource.transaction).toHaveBeenCalledTimes(1);
  });

  it('should pass non-http calls through without a transaction', async () => {
    const context = httpContext();
    context.setType('rpc');
    const next: CallHandler<unknown> = { handle: () => of('done') };

    await expect(lastValueFrom(interceptor.intercept(context, next))).resolves.toBe('done');
    expect(mockDataSource.transaction).not.toHaveBeenCalled();
  });
});
