export * from './database.module';
export * from './transaction-context';
export * from './transaction.interceptor';
export * from './typeorm.repository';
