import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import { DataSource, EntityManager } from 'typeorm';

/**
 * Хранит EntityManager транзакции текущего запроса.
 * Вне транзакции репозитории работают через менеджер DataSource.
 */
@Injectable()
export class TransactionContext {
  private readonly storage = new AsyncLocalStorage<EntityManager>();

  constructor(private readonly dataSource: DataSource) {}

  get manager(): EntityManager {
    return this.storage.getStore() ?? this.dataSource.manager;
  }

  get isActive(): boolean {
    return this.storage.getStore() !== undefined;
  }

  run<R>(manager: EntityManager, callback: () => R): R {
    return this.storage.run(manager, callback);
  }

  /**
   * Открывает транзакцию, если у текущего запроса ее еще нет.
   */
  async transaction<R>(work: () => Promise<R>): Promise<R> {
    if (this.isActive) {
      return work();
    }
    return this.dataSource.transaction((manager) => this.run(manager, work));
  }
}
