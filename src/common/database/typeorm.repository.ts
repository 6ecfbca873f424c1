import {
  EntityTarget,
  ObjectLiteral,
  Repository,
  SelectQueryBuilder,
} from 'typeorm';
import { NO_PAGINATION, Page, PaginationInfo } from '../pagination/page';
import {
  AnyFieldSpecification,
  QueryFilter,
  SortSpecification,
  applyFilters,
  applySortSpecifications,
  applySpecifications,
} from '../specification';
import { TransactionContext } from './transaction-context';

export type Filters = readonly QueryFilter<unknown>[];
export type Specifications = readonly AnyFieldSpecification[];
export type SortSpecifications = readonly SortSpecification[];

/**
 * Базовый репозиторий: доменная сущность `E` хранится в TypeORM-модели `M`
 * с первичным ключом `id`. Наследники описывают только маппинг.
 *
 * Ошибки базы данных пробрасываются как есть.
 */
export abstract class TypeOrmRepository<
  E,
  M extends ObjectLiteral,
  ID extends string = string,
> {
  protected abstract readonly model: EntityTarget<M>;
  protected abstract readonly alias: string;

  constructor(protected readonly transactionContext: TransactionContext) {}

  protected abstract toModel(entity: E): M;
  protected abstract toEntity(model: M): E;

  /** Догружает данные, которые не лежат в строке модели */
  protected async hydrate(entities: E[]): Promise<E[]> {
    return entities;
  }

  protected get repository(): Repository<M> {
    return this.transactionContext.manager.getRepository(this.model);
  }

  protected createQuery(): SelectQueryBuilder<M> {
    return this.repository.createQueryBuilder(this.alias);
  }

  async create(entity: E): Promise<E> {
    return this.persist(entity);
  }

  async update(entity: E): Promise<E> {
    return this.persist(entity);
  }

  async getById(id: ID): Promise<E | null> {
    const model = await this.createQuery()
      .where(`${this.alias}.id = :id`, { id })
      .getOne();

    if (!model) {
      return null;
    }
    const [entity] = await this.hydrate([this.toEntity(model)]);
    return entity;
  }

  async delete(id: ID): Promise<void> {
    await this.repository.delete(id);
  }

  async getList(
    pagination: PaginationInfo = NO_PAGINATION,
    specifications: Specifications = [],
    sortSpecifications: SortSpecifications = [],
    filters: Filters = [],
  ): Promise<E[]> {
    const query = this.buildQuery(specifications, filters);
    applySortSpecifications(query, sortSpecifications);

    if (pagination.perPage > 0) {
      if (!Number.isInteger(pagination.page) || pagination.page < 1) {
        throw new RangeError(`Page must be a positive integer, got ${pagination.page}`);
      }
      if (!Number.isInteger(pagination.perPage)) {
        throw new RangeError(`Page size must be an integer, got ${pagination.perPage}`);
      }
      query.offset((pagination.page - 1) * pagination.perPage).limit(pagination.perPage);
    }

    const models = await query.getMany();
    return this.hydrate(models.map((model) => this.toEntity(model)));
  }

  async getCount(
    specifications: Specifications = [],
    filters: Filters = [],
  ): Promise<number> {
    return this.buildQuery(specifications, filters).getCount();
  }

  async getPage(
    pagination: PaginationInfo,
    specifications: Specifications = [],
    sortSpecifications: SortSpecifications = [],
    filters: Filters = [],
  ): Promise<Page<E>> {
    const items = await this.getList(pagination, specifications, sortSpecifications, filters);
    const total = await this.getCount(specifications, filters);

    return new Page(items, total, pagination.page, pagination.perPage);
  }

  private buildQuery(
    specifications: Specifications,
    filters: Filters,
  ): SelectQueryBuilder<M> {
    const query = this.createQuery();
    applySpecifications(query, specifications);
    return applyFilters(query, filters);
  }

  private async persist(entity: E): Promise<E> {
    const saved = await this.repository.save(this.toModel(entity));
    const [hydrated] = await this.hydrate([this.toEntity(saved)]);
    return hydrated;
  }
}
