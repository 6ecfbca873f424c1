import { ObjectLiteral, SelectQueryBuilder } from 'typeorm';

/**
 * Условие, которое не выражается одной field-спецификацией
 * (join, подзапрос, рекурсивный CTE).
 *
 * `key` уникален в пределах запроса: из него строятся имена
 * параметров и алиасов, чтобы два фильтра не конфликтовали.
 */
export abstract class QueryFilter<V> {
  constructor(readonly value: V) {}

  abstract apply<M extends ObjectLiteral>(
    query: SelectQueryBuilder<M>,
    key: string,
  ): SelectQueryBuilder<M>;
}
