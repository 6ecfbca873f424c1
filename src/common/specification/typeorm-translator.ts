import { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import { AnyFieldSpecification } from './field-specification';
import { readFieldValue } from './field-value';
import { toContainsPattern } from './like-pattern';
import { QueryFilter } from './query-filter';
import { OrderByType, SortSpecification } from './sort-specification';
import { UnsupportedSpecificationError } from './specification.errors';

export interface WhereFragment {
  sql: string;
  parameters: ObjectLiteral;
}

export interface OrderByClause {
  column: string;
  order: 'ASC' | 'DESC';
}

// Поля с точкой ссылаются на алиас join-а, остальные на основную таблицу
export const resolveColumn = (alias: string, field: string): string =>
  field.includes('.') ? field : `${alias}.${field}`;

/**
 * Превращает связанную спецификацию в параметризованный фрагмент WHERE.
 * Новый kind в `FieldSpecificationValues` без case здесь не скомпилируется.
 */
export function toWhereFragment(
  specification: AnyFieldSpecification,
  alias: string,
  parameterName: string,
): WhereFragment {
  const column = resolveColumn(alias, specification.field);
  const parameter = `:${parameterName}`;

  switch (specification.kind) {
    case 'equals':
      if (specification.value === null) {
        return { sql: `${column} IS NULL`, parameters: {} };
      }
      return fragment(`${column} = ${parameter}`, parameterName, specification.value);
    case 'notEquals':
      if (specification.value === null) {
        return { sql: `${column} IS NOT NULL`, parameters: {} };
      }
      return fragment(`${column} != ${parameter}`, parameterName, specification.value);
    case 'greaterThan':
      return fragment(`${column} > ${parameter}`, parameterName, specification.value);
    case 'lessThan':
      return fragment(`${column} < ${parameter}`, parameterName, specification.value);
    case 'greaterThanOrEquals':
      return fragment(`${column} >= ${parameter}`, parameterName, specification.value);
    case 'lessThanOrEquals':
      return fragment(`${column} <= ${parameter}`, parameterName, specification.value);
    case 'inList':
      // IN () недопустим в PostgreSQL
      if (specification.value.length === 0) {
        return { sql: '1 = 0', parameters: {} };
      }
      return fragment(
        `${column} IN (:...${parameterName})`,
        parameterName,
        [...specification.value],
      );
    case 'notInList':
      if (specification.value.length === 0) {
        return { sql: '1 = 1', parameters: {} };
      }
      return fragment(
        `${column} NOT IN (:...${parameterName})`,
        parameterName,
        [...specification.value],
      );
    case 'subList':
      return fragment(`${column} @> ${parameter}`, parameterName, [
        ...specification.value,
      ]);
    case 'notSubList':
      return fragment(`NOT (${column} @> ${parameter})`, parameterName, [
        ...specification.value,
      ]);
    case 'like':
      return fragment(
        `${column} LIKE ${parameter}`,
        parameterName,
        toContainsPattern(specification.value),
      );
    case 'notLike':
      return fragment(
        `${column} NOT LIKE ${parameter}`,
        parameterName,
        toContainsPattern(specification.value),
      );
    case 'iLike':
      return fragment(
        `${column} ILIKE ${parameter}`,
        parameterName,
        toContainsPattern(specification.value),
      );
    case 'notILike':
      return fragment(
        `${column} NOT ILIKE ${parameter}`,
        parameterName,
        toContainsPattern(specification.value),
      );
    case 'isNone':
      return {
        sql: specification.value ? `${column} IS NULL` : `${column} IS NOT NULL`,
        parameters: {},
      };
    case 'isNotNone':
      return {
        sql: specification.value ? `${column} IS NOT NULL` : `${column} IS NULL`,
        parameters: {},
      };
    default:
      return unsupported(specification);
  }
}

export function toOrderBy(
  sortSpecification: SortSpecification,
  alias: string,
): OrderByClause {
  return {
    column: resolveColumn(alias, sortSpecification.field),
    order: sortSpecification.direction === OrderByType.ASC ? 'ASC' : 'DESC',
  };
}

export function applySpecifications<M extends ObjectLiteral>(
  query: SelectQueryBuilder<M>,
  specifications: readonly AnyFieldSpecification[],
): SelectQueryBuilder<M> {
  specifications.forEach((specification, index) => {
    const { sql, parameters } = toWhereFragment(
      specification,
      query.alias,
      `spec_${index}`,
    );
    query.andWhere(sql, parameters);
  });
  return query;
}

export function applySortSpecifications<M extends ObjectLiteral>(
  query: SelectQueryBuilder<M>,
  sortSpecifications: readonly SortSpecification[],
): SelectQueryBuilder<M> {
  for (const sortSpecification of sortSpecifications) {
    const { column, order } = toOrderBy(sortSpecification, query.alias);
    query.addOrderBy(column, order);
  }
  return query;
}

export function applyFilters<M extends ObjectLiteral>(
  query: SelectQueryBuilder<M>,
  filters: readonly QueryFilter<unknown>[],
): SelectQueryBuilder<M> {
  return filters.reduce(
    (current, filter, index) => filter.apply(current, `filter_${index}`),
    query,
  );
}

function fragment(
  sql: string,
  parameterName: string,
  value: unknown,
): WhereFragment {
  return { sql, parameters: { [parameterName]: value } };
}

function unsupported(specification: never): never {
  throw new UnsupportedSpecificationError(
    String(readFieldValue(specification, 'kind')),
  );
}
