import { BadRequestException } from '@nestjs/common';
import { AnyFieldSpecification } from './field-specification';
import { OrderByType, SortSpecification } from './sort-specification';

export interface SpecificationBinding<Q> {
  bind(query: Q): AnyFieldSpecification | undefined;
}

/**
 * Связывает поля query-DTO с шаблонами спецификаций.
 * Если поля нет в запросе, привязка пропускается.
 *
 * @example
 * const field = fieldBinder<BuildingListQueryDto>();
 * const bindings = [field('ids', (ids) => ID_IN.newWithValue(ids))];
 */
export const fieldBinder =
  <Q>() =>
  <K extends keyof Q>(
    key: K,
    toSpecification: (value: NonNullable<Q[K]>) => AnyFieldSpecification,
  ): SpecificationBinding<Q> => ({
    bind(query: Q) {
      const value = query[key];
      if (value == null) {
        return undefined;
      }
      return toSpecification(value);
    },
  });

export function bindSpecifications<Q>(
  query: Q,
  bindings: readonly SpecificationBinding<Q>[],
): AnyFieldSpecification[] {
  const specifications: AnyFieldSpecification[] = [];
  for (const binding of bindings) {
    const specification = binding.bind(query);
    if (specification) {
      specifications.push(specification);
    }
  }
  return specifications;
}

/** Шаблоны сортировки: ключ - имя параметра в `sort`, значение - поле сущности */
export const sortTemplates = (
  fields: Record<string, string>,
): ReadonlyMap<string, SortSpecification> =>
  new Map(
    Object.entries(fields).map(([parameter, field]) => [
      parameter,
      new SortSpecification(field),
    ]),
  );

/**
 * Разбирает элементы `field:asc|desc`. Неизвестное поле или направление дает 400.
 */
export function bindSortSpecifications(
  values: readonly string[] | undefined,
  templates: ReadonlyMap<string, SortSpecification>,
): SortSpecification[] {
  if (!values) {
    return [];
  }

  return values.map((value) => {
    const [parameter, direction = OrderByType.ASC, ...rest] = value.split(':');
    const template = templates.get(parameter);

    if (!template || rest.length > 0) {
      throw new BadRequestException(
        `Unsupported sort "${value}". Allowed fields: ${[...templates.keys()].join(', ')}`,
      );
    }
    if (direction !== OrderByType.ASC && direction !== OrderByType.DESC) {
      throw new BadRequestException(
        `Unsupported sort direction "${direction}", expected asc or desc`,
      );
    }

    return template.newWithDirection(direction);
  });
}
