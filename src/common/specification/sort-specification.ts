import { Binding } from './field-specification';

export enum OrderByType {
  ASC = 'asc',
  DESC = 'desc',
}

export class UnboundSortDirectionError extends Error {
  constructor(field: string) {
    super(
      `Sort specification for field "${field}" has no direction. Create an instance with newWithDirection() first`,
    );
    this.name = 'UnboundSortDirectionError';
  }
}

/**
 * Сортировка по одному полю. Несколько применяются по порядку;
 * строки с равными ключами идут в том порядке, что вернула БД.
 */
export class SortSpecification {
  constructor(
    readonly field: string,
    readonly binding: Binding<OrderByType> = { bound: false },
  ) {}

  get direction(): OrderByType {
    if (!this.binding.bound) {
      throw new UnboundSortDirectionError(this.field);
    }
    return this.binding.value;
  }

  newWithDirection(direction: OrderByType): SortSpecification {
    return new SortSpecification(this.field, { bound: true, value: direction });
  }
}
