import { EvaluationResult, Specification } from './specification';
import { UnboundSpecificationValueError } from './specification.errors';
import {
  compareValues,
  readFieldValue,
  toComparable,
  toValueSet,
  valuesEqual,
} from './field-value';
import { likePatternToRegExp, toContainsPattern } from './like-pattern';

/**
 * Тип значения для каждого вида предиката.
 */
export interface FieldSpecificationValues {
  equals: unknown;
  notEquals: unknown;
  greaterThan: unknown;
  lessThan: unknown;
  greaterThanOrEquals: unknown;
  lessThanOrEquals: unknown;
  inList: readonly unknown[];
  notInList: readonly unknown[];
  subList: readonly unknown[];
  notSubList: readonly unknown[];
  like: string;
  notLike: string;
  iLike: string;
  notILike: string;
  isNone: boolean;
  isNotNone: boolean;
}

export type FieldSpecificationKind = keyof FieldSpecificationValues;

export type Binding<V> =
  | { readonly bound: false }
  | { readonly bound: true; readonly value: V };

const UNBOUND = { bound: false } as const;

const SPECIFICATION_NAMES: Record<FieldSpecificationKind, string> = {
  equals: 'EqualsSpecification',
  notEquals: 'NotEqualsSpecification',
  greaterThan: 'GreaterThanSpecification',
  lessThan: 'LessThanSpecification',
  greaterThanOrEquals: 'GreaterThanOrEqualsToSpecification',
  lessThanOrEquals: 'LessThanOrEqualsToSpecification',
  inList: 'InListSpecification',
  notInList: 'NotInListSpecification',
  subList: 'SubListSpecification',
  notSubList: 'NotSubListSpecification',
  like: 'LikeSpecification',
  notLike: 'NotLikeSpecification',
  iLike: 'ILikeSpecification',
  notILike: 'NotILikeSpecification',
  isNone: 'IsNoneSpecification',
  isNotNone: 'IsNotNoneSpecification',
};

const DESCRIPTIONS: Record<FieldSpecificationKind, string> = {
  equals: 'Matches when field == value.',
  notEquals: 'Matches when field != value.',
  greaterThan: 'Matches when field > value.',
  lessThan: 'Matches when field < value.',
  greaterThanOrEquals: 'Matches when field >= value.',
  lessThanOrEquals: 'Matches when field <= value.',
  inList: 'Matches when field is in value.',
  notInList: 'Matches when field is not in value.',
  subList: 'Matches when every item of value is in field.',
  notSubList: 'Matches when some item of value is not in field.',
  like: 'Matches when field contains value (case-sensitive).',
  notLike: 'Matches when LikeSpecification does not match.',
  iLike: 'Matches when field contains value (case-insensitive).',
  notILike: 'Matches when ILikeSpecification does not match.',
  isNone: 'True means field must be empty; false means field must be set.',
  isNotNone: 'True means field must be set; false means field must be empty.',
};

/**
 * Предикат по одному полю (путь может быть через точку). Объявляется
 * один раз шаблоном без значения, значение подставляет `newWithValue`.
 */
export class FieldSpecification<
  K extends FieldSpecificationKind = FieldSpecificationKind,
> extends Specification<unknown> {
  constructor(
    readonly kind: K,
    readonly field: string,
    readonly binding: Binding<FieldSpecificationValues[K]> = UNBOUND,
  ) {
    super();
  }

  get name(): string {
    return SPECIFICATION_NAMES[this.kind];
  }

  get description(): string {
    return DESCRIPTIONS[this.kind];
  }

  get isBound(): boolean {
    return this.binding.bound;
  }

  get value(): FieldSpecificationValues[K] {
    if (!this.binding.bound) {
      throw new UnboundSpecificationValueError(this.name, this.field);
    }
    return this.binding.value;
  }

  newWithValue(value: FieldSpecificationValues[K]): FieldSpecification<K> {
    return new FieldSpecification(this.kind, this.field, {
      bound: true,
      value,
    });
  }

  evaluate(candidate: unknown): EvaluationResult {
    const actual = readFieldValue(candidate, this.field);
    return this.result(matches(this.kind, this.value, actual, this.field));
  }
}

export type AnyFieldSpecification = {
  [K in FieldSpecificationKind]: FieldSpecification<K>;
}[FieldSpecificationKind];

function matches(
  kind: FieldSpecificationKind,
  value: unknown,
  actual: unknown,
  field: string,
): boolean {
  switch (kind) {
    case 'equals':
      return valuesEqual(actual, value);
    case 'notEquals':
      return !valuesEqual(actual, value);
    case 'greaterThan':
      return compareValues(actual, value) > 0;
    case 'lessThan':
      return compareValues(actual, value) < 0;
    case 'greaterThanOrEquals':
      return compareValues(actual, value) >= 0;
    case 'lessThanOrEquals':
      return compareValues(actual, value) <= 0;
    case 'inList':
      return toValueSet(value, 'value').has(toComparable(actual));
    case 'notInList':
      return !toValueSet(value, 'value').has(toComparable(actual));
    case 'subList':
      return isSubset(value, actual, field);
    case 'notSubList':
      return !isSubset(value, actual, field);
    case 'like':
      return likeMatches(value, actual, false);
    case 'notLike':
      return !likeMatches(value, actual, false);
    case 'iLike':
      return likeMatches(value, actual, true);
    case 'notILike':
      return !likeMatches(value, actual, true);
    case 'isNone':
      return value ? actual == null : actual != null;
    case 'isNotNone':
      return value ? actual != null : actual == null;
  }
}

function isSubset(value: unknown, actual: unknown, field: string): boolean {
  const available = toValueSet(actual, field);
  for (const item of toValueSet(value, 'value')) {
    if (!available.has(item)) {
      return false;
    }
  }
  return true;
}

function likeMatches(
  value: unknown,
  actual: unknown,
  caseInsensitive: boolean,
): boolean {
  if (typeof value !== 'string') {
    throw new TypeError('LIKE value must be a string');
  }
  if (typeof actual !== 'string') {
    return false;
  }
  return likePatternToRegExp(toContainsPattern(value), caseInsensitive).test(
    actual,
  );
}

// Шаблоны без значения; связываются через newWithValue()
export const Equals = (field: string) => new FieldSpecification('equals', field);
export const NotEquals = (field: string) =>
  new FieldSpecification('notEquals', field);
export const GreaterThan = (field: string) =>
  new FieldSpecification('greaterThan', field);
export const LessThan = (field: string) =>
  new FieldSpecification('lessThan', field);
export const GreaterThanOrEquals = (field: string) =>
  new FieldSpecification('greaterThanOrEquals', field);
export const LessThanOrEquals = (field: string) =>
  new FieldSpecification('lessThanOrEquals', field);
export const InList = (field: string) => new FieldSpecification('inList', field);
export const NotInList = (field: string) =>
  new FieldSpecification('notInList', field);
export const SubList = (field: string) =>
  new FieldSpecification('subList', field);
export const NotSubList = (field: string) =>
  new FieldSpecification('notSubList', field);
export const Like = (field: string) => new FieldSpecification('like', field);
export const NotLike = (field: string) =>
  new FieldSpecification('notLike', field);
export const ILike = (field: string) => new FieldSpecification('iLike', field);
export const NotILike = (field: string) =>
  new FieldSpecification('notILike', field);
export const IsNone = (field: string) => new FieldSpecification('isNone', field);
export const IsNotNone = (field: string) =>
  new FieldSpecification('isNotNone', field);
