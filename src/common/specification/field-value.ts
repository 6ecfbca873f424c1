/**
 * Читает путь через точку (`building.coordinate.latitude`) из объекта.
 * Отсутствующий сегмент дает `undefined`.
 */
export function readFieldValue(candidate: unknown, path: string): unknown {
  let current: unknown = candidate;

  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }

  return current;
}

// Value objects (PhoneNumber, Date) сравниваются по примитивному значению
export function toComparable(value: unknown): unknown {
  if (value !== null && typeof value === 'object') {
    const primitive: unknown = value.valueOf();
    return typeof primitive === 'object' ? value : primitive;
  }
  return value;
}

// SameValueZero, как у Set в inList: -0 равен 0, NaN равен NaN
export function valuesEqual(left: unknown, right: unknown): boolean {
  const a = toComparable(left);
  const b = toComparable(right);
  return a === b || (a !== a && b !== b);
}

export function compareValues(left: unknown, right: unknown): number {
  const a = toComparable(left);
  const b = toComparable(right);

  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  throw new TypeError(
    `Values are not comparable: ${describeType(a)} and ${describeType(b)}`,
  );
}

export function toValueSet(value: unknown, field: string): Set<unknown> {
  if (!Array.isArray(value)) {
    throw new TypeError(`Field "${field}" is not a list`);
  }
  return new Set(value.map(toComparable));
}

function describeType(value: unknown): string {
  return value === null ? 'null' : typeof value;
}
