import { Transform } from 'class-transformer';

/**
 * `?ids=a&ids=b` и `?ids=a,b` приводятся к массиву строк.
 */
export const ToStringArray = () =>
  Transform(({ value }: { value: unknown }) => {
    if (value === undefined || value === null || value === '') {
      return undefined;
    }
    const items: unknown[] = Array.isArray(value) ? value : [value];
    return items
      .flatMap((item) => String(item).split(','))
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  });
