import { Page } from './page';

export interface PageResponse<R> {
  items: R[];
  totalItems: number;
  totalPages: number;
  page: number;
  perPage: number;
  hasPrev: boolean;
  hasNext: boolean;
}

export function toPageResponse<T, R>(
  page: Page<T>,
  mapItem: (item: T) => R,
): PageResponse<R> {
  return {
    items: page.items.map(mapItem),
    totalItems: page.total,
    totalPages: page.pages,
    page: page.page,
    perPage: page.perPage,
    hasPrev: page.hasPrev,
    hasNext: page.hasNext,
  };
}
