/**
 * `perPage` 0 означает выборку без limit/offset.
 */
export interface PaginationInfo {
  page: number;
  perPage: number;
}

export const NO_PAGINATION: PaginationInfo = { page: 1, perPage: 0 };

export class Page<T> {
  constructor(
    readonly items: T[],
    readonly total: number,
    readonly page: number,
    readonly perPage: number,
  ) {}

  get pages(): number {
    return this.perPage > 0 ? Math.ceil(this.total / this.perPage) : 0;
  }

  get hasPrev(): boolean {
    return this.page > 1;
  }

  get hasNext(): boolean {
    return this.page < this.pages;
  }
}
