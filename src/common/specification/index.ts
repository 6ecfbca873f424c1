export * from './specification';
export * from './specification.errors';
export * from './field-specification';
export * from './sort-specification';
export * from './query-filter';
export * from './like-pattern';
export * from './typeorm-translator';
export * from './bind-specifications';
