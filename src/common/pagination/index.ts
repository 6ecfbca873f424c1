export * from './page';
export * from './page-response';
export * from './pagination-query.dto';
