export { OfferStore, DEFAULT_RECENT_LIMIT, DEFAULT_SEARCH_LIMIT } from './offer-store.js';
export type { InitReport } from './offer-store.js';
export { buildSearchClause, escapeLike, SEARCH_CRITERIA } from './filter-builder.js';
export type { SearchClause, SearchCriterion, SqlParam } from './filter-builder.js';
export { COLUMN_MIGRATIONS, applyColumnMigrations, listColumns } from './schema.js';
export type { ColumnMigration } from './schema.js';
