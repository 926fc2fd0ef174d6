import type { SearchFilter } from '../../types/index.js';

export type SqlParam = string | number;

export interface SearchClause {
  where: string;
  params: SqlParam[];
}

type MatchKind = 'contains' | 'equals' | 'atLeast' | 'atMost';

export interface SearchCriterion {
  field: keyof SearchFilter;
  column: 'country' | 'method' | 'status' | 'kind' | 'fee_percent';
  match: MatchKind;
}

/**
 * Declared criteria, one clause each. Adding a criterion means adding a row
 * here; the builder itself does not change.
 */
export const SEARCH_CRITERIA: readonly SearchCriterion[] = [
  { field: 'country', column: 'country', match: 'contains' },
  { field: 'method', column: 'method', match: 'contains' },
  { field: 'status', column: 'status', match: 'equals' },
  { field: 'kind', column: 'kind', match: 'equals' },
  { field: 'minFeePercent', column: 'fee_percent', match: 'atLeast' },
  { field: 'maxFeePercent', column: 'fee_percent', match: 'atMost' },
];

/**
 * Name of the SQL function registered on every connection for
 * case folding. SQLite's LOWER() only folds ASCII.
 */
export const CASEFOLD_FUNCTION = 'casefold';

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function presentText(value: SearchFilter[keyof SearchFilter]): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function presentNumber(value: SearchFilter[keyof SearchFilter]): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Builds the WHERE clause for a search. Absent criteria add nothing, so the
 * base is the identity predicate. Values are only ever bound, never spliced
 * into the SQL text.
 */
export function buildSearchClause(
  filter: SearchFilter,
  criteria: readonly SearchCriterion[] = SEARCH_CRITERIA,
): SearchClause {
  const clauses: string[] = [];
  const params: SqlParam[] = [];

  for (const { field, column, match } of criteria) {
    const value = filter[field];

    switch (match) {
      case 'contains': {
        const text = presentText(value);
        if (text === undefined) continue;
        clauses.push(`${CASEFOLD_FUNCTION}(${column}) LIKE ? ESCAPE '\\'`);
        params.push(`%${escapeLike(text.toLowerCase())}%`);
        break;
      }
      case 'equals': {
        const text = presentText(value);
        if (text === undefined) continue;
        clauses.push(`${column} = ?`);
        params.push(text);
        break;
      }
      case 'atLeast':
      case 'atMost': {
        const bound = presentNumber(value);
        if (bound === undefined) continue;
        clauses.push(`${column} ${match === 'atLeast' ? '>=' : '<='} ?`);
        params.push(bound);
        break;
      }
    }
  }

  return {
    where: clauses.length > 0 ? clauses.join(' AND ') : '1 = 1',
    params,
  };
}
