import { rangeBounds } from '../../src/domain/dates.js';
import { tagKey } from '../../src/domain/tags.js';
import type { DateRange } from '../../src/domain/types.js';

export type SqlParams = Record<string, string | number>;

export interface ExpenseFilter {
  search?: string;
  dateRange?: DateRange;
  tag?: string;
  /** Whether search also looks at tag names (the transaction list does, analytics does not) */
  searchTags?: boolean;
}

export interface WhereClause {
  sql: string;   // "WHERE …" or ""
  params: SqlParams;
}

/** Escape LIKE wildcards so the search text matches literally */
export function likePattern(text: string): string {
  return `%${text.toLowerCase().replace(/[!%_]/g, '!$&')}%`;
}

const TAG_JOIN = `SELECT 1 FROM expense_tags et JOIN tags t ON t.id = et.tag_id WHERE et.expense_id = e.id`;

/** WHERE clause over the `expenses e` alias */
export function buildWhere(filter: ExpenseFilter): WhereClause {
  const parts: string[] = [];
  const params: SqlParams = {};

  const q = (filter.search ?? '').trim();
  if (q) {
    params.q = likePattern(q);
    const fields = [
      `LOWER(e.note) LIKE @q ESCAPE '!'`,
      `LOWER(e.category) LIKE @q ESCAPE '!'`,
    ];
    if (filter.searchTags) {
      fields.push(`EXISTS (${TAG_JOIN} AND t.name_key LIKE @q ESCAPE '!')`);
    }
    parts.push(`(${fields.join(' OR ')})`);
  }

  const { start, end } = rangeBounds(filter.dateRange);
  if (start) {
    params.start = start;
    parts.push('e.occurred_at >= @start');
  }
  if (end) {
    params.end = end;
    parts.push('e.occurred_at < @end');
  }

  const tag = (filter.tag ?? '').trim();
  if (tag) {
    params.tagKey = tagKey(tag);
    parts.push(`EXISTS (${TAG_JOIN} AND t.name_key = @tagKey)`);
  }

  return { sql: parts.length ? `WHERE ${parts.join(' AND ')}` : '', params };
}
