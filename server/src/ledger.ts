/**
 * Ledger store: expenses, tags and the filtered reads behind the
 * transaction list and dashboard.
 */
import { monthWindow, startOfDay } from '../../src/domain/dates.js';
import { NotFoundError } from '../../src/domain/errors.js';
import { normalizeTags, sortTagNames, tagKey } from '../../src/domain/tags.js';
import {
  isCategory,
  type Category,
  type Expense,
  type ExpenseInput,
  type ListFilter,
  type TagName,
} from '../../src/domain/types.js';
import {
  dateRangeSchema,
  expenseInputSchema,
  isoDate,
  limitSchema,
  parseInput,
} from '../../src/domain/validation.js';
import type { Db, ExpenseRow } from './db.js';
import { buildWhere } from './filters.js';
import { writeTransaction, type RetryOptions } from './retry.js';

export const DEFAULT_LIST_LIMIT = 500;

export interface StoreOptions {
  retry?: RetryOptions;
  /** Clock for created_at */
  now?: () => Date;
}

interface TagLinkRow {
  expense_id: number;
  name: string;
}

export class LedgerStore {
  constructor(
    private readonly db: Db,
    private readonly options: StoreOptions = {},
  ) {}

  insert(input: ExpenseInput): number {
    const data = parseInput(expenseInputSchema, input, 'Invalid expense');
    const tags = normalizeTags(data.tags);
    const createdAt = (this.options.now?.() ?? new Date()).toISOString();

    return this.write(() => {
      const result = this.db.prepare(`
        INSERT INTO expenses (amount_cents, currency, category, note, occurred_at, created_at)
        VALUES (?, 'USD', ?, ?, ?, ?)
      `).run(data.amountMinor, data.category, data.itemName, startOfDay(data.occurredOn), createdAt);

      const id = Number(result.lastInsertRowid);
      this.replaceTags(id, tags);
      return id;
    });
  }

  get(id: number): Expense | null {
    const row = this.db.prepare('SELECT * FROM expenses WHERE id = ?').get(id) as ExpenseRow | undefined;
    if (!row) return null;
    return toExpense(row, this.tagsFor([id]).get(id) ?? []);
  }

  /** Full replace, tags included. Throws NotFoundError for a missing id. */
  update(id: number, input: ExpenseInput): void {
    const data = parseInput(expenseInputSchema, input, 'Invalid expense');
    const tags = normalizeTags(data.tags);

    this.write(() => {
      const result = this.db.prepare(`
        UPDATE expenses
           SET amount_cents = ?, category = ?, note = ?, occurred_at = ?
         WHERE id = ?
      `).run(data.amountMinor, data.category, data.itemName, startOfDay(data.occurredOn), id);

      if (result.changes === 0) throw new NotFoundError('Expense', id);
      this.replaceTags(id, tags);
    });
  }

  /** Idempotent: deleting a missing id does nothing */
  delete(id: number): void {
    this.write(() => {
      this.db.prepare('DELETE FROM expenses WHERE id = ?').run(id);
    });
  }

  listFiltered(filter: ListFilter = {}): Expense[] {
    const dateRange = filter.dateRange
      ? parseInput(dateRangeSchema, filter.dateRange, 'Invalid date range')
      : undefined;
    const limit = parseInput(limitSchema, filter.limit ?? DEFAULT_LIST_LIMIT, 'Invalid limit');

    const where = buildWhere({
      search: filter.search,
      dateRange,
      tag: filter.tag,
      searchTags: true,
    });

    const rows = this.db.prepare(`
      SELECT e.*
      FROM expenses e
      ${where.sql}
      ORDER BY e.occurred_at DESC, e.id DESC
      LIMIT @limit
    `).all({ ...where.params, limit }) as ExpenseRow[];

    return this.withTags(rows);
  }

  /** Every expense, in list order and without a row cap; used by the CSV export */
  listAll(): Expense[] {
    const rows = this.db.prepare(`
      SELECT e.*
      FROM expenses e
      ORDER BY e.occurred_at DESC, e.id DESC
    `).all() as ExpenseRow[];

    return this.withTags(rows);
  }

  /** Every category present, 0 when nothing was spent */
  spentByCategoryForMonth(referenceDate: string): Record<Category, number> {
    const { start, end } = monthWindow(parseInput(isoDate, referenceDate, 'Invalid reference date'));
    const rows = this.db.prepare(`
      SELECT category, COALESCE(SUM(amount_cents), 0) AS spent
      FROM expenses
      WHERE occurred_at >= ? AND occurred_at < ?
      GROUP BY category
    `).all(start, end) as { category: string; spent: number }[];

    const result: Record<Category, number> = { fun: 0, groceries: 0, travel: 0, home: 0, misc: 0 };
    for (const row of rows) {
      if (isCategory(row.category)) result[row.category] = row.spent;
    }
    return result;
  }

  spentTotalForMonth(referenceDate: string): number {
    const { start, end } = monthWindow(parseInput(isoDate, referenceDate, 'Invalid reference date'));
    const row = this.db.prepare(`
      SELECT COALESCE(SUM(amount_cents), 0) AS total
      FROM expenses
      WHERE occurred_at >= ? AND occurred_at < ?
    `).get(start, end) as { total: number };
    return row.total;
  }

  /** Alphabetical, ignoring case */
  allTagNames(limit = DEFAULT_LIST_LIMIT): string[] {
    const rows = this.db.prepare(`
      SELECT name FROM tags
      ORDER BY name_key ASC, id ASC
      LIMIT ?
    `).all(parseInput(limitSchema, limit, 'Invalid limit')) as { name: string }[];
    return rows.map((r) => r.name);
  }

  private write<T>(fn: () => T): T {
    return writeTransaction(this.db, fn, this.options.retry);
  }

  /**
   * Replace an expense's tag set. Tags are get-or-create: INSERT OR IGNORE on
   * the unique key, then re-select, so two writers adding the same new name
   * end up sharing one row. Must run inside a write transaction.
   */
  private replaceTags(expenseId: number, tags: TagName[]): void {
    this.db.prepare('DELETE FROM expense_tags WHERE expense_id = ?').run(expenseId);
    if (tags.length === 0) return;

    const insertTag = this.db.prepare('INSERT OR IGNORE INTO tags (name, name_key) VALUES (?, ?)');
    for (const name of tags) {
      insertTag.run(name, tagKey(name));
    }

    const ids = this.db.prepare(`
      SELECT id FROM tags WHERE name_key IN (SELECT value FROM json_each(?))
    `).all(JSON.stringify(tags.map(tagKey))) as { id: number }[];

    const link = this.db.prepare('INSERT OR IGNORE INTO expense_tags (expense_id, tag_id) VALUES (?, ?)');
    for (const { id } of ids) {
      link.run(expenseId, id);
    }
  }

  private withTags(rows: ExpenseRow[]): Expense[] {
    const tags = this.tagsFor(rows.map((r) => r.id));
    return rows.map((row) => toExpense(row, tags.get(row.id) ?? []));
  }

  private tagsFor(expenseIds: number[]): Map<number, TagName[]> {
    const out = new Map<number, TagName[]>();
    if (expenseIds.length === 0) return out;

    const rows = this.db.prepare(`
      SELECT et.expense_id, t.name
      FROM expense_tags et
      JOIN tags t ON t.id = et.tag_id
      WHERE et.expense_id IN (SELECT value FROM json_each(?))
    `).all(JSON.stringify(expenseIds)) as TagLinkRow[];

    for (const row of rows) {
      const list = out.get(row.expense_id) ?? [];
      list.push(...normalizeTags([row.name]));
      out.set(row.expense_id, list);
    }
    for (const [id, list] of out) {
      out.set(id, sortTagNames(list));
    }
    return out;
  }
}

function toExpense(row: ExpenseRow, tags: TagName[]): Expense {
  if (!isCategory(row.category)) {
    throw new Error(`Expense ${row.id} has unknown category "${row.category}"`);
  }
  return {
    id: row.id,
    amountMinor: row.amount_cents,
    currency: 'USD',
    category: row.category,
    note: row.note,
    occurredAt: row.occurred_at,
    createdAt: row.created_at,
    tags,
  };
}
