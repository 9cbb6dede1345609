/**
 * Aggregation engine: time-bucketed rollups over the ledger for the
 * dashboard and trend charts. Every amount is in cents.
 *
 * Buckets are string keys derived from occurred_at (YYYY-MM, YYYY-Www) whose
 * lexical order is chronological, so "most recent N" is ORDER BY key DESC
 * LIMIT N and the result is reversed for display.
 */
import { budgetStatus, savingsRate, spendingBudget } from '../../src/domain/computations.js';
import { monthOf, today } from '../../src/domain/dates.js';
import { divideHalfEven } from '../../src/domain/money.js';
import { tagKey } from '../../src/domain/tags.js';
import {
  isCategory,
  type BudgetSummary,
  type DateRange,
  type KpiMetrics,
  type MonthCategoryTotal,
  type MonthTagTotal,
  type MonthTotal,
  type SavingsRatePoint,
  type TagTotal,
  type WeekTotal,
} from '../../src/domain/types.js';
import { dateRangeSchema, isoDate, limitSchema, parseInput } from '../../src/domain/validation.js';
import type { Db } from './db.js';
import { buildWhere, type WhereClause } from './filters.js';
import type { LedgerStore } from './ledger.js';
import type { SettingsStore } from './settings.js';

export interface AnalyticsFilter {
  dateRange?: DateRange;
  search?: string;
}

const MONTH_KEY = 'substr(e.occurred_at, 1, 7)';
const WEEK_KEY = `strftime('%Y-W%W', e.occurred_at)`;

interface BucketRow {
  bucket: string;
  total: number;
}

function andWhere(where: WhereClause, condition: string): string {
  return where.sql ? `${where.sql} AND ${condition}` : `WHERE ${condition}`;
}

export class Analytics {
  constructor(
    private readonly db: Db,
    private readonly ledger: LedgerStore,
    private readonly settings: SettingsStore,
  ) {}

  /** Most recent `limit` months that have data, oldest first */
  monthlyTotals(limit = 6, filter: AnalyticsFilter = {}): MonthTotal[] {
    const where = this.where(filter);
    const rows = this.db.prepare(`
      SELECT ${MONTH_KEY} AS bucket, COALESCE(SUM(e.amount_cents), 0) AS total
      FROM expenses e
      ${where.sql}
      GROUP BY bucket
      ORDER BY bucket DESC
      LIMIT @limit
    `).all({ ...where.params, limit: checkLimit(limit) }) as BucketRow[];

    return rows.reverse().map((r) => ({ yearMonth: r.bucket, totalMinor: r.total }));
  }

  /** Monday-first week buckets (%W), oldest first */
  weeklyTotals(limit = 10): WeekTotal[] {
    const rows = this.db.prepare(`
      SELECT ${WEEK_KEY} AS bucket, COALESCE(SUM(e.amount_cents), 0) AS total
      FROM expenses e
      GROUP BY bucket
      ORDER BY bucket DESC
      LIMIT @limit
    `).all({ limit: checkLimit(limit) }) as BucketRow[];

    return rows.reverse().map((r) => ({ yearWeek: r.bucket, totalMinor: r.total }));
  }

  /**
   * Per-category totals within the most recent `limitMonths` months with
   * data. The months are picked first; a category with no spend in a month
   * is absent rather than zero.
   */
  monthlyCategoryTotals(limitMonths = 6, dateRange?: DateRange): MonthCategoryTotal[] {
    const where = this.where({ dateRange });
    const rows = this.db.prepare(`
      WITH months AS (
        SELECT ${MONTH_KEY} AS ym
        FROM expenses e
        ${where.sql}
        GROUP BY ym
        ORDER BY ym DESC
        LIMIT @limit
      )
      SELECT ${MONTH_KEY} AS ym, e.category AS category, SUM(e.amount_cents) AS total
      FROM expenses e
      ${andWhere(where, `${MONTH_KEY} IN (SELECT ym FROM months)`)}
      GROUP BY ym, e.category
      ORDER BY ym ASC, e.category ASC
    `).all({ ...where.params, limit: checkLimit(limitMonths) }) as { ym: string; category: string; total: number }[];

    const out: MonthCategoryTotal[] = [];
    for (const r of rows) {
      if (isCategory(r.category)) {
        out.push({ yearMonth: r.ym, category: r.category, totalMinor: r.total });
      }
    }
    return out;
  }

  /** avgMinor is the mean rounded half to even */
  kpiMetrics(filter: AnalyticsFilter = {}): KpiMetrics {
    const where = this.where(filter);
    const row = this.db.prepare(`
      SELECT COALESCE(SUM(e.amount_cents), 0) AS total,
             COUNT(*) AS count,
             MIN(e.occurred_at) AS first,
             MAX(e.occurred_at) AS last
      FROM expenses e
      ${where.sql}
    `).get(where.params) as { total: number; count: number; first: string | null; last: string | null };

    return {
      totalMinor: row.total,
      transactionCount: row.count,
      avgMinor: divideHalfEven(row.total, row.count),
      firstDate: row.first ? row.first.slice(0, 10) : null,
      lastDate: row.last ? row.last.slice(0, 10) : null,
    };
  }

  /**
   * (income − spent) / income for each recent month, income being the
   * configured monthly total. Empty when there is no income to divide by.
   */
  monthlySavingsRate(limit = 6): SavingsRatePoint[] {
    const settings = this.settings.get();
    const income = settings.income1Minor + settings.income2Minor;
    if (income <= 0) return [];

    const out: SavingsRatePoint[] = [];
    for (const month of this.monthlyTotals(limit)) {
      const rate = savingsRate(income, month.totalMinor);
      if (rate === null) continue;
      out.push({
        yearMonth: month.yearMonth,
        savingsRatePct: rate,
        spentMinor: month.totalMinor,
        incomeMinor: income,
      });
    }
    return out;
  }

  /** Monthly spend for one tag, matched case-insensitively and exactly */
  tagSpendingOverTime(tagName: string, limitMonths = 12): MonthTotal[] {
    const rows = this.db.prepare(`
      SELECT ${MONTH_KEY} AS bucket, COALESCE(SUM(e.amount_cents), 0) AS total
      FROM expenses e
      JOIN expense_tags et ON et.expense_id = e.id
      JOIN tags t ON t.id = et.tag_id
      WHERE t.name_key = @tagKey
      GROUP BY bucket
      ORDER BY bucket DESC
      LIMIT @limit
    `).all({ tagKey: tagKey(tagName), limit: checkLimit(limitMonths) }) as BucketRow[];

    return rows.reverse().map((r) => ({ yearMonth: r.bucket, totalMinor: r.total }));
  }

  topTagsBySpending(limit = 10): TagTotal[] {
    const rows = this.db.prepare(`
      SELECT t.name AS name,
             COALESCE(SUM(e.amount_cents), 0) AS total,
             COUNT(DISTINCT e.id) AS count
      FROM tags t
      JOIN expense_tags et ON et.tag_id = t.id
      JOIN expenses e ON e.id = et.expense_id
      GROUP BY t.id
      ORDER BY total DESC, t.name_key ASC
      LIMIT @limit
    `).all({ limit: checkLimit(limit) }) as { name: string; total: number; count: number }[];

    return rows.map((r) => ({ tagName: r.name, totalMinor: r.total, transactionCount: r.count }));
  }

  /** Tag totals within the most recent months that have any expense */
  tagSpendingByMonth(limitMonths = 6): MonthTagTotal[] {
    const rows = this.db.prepare(`
      WITH months AS (
        SELECT ${MONTH_KEY} AS ym
        FROM expenses e
        GROUP BY ym
        ORDER BY ym DESC
        LIMIT @limit
      )
      SELECT ${MONTH_KEY} AS ym, t.name AS name, SUM(e.amount_cents) AS total
      FROM expenses e
      JOIN expense_tags et ON et.expense_id = e.id
      JOIN tags t ON t.id = et.tag_id
      WHERE ${MONTH_KEY} IN (SELECT ym FROM months)
      GROUP BY ym, t.id
      ORDER BY ym ASC, total DESC, t.name_key ASC
    `).all({ limit: checkLimit(limitMonths) }) as { ym: string; name: string; total: number }[];

    return rows.map((r) => ({ yearMonth: r.ym, tagName: r.name, totalMinor: r.total }));
  }

  /** Dashboard numbers for the month containing referenceDate */
  budgetSummary(referenceDate: string = today()): BudgetSummary {
    const date = parseInput(isoDate, referenceDate, 'Invalid reference date');
    const settings = this.settings.get();
    const spentByCategory = this.ledger.spentByCategoryForMonth(date);
    const budget = spendingBudget(settings.income1Minor, settings.income2Minor, settings.savingGoalPct);
    const spent = Object.values(spentByCategory).reduce((sum, v) => sum + v, 0);

    return {
      yearMonth: monthOf(date),
      spendingBudgetMinor: budget,
      spentMinor: spent,
      remainingMinor: budget - spent,
      categories: budgetStatus(settings, spentByCategory),
    };
  }

  private where(filter: AnalyticsFilter): WhereClause {
    const dateRange = filter.dateRange
      ? parseInput(dateRangeSchema, filter.dateRange, 'Invalid date range')
      : undefined;
    return buildWhere({ search: filter.search, dateRange, searchTags: false });
  }
}

function checkLimit(limit: number): number {
  return parseInput(limitSchema, limit, 'Invalid limit');
}
