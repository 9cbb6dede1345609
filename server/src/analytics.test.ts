import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../src/domain/errors.js';
import type { Category } from '../../src/domain/types.js';
import { Analytics } from './analytics.js';
import { openDatabase, type Db } from './db.js';
import { LedgerStore } from './ledger.js';
import { SettingsStore } from './settings.js';

describe('Analytics', () => {
  let db: Db;
  let ledger: LedgerStore;
  let settings: SettingsStore;
  let analytics: Analytics;

  function add(occurredOn: string, amountMinor: number, extra: { category?: Category; itemName?: string; tags?: string[] } = {}) {
    return ledger.insert({
      itemName: extra.itemName ?? 'Item',
      amountMinor,
      category: extra.category ?? 'fun',
      occurredOn,
      tags: extra.tags ?? [],
    });
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    db = openDatabase(':memory:');
    ledger = new LedgerStore(db);
    settings = new SettingsStore(db);
    analytics = new Analytics(db, ledger, settings);
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  describe('monthlyTotals', () => {
    it('sums each month, oldest first', () => {
      add('2024-01-05', 1000);
      add('2024-01-20', 500);
      add('2024-02-03', 700);

      expect(analytics.monthlyTotals()).toEqual([
        { yearMonth: '2024-01', totalMinor: 1500 },
        { yearMonth: '2024-02', totalMinor: 700 },
      ]);
    });

    it('leaves out months without expenses', () => {
      add('2024-01-05', 100);
      add('2024-04-05', 200);

      expect(analytics.monthlyTotals().map((m) => m.yearMonth)).toEqual(['2024-01', '2024-04']);
    });

    it('keeps the most recent months when limited', () => {
      add('2023-11-01', 1);
      add('2023-12-01', 2);
      add('2024-01-01', 3);

      expect(analytics.monthlyTotals(2)).toEqual([
        { yearMonth: '2023-12', totalMinor: 2 },
        { yearMonth: '2024-01', totalMinor: 3 },
      ]);
    });

    it('applies the date range and search', () => {
      add('2024-01-05', 100, { itemName: 'Coffee' });
      add('2024-01-06', 200, { itemName: 'Lunch' });
      add('2024-02-05', 400, { itemName: 'coffee beans' });

      expect(analytics.monthlyTotals(6, { search: 'COFFEE' })).toEqual([
        { yearMonth: '2024-01', totalMinor: 100 },
        { yearMonth: '2024-02', totalMinor: 400 },
      ]);
      expect(analytics.monthlyTotals(6, { dateRange: { start: '2024-02-01' } })).toEqual([
        { yearMonth: '2024-02', totalMinor: 400 },
      ]);
    });

    it('does not match tag names when searching', () => {
      add('2024-01-05', 100, { itemName: 'Beans', tags: ['coffee'] });
      expect(analytics.monthlyTotals(6, { search: 'coffee' })).toEqual([]);
    });

    it('rejects a non-positive limit', () => {
      expect(() => analytics.monthlyTotals(0)).toThrow(ValidationError);
    });
  });

  describe('weeklyTotals', () => {
    it('buckets by Monday-first week number', () => {
      add('2023-12-31', 50);
      add('2024-01-03', 100);
      add('2024-01-05', 200);
      add('2024-01-10', 300);

      expect(analytics.weeklyTotals()).toEqual([
        { yearWeek: '2023-W52', totalMinor: 50 },
        { yearWeek: '2024-W01', totalMinor: 300 },
        { yearWeek: '2024-W02', totalMinor: 300 },
      ]);
      expect(analytics.weeklyTotals(1)).toEqual([{ yearWeek: '2024-W02', totalMinor: 300 }]);
    });
  });

  describe('monthlyCategoryTotals', () => {
    beforeEach(() => {
      add('2024-01-02', 100, { category: 'fun' });
      add('2024-01-03', 200, { category: 'groceries' });
      add('2024-01-04', 25, { category: 'fun' });
      add('2024-02-02', 50, { category: 'fun' });
      add('2024-03-02', 30, { category: 'home' });
    });

    it('lists month and category pairs that have spend', () => {
      expect(analytics.monthlyCategoryTotals()).toEqual([
        { yearMonth: '2024-01', category: 'fun', totalMinor: 125 },
        { yearMonth: '2024-01', category: 'groceries', totalMinor: 200 },
        { yearMonth: '2024-02', category: 'fun', totalMinor: 50 },
        { yearMonth: '2024-03', category: 'home', totalMinor: 30 },
      ]);
    });

    it('limits by month, not by row', () => {
      expect(analytics.monthlyCategoryTotals(2)).toEqual([
        { yearMonth: '2024-02', category: 'fun', totalMinor: 50 },
        { yearMonth: '2024-03', category: 'home', totalMinor: 30 },
      ]);
    });

    it('picks the months inside the date range', () => {
      expect(analytics.monthlyCategoryTotals(1, { end: '2024-01-31' })).toEqual([
        { yearMonth: '2024-01', category: 'fun', totalMinor: 125 },
        { yearMonth: '2024-01', category: 'groceries', totalMinor: 200 },
      ]);
    });
  });

  describe('kpiMetrics', () => {
    it('summarises the matching expenses', () => {
      add('2024-01-10', 100);
      add('2024-01-02', 200);
      add('2024-02-20', 250);

      expect(analytics.kpiMetrics()).toEqual({
        totalMinor: 550,
        transactionCount: 3,
        avgMinor: 183,
        firstDate: '2024-01-02',
        lastDate: '2024-02-20',
      });
    });

    it('rounds an exact half to the even cent', () => {
      add('2024-01-01', 2);
      add('2024-01-02', 3);
      expect(analytics.kpiMetrics().avgMinor).toBe(2);
    });

    it('is all zero with no expenses', () => {
      expect(analytics.kpiMetrics()).toEqual({
        totalMinor: 0,
        transactionCount: 0,
        avgMinor: 0,
        firstDate: null,
        lastDate: null,
      });
    });

    it('honours search and date range', () => {
      add('2024-01-10', 100, { category: 'travel' });
      add('2024-01-11', 300, { category: 'home' });
      add('2024-03-01', 900, { category: 'travel' });

      expect(analytics.kpiMetrics({ search: 'travel', dateRange: { end: '2024-02-29' } })).toEqual({
        totalMinor: 100,
        transactionCount: 1,
        avgMinor: 100,
        firstDate: '2024-01-10',
        lastDate: '2024-01-10',
      });
    });
  });

  describe('monthlySavingsRate', () => {
    it('is empty without income', () => {
      add('2024-01-10', 100);
      expect(analytics.monthlySavingsRate()).toEqual([]);
    });

    it('compares each month against the configured income', () => {
      settings.save({
        income1Minor: 300000,
        income2Minor: 0,
        savingGoalPct: 0,
        budgetFunMinor: 0,
        budgetGroceriesMinor: 0,
        budgetTravelMinor: 0,
        budgetHomeMinor: 0,
        budgetMiscMinor: 300000,
      });
      add('2024-01-10', 150000);
      add('2024-02-10', 330000);

      expect(analytics.monthlySavingsRate()).toEqual([
        { yearMonth: '2024-01', savingsRatePct: 50, spentMinor: 150000, incomeMinor: 300000 },
        { yearMonth: '2024-02', savingsRatePct: -10, spentMinor: 330000, incomeMinor: 300000 },
      ]);
    });
  });

  describe('tags', () => {
    it('tracks one tag month by month, matching it exactly', () => {
      add('2024-01-05', 300, { tags: ['coffee'] });
      add('2024-01-06', 999, { tags: ['coffee-shop'] });
      add('2024-02-05', 200, { tags: ['Coffee', 'work'] });

      expect(analytics.tagSpendingOverTime('COFFEE')).toEqual([
        { yearMonth: '2024-01', totalMinor: 300 },
        { yearMonth: '2024-02', totalMinor: 200 },
      ]);
      expect(analytics.tagSpendingOverTime('nope')).toEqual([]);
    });

    it('ranks tags by spend, breaking ties by name', () => {
      add('2024-01-01', 100, { tags: ['a'] });
      add('2024-01-02', 200, { tags: ['a'] });
      add('2024-01-03', 300, { tags: ['c'] });
      add('2024-01-04', 500, { tags: ['b'] });

      expect(analytics.topTagsBySpending()).toEqual([
        { tagName: 'b', totalMinor: 500, transactionCount: 1 },
        { tagName: 'a', totalMinor: 300, transactionCount: 2 },
        { tagName: 'c', totalMinor: 300, transactionCount: 1 },
      ]);
      expect(analytics.topTagsBySpending(1).map((t) => t.tagName)).toEqual(['b']);
    });

    it('counts an expense under each of its tags', () => {
      add('2024-01-01', 400, { tags: ['x', 'y'] });
      expect(analytics.topTagsBySpending()).toEqual([
        { tagName: 'x', totalMinor: 400, transactionCount: 1 },
        { tagName: 'y', totalMinor: 400, transactionCount: 1 },
      ]);
    });

    it('breaks recent months down by tag', () => {
      add('2024-01-05', 100, { tags: ['x'] });
      add('2024-01-06', 300, { tags: ['y'] });
      add('2024-02-05', 50);
      add('2024-03-05', 70, { tags: ['x'] });

      expect(analytics.tagSpendingByMonth()).toEqual([
        { yearMonth: '2024-01', tagName: 'y', totalMinor: 300 },
        { yearMonth: '2024-01', tagName: 'x', totalMinor: 100 },
        { yearMonth: '2024-03', tagName: 'x', totalMinor: 70 },
      ]);
      expect(analytics.tagSpendingByMonth(2)).toEqual([
        { yearMonth: '2024-03', tagName: 'x', totalMinor: 70 },
      ]);
    });
  });

  describe('budgetSummary', () => {
    it('reports the month of the reference date against the budget', () => {
      settings.save({
        income1Minor: 300000,
        income2Minor: 200000,
        savingGoalPct: 20,
        budgetFunMinor: 100000,
        budgetGroceriesMinor: 80000,
        budgetTravelMinor: 50000,
        budgetHomeMinor: 70000,
        budgetMiscMinor: 100000,
      });
      add('2024-03-01', 120000, { category: 'fun' });
      add('2024-03-31', 5000, { category: 'misc' });
      add('2024-04-01', 9999, { category: 'home' });

      expect(analytics.budgetSummary('2024-03-15')).toEqual({
        yearMonth: '2024-03',
        spendingBudgetMinor: 400000,
        spentMinor: 125000,
        remainingMinor: 275000,
        categories: [
          { category: 'fun', budgetedMinor: 100000, spentMinor: 120000, remainingMinor: -20000 },
          { category: 'groceries', budgetedMinor: 80000, spentMinor: 0, remainingMinor: 80000 },
          { category: 'travel', budgetedMinor: 50000, spentMinor: 0, remainingMinor: 50000 },
          { category: 'home', budgetedMinor: 70000, spentMinor: 0, remainingMinor: 70000 },
          { category: 'misc', budgetedMinor: 100000, spentMinor: 5000, remainingMinor: 95000 },
        ],
      });
    });

    it('rejects a malformed reference date', () => {
      expect(() => analytics.budgetSummary('March')).toThrow(ValidationError);
    });
  });
});
