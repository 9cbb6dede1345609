/**
 * Domain types for the expense ledger.
 * Pure data with no DB or HTTP access.
 */

export const CATEGORIES = ['fun', 'groceries', 'travel', 'home', 'misc'] as const;

/** Closed set of spending categories */
export type Category = (typeof CATEGORIES)[number];

export const CATEGORY_LABELS: Record<Category, string> = {
  fun: 'Fun',
  groceries: 'Groceries',
  travel: 'Travel',
  home: 'Home',
  misc: 'Misc',
};

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

export function categoryLabel(category: Category): string {
  return CATEGORY_LABELS[category];
}

/** Trimmed, non-empty tag name. Only produced by normalizeTags. */
export type TagName = string & { readonly __brand: 'TagName' };

/** YYYY-MM-DD */
export type IsoDate = string;

/** YYYY-MM */
export type Month = string;

export interface Expense {
  id: number;
  amountMinor: number;         // cents, always > 0
  currency: 'USD';
  category: Category;
  note: string;
  occurredAt: string;          // YYYY-MM-DDT00:00:00
  createdAt: string;           // ISO instant
  tags: TagName[];
}

/** Input for insert/update; amounts already in minor units */
export interface ExpenseInput {
  itemName: string;
  amountMinor: number;
  category: Category;
  occurredOn: IsoDate;
  tags: string[];
}

/** Singleton budget configuration, all amounts in cents */
export interface Settings {
  income1Minor: number;
  income2Minor: number;
  savingGoalPct: number;       // 0–100
  budgetFunMinor: number;
  budgetGroceriesMinor: number;
  budgetTravelMinor: number;
  budgetHomeMinor: number;
  budgetMiscMinor: number;     // derived remainder, see computations.ts
}

export interface DateRange {
  start?: IsoDate;             // inclusive
  end?: IsoDate;               // inclusive (end of day)
}

export interface ListFilter {
  search?: string;
  dateRange?: DateRange;
  tag?: string;
  limit?: number;
}

/** Draft allocation handed to the allocator by the presentation layer */
export interface AllocationDraft {
  income1Minor: number;
  income2Minor: number;
  savingGoalPct: number;
  budgetFunMinor: number;
  budgetGroceriesMinor: number;
  budgetTravelMinor: number;
  budgetHomeMinor: number;
}

export interface AllocationResult {
  spendingBudgetMinor: number;
  allocatedMinor: number;      // sum of the four user-set categories
  miscMinor: number;
  valid: boolean;
}

export interface BudgetStatus {
  category: Category;
  budgetedMinor: number;
  spentMinor: number;
  remainingMinor: number;      // can be negative (overspent)
}

export interface BudgetSummary {
  yearMonth: Month;
  spendingBudgetMinor: number;
  spentMinor: number;
  remainingMinor: number;
  categories: BudgetStatus[];
}

export interface MonthTotal {
  yearMonth: Month;
  totalMinor: number;
}

export interface WeekTotal {
  yearWeek: string;            // YYYY-Www
  totalMinor: number;
}

export interface MonthCategoryTotal {
  yearMonth: Month;
  category: Category;
  totalMinor: number;
}

export interface KpiMetrics {
  totalMinor: number;
  transactionCount: number;
  avgMinor: number;
  firstDate: IsoDate | null;
  lastDate: IsoDate | null;
}

export interface SavingsRatePoint {
  yearMonth: Month;
  savingsRatePct: number;
  spentMinor: number;
  incomeMinor: number;
}

export interface TagTotal {
  tagName: string;
  totalMinor: number;
  transactionCount: number;
}

export interface MonthTagTotal {
  yearMonth: Month;
  tagName: string;
  totalMinor: number;
}

/** Zero-valued settings for first-time users */
export const DEFAULT_SETTINGS: Settings = {
  income1Minor: 0,
  income2Minor: 0,
  savingGoalPct: 0,
  budgetFunMinor: 0,
  budgetGroceriesMinor: 0,
  budgetTravelMinor: 0,
  budgetHomeMinor: 0,
  budgetMiscMinor: 0,
};
