/**
 * Pure budget computations.
 * No DB or IO, only data in and data out. Nothing here remembers a previous
 * result: callers recompute whenever income, the savings goal or one of the
 * four user-set budgets changes.
 */
import type {
  AllocationDraft,
  AllocationResult,
  BudgetStatus,
  Category,
  Settings,
} from './types.js';
import { CATEGORIES } from './types.js';

/**
 * Money left to spend after the savings goal.
 *
 *   spending budget = (income1 + income2) × (1 − savingGoalPct / 100)
 *
 * Rounded to the nearest cent and never negative, so a goal above 100%
 * yields 0.
 */
export function spendingBudget(income1: number, income2: number, savingGoalPct: number): number {
  const raw = (income1 + income2) * (1 - savingGoalPct / 100);
  return Math.max(Math.round(raw), 0);
}

/** Misc is always the non-negative remainder of the other four */
export function miscAllocation(
  maxBudget: number,
  fun: number,
  groceries: number,
  travel: number,
  home: number,
): number {
  return Math.max(maxBudget - (fun + groceries + travel + home), 0);
}

/** Bound a user-edited category value to [0, maxBudget] */
export function clampAllocation(value: number, maxBudget: number): number {
  return Math.min(Math.max(value, 0), Math.max(maxBudget, 0));
}

/**
 * Recompute the spending budget and misc remainder for a draft.
 * An over-allocated draft is reported through `valid`, never thrown.
 */
export function evaluateAllocation(draft: AllocationDraft): AllocationResult {
  const budget = spendingBudget(draft.income1Minor, draft.income2Minor, draft.savingGoalPct);
  const allocated =
    draft.budgetFunMinor +
    draft.budgetGroceriesMinor +
    draft.budgetTravelMinor +
    draft.budgetHomeMinor;
  const valid = allocated <= budget;

  return {
    spendingBudgetMinor: budget,
    allocatedMinor: allocated,
    miscMinor: valid
      ? miscAllocation(
          budget,
          draft.budgetFunMinor,
          draft.budgetGroceriesMinor,
          draft.budgetTravelMinor,
          draft.budgetHomeMinor,
        )
      : 0,
    valid,
  };
}

/** Per-category budget as stored in settings */
export function budgetFor(settings: Settings, category: Category): number {
  switch (category) {
    case 'fun':
      return settings.budgetFunMinor;
    case 'groceries':
      return settings.budgetGroceriesMinor;
    case 'travel':
      return settings.budgetTravelMinor;
    case 'home':
      return settings.budgetHomeMinor;
    case 'misc':
      return settings.budgetMiscMinor;
  }
}

/**
 * How much is left in each category's budget.
 * remaining = budgeted − actual spend, negative when overspent.
 */
export function budgetStatus(
  settings: Settings,
  spentByCategory: Record<Category, number>,
): BudgetStatus[] {
  return CATEGORIES.map((category) => {
    const budgeted = budgetFor(settings, category);
    const spent = spentByCategory[category];
    return {
      category,
      budgetedMinor: budgeted,
      spentMinor: spent,
      remainingMinor: budgeted - spent,
    };
  });
}

/** Savings rate in percent, two decimals; null when income gives no base */
export function savingsRate(incomeMinor: number, spentMinor: number): number | null {
  if (incomeMinor <= 0) return null;
  return Math.round(((incomeMinor - spentMinor) / incomeMinor) * 10000) / 100;
}
