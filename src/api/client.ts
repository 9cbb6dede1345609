/**
 * HTTP client for the ledger API.
 *
 * The server speaks cents. Everything a person types or reads here is in
 * major units: writes go through toMinor, expense and settings reads through
 * fromMinor. Analytics results stay in cents; charts convert at render time.
 */
import { fromMinor, toMinor } from '../domain/money.js';
import { categoryLabel } from '../domain/types.js';
import type {
  AllocationResult,
  BudgetSummary,
  Category,
  DateRange,
  Expense,
  IsoDate,
  KpiMetrics,
  MonthCategoryTotal,
  MonthTagTotal,
  MonthTotal,
  SavingsRatePoint,
  Settings,
  TagTotal,
  WeekTotal,
} from '../domain/types.js';

const API_BASE = '/api';

export interface ExpenseView {
  id: number;
  amount: number;
  currency: 'USD';
  category: Category;
  categoryLabel: string;
  note: string;
  date: IsoDate;
  createdAt: string;
  tags: string[];
}

export interface ExpenseDraft {
  itemName: string;
  amount: number;
  category: Category;
  date: IsoDate;
  tags?: string[];
}

export interface SettingsView {
  income1: number;
  income2: number;
  savingGoalPct: number;
  budgetFun: number;
  budgetGroceries: number;
  budgetTravel: number;
  budgetHome: number;
  budgetMisc: number;
}

export type AllocationDraftView = Omit<SettingsView, 'budgetMisc'>;

export interface AllocationView {
  spendingBudget: number;
  allocated: number;
  misc: number;
  valid: boolean;
}

export interface ExpenseQuery {
  search?: string;
  dateRange?: DateRange;
  tag?: string;
  limit?: number;
}

interface ErrorPayload {
  error?: { code?: string; message?: string; fieldErrors?: Record<string, string[]> };
}

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string,
    readonly fieldErrors: Record<string, string[]> = {},
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

async function readErrorPayload(response: Response): Promise<ErrorPayload> {
  // Proxies and crashed servers answer with HTML or nothing at all
  if (!response.headers.get('content-type')?.includes('application/json')) return {};
  try {
    const payload: ErrorPayload = await response.json();
    return payload;
  } catch (err) {
    if (err instanceof SyntaxError) return {};
    throw err;
  }
}

async function failure(response: Response, fallback: string): Promise<ApiError> {
  const payload = await readErrorPayload(response);
  return new ApiError(
    payload.error?.message ?? fallback,
    response.status,
    payload.error?.code ?? 'HTTP_ERROR',
    payload.error?.fieldErrors,
  );
}

async function request<T>(path: string, fallback: string, init?: RequestInit): Promise<T> {
  const response = await fetch(`${API_BASE}${path}`, init);
  if (!response.ok) throw await failure(response, fallback);
  const body: T = await response.json();
  return body;
}

function jsonInit(method: string, data: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(data),
  };
}

function query(params: Record<string, string | number | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== '') search.set(key, String(value));
  }
  const text = search.toString();
  return text ? `?${text}` : '';
}

// --- Conversions ---

export function toExpenseView(expense: Expense): ExpenseView {
  return {
    id: expense.id,
    amount: fromMinor(expense.amountMinor),
    currency: expense.currency,
    category: expense.category,
    categoryLabel: categoryLabel(expense.category),
    note: expense.note,
    date: expense.occurredAt.slice(0, 10),
    createdAt: expense.createdAt,
    tags: [...expense.tags],
  };
}

function toExpenseInput(draft: ExpenseDraft) {
  return {
    itemName: draft.itemName,
    amountMinor: toMinor(draft.amount),
    category: draft.category,
    occurredOn: draft.date,
    tags: draft.tags ?? [],
  };
}

export function toSettingsView(settings: Settings): SettingsView {
  return {
    income1: fromMinor(settings.income1Minor),
    income2: fromMinor(settings.income2Minor),
    savingGoalPct: settings.savingGoalPct,
    budgetFun: fromMinor(settings.budgetFunMinor),
    budgetGroceries: fromMinor(settings.budgetGroceriesMinor),
    budgetTravel: fromMinor(settings.budgetTravelMinor),
    budgetHome: fromMinor(settings.budgetHomeMinor),
    budgetMisc: fromMinor(settings.budgetMiscMinor),
  };
}

export function toSettings(view: SettingsView): Settings {
  return {
    income1Minor: toMinor(view.income1),
    income2Minor: toMinor(view.income2),
    savingGoalPct: view.savingGoalPct,
    budgetFunMinor: toMinor(view.budgetFun),
    budgetGroceriesMinor: toMinor(view.budgetGroceries),
    budgetTravelMinor: toMinor(view.budgetTravel),
    budgetHomeMinor: toMinor(view.budgetHome),
    budgetMiscMinor: toMinor(view.budgetMisc),
  };
}

// --- Expenses ---

export async function getExpenses(q: ExpenseQuery = {}): Promise<ExpenseView[]> {
  const path = `/expenses${query({
    search: q.search,
    start: q.dateRange?.start,
    end: q.dateRange?.end,
    tag: q.tag,
    limit: q.limit,
  })}`;
  const expenses = await request<Expense[]>(path, 'Failed to fetch expenses');
  return expenses.map(toExpenseView);
}

/** null when the expense does not exist */
export async function getExpense(id: number): Promise<ExpenseView | null> {
  const response = await fetch(`${API_BASE}/expenses/${id}`);
  if (response.status === 404) return null;
  if (!response.ok) throw await failure(response, 'Failed to fetch expense');
  const expense: Expense = await response.json();
  return toExpenseView(expense);
}

export async function createExpense(draft: ExpenseDraft): Promise<number> {
  const { id } = await request<{ id: number }>(
    '/expenses',
    'Failed to create expense',
    jsonInit('POST', toExpenseInput(draft)),
  );
  return id;
}

export async function updateExpense(id: number, draft: ExpenseDraft): Promise<ExpenseView> {
  const expense = await request<Expense>(
    `/expenses/${id}`,
    'Failed to update expense',
    jsonInit('PUT', toExpenseInput(draft)),
  );
  return toExpenseView(expense);
}

export async function deleteExpense(id: number): Promise<void> {
  const response = await fetch(`${API_BASE}/expenses/${id}`, { method: 'DELETE' });
  if (!response.ok) throw await failure(response, 'Failed to delete expense');
}

export async function getTags(limit?: number): Promise<string[]> {
  return request<string[]>(`/tags${query({ limit })}`, 'Failed to fetch tags');
}

// --- Settings ---

export async function getSettings(): Promise<SettingsView> {
  return toSettingsView(await request<Settings>('/settings', 'Failed to fetch settings'));
}

export async function saveSettings(view: SettingsView): Promise<SettingsView> {
  const saved = await request<Settings>(
    '/settings',
    'Failed to save settings',
    jsonInit('PUT', toSettings(view)),
  );
  return toSettingsView(saved);
}

export async function previewAllocation(draft: AllocationDraftView): Promise<AllocationView> {
  const result = await request<AllocationResult>(
    '/allocation',
    'Failed to recalculate budget',
    jsonInit('POST', {
      income1Minor: toMinor(draft.income1),
      income2Minor: toMinor(draft.income2),
      savingGoalPct: draft.savingGoalPct,
      budgetFunMinor: toMinor(draft.budgetFun),
      budgetGroceriesMinor: toMinor(draft.budgetGroceries),
      budgetTravelMinor: toMinor(draft.budgetTravel),
      budgetHomeMinor: toMinor(draft.budgetHome),
    }),
  );
  return {
    spendingBudget: fromMinor(result.spendingBudgetMinor),
    allocated: fromMinor(result.allocatedMinor),
    misc: fromMinor(result.miscMinor),
    valid: result.valid,
  };
}

export async function resetAllData(confirm: string): Promise<void> {
  await request<{ ok: boolean }>('/reset', 'Failed to reset data', jsonInit('POST', { confirm }));
}

export async function exportCsv(): Promise<string> {
  const response = await fetch(`${API_BASE}/export.csv`);
  if (!response.ok) throw await failure(response, 'Failed to export');
  return response.text();
}

// --- Summary & analytics (cents) ---

export async function getSummary(date?: IsoDate): Promise<BudgetSummary> {
  return request<BudgetSummary>(`/summary${query({ date })}`, 'Failed to fetch summary');
}

export async function getMonthlyTotals(
  limit?: number,
  filter: { dateRange?: DateRange; search?: string } = {},
): Promise<MonthTotal[]> {
  const path = `/analytics/monthly${query({
    limit,
    start: filter.dateRange?.start,
    end: filter.dateRange?.end,
    search: filter.search,
  })}`;
  return request<MonthTotal[]>(path, 'Failed to fetch monthly totals');
}

export async function getWeeklyTotals(limit?: number): Promise<WeekTotal[]> {
  return request<WeekTotal[]>(`/analytics/weekly${query({ limit })}`, 'Failed to fetch weekly totals');
}

export async function getMonthlyCategoryTotals(
  limit?: number,
  dateRange?: DateRange,
): Promise<MonthCategoryTotal[]> {
  const path = `/analytics/categories${query({ limit, start: dateRange?.start, end: dateRange?.end })}`;
  return request<MonthCategoryTotal[]>(path, 'Failed to fetch category totals');
}

export async function getKpis(filter: { dateRange?: DateRange; search?: string } = {}): Promise<KpiMetrics> {
  const path = `/analytics/kpi${query({
    start: filter.dateRange?.start,
    end: filter.dateRange?.end,
    search: filter.search,
  })}`;
  return request<KpiMetrics>(path, 'Failed to fetch KPIs');
}

export async function getSavingsRate(limit?: number): Promise<SavingsRatePoint[]> {
  return request<SavingsRatePoint[]>(`/analytics/savings-rate${query({ limit })}`, 'Failed to fetch savings rate');
}

export async function getTopTags(limit?: number): Promise<TagTotal[]> {
  return request<TagTotal[]>(`/analytics/tags/top${query({ limit })}`, 'Failed to fetch top tags');
}

export async function getTagSpendingByMonth(limit?: number): Promise<MonthTagTotal[]> {
  return request<MonthTagTotal[]>(`/analytics/tags/monthly${query({ limit })}`, 'Failed to fetch tag spending');
}

export async function getTagSpending(tagName: string, limit?: number): Promise<MonthTotal[]> {
  const path = `/analytics/tag-trend${query({ tag: tagName, limit })}`;
  return request<MonthTotal[]>(path, 'Failed to fetch tag spending');
}
