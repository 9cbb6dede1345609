/**
 * Settings store: the single budget configuration row, plus the reset that
 * wipes it together with the ledger.
 */
import { evaluateAllocation } from '../../src/domain/computations.js';
import { ValidationError } from '../../src/domain/errors.js';
import { DEFAULT_SETTINGS, type Settings } from '../../src/domain/types.js';
import { RESET_TOKEN, parseInput, settingsInputSchema } from '../../src/domain/validation.js';
import type { Db, SettingsRow } from './db.js';
import { writeTransaction, type RetryOptions } from './retry.js';

export class SettingsStore {
  constructor(
    private readonly db: Db,
    private readonly options: { retry?: RetryOptions } = {},
  ) {}

  get(): Settings {
    const row = this.db.prepare('SELECT * FROM settings WHERE id = 1').get() as SettingsRow | undefined;
    if (!row) return { ...DEFAULT_SETTINGS };
    return {
      income1Minor: row.income_1_cents,
      income2Minor: row.income_2_cents,
      savingGoalPct: row.saving_goal_pct,
      budgetFunMinor: row.budget_fun_cents,
      budgetGroceriesMinor: row.budget_groceries_cents,
      budgetTravelMinor: row.budget_travel_cents,
      budgetHomeMinor: row.budget_home_cents,
      budgetMiscMinor: row.budget_misc_cents,
    };
  }

  /**
   * Overwrite the whole row. Refused while the allocation is invalid or the
   * misc value is stale; the caller recomputes with evaluateAllocation first.
   */
  save(input: Settings): Settings {
    const data = parseInput(settingsInputSchema, input, 'Invalid settings');
    const allocation = evaluateAllocation(data);

    if (!allocation.valid) {
      throw new ValidationError('Category budgets exceed the spending budget', {
        budgets: [
          `allocated ${allocation.allocatedMinor} of ${allocation.spendingBudgetMinor} available`,
        ],
      });
    }
    if (data.budgetMiscMinor !== allocation.miscMinor) {
      throw new ValidationError('Misc budget is out of date; recalculate before saving', {
        budgetMiscMinor: [`expected ${allocation.miscMinor}`],
      });
    }

    writeTransaction(this.db, () => {
      // INSERT OR REPLACE also recreates the row if it was ever removed
      this.db.prepare(`
        INSERT OR REPLACE INTO settings (
          id, income_1_cents, income_2_cents, saving_goal_pct,
          budget_fun_cents, budget_groceries_cents, budget_travel_cents,
          budget_home_cents, budget_misc_cents
        ) VALUES (1, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        data.income1Minor,
        data.income2Minor,
        data.savingGoalPct,
        data.budgetFunMinor,
        data.budgetGroceriesMinor,
        data.budgetTravelMinor,
        data.budgetHomeMinor,
        data.budgetMiscMinor,
      );
    }, this.options.retry);

    return this.get();
  }

  /**
   * Delete every expense and tag and zero the settings, all or nothing.
   * The confirmation must be exactly "RESET".
   */
  reset(confirmation: string): void {
    if (confirmation !== RESET_TOKEN) {
      throw new ValidationError(`Type ${RESET_TOKEN} to confirm`, {
        confirm: [`must be "${RESET_TOKEN}"`],
      });
    }

    writeTransaction(this.db, () => {
      this.db.exec('DELETE FROM expense_tags');
      this.db.exec('DELETE FROM tags');
      this.db.exec('DELETE FROM expenses');
      this.db.exec(`
        INSERT OR REPLACE INTO settings (
          id, income_1_cents, income_2_cents, saving_goal_pct,
          budget_fun_cents, budget_groceries_cents, budget_travel_cents,
          budget_home_cents, budget_misc_cents
        ) VALUES (1, 0, 0, 0, 0, 0, 0, 0, 0)
      `);
    }, this.options.retry);

    console.log('[db] All ledger data and settings reset');
  }
}
