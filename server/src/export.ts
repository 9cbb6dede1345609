import { formatMajor } from '../../src/domain/money.js';
import type { Expense } from '../../src/domain/types.js';

export const CSV_HEADER = ['date', 'item', 'category', 'price'];

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** date,item,category,price: one line per expense, CRLF endings */
export function expensesToCsv(expenses: readonly Expense[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const e of expenses) {
    lines.push(
      [e.occurredAt.slice(0, 10), e.note.trim(), e.category, formatMajor(e.amountMinor)]
        .map(escapeField)
        .join(','),
    );
  }
  return lines.join('\r\n') + '\r\n';
}
