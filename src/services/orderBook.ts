import { HttpError } from '../utils/errors';
import { normalize } from './normalizer';
import type { CalendarDate, CleanTable, OrderRecord, RawTable, TextField } from './orderSchema';
import { REQUIRED_COLUMNS, TEXT_FIELDS } from './orderSchema';
import { isCandidateOrder } from './rowFilter';
import { coerceDate } from './rowNormalizer';

export type MatchMode = 'contains' | 'exact';

export interface TextFilter {
  text: string;
  match: MatchMode;
}

export type OrderFilters = Partial<Record<TextField, TextFilter>> & {
  date?: CalendarDate;
  month?: { year: number; month: number };
};

function matchesText(value: string, filter: TextFilter, caseInsensitiveExact: boolean): boolean {
  if (filter.match === 'exact') {
    const a = value.trim();
    const b = filter.text.trim();
    return caseInsensitiveExact ? a.toLowerCase() === b.toLowerCase() : a === b;
  }
  return value.toLowerCase().includes(filter.text.toLowerCase());
}

/** View filters for the table screen. They never change what is saved. */
export function filterOrders(rows: readonly OrderRecord[], filters: OrderFilters): OrderRecord[] {
  return rows.filter((row) => {
    for (const field of TEXT_FIELDS) {
      const filter = filters[field];
      if (!filter || !filter.text) continue;
      if (!matchesText(row[field], filter, field === 'status')) return false;
    }
    if (filters.date && row.scheduledDate !== filters.date) return false;
    if (filters.month) {
      const prefix = `${filters.month.year}-${String(filters.month.month).padStart(2, '0')}-`;
      if (!row.scheduledDate || !row.scheduledDate.startsWith(prefix)) return false;
    }
    return true;
  });
}

function mergeColumns(a: readonly string[], b: readonly string[]): string[] {
  const out = [...a];
  for (const c of b) if (!out.includes(c)) out.push(c);
  return out;
}

/**
 * Folds rows edited in a filtered table view back into the full book. Rows
 * whose WO was on screen are replaced by the edited set, which is appended
 * at the end. An edit that leaves no real orders changes nothing.
 */
export function mergeEditedRows(full: CleanTable, displayedWos: readonly string[], edited: RawTable): CleanTable {
  const normalized = normalize(edited);
  const kept = normalized.rows.filter(isCandidateOrder);
  if (kept.length === 0) return full;

  const replaced = new Set(displayedWos.map((wo) => wo.trim()));
  return {
    columns: mergeColumns(full.columns, normalized.columns),
    rows: [...full.rows.filter((row) => !replaced.has(row.wo)), ...kept],
  };
}

/**
 * Moves every row with the given WO to a new date, using the same date
 * coercion as ingestion.
 */
export function rescheduleOrder(table: CleanTable, wo: string, value: unknown): { table: CleanTable; date: CalendarDate } {
  const key = wo.trim();
  const date = typeof value === 'string' || typeof value === 'number' ? coerceDate(value) : null;
  if (!date) throw new HttpError(400, 'date must be a valid calendar date');
  if (!table.rows.some((row) => row.wo === key)) throw new HttpError(404, `Order ${key} not found`);

  return {
    table: {
      columns: table.columns,
      rows: table.rows.map((row) => (row.wo === key ? { ...row, scheduledDate: date } : row)),
    },
    date,
  };
}

export function removeOrder(table: CleanTable, wo: string): { table: CleanTable; removed: number } {
  const key = wo.trim();
  const rows = table.rows.filter((row) => row.wo !== key);
  const removed = table.rows.length - rows.length;
  if (removed === 0) throw new HttpError(404, `Order ${key} not found`);
  return { table: { columns: table.columns, rows }, removed };
}

export function emptyOrderBook(): CleanTable {
  return { columns: [...REQUIRED_COLUMNS], rows: [] };
}
