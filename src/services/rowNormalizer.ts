import { format, isValid, parse } from 'date-fns';
import type { ColumnResolution } from './columnResolver';
import {
  TEXT_COLUMNS,
  TEXT_FIELD_BY_COLUMN,
  isCanonicalColumn,
  type CalendarDate,
  type CellValue,
  type OrderRecord,
} from './orderSchema';

// Stringified missing-value markers left behind by numeric exports
const NULL_TOKENS = new Set(['nan', 'none', '<na>']);
const MISSING_DATE_TOKENS = new Set(['', 'none', 'nat']);

// Tried in order; two-digit years come before four-digit ones so "3/15/24" is not read as year 24.
const DATE_FORMATS = [
  'M/d/yy',
  'M/d/yyyy',
  'M-d-yy',
  'M-d-yyyy',
  'M.d.yyyy',
  'd-MMM-yy',
  'd-MMM-yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'MMM d yyyy',
  'MMMM d yyyy',
  'EEEE, MMMM d, yyyy',
  'EEE, MMM d, yyyy',
  'EEEE, d MMMM yyyy',
  'yyyyMMdd',
  // Day-first, reached only when the month-first reading is impossible (15/03/2024)
  'd/M/yyyy',
  'd.M.yyyy',
  'd-M-yyyy',
];

const ISO_LIKE = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[T\s]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;
const TRAILING_TIME = /[\sT]+\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s*[ap]\.?m\.?)?$/i;

// Excel day zero is 1899-12-30; 25569 is the serial of 1970-01-01.
const EXCEL_EPOCH_OFFSET = 25569;
const MS_PER_DAY = 86_400_000;
const MAX_EXCEL_SERIAL = 2_958_465; // 9999-12-31

export function formatCalendarDate(date: Date): CalendarDate {
  return format(date, 'yyyy-MM-dd');
}

export function coerceText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  const text = value instanceof Date
    ? (isValid(value) ? formatCalendarDate(value) : '')
    : String(value).trim();
  return NULL_TOKENS.has(text.toLowerCase()) ? '' : text;
}

function fromExcelSerial(serial: number): CalendarDate | null {
  if (!Number.isFinite(serial) || serial < 1 || serial > MAX_EXCEL_SERIAL) return null;
  const d = new Date(Math.round((Math.floor(serial) - EXCEL_EPOCH_OFFSET) * MS_PER_DAY));
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${String(d.getUTCFullYear()).padStart(4, '0')}-${mm}-${dd}`;
}

function parseDateText(text: string): CalendarDate | null {
  const reference = new Date();

  const iso = ISO_LIKE.exec(text);
  if (iso) {
    const parsed = parse(`${iso[1]}-${iso[2]}-${iso[3]}`, 'yyyy-M-d', reference);
    return isValid(parsed) ? formatCalendarDate(parsed) : null;
  }

  const datePart = text.replace(TRAILING_TIME, '').trim();
  for (const pattern of DATE_FORMATS) {
    const parsed = parse(datePart, pattern, reference);
    if (isValid(parsed)) return formatCalendarDate(parsed);
  }
  return null;
}

/**
 * Best-effort conversion to a calendar date. Anything that cannot be read as
 * a date comes back as `null` (missing); time of day is discarded.
 *
 * Numbers are taken as Excel date serials.
 */
export function coerceDate(value: CellValue): CalendarDate | null {
  if (value === null || value === undefined || typeof value === 'boolean') return null;
  if (value instanceof Date) return isValid(value) ? formatCalendarDate(value) : null;
  if (typeof value === 'number') return fromExcelSerial(value);

  const text = value.trim();
  if (MISSING_DATE_TOKENS.has(text.toLowerCase())) return null;
  return parseDateText(text);
}

/**
 * Reads a price such as `"$1,234.50"` as a number. Currency symbols,
 * thousands separators and any other stray characters are stripped first;
 * whatever does not then read as a decimal number is `null` (missing).
 */
export function coercePrice(value: CellValue): number | null {
  if (value === null || value === undefined || typeof value === 'boolean' || value instanceof Date) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  const text = value.trim();
  if (text === '') return null;
  const residual = text.replace(/[$,]/g, '').replace(/[^0-9.-]/g, '');
  if (!/^-?(?:\d+\.?\d*|\.\d+)$/.test(residual)) return null;
  const parsed = Number(residual);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Coerces one raw row of a resolved table into an order record. */
export function normalizeRow(cells: readonly CellValue[], resolution: ColumnResolution): OrderRecord {
  const cell = (column: string): CellValue => {
    const index = resolution.sourceIndex.get(column);
    return index === undefined ? null : cells[index];
  };

  const record: OrderRecord = {
    wo: '',
    quote: '',
    poNumber: '',
    status: '',
    customerName: '',
    modelDescription: '',
    scheduledDate: coerceDate(cell('Scheduled Date')),
    price: coercePrice(cell('Price')),
    extras: {},
  };
  for (const column of TEXT_COLUMNS) {
    record[TEXT_FIELD_BY_COLUMN[column]] = coerceText(cell(column));
  }
  for (const column of resolution.columns) {
    if (isCanonicalColumn(column)) continue;
    record.extras[column] = cell(column) ?? null;
  }
  return record;
}
