import { DEFAULT_COLUMN_ALIASES, resolveColumns, type AliasTable } from './columnResolver';
import { REQUIRED_COLUMNS, TEXT_FIELD_BY_COLUMN, isTextColumn, type CellValue, type CleanTable, type OrderRecord, type RawTable } from './orderSchema';
import { filterRows } from './rowFilter';
import { normalizeRow } from './rowNormalizer';

/**
 * Turns a raw spreadsheet read into the canonical order table.
 *
 * Columns are resolved first; a {@link SchemaError} is thrown before any row
 * is coerced when required columns are missing. Rows then go through cell
 * coercion and the summary/blank filters, keeping their relative order.
 */
export function normalize(
  raw: RawTable,
  aliases: AliasTable = DEFAULT_COLUMN_ALIASES,
  required: readonly string[] = REQUIRED_COLUMNS,
): CleanTable {
  const resolution = resolveColumns(raw.headers, aliases, required);
  const rows = raw.rows.map((cells) => normalizeRow(cells, resolution));
  return { columns: resolution.columns, rows: filterRows(rows) };
}

export function cellOf(row: OrderRecord, column: string): CellValue {
  if (isTextColumn(column)) return row[TEXT_FIELD_BY_COLUMN[column]];
  if (column === 'Scheduled Date') return row.scheduledDate;
  if (column === 'Price') return row.price;
  return row.extras[column] ?? null;
}

/** Inverse of {@link normalize} for an already clean table. */
export function toRawTable(table: CleanTable): RawTable {
  return {
    headers: [...table.columns],
    rows: table.rows.map((row) => table.columns.map((column) => cellOf(row, column))),
  };
}

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return null;
}

const FIELD_TO_COLUMN: Record<string, string> = {
  wo: 'WO',
  quote: 'Quote',
  poNumber: 'PO Number',
  status: 'Status',
  customerName: 'Customer Name',
  modelDescription: 'Model Description',
  scheduledDate: 'Scheduled Date',
  price: 'Price',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

// Accepts rows in the shape GET /api/orders returns them as well as header-keyed rows.
function flattenRecord(record: Record<string, unknown>): Record<string, unknown> {
  if (!isPlainObject(record.extras)) return record;
  const flat: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (key === 'extras') continue;
    flat[FIELD_TO_COLUMN[key] ?? key] = value;
  }
  return { ...flat, ...record.extras };
}

/**
 * Builds a raw table from row objects keyed by header, as a table editor
 * posts them. Headers are collected in first-seen order.
 */
export function rawTableFromRecords(input: ReadonlyArray<Record<string, unknown>>): RawTable {
  const records = input.map(flattenRecord);
  const headers: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        headers.push(key);
      }
    }
  }
  return {
    headers,
    rows: records.map((record) => headers.map((h) => toCellValue(record[h]))),
  };
}
