// Canonical order-book columns, in the order they are presented and exported.
export const REQUIRED_COLUMNS = [
  'WO',
  'Quote',
  'PO Number',
  'Status',
  'Customer Name',
  'Model Description',
  'Scheduled Date',
  'Price',
] as const;

export type CanonicalColumn = (typeof REQUIRED_COLUMNS)[number];

export const TEXT_COLUMNS = [
  'WO',
  'Quote',
  'PO Number',
  'Status',
  'Customer Name',
  'Model Description',
] as const satisfies readonly CanonicalColumn[];

export type TextColumn = (typeof TEXT_COLUMNS)[number];

/** A cell as a spreadsheet reader or a JSON body hands it over. */
export type CellValue = string | number | boolean | Date | null | undefined;

/** Calendar date without time of day, formatted `YYYY-MM-DD`. */
export type CalendarDate = string;

export interface RawTable {
  headers: string[];
  rows: CellValue[][];
}

export interface OrderRecord {
  wo: string;
  quote: string;
  poNumber: string;
  status: string;
  customerName: string;
  modelDescription: string;
  scheduledDate: CalendarDate | null;
  price: number | null;
  // Unrecognized source columns, keyed by trimmed header
  extras: Record<string, CellValue>;
}

export type TextField = 'wo' | 'quote' | 'poNumber' | 'status' | 'customerName' | 'modelDescription';

export interface CleanTable {
  columns: string[];
  rows: OrderRecord[];
}

export const TEXT_FIELD_BY_COLUMN: Record<TextColumn, TextField> = {
  'WO': 'wo',
  'Quote': 'quote',
  'PO Number': 'poNumber',
  'Status': 'status',
  'Customer Name': 'customerName',
  'Model Description': 'modelDescription',
};

export const TEXT_FIELDS: readonly TextField[] = TEXT_COLUMNS.map((c) => TEXT_FIELD_BY_COLUMN[c]);

const CANONICAL_COLUMN_SET: ReadonlySet<string> = new Set(REQUIRED_COLUMNS);
const TEXT_COLUMN_SET: ReadonlySet<string> = new Set(TEXT_COLUMNS);

export function isCanonicalColumn(name: string): name is CanonicalColumn {
  return CANONICAL_COLUMN_SET.has(name);
}

export function isTextColumn(name: string): name is TextColumn {
  return TEXT_COLUMN_SET.has(name);
}
