import path from 'path';
import XLSX from 'xlsx';
import { cellOf } from './normalizer';
import type { CellValue, CleanTable, RawTable } from './orderSchema';

export const DATE_NUMBER_FORMAT = 'yyyy-mm-dd';
export const PRICE_NUMBER_FORMAT = '"$"#,##0.00';

const EXCEL_EPOCH_OFFSET = 25569;
const MS_PER_DAY = 86_400_000;
const MIN_COLUMN_WIDTH = 10;
const MAX_COLUMN_WIDTH = 60;

export function isCsvFile(filename: string) {
  return path.extname(filename).toLowerCase() === '.csv';
}

/**
 * Reads the first sheet of an uploaded workbook or CSV file into header +
 * row arrays. CSV cells are kept as text; workbook cells keep their stored
 * type, so dates come through as Excel serial numbers.
 */
export function readSpreadsheet(buffer: Buffer, filename: string): RawTable {
  const wb = XLSX.read(buffer, { type: 'buffer', raw: isCsvFile(filename) });
  const sheetName = wb.SheetNames[0];
  const sheet = sheetName ? wb.Sheets[sheetName] : undefined;
  if (!sheet) return { headers: [], rows: [] };

  const grid = XLSX.utils.sheet_to_json<CellValue[]>(sheet, { header: 1, defval: null, raw: true, blankrows: true });
  const [headerRow = [], ...rows] = grid;
  return {
    headers: headerRow.map((h) => (h === null || h === undefined ? '' : String(h))),
    rows,
  };
}

function toExcelSerial(date: string): number {
  const [y, m, d] = date.split('-').map(Number);
  return Date.UTC(y, m - 1, d) / MS_PER_DAY + EXCEL_EPOCH_OFFSET;
}

function displayLength(value: CellValue): number {
  if (value === null || value === undefined) return 0;
  return String(value).length;
}

/**
 * Lays a clean table out as a worksheet: real date cells for Scheduled Date,
 * currency-formatted Price, and column widths fitted to the content.
 */
export function buildOrderBookSheet(table: CleanTable): XLSX.WorkSheet {
  const body = table.rows.map((row) => table.columns.map((column) => cellOf(row, column)));
  const sheet = XLSX.utils.aoa_to_sheet([table.columns, ...body]);

  const dateCol = table.columns.indexOf('Scheduled Date');
  const priceCol = table.columns.indexOf('Price');
  table.rows.forEach((row, i) => {
    const r = i + 1;
    if (dateCol >= 0 && row.scheduledDate) {
      sheet[XLSX.utils.encode_cell({ r, c: dateCol })] = { t: 'n', v: toExcelSerial(row.scheduledDate), z: DATE_NUMBER_FORMAT };
    }
    if (priceCol >= 0 && row.price !== null) {
      sheet[XLSX.utils.encode_cell({ r, c: priceCol })] = { t: 'n', v: row.price, z: PRICE_NUMBER_FORMAT };
    }
  });

  sheet['!cols'] = table.columns.map((column, c) => {
    const longest = Math.max(column.length, ...body.map((cells) => displayLength(cells[c])));
    return { wch: Math.min(Math.max(MIN_COLUMN_WIDTH, longest + 2), MAX_COLUMN_WIDTH) };
  });
  return sheet;
}

export function buildOrderBookWorkbook(table: CleanTable, sheetName = 'Order Book'): Buffer {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, buildOrderBookSheet(table), sheetName);
  const out: Buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  return out;
}
