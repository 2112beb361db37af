import { TEXT_FIELDS, type OrderRecord } from './orderSchema';

const BARE_COUNT = /^\d+$/;

/**
 * Footer line left by spreadsheet exports: a bare row count in WO and a
 * total in Price, nothing else. This is a heuristic; a numeric WO on an
 * otherwise empty priced row is dropped too.
 */
export function isSummaryRow(row: OrderRecord): boolean {
  return (
    BARE_COUNT.test(row.wo) &&
    row.quote === '' &&
    row.poNumber === '' &&
    row.status === '' &&
    row.customerName === '' &&
    row.modelDescription === '' &&
    row.scheduledDate === null &&
    row.price !== null
  );
}

export function isBlankRow(row: OrderRecord): boolean {
  return TEXT_FIELDS.every((f) => row[f] === '') && row.scheduledDate === null && row.price === null;
}

/** True when the row carries something that identifies an order. */
export function isCandidateOrder(row: OrderRecord): boolean {
  return row.wo !== '' || row.customerName !== '' || row.modelDescription !== '';
}

/**
 * Drops summary and blank rows, then anything left that names no order
 * (no WO, customer or model), keeping the relative order of the rest.
 */
export function filterRows(rows: readonly OrderRecord[]): OrderRecord[] {
  return rows.filter((row) => !isSummaryRow(row) && !isBlankRow(row) && isCandidateOrder(row));
}
