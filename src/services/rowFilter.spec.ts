import { order } from '../test/fixtures';
import { filterRows, isBlankRow, isCandidateOrder, isSummaryRow } from './rowFilter';

describe('isSummaryRow', () => {
  it('matches a bare count with a total', () => {
    expect(isSummaryRow(order({ wo: '42', price: 1500 }))).toBe(true);
  });

  it('does not match real orders', () => {
    expect(isSummaryRow(order({ wo: '42', price: 1500, customerName: 'Acme Corp' }))).toBe(false);
    expect(isSummaryRow(order({ wo: 'WO-42', price: 1500 }))).toBe(false);
    expect(isSummaryRow(order({ wo: '42' }))).toBe(false);
    expect(isSummaryRow(order({ wo: '42', price: 1500, scheduledDate: '2024-03-15' }))).toBe(false);
  });
});

describe('isBlankRow', () => {
  it('matches a row with nothing in it', () => {
    expect(isBlankRow(order())).toBe(true);
    expect(isBlankRow(order({ extras: { Notes: 'ignored' } }))).toBe(true);
  });

  it('does not match a row with a price', () => {
    expect(isBlankRow(order({ price: 0 }))).toBe(false);
  });
});

describe('isCandidateOrder', () => {
  it('needs a WO, customer or model', () => {
    expect(isCandidateOrder(order({ modelDescription: 'Widget' }))).toBe(true);
    expect(isCandidateOrder(order({ quote: 'Q-1', price: 10 }))).toBe(false);
  });
});

describe('filterRows', () => {
  it('drops summary, blank and unidentified rows and keeps the order of the rest', () => {
    const a = order({ wo: '1001', customerName: 'Acme Corp' });
    const b = order({ customerName: 'Beta LLC', price: 99 });
    const rows = [a, order({ wo: '2', price: 5000 }), order(), order({ quote: 'Q-7' }), b];
    expect(filterRows(rows)).toEqual([a, b]);
  });
});
