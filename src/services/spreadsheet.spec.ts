import { normalize } from './normalizer';
import { REQUIRED_COLUMNS, type CleanTable } from './orderSchema';
import { DATE_NUMBER_FORMAT, PRICE_NUMBER_FORMAT, buildOrderBookSheet, buildOrderBookWorkbook, isCsvFile, readSpreadsheet } from './spreadsheet';

const table: CleanTable = {
  columns: [...REQUIRED_COLUMNS],
  rows: [
    {
      wo: '1001',
      quote: 'Q-1',
      poNumber: 'PO-1',
      status: 'Open',
      customerName: 'Acme Corp',
      modelDescription: 'Widget',
      scheduledDate: '2024-03-15',
      price: 1234.5,
      extras: {},
    },
  ],
};

describe('isCsvFile', () => {
  it('goes by extension', () => {
    expect(isCsvFile('orders.CSV')).toBe(true);
    expect(isCsvFile('orders.xlsx')).toBe(false);
  });
});

describe('readSpreadsheet', () => {
  it('reads CSV cells as text', () => {
    const csv = Buffer.from('WO,Customer Name,Price\n1001,Acme Corp,1200.50\n');
    const raw = readSpreadsheet(csv, 'orders.csv');
    expect(raw.headers).toEqual(['WO', 'Customer Name', 'Price']);
    expect(raw.rows[0]).toEqual(['1001', 'Acme Corp', '1200.50']);
  });
});

describe('buildOrderBookSheet', () => {
  it('writes dates and prices as formatted numbers', () => {
    const sheet = buildOrderBookSheet(table);
    expect(sheet['A1']).toMatchObject({ v: 'WO' });
    expect(sheet['G2']).toEqual({ t: 'n', v: 45366, z: DATE_NUMBER_FORMAT });
    expect(sheet['H2']).toEqual({ t: 'n', v: 1234.5, z: PRICE_NUMBER_FORMAT });
  });

  it('fits column widths to the content', () => {
    const sheet = buildOrderBookSheet(table);
    expect(sheet['!cols']?.[0]).toEqual({ wch: 10 });
    expect(sheet['!cols']?.[5]).toEqual({ wch: 19 });
  });
});

describe('buildOrderBookWorkbook', () => {
  it('reads back to the same orders', () => {
    const buffer = buildOrderBookWorkbook(table);
    const raw = readSpreadsheet(buffer, 'order-book.xlsx');
    expect(raw.headers).toEqual([...REQUIRED_COLUMNS]);
    expect(normalize(raw)).toEqual(table);
  });
});
