import { SchemaError } from '../utils/errors';
import { normalize, rawTableFromRecords, toRawTable } from './normalizer';
import { REQUIRED_COLUMNS, type RawTable } from './orderSchema';

const aliasedHeaders = ['Work Order', 'Quote', 'PO #', 'Status', 'Client', 'Model', 'Ship Date', 'Amount', 'Notes'];

function sampleTable(headers: string[]): RawTable {
  return {
    headers,
    rows: [
      ['1001', 'Q-1', 'PO-1', 'Open', 'Acme Corp', 'Widget', '2024-03-15', '$1,234.50', 'rush'],
      ['2', null, null, null, null, null, null, '2,469.00', null],
      [null, null, null, null, null, null, null, null, null],
      ['1002', '', '', 'In Progress', 'Beta LLC', 'Gadget', 'NaT', 'abc', null],
    ],
  };
}

describe('normalize', () => {
  it('resolves aliases, coerces cells and drops summary and blank rows', () => {
    const clean = normalize(sampleTable(aliasedHeaders));
    expect(clean.columns).toEqual([...REQUIRED_COLUMNS, 'Notes']);
    expect(clean.rows).toEqual([
      {
        wo: '1001',
        quote: 'Q-1',
        poNumber: 'PO-1',
        status: 'Open',
        customerName: 'Acme Corp',
        modelDescription: 'Widget',
        scheduledDate: '2024-03-15',
        price: 1234.5,
        extras: { Notes: 'rush' },
      },
      {
        wo: '1002',
        quote: '',
        poNumber: '',
        status: 'In Progress',
        customerName: 'Beta LLC',
        modelDescription: 'Gadget',
        scheduledDate: null,
        price: null,
        extras: { Notes: null },
      },
    ]);
  });

  it('gives the same result for canonical and aliased headers', () => {
    const canonical = normalize(sampleTable([...REQUIRED_COLUMNS, 'Notes']));
    expect(normalize(sampleTable(aliasedHeaders))).toEqual(canonical);
  });

  it('throws before reading rows when required columns are missing', () => {
    const raw: RawTable = { headers: ['WO', 'Quote', 'PO Number', 'Status', 'Customer Name', 'Model Description'], rows: [['1001']] };
    expect(() => normalize(raw)).toThrow(SchemaError);
    expect(() => normalize(raw)).toThrow('Missing required columns: Scheduled Date, Price');
  });

  it('is idempotent on its own output', () => {
    const clean = normalize(sampleTable(aliasedHeaders));
    expect(normalize(toRawTable(clean))).toEqual(clean);
  });

  it('returns an empty table for a header-only file', () => {
    expect(normalize({ headers: [...REQUIRED_COLUMNS], rows: [] })).toEqual({ columns: [...REQUIRED_COLUMNS], rows: [] });
  });
});

describe('rawTableFromRecords', () => {
  it('collects headers in first-seen order', () => {
    const raw = rawTableFromRecords([{ WO: '1', Customer: 'Acme Corp' }, { Price: 5, WO: '2' }]);
    expect(raw).toEqual({
      headers: ['WO', 'Customer', 'Price'],
      rows: [['1', 'Acme Corp', null], ['2', null, 5]],
    });
  });

  it('flattens rows in the list response shape', () => {
    const raw = rawTableFromRecords([
      { wo: '1001', customerName: 'Acme Corp', scheduledDate: '2024-03-15', price: 10, extras: { Notes: 'rush' } },
    ]);
    expect(raw).toEqual({
      headers: ['WO', 'Customer Name', 'Scheduled Date', 'Price', 'Notes'],
      rows: [['1001', 'Acme Corp', '2024-03-15', 10, 'rush']],
    });
  });
});
