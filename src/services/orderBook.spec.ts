import { order } from '../test/fixtures';
import { HttpError } from '../utils/errors';
import { emptyOrderBook, filterOrders, mergeEditedRows, removeOrder, rescheduleOrder } from './orderBook';
import { REQUIRED_COLUMNS, type CleanTable } from './orderSchema';

const a = order({ wo: '1001', quote: 'Q-1', status: 'Open', customerName: 'Acme Corp', scheduledDate: '2024-03-15' });
const b = order({ wo: '1002', quote: 'Q-2', status: 'Done', customerName: 'Beta LLC', scheduledDate: '2024-04-02' });
const c = order({ wo: '1003', quote: 'Q-3', status: 'open order', customerName: 'Acme Corp' });
const book: CleanTable = { columns: [...REQUIRED_COLUMNS], rows: [a, b, c] };

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

describe('filterOrders', () => {
  it('matches contains filters without regard to case', () => {
    expect(filterOrders(book.rows, { customerName: { text: 'acme', match: 'contains' } })).toEqual([a, c]);
  });

  it('compares exact filters case-sensitively except for status', () => {
    expect(filterOrders(book.rows, { quote: { text: 'q-1', match: 'exact' } })).toEqual([]);
    expect(filterOrders(book.rows, { quote: { text: ' Q-1 ', match: 'exact' } })).toEqual([a]);
    expect(filterOrders(book.rows, { status: { text: 'OPEN', match: 'exact' } })).toEqual([a]);
  });

  it('filters by day or by month', () => {
    expect(filterOrders(book.rows, { date: '2024-04-02' })).toEqual([b]);
    expect(filterOrders(book.rows, { month: { year: 2024, month: 3 } })).toEqual([a]);
  });

  it('ignores empty filter text', () => {
    expect(filterOrders(book.rows, { wo: { text: '', match: 'exact' } })).toHaveLength(3);
  });
});

describe('mergeEditedRows', () => {
  it('replaces the displayed rows with the edited ones', () => {
    const edited = {
      headers: [...REQUIRED_COLUMNS, 'Notes'],
      rows: [['1002', 'Q-2', '', 'Shipped', 'Beta LLC', 'Gadget', '2024-04-05', 50, 'moved']],
    };
    const merged = mergeEditedRows(book, ['1002'], edited);
    expect(merged.columns).toEqual([...REQUIRED_COLUMNS, 'Notes']);
    expect(merged.rows.map((r) => r.wo)).toEqual(['1001', '1003', '1002']);
    expect(merged.rows[2]).toMatchObject({ status: 'Shipped', scheduledDate: '2024-04-05', price: 50, extras: { Notes: 'moved' } });
  });

  it('leaves the book alone when the edit holds no orders', () => {
    const edited = { headers: [...REQUIRED_COLUMNS], rows: [['', 'Q-9', '', '', '', '', '', '']] };
    expect(mergeEditedRows(book, ['1002'], edited)).toBe(book);
  });
});

describe('rescheduleOrder', () => {
  it('moves the order to the coerced date', () => {
    const { table, date } = rescheduleOrder(book, ' 1002 ', '04/09/2024');
    expect(date).toBe('2024-04-09');
    expect(table.rows[1].scheduledDate).toBe('2024-04-09');
    expect(book.rows[1].scheduledDate).toBe('2024-04-02');
  });

  it('rejects an unreadable date with 400', () => {
    const err = captureError(() => rescheduleOrder(book, '1002', 'soon'));
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ statusCode: 400 });
  });

  it('rejects an unknown WO with 404', () => {
    expect(captureError(() => rescheduleOrder(book, '9999', '2024-04-09'))).toMatchObject({ statusCode: 404 });
  });
});

describe('removeOrder', () => {
  it('drops every row with the WO', () => {
    const { table, removed } = removeOrder(book, '1001');
    expect(removed).toBe(1);
    expect(table.rows).toEqual([b, c]);
  });

  it('rejects an unknown WO with 404', () => {
    expect(captureError(() => removeOrder(book, '9999'))).toMatchObject({ statusCode: 404, message: 'Order 9999 not found' });
  });
});

describe('emptyOrderBook', () => {
  it('has the canonical columns and no rows', () => {
    expect(emptyOrderBook()).toEqual({ columns: [...REQUIRED_COLUMNS], rows: [] });
  });
});
