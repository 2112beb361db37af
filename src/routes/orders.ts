import { Router, type Response } from 'express';
import mime from 'mime-types';
import multer from 'multer';
import { authenticateJWT, requireStaff, requireUpdatePassword, type AuthenticatedRequest } from '../middleware/auth';
import { buildMonthGrid, ownOrders, toCalendarEvents, toCustomerCalendarEvents } from '../services/calendar';
import { normalize, rawTableFromRecords } from '../services/normalizer';
import { emptyOrderBook, filterOrders, mergeEditedRows, removeOrder, rescheduleOrder, type MatchMode, type OrderFilters, type TextFilter } from '../services/orderBook';
import { REQUIRED_COLUMNS, type CleanTable } from '../services/orderSchema';
import type { OrderStore } from '../services/orderStore';
import { coerceDate } from '../services/rowNormalizer';
import { buildOrderBookWorkbook, readSpreadsheet } from '../services/spreadsheet';
import { HttpError, SchemaError } from '../utils/errors';

const ALLOWED_UPLOAD_TYPES = [
  'text/csv',
  'application/vnd.ms-excel',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
];

// Multer memory storage (no disk writes)
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 10 * 1024 * 1024, // 10 MB
  },
  fileFilter: (_req, file, cb) => {
    const type = mime.lookup(file.originalname);
    if (type && ALLOWED_UPLOAD_TYPES.includes(type)) return cb(null, true);
    return cb(new HttpError(415, 'Only .xlsx, .xls or .csv files are accepted'));
  },
});

function queryString(value: unknown): string | undefined {
  if (Array.isArray(value)) return queryString(value[0]);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function textFilter(text: string | undefined, match: string | undefined): TextFilter | undefined {
  if (!text) return undefined;
  const mode: MatchMode = match === 'exact' ? 'exact' : 'contains';
  return { text, match: mode };
}

function parseMonthNumber(year: unknown, month: unknown): { year: number; month: number } {
  const y = Number(year);
  const m = Number(month);
  if (!Number.isInteger(y) || y < 1 || y > 9999 || !Number.isInteger(m) || m < 1 || m > 12) {
    throw new HttpError(400, 'year and month must be a valid calendar month');
  }
  return { year: y, month: m };
}

// GET /api/orders?quote=&quoteMatch=exact&po=&status=&customer=&model=&wo=&date=&year=&month=
export function parseFilters(query: Record<string, unknown>): OrderFilters {
  const filters: OrderFilters = {
    wo: textFilter(queryString(query.wo), queryString(query.woMatch)),
    quote: textFilter(queryString(query.quote), queryString(query.quoteMatch)),
    poNumber: textFilter(queryString(query.po), queryString(query.poMatch)),
    status: textFilter(queryString(query.status), queryString(query.statusMatch)),
    customerName: textFilter(queryString(query.customer), queryString(query.customerMatch)),
    modelDescription: textFilter(queryString(query.model), queryString(query.modelMatch)),
  };
  const date = queryString(query.date);
  if (date) {
    const parsed = coerceDate(date);
    if (!parsed) throw new HttpError(400, 'date must be a valid calendar date');
    filters.date = parsed;
  } else if (queryString(query.year) || queryString(query.month)) {
    filters.month = parseMonthNumber(queryString(query.year), queryString(query.month));
  }
  return filters;
}

function parseExpectedVersion(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(n) || n < 0) throw new HttpError(400, 'expectedVersion must be a non-negative integer');
  return n;
}

function isRecordArray(value: unknown): value is Array<Record<string, unknown>> {
  return Array.isArray(value) && value.every((v) => typeof v === 'object' && v !== null && !Array.isArray(v));
}

function requireRows(body: unknown): Array<Record<string, unknown>> {
  const rows = typeof body === 'object' && body !== null && 'rows' in body ? body.rows : undefined;
  if (!isRecordArray(rows)) throw new HttpError(400, 'rows must be an array of objects');
  return rows;
}

// Customers see their own rows and the canonical columns only; extra columns stay with staff.
function visibleTable(req: AuthenticatedRequest, table: CleanTable): CleanTable {
  if (req.user?.role === 'staff') return { columns: table.columns, rows: [...table.rows] };
  return {
    columns: [...REQUIRED_COLUMNS],
    rows: ownOrders(table.rows, req.user?.customerNames ?? []).map((row) => ({ ...row, extras: {} })),
  };
}

function sendError(res: Response, err: unknown, tag: string, fallback: string) {
  if (err instanceof SchemaError) {
    console.warn(`[${tag}] Rejected file:`, { missing: err.missing, found: err.found });
    return res.status(422).json({ success: false, message: err.message, missing: err.missing, found: err.found });
  }
  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({ success: false, message: err.message });
  }
  console.error(`[${tag}] Unexpected error:`, err);
  return res.status(500).json({ success: false, message: err instanceof Error ? err.message : fallback });
}

function ingestUpload(req: AuthenticatedRequest, tag: string): { table: CleanTable; uploadedName: string } {
  if (!req.file) throw new HttpError(400, 'file is required');
  const raw = readSpreadsheet(req.file.buffer, req.file.originalname);
  const table = normalize(raw);
  console.log(`[${tag}] ${req.file.originalname}: read=${raw.rows.length} kept=${table.rows.length}`);
  return { table, uploadedName: req.file.originalname };
}

function bodyField(req: AuthenticatedRequest, field: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.prototype.hasOwnProperty.call(body, field) ? Reflect.get(body, field) : undefined;
}

export function createOrderHandlers(store: OrderStore) {
  return {
    // POST /api/orders/preview (multipart "file"): normalize without saving
    async preview(req: AuthenticatedRequest, res: Response) {
      try {
        const { table, uploadedName } = ingestUpload(req, 'OrderPreview');
        return res.json({ success: true, data: { uploadedName, count: table.rows.length, columns: table.columns, rows: table.rows } });
      } catch (err) {
        return sendError(res, err, 'OrderPreview', 'Failed to read file');
      }
    },

    // POST /api/orders/import (multipart "file"): normalize and replace the saved order book
    async importFile(req: AuthenticatedRequest, res: Response) {
      try {
        const { table, uploadedName } = ingestUpload(req, 'OrderImport');
        const expectedVersion = parseExpectedVersion(bodyField(req, 'expectedVersion'));
        const snapshot = await store.replace(table, uploadedName, expectedVersion);
        return res.status(201).json({
          success: true,
          data: { version: snapshot.version, uploadedName, count: table.rows.length, columns: table.columns },
        });
      } catch (err) {
        return sendError(res, err, 'OrderImport', 'Failed to import file');
      }
    },

    // GET /api/orders
    async list(req: AuthenticatedRequest, res: Response) {
      try {
        const filters = parseFilters(req.query);
        const snapshot = await store.load();
        const { columns, rows } = visibleTable(req, snapshot.table);
        const filtered = filterOrders(rows, filters);
        return res.json({
          success: true,
          data: {
            version: snapshot.version,
            uploadedName: snapshot.uploadedName,
            savedAt: snapshot.savedAt,
            total: rows.length,
            count: filtered.length,
            columns,
            rows: filtered,
          },
        });
      } catch (err) {
        return sendError(res, err, 'OrderList', 'Failed to load orders');
      }
    },

    // PUT /api/orders  Body: { rows, uploadedName?, expectedVersion? }
    async replaceAll(req: AuthenticatedRequest, res: Response) {
      try {
        const table = normalize(rawTableFromRecords(requireRows(req.body)));
        const expectedVersion = parseExpectedVersion(bodyField(req, 'expectedVersion'));
        const name = bodyField(req, 'uploadedName');
        const current = await store.load();
        const snapshot = await store.replace(table, typeof name === 'string' ? name : current.uploadedName, expectedVersion);
        return res.json({ success: true, data: { version: snapshot.version, count: table.rows.length } });
      } catch (err) {
        return sendError(res, err, 'OrderSave', 'Failed to save orders');
      }
    },

    // PATCH /api/orders/merge  Body: { displayedWos, rows, expectedVersion? }
    async merge(req: AuthenticatedRequest, res: Response) {
      try {
        const displayed = bodyField(req, 'displayedWos');
        if (!Array.isArray(displayed) || !displayed.every((wo) => typeof wo === 'string')) {
          throw new HttpError(400, 'displayedWos must be an array of strings');
        }
        const edited = rawTableFromRecords(requireRows(req.body));
        const expectedVersion = parseExpectedVersion(bodyField(req, 'expectedVersion'));
        const current = await store.load();
        const merged = mergeEditedRows(current.table, displayed, edited);
        const snapshot = await store.replace(merged, current.uploadedName, expectedVersion);
        return res.json({ success: true, data: { version: snapshot.version, count: merged.rows.length } });
      } catch (err) {
        return sendError(res, err, 'OrderMerge', 'Failed to apply changes');
      }
    },

    // PATCH /api/orders/:wo/schedule  Body: { date, expectedVersion? }
    async reschedule(req: AuthenticatedRequest, res: Response) {
      try {
        const expectedVersion = parseExpectedVersion(bodyField(req, 'expectedVersion'));
        const current = await store.load();
        const { table, date } = rescheduleOrder(current.table, req.params.wo, bodyField(req, 'date'));
        const snapshot = await store.replace(table, current.uploadedName, expectedVersion);
        console.log('[OrderSchedule] Moved', { wo: req.params.wo, date, by: req.user?.username });
        return res.json({ success: true, data: { version: snapshot.version, wo: req.params.wo.trim(), scheduledDate: date } });
      } catch (err) {
        return sendError(res, err, 'OrderSchedule', 'Failed to reschedule order');
      }
    },

    // DELETE /api/orders/:wo
    async removeOne(req: AuthenticatedRequest, res: Response) {
      try {
        const expectedVersion = parseExpectedVersion(bodyField(req, 'expectedVersion'));
        const current = await store.load();
        const { table, removed } = removeOrder(current.table, req.params.wo);
        const snapshot = await store.replace(table, current.uploadedName, expectedVersion);
        return res.json({ success: true, data: { version: snapshot.version, removed } });
      } catch (err) {
        return sendError(res, err, 'OrderDelete', 'Failed to delete order');
      }
    },

    // DELETE /api/orders
    async clear(req: AuthenticatedRequest, res: Response) {
      try {
        const expectedVersion = parseExpectedVersion(bodyField(req, 'expectedVersion'));
        const snapshot = await store.replace(emptyOrderBook(), null, expectedVersion);
        console.log('[OrderClear] Order book cleared', { by: req.user?.username });
        return res.json({ success: true, data: { version: snapshot.version } });
      } catch (err) {
        return sendError(res, err, 'OrderClear', 'Failed to clear orders');
      }
    },

    // GET /api/orders/events
    async events(req: AuthenticatedRequest, res: Response) {
      try {
        const snapshot = await store.load();
        const events = req.user?.role === 'staff'
          ? toCalendarEvents(snapshot.table.rows)
          : toCustomerCalendarEvents(snapshot.table.rows, req.user?.customerNames ?? []);
        return res.json({ success: true, data: events });
      } catch (err) {
        return sendError(res, err, 'OrderEvents', 'Failed to build calendar');
      }
    },

    // GET /api/orders/calendar/:year/:month
    async monthGrid(req: AuthenticatedRequest, res: Response) {
      try {
        const { year, month } = parseMonthNumber(req.params.year, req.params.month);
        const snapshot = await store.load();
        const customers = req.user?.role === 'staff' ? undefined : req.user?.customerNames ?? [];
        return res.json({ success: true, data: buildMonthGrid(snapshot.table.rows, year, month, customers) });
      } catch (err) {
        return sendError(res, err, 'OrderMonth', 'Failed to build month view');
      }
    },

    // GET /api/orders/export (same filters as the list)
    async exportXlsx(req: AuthenticatedRequest, res: Response) {
      try {
        const filters = parseFilters(req.query);
        const snapshot = await store.load();
        const visible = visibleTable(req, snapshot.table);
        const rows = filterOrders(visible.rows, filters);
        const staff = req.user?.role === 'staff';
        const buffer = buildOrderBookWorkbook({ columns: visible.columns, rows }, staff ? 'Order Book' : 'My Orders');
        const stamp = new Date().toISOString().slice(0, 10);
        res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
        res.setHeader('Content-Disposition', `attachment; filename="${staff ? 'order-book' : 'my-orders'}-${stamp}.xlsx"`);
        return res.send(buffer);
      } catch (err) {
        return sendError(res, err, 'OrderExport', 'Failed to export orders');
      }
    },
  };
}

export function createOrdersRouter(store: OrderStore) {
  const handlers = createOrderHandlers(store);
  const router = Router();
  router.use(authenticateJWT());

  router.get('/', handlers.list);
  router.get('/events', handlers.events);
  router.get('/calendar/:year/:month', handlers.monthGrid);
  router.get('/export', handlers.exportXlsx);

  router.post('/preview', requireStaff(), upload.single('file'), handlers.preview);
  router.post('/import', requireStaff(), upload.single('file'), requireUpdatePassword(), handlers.importFile);
  router.put('/', requireStaff(), requireUpdatePassword(), handlers.replaceAll);
  router.patch('/merge', requireStaff(), requireUpdatePassword(), handlers.merge);
  router.patch('/:wo/schedule', requireStaff(), requireUpdatePassword(), handlers.reschedule);
  router.delete('/:wo', requireStaff(), requireUpdatePassword(), handlers.removeOne);
  router.delete('/', requireStaff(), requireUpdatePassword(), handlers.clear);

  return router;
}
