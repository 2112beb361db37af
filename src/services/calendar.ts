import { format, getDaysInMonth, getDay } from 'date-fns';
import type { CalendarDate, OrderRecord } from './orderSchema';
import { SOLD_COLORS, normalizeStatusKey, statusToColors, type EventColors, type StatusKey } from './statusClassifier';

export interface OrderEventProps {
  wo: string;
  customerName: string;
  modelDescription: string;
  status: string;
}

export interface CalendarEvent extends EventColors {
  id: string;
  title: string;
  start: CalendarDate;
  allDay: true;
  extendedProps: OrderEventProps | { sold: true };
}

export interface MonthGridEntry extends OrderEventProps {
  statusKey: StatusKey;
}

export interface MonthGridDay {
  date: CalendarDate;
  day: number;
  entries: MonthGridEntry[];
  // Only another customer has an order on this date (customer view only)
  sold: boolean;
}

export interface MonthGrid {
  year: number;
  month: number;
  label: string;
  // Sunday-first weeks; null pads days outside the month
  weeks: Array<Array<MonthGridDay | null>>;
}

function sameCustomer(a: string, b: string) {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/** True when the row belongs to one of the signed-in customer's accounts. */
export function isOwnOrder(row: OrderRecord, customerNames: readonly string[]): boolean {
  return customerNames.some((name) => sameCustomer(row.customerName, name));
}

export function ownOrders(rows: readonly OrderRecord[], customerNames: readonly string[]): OrderRecord[] {
  return rows.filter((row) => isOwnOrder(row, customerNames));
}

function eventTitle(row: OrderRecord) {
  const title = [row.wo, row.customerName].filter(Boolean).join(' | ');
  return row.modelDescription ? `${title} — ${row.modelDescription}` : title;
}

function orderEvent(row: OrderRecord, start: CalendarDate): CalendarEvent {
  return {
    id: row.wo,
    title: eventTitle(row),
    start,
    allDay: true,
    ...statusToColors(row.status),
    extendedProps: {
      wo: row.wo,
      customerName: row.customerName,
      modelDescription: row.modelDescription,
      status: row.status,
    },
  };
}

/** Full-detail events for staff; rows without a WO or a date are not shown. */
export function toCalendarEvents(rows: readonly OrderRecord[]): CalendarEvent[] {
  const events: CalendarEvent[] = [];
  for (const row of rows) {
    if (!row.wo || !row.scheduledDate) continue;
    events.push(orderEvent(row, row.scheduledDate));
  }
  return events;
}

/**
 * Customer view: own orders in full, every other booking as an anonymous
 * SOLD block that only reveals the date.
 */
export function toCustomerCalendarEvents(rows: readonly OrderRecord[], customerNames: readonly string[]): CalendarEvent[] {
  const events: CalendarEvent[] = [];
  for (const row of rows) {
    if (!row.wo || !row.scheduledDate) continue;
    if (isOwnOrder(row, customerNames)) {
      events.push(orderEvent(row, row.scheduledDate));
    } else {
      events.push({
        id: `sold_${row.wo}`,
        title: 'SOLD',
        start: row.scheduledDate,
        allDay: true,
        ...SOLD_COLORS,
        extendedProps: { sold: true },
      });
    }
  }
  return events;
}

/**
 * Groups a month's orders by date into a Sunday-first grid. With
 * `customerNames` only that customer's orders are listed; dates booked only
 * by others are flagged `sold`.
 */
export function buildMonthGrid(
  rows: readonly OrderRecord[],
  year: number,
  month: number,
  customerNames?: readonly string[],
): MonthGrid {
  const first = new Date(year, month - 1, 1);
  const prefix = format(first, 'yyyy-MM-');
  const entriesByDate = new Map<CalendarDate, MonthGridEntry[]>();
  const soldDates = new Set<CalendarDate>();

  for (const row of rows) {
    const date = row.scheduledDate;
    if (!date || !date.startsWith(prefix)) continue;
    if (customerNames && !isOwnOrder(row, customerNames)) {
      soldDates.add(date);
      continue;
    }
    const list = entriesByDate.get(date) ?? [];
    list.push({
      wo: row.wo,
      customerName: row.customerName,
      modelDescription: row.modelDescription,
      status: row.status,
      statusKey: normalizeStatusKey(row.status),
    });
    entriesByDate.set(date, list);
  }

  const leading = getDay(first);
  const daysInMonth = getDaysInMonth(first);
  const weekCount = Math.ceil((leading + daysInMonth) / 7);
  const weeks: Array<Array<MonthGridDay | null>> = [];

  for (let w = 0; w < weekCount; w++) {
    const week: Array<MonthGridDay | null> = [];
    for (let dow = 0; dow < 7; dow++) {
      const day = w * 7 + dow - leading + 1;
      if (day < 1 || day > daysInMonth) {
        week.push(null);
        continue;
      }
      const date = `${prefix}${String(day).padStart(2, '0')}`;
      const entries = entriesByDate.get(date) ?? [];
      week.push({ date, day, entries, sold: soldDates.has(date) && entries.length === 0 });
    }
    weeks.push(week);
  }

  return { year, month, label: format(first, 'MMMM yyyy'), weeks };
}
