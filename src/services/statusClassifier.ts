export type StatusKey = 'open' | 'in progress' | 'completed' | 'on hold' | 'cancelled' | 'default';

export interface EventColors {
  backgroundColor: string;
  borderColor: string;
  textColor: string;
}

export const STATUS_COLORS: Record<StatusKey, EventColors> = {
  'open': { backgroundColor: '#2563eb', borderColor: '#1d4ed8', textColor: '#ffffff' },
  'in progress': { backgroundColor: '#d97706', borderColor: '#b45309', textColor: '#ffffff' },
  'completed': { backgroundColor: '#16a34a', borderColor: '#15803d', textColor: '#ffffff' },
  'on hold': { backgroundColor: '#6b7280', borderColor: '#4b5563', textColor: '#ffffff' },
  'cancelled': { backgroundColor: '#dc2626', borderColor: '#b91c1c', textColor: '#ffffff' },
  'default': { backgroundColor: '#0f766e', borderColor: '#115e59', textColor: '#ffffff' },
};

// Other customers' bookings in the customer view
export const SOLD_COLORS: EventColors = { backgroundColor: '#cbd5e1', borderColor: '#94a3b8', textColor: '#475569' };

// Checked in declaration order; the first category with a matching keyword wins.
const STATUS_KEYWORDS: Array<[StatusKey, string[]]> = [
  ['open', ['open', 'new', 'pending']],
  ['in progress', ['in progress', 'inprogress', 'wip', 'started', 'working']],
  ['completed', ['completed', 'complete', 'done', 'closed', 'shipped', 'delivered']],
  ['on hold', ['on hold', 'hold', 'paused', 'waiting']],
  ['cancelled', ['cancelled', 'canceled', 'void']],
];

function isStatusKey(value: string): value is StatusKey {
  return Object.prototype.hasOwnProperty.call(STATUS_COLORS, value);
}

/** Maps free-text status to a display category by keyword. */
export function normalizeStatusKey(status: string | null | undefined): StatusKey {
  const raw = String(status ?? '').trim().toLowerCase();
  if (!raw) return 'default';
  const compact = raw.replace(/[^a-z0-9]+/g, ' ').trim();
  if (isStatusKey(compact)) return compact;
  for (const [key, keywords] of STATUS_KEYWORDS) {
    if (keywords.some((k) => compact.includes(k))) return key;
  }
  return 'default';
}

export function statusToColors(status: string | null | undefined): EventColors {
  return STATUS_COLORS[normalizeStatusKey(status)];
}
