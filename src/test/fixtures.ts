import type { OrderRecord } from '../services/orderSchema';

export function order(overrides: Partial<OrderRecord> = {}): OrderRecord {
  return {
    wo: '',
    quote: '',
    poNumber: '',
    status: '',
    customerName: '',
    modelDescription: '',
    scheduledDate: null,
    price: null,
    extras: {},
    ...overrides,
  };
}
