import { Schema, model } from 'mongoose';

export interface IOrderBookEntry {
  // Snapshot version these rows were written under
  snapshotVersion: number;
  position: number;
  wo: string;
  quote: string;
  poNumber: string;
  status: string;
  customerName: string;
  modelDescription: string;
  scheduledDate: string | null; // YYYY-MM-DD
  price: number | null;
  extras: Record<string, unknown>;
  uploadedName: string;
}

// Text fields are stored as '' rather than left out, so `required` cannot be used on them.
const OrderBookEntrySchema = new Schema<IOrderBookEntry>({
  snapshotVersion: { type: Number, required: true, index: true },
  position: { type: Number, required: true, index: true },
  wo: { type: String, default: '', index: true },
  quote: { type: String, default: '' },
  poNumber: { type: String, default: '' },
  status: { type: String, default: '' },
  customerName: { type: String, default: '', index: true },
  modelDescription: { type: String, default: '' },
  scheduledDate: { type: String, default: null, index: true },
  price: { type: Number, default: null },
  extras: { type: Schema.Types.Mixed, default: {} },
  uploadedName: { type: String, default: '' },
}, { timestamps: true, minimize: false });

export const OrderBookEntryModel = model<IOrderBookEntry>('OrderBookEntry', OrderBookEntrySchema);
