import { Schema, model } from 'mongoose';

export interface IOrderBookSnapshot {
  key: string;
  // Last version handed to a save, finished or not
  version: number;
  // Version whose rows are complete; readers only see this one
  committedVersion: number;
  columns: string[];
  uploadedName: string | null;
  rowCount: number;
  savedAt: Date;
}

const OrderBookSnapshotSchema = new Schema<IOrderBookSnapshot>({
  key: { type: String, required: true, unique: true },
  version: { type: Number, required: true, default: 0 },
  committedVersion: { type: Number, required: true, default: 0 },
  columns: [{ type: String }],
  uploadedName: { type: String, default: null },
  rowCount: { type: Number, default: 0 },
  savedAt: { type: Date, default: () => new Date() },
}, { timestamps: true });

export const OrderBookSnapshotModel = model<IOrderBookSnapshot>('OrderBookSnapshot', OrderBookSnapshotSchema);
