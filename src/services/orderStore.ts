import mongoose from 'mongoose';
import { OrderBookEntryModel, type IOrderBookEntry } from '../models/order';
import { OrderBookSnapshotModel } from '../models/orderBookSnapshot';
import { SnapshotConflictError } from '../utils/errors';
import { toCellValue } from './normalizer';
import { REQUIRED_COLUMNS, type CellValue, type CleanTable, type OrderRecord } from './orderSchema';

const SNAPSHOT_KEY = 'order_book';
// Rows per insertMany call
const INSERT_BATCH_SIZE = 500;

export interface OrderBookSnapshot {
  table: CleanTable;
  uploadedName: string | null;
  version: number;
  savedAt: Date | null;
}

/**
 * Persistence for the shared order book. Saving replaces the whole snapshot.
 * Passing `expectedVersion` rejects the save when someone else saved first;
 * leaving it out keeps last-write-wins.
 */
export interface OrderStore {
  load(): Promise<OrderBookSnapshot>;
  replace(table: CleanTable, uploadedName: string | null, expectedVersion?: number): Promise<OrderBookSnapshot>;
}

export function chunk<T>(arr: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < arr.length; i += size) out.push(arr.slice(i, i + size));
  return out;
}

type StoredEntry = Partial<Omit<IOrderBookEntry, 'extras'>> & { extras?: unknown };

function toRecord(doc: StoredEntry): OrderRecord {
  const extras: Record<string, CellValue> = {};
  if (typeof doc.extras === 'object' && doc.extras !== null) {
    for (const [key, value] of Object.entries(doc.extras)) extras[key] = toCellValue(value);
  }
  return {
    wo: doc.wo ?? '',
    quote: doc.quote ?? '',
    poNumber: doc.poNumber ?? '',
    status: doc.status ?? '',
    customerName: doc.customerName ?? '',
    modelDescription: doc.modelDescription ?? '',
    scheduledDate: doc.scheduledDate ?? null,
    price: typeof doc.price === 'number' ? doc.price : null,
    extras,
  };
}

function isDuplicateKey(err: unknown) {
  return err instanceof mongoose.mongo.MongoServerError && err.code === 11000;
}

/**
 * Each save claims a new version, writes its rows tagged with that version,
 * then commits by moving `committedVersion` forward. Readers only see
 * committed rows, so overlapping saves never mix. A save that reaches the
 * commit after a newer one has committed drops its own rows.
 */
export class MongoOrderStore implements OrderStore {
  async load(): Promise<OrderBookSnapshot> {
    const meta = await OrderBookSnapshotModel.findOne({ key: SNAPSHOT_KEY }).lean();
    const version = meta?.committedVersion ?? 0;
    const docs = await OrderBookEntryModel.find({ snapshotVersion: version }).sort({ position: 1 }).lean();
    const rows = docs.map((doc) => toRecord(doc));
    return {
      table: { columns: meta?.columns?.length ? meta.columns : [...REQUIRED_COLUMNS], rows },
      uploadedName: meta?.uploadedName ?? null,
      version,
      savedAt: version > 0 ? meta?.savedAt ?? null : null,
    };
  }

  async replace(table: CleanTable, uploadedName: string | null, expectedVersion?: number): Promise<OrderBookSnapshot> {
    const version = await this.claimVersion(expectedVersion);

    const docs: IOrderBookEntry[] = table.rows.map((row, position) => ({
      ...row,
      snapshotVersion: version,
      position,
      uploadedName: uploadedName ?? '',
    }));
    for (const batch of chunk(docs, INSERT_BATCH_SIZE)) {
      await OrderBookEntryModel.insertMany(batch);
    }

    const savedAt = new Date();
    const commit = await OrderBookSnapshotModel.updateOne(
      { key: SNAPSHOT_KEY, committedVersion: { $lt: version } },
      { $set: { committedVersion: version, columns: table.columns, uploadedName, rowCount: docs.length, savedAt } },
    );
    if (commit.modifiedCount === 0) {
      await OrderBookEntryModel.deleteMany({ snapshotVersion: version });
      const latest = await this.load();
      console.warn(`[OrderStore] Dropped snapshot v${version}; v${latest.version} was saved first`);
      if (expectedVersion !== undefined) throw new SnapshotConflictError(expectedVersion, latest.version);
      return latest;
    }

    await OrderBookEntryModel.deleteMany({ snapshotVersion: { $lt: version } });
    console.log(`[OrderStore] Saved snapshot v${version} rows=${docs.length} source=${uploadedName ?? '-'}`);
    return { table, uploadedName, version, savedAt };
  }

  private async currentVersion(): Promise<number> {
    const meta = await OrderBookSnapshotModel.findOne({ key: SNAPSHOT_KEY }).lean();
    return meta?.version ?? 0;
  }

  private async claimVersion(expectedVersion?: number): Promise<number> {
    if (expectedVersion === undefined) {
      const meta = await OrderBookSnapshotModel.findOneAndUpdate(
        { key: SNAPSHOT_KEY },
        { $inc: { version: 1 } },
        { upsert: true, new: true },
      ).lean();
      if (!meta) throw new Error('Order book snapshot was not created');
      return meta.version;
    }

    const current = await this.currentVersion();
    if (current !== expectedVersion) throw new SnapshotConflictError(expectedVersion, current);

    // Matching on the version makes a concurrent guarded claim fail on the unique key.
    const meta = await OrderBookSnapshotModel.findOneAndUpdate(
      { key: SNAPSHOT_KEY, version: expectedVersion },
      { $set: { version: expectedVersion + 1 } },
      { upsert: true, new: true },
    ).lean().catch(async (err: unknown) => {
      if (isDuplicateKey(err)) throw new SnapshotConflictError(expectedVersion, await this.currentVersion());
      throw err;
    });
    if (!meta) throw new Error('Order book snapshot was not created');
    return meta.version;
  }
}
