import mongoose from 'mongoose';
import type { IOrderBookEntry } from '../models/order';
import type { IOrderBookSnapshot } from '../models/orderBookSnapshot';

type VersionFilter = number | { $lt: number };

function matchesVersion(value: number, filter: VersionFilter) {
  return typeof filter === 'number' ? value === filter : value < filter.$lt;
}

// Every call settles on a later turn of the event loop so overlapping saves interleave.
function later<T>(fn: () => T): Promise<T> {
  return new Promise((resolve, reject) => {
    setImmediate(() => {
      try {
        resolve(fn());
      } catch (err) {
        reject(err);
      }
    });
  });
}

function duplicateKeyError() {
  return new mongoose.mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 });
}

/**
 * In-process stand-in for the order book models, covering the queries
 * MongoOrderStore issues. Installed with jest.mock in the store tests.
 */
export function createFakeOrderModels() {
  let snapshot: IOrderBookSnapshot | null = null;
  let entries: IOrderBookEntry[] = [];

  const snapshotModel = {
    findOne: (_filter: { key: string }) => ({
      lean: () => later(() => (snapshot ? { ...snapshot } : null)),
    }),
    findOneAndUpdate: (
      filter: { key: string; version?: number },
      update: { $inc?: { version: number }; $set?: { version: number } },
    ) => ({
      lean: () => later(() => {
        if (snapshot && (filter.version === undefined || filter.version === snapshot.version)) {
          if (update.$inc) snapshot.version += update.$inc.version;
          if (update.$set) snapshot.version = update.$set.version;
          return { ...snapshot };
        }
        // The upsert would insert a second document with the same key.
        if (snapshot) throw duplicateKeyError();
        snapshot = {
          key: filter.key,
          version: update.$inc?.version ?? update.$set?.version ?? 0,
          committedVersion: 0,
          columns: [],
          uploadedName: null,
          rowCount: 0,
          savedAt: new Date(0),
        };
        return { ...snapshot };
      }),
    }),
    updateOne: (
      filter: { key: string; committedVersion: { $lt: number } },
      update: { $set: Omit<IOrderBookSnapshot, 'key' | 'version'> },
    ) => later(() => {
      if (!snapshot || snapshot.committedVersion >= filter.committedVersion.$lt) return { modifiedCount: 0 };
      snapshot = { ...snapshot, ...update.$set };
      return { modifiedCount: 1 };
    }),
  };

  const entryModel = {
    find: (filter: { snapshotVersion: number }) => ({
      sort: (_order: { position: 1 }) => ({
        lean: () => later(() => entries
          .filter((e) => e.snapshotVersion === filter.snapshotVersion)
          .sort((a, b) => a.position - b.position)
          .map((e) => ({ ...e }))),
      }),
    }),
    insertMany: (docs: IOrderBookEntry[]) => later(() => {
      entries.push(...docs.map((d) => ({ ...d })));
      return docs;
    }),
    deleteMany: (filter: { snapshotVersion: VersionFilter }) => later(() => {
      const before = entries.length;
      entries = entries.filter((e) => !matchesVersion(e.snapshotVersion, filter.snapshotVersion));
      return { deletedCount: before - entries.length };
    }),
  };

  return {
    snapshotModel,
    entryModel,
    entries: () => entries,
    reset() {
      snapshot = null;
      entries = [];
    },
  };
}

export const fakeOrderModels = createFakeOrderModels();
