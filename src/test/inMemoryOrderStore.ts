import { emptyOrderBook } from '../services/orderBook';
import type { CleanTable } from '../services/orderSchema';
import type { OrderBookSnapshot, OrderStore } from '../services/orderStore';
import { SnapshotConflictError } from '../utils/errors';

// Stand-in for MongoOrderStore in route tests.
export class InMemoryOrderStore implements OrderStore {
  private snapshot: OrderBookSnapshot = { table: emptyOrderBook(), uploadedName: null, version: 0, savedAt: null };

  async load(): Promise<OrderBookSnapshot> {
    return this.snapshot;
  }

  async replace(table: CleanTable, uploadedName: string | null, expectedVersion?: number): Promise<OrderBookSnapshot> {
    if (expectedVersion !== undefined && expectedVersion !== this.snapshot.version) {
      throw new SnapshotConflictError(expectedVersion, this.snapshot.version);
    }
    this.snapshot = { table, uploadedName, version: this.snapshot.version + 1, savedAt: new Date() };
    return this.snapshot;
  }
}
