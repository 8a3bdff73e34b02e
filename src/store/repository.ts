// src/store/repository.ts

import { MemoryIdAllocator, type IdAllocator } from './id-allocator';
import { MemoryRecordStore, type RecordStore } from './record-store';

/**
 * Everything the engine persists: the records, the id counter and the
 * total-created counter. `transaction` runs `fn` as one unit; if it throws,
 * every change made through the repository inside it is undone.
 */
export interface EscrowRepository {
  readonly records: RecordStore;
  readonly ids: IdAllocator;
  totalCreated(): number;
  recordCreated(): void;
  transaction<T>(fn: () => T): T;
}

export class MemoryEscrowRepository implements EscrowRepository {
  readonly records = new MemoryRecordStore();
  readonly ids = new MemoryIdAllocator();
  private total = 0;

  totalCreated(): number {
    return this.total;
  }

  recordCreated(): void {
    this.total++;
  }

  transaction<T>(fn: () => T): T {
    const records = this.records.snapshot();
    const nextId = this.ids.peek();
    const total = this.total;
    try {
      return fn();
    } catch (err) {
      this.records.restore(records);
      this.ids.reset(nextId);
      this.total = total;
      throw err;
    }
  }
}

export const createMemoryRepository = (): MemoryEscrowRepository => new MemoryEscrowRepository();
