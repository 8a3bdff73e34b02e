// src/store/record-store.ts

import type { EscrowRecord } from '../types/escrow';
import { EscrowError } from '../utils/validation';

/** Keyed escrow storage. No policy lives here; the engine validates transitions. */
export interface RecordStore {
  insert(id: number, record: EscrowRecord): void;
  get(id: number): EscrowRecord;
  find(id: number): EscrowRecord | null;
  has(id: number): boolean;
  update(id: number, record: EscrowRecord): void;
  list(): EscrowRecord[];
}

export const notFound = (id: number): EscrowError =>
  new EscrowError('NotFound', `Escrow ${id} not found`, 'id');

export class MemoryRecordStore implements RecordStore {
  private records = new Map<number, EscrowRecord>();

  insert(id: number, record: EscrowRecord): void {
    if (this.records.has(id)) {
      throw new EscrowError('DuplicateId', `Escrow ${id} already exists`, 'id');
    }
    this.records.set(id, { ...record });
  }

  get(id: number): EscrowRecord {
    const record = this.find(id);
    if (!record) throw notFound(id);
    return record;
  }

  find(id: number): EscrowRecord | null {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  has(id: number): boolean {
    return this.records.has(id);
  }

  update(id: number, record: EscrowRecord): void {
    if (!this.records.has(id)) throw notFound(id);
    this.records.set(id, { ...record });
  }

  list(): EscrowRecord[] {
    return Array.from(this.records.values())
      .sort((a, b) => a.id - b.id)
      .map(r => ({ ...r }));
  }

  snapshot(): Map<number, EscrowRecord> {
    return new Map(this.records);
  }

  restore(snapshot: Map<number, EscrowRecord>): void {
    this.records = new Map(snapshot);
  }
}
