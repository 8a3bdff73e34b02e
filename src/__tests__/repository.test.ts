// src/__tests__/repository.test.ts

import { describe, it, expect } from 'vitest';
import { MemoryIdAllocator } from '../store/id-allocator';
import { MemoryRecordStore } from '../store/record-store';
import { createMemoryRepository } from '../store/repository';
import type { EscrowRecord } from '../types/escrow';
import { RECIPIENT, SECRET_HASH, SENDER, catchEscrowError } from './helpers';

const record = (id: number): EscrowRecord => ({
  id,
  sender: SENDER,
  recipient: RECIPIENT,
  amount: 500,
  unlockHeight: 20,
  secretHash: SECRET_HASH,
  state: 'OPEN',
  createdHeight: 10
});

describe('MemoryIdAllocator', () => {
  it('should start at 1 and never repeat', () => {
    const ids = new MemoryIdAllocator();
    expect(ids.peek()).toBe(1);
    expect([ids.next(), ids.next(), ids.next()]).toEqual([1, 2, 3]);
    expect(ids.peek()).toBe(4);
  });
});

describe('MemoryRecordStore', () => {
  it('should reject duplicate inserts', () => {
    const store = new MemoryRecordStore();
    store.insert(1, record(1));

    expect(catchEscrowError(() => store.insert(1, record(1))).code).toBe('DuplicateId');
  });

  it('should report NotFound for get and update of a missing id', () => {
    const store = new MemoryRecordStore();

    expect(catchEscrowError(() => store.get(3)).code).toBe('NotFound');
    expect(catchEscrowError(() => store.update(3, record(3))).code).toBe('NotFound');
    expect(store.find(3)).toBeNull();
    expect(store.has(3)).toBe(false);
  });

  it('should update in place and list in id order', () => {
    const store = new MemoryRecordStore();
    store.insert(2, record(2));
    store.insert(1, record(1));
    store.update(2, { ...record(2), state: 'CLAIMED' });

    expect(store.list().map(r => [r.id, r.state])).toEqual([[1, 'OPEN'], [2, 'CLAIMED']]);
  });
});

describe('MemoryEscrowRepository', () => {
  it('should undo records and counters when the transaction throws', () => {
    const repo = createMemoryRepository();
    repo.transaction(() => {
      repo.records.insert(repo.ids.next(), record(1));
      repo.recordCreated();
    });

    expect(() => repo.transaction(() => {
      repo.records.insert(repo.ids.next(), record(2));
      repo.recordCreated();
      repo.records.update(1, { ...record(1), state: 'REFUNDED' });
      throw new Error('abort');
    })).toThrow('abort');

    expect(repo.records.list()).toEqual([record(1)]);
    expect(repo.ids.peek()).toBe(2);
    expect(repo.totalCreated()).toBe(1);
  });

  it('should return the value of a committed transaction', () => {
    const repo = createMemoryRepository();
    expect(repo.transaction(() => repo.ids.next())).toBe(1);
    expect(repo.ids.peek()).toBe(2);
  });
});
