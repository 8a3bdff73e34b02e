// src/store/id-allocator.ts

export interface IdAllocator {
  /** Returns an id never returned before and advances. */
  next(): number;
  peek(): number;
}

export class MemoryIdAllocator implements IdAllocator {
  constructor(private nextId = 1) {}

  next(): number {
    return this.nextId++;
  }

  peek(): number {
    return this.nextId;
  }

  reset(nextId: number): void {
    this.nextId = nextId;
  }
}
