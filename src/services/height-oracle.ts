// src/services/height-oracle.ts

import type { Logger } from '../types/escrow';
import type { HeightOracle } from '../types/ledger';

/** Height advanced by hand. Dev mode and tests. */
export class ManualHeightOracle implements HeightOracle {
  constructor(private height = 0) {
    if (!Number.isSafeInteger(height) || height < 0) {
      throw new Error(`Initial height must be a non-negative integer, got ${height}`);
    }
  }

  currentHeight(): number {
    return this.height;
  }

  mine(blocks = 1): number {
    if (!Number.isSafeInteger(blocks) || blocks < 0) {
      throw new Error(`Block count must be a non-negative integer, got ${blocks}`);
    }
    this.height += blocks;
    return this.height;
  }

  advanceTo(height: number): number {
    if (!Number.isSafeInteger(height) || height < this.height) {
      throw new Error(`Height cannot move from ${this.height} to ${height}`);
    }
    this.height = height;
    return this.height;
  }
}

export interface BlockCountSource {
  getBlockCount(): Promise<number>;
}

/**
 * Caches the chain tip reported by a node and refreshes it on an interval.
 * A lower tip (reorg, lagging node) is ignored so the height never decreases.
 */
export class BitcoinHeightOracle implements HeightOracle {
  private height = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly source: BlockCountSource,
    private readonly pollMs = 10_000,
    private readonly logger: Logger = console
  ) {}

  currentHeight(): number {
    return this.height;
  }

  async refresh(): Promise<number> {
    const tip = await this.source.getBlockCount();
    if (tip > this.height) this.height = tip;
    return this.height;
  }

  async start(): Promise<void> {
    await this.refresh();
    this.logger.log(`Height oracle synced at block ${this.height}`);
    this.timer = setInterval(() => {
      this.refresh().catch((err: unknown) => {
        this.logger.error('Height oracle poll failed:', err instanceof Error ? err.message : err);
      });
    }, this.pollMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
