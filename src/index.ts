// src/index.ts

export { EscrowManager } from './core/escrow-manager';
export type { EscrowManagerDeps } from './core/escrow-manager';
export { EscrowQueries, toView } from './core/escrow-queries';
export type { EscrowQueriesDeps } from './core/escrow-queries';
export * as Preconditions from './core/preconditions';

export { MemoryRecordStore } from './store/record-store';
export type { RecordStore } from './store/record-store';
export { MemoryIdAllocator } from './store/id-allocator';
export type { IdAllocator } from './store/id-allocator';
export { MemoryEscrowRepository, createMemoryRepository } from './store/repository';
export type { EscrowRepository } from './store/repository';
export {
  openDatabase,
  SqliteEscrowRepository,
  SqliteLedger,
  SqliteRecordStore
} from './db';

export { InMemoryLedger } from './services/ledger';
export {
  BitcoinHeightOracle,
  ManualHeightOracle
} from './services/height-oracle';
export type { BlockCountSource } from './services/height-oracle';
export { NostrAuthService, AuthError } from './services/nostr-auth';
export { BitcoinRpc, BitcoinRpcError } from './lib/bitcoin';

export { createApp } from './app';
export type { AppDeps, EscrowApp } from './app';
export { loadConfig, loadEnvConfig, ConfigError } from './config';
export type { AppConfig } from './config';

export type {
  CreateEscrowParams,
  EscrowEvents,
  EscrowRecord,
  EscrowState,
  EscrowStats,
  EscrowStatus,
  EscrowView,
  Identity,
  Logger
} from './types/escrow';

export type {
  HeightOracle,
  Ledger,
  TransferFailure,
  TransferResult
} from './types/ledger';

export {
  EscrowError,
  ESCROW_ERROR_NUMBERS,
  isEscrowError,
  isPubkey,
  parseEscrowId,
  validateAmount,
  validateBlocksAhead,
  validatePubkey,
  validateSecretHash
} from './utils/validation';
export type { EscrowErrorCode } from './utils/validation';

export {
  generateSecret,
  hashSecret,
  secretMatches
} from './utils/crypto';
