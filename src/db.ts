// src/db.ts — SQLite persistence for escrow records, counters and balances
//
// Records, id/total counters and ledger balances live in one database so a
// transfer and the record commit that follows it share one transaction.

import Database from 'better-sqlite3';
import path from 'path';
import { mkdirSync } from 'fs';
import type { EscrowRecord, EscrowState, Identity, Logger } from './types/escrow';
import type { Ledger, TransferResult } from './types/ledger';
import type { IdAllocator } from './store/id-allocator';
import { notFound, type RecordStore } from './store/record-store';
import type { EscrowRepository } from './store/repository';
import { EscrowError } from './utils/validation';

export type SqliteDatabase = Database.Database;

// ── Schema ────────────────────────────────────────────────────────────────

const migrations: { version: number; sql: string }[] = [
  {
    version: 1,
    sql: `
      CREATE TABLE IF NOT EXISTS escrows (
        id             INTEGER PRIMARY KEY,
        sender         TEXT NOT NULL,
        recipient      TEXT NOT NULL,
        amount         INTEGER NOT NULL CHECK (amount > 0),
        unlock_height  INTEGER NOT NULL,
        secret_hash    TEXT NOT NULL,
        state          TEXT NOT NULL DEFAULT 'OPEN' CHECK (state IN ('OPEN', 'CLAIMED', 'REFUNDED')),
        created_height INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS counters (
        name  TEXT PRIMARY KEY,
        value INTEGER NOT NULL
      );
      INSERT OR IGNORE INTO counters (name, value) VALUES ('next_id', 1), ('total_created', 0);
      CREATE INDEX IF NOT EXISTS idx_escrows_sender    ON escrows(sender);
      CREATE INDEX IF NOT EXISTS idx_escrows_recipient ON escrows(recipient);
    `
  },
  {
    version: 2,
    sql: `
      CREATE TABLE IF NOT EXISTS balances (
        account TEXT PRIMARY KEY,
        amount  INTEGER NOT NULL CHECK (amount >= 0)
      );
    `
  }
];

export function openDatabase(file: string, logger: Logger = console): SqliteDatabase {
  if (file !== ':memory:') mkdirSync(path.dirname(file), { recursive: true });

  const db = new Database(file);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  migrate(db, logger);
  return db;
}

function migrate(db: SqliteDatabase, logger: Logger): void {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY)`);
  const row = db
    .prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM schema_version')
    .get();
  const currentVersion = row?.v ?? 0;

  const apply = db.transaction(() => {
    for (const m of migrations) {
      if (m.version > currentVersion) {
        db.exec(m.sql);
        db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(m.version);
        logger.log(`  DB migration v${m.version} applied`);
      }
    }
  });
  apply();
}

// ── Rows ──────────────────────────────────────────────────────────────────

interface EscrowRow {
  id: number;
  sender: string;
  recipient: string;
  amount: number;
  unlock_height: number;
  secret_hash: string;
  state: string;
  created_height: number;
}

const ESCROW_STATES: readonly EscrowState[] = ['OPEN', 'CLAIMED', 'REFUNDED'];

const isEscrowState = (value: string): value is EscrowState =>
  ESCROW_STATES.some(s => s === value);

function fromRow(row: EscrowRow): EscrowRecord {
  if (!isEscrowState(row.state)) {
    throw new Error(`Escrow ${row.id} has unknown state ${row.state}`);
  }
  return {
    id: row.id,
    sender: row.sender,
    recipient: row.recipient,
    amount: row.amount,
    unlockHeight: row.unlock_height,
    secretHash: row.secret_hash,
    state: row.state,
    createdHeight: row.created_height
  };
}

function toRow(record: EscrowRecord): EscrowRow {
  return {
    id: record.id,
    sender: record.sender,
    recipient: record.recipient,
    amount: record.amount,
    unlock_height: record.unlockHeight,
    secret_hash: record.secretHash,
    state: record.state,
    created_height: record.createdHeight
  };
}

// ── Record store ──────────────────────────────────────────────────────────

export class SqliteRecordStore implements RecordStore {
  private readonly stmts;

  constructor(db: SqliteDatabase) {
    this.stmts = {
      insert: db.prepare<[EscrowRow]>(`
        INSERT INTO escrows (id, sender, recipient, amount, unlock_height, secret_hash, state, created_height)
        VALUES (@id, @sender, @recipient, @amount, @unlock_height, @secret_hash, @state, @created_height)
      `),
      get: db.prepare<[number], EscrowRow>(`SELECT * FROM escrows WHERE id = ?`),
      update: db.prepare<[EscrowRow]>(`
        UPDATE escrows SET sender = @sender, recipient = @recipient, amount = @amount,
          unlock_height = @unlock_height, secret_hash = @secret_hash, state = @state,
          created_height = @created_height
        WHERE id = @id
      `),
      list: db.prepare<[], EscrowRow>(`SELECT * FROM escrows ORDER BY id ASC`)
    };
  }

  insert(id: number, record: EscrowRecord): void {
    if (this.has(id)) {
      throw new EscrowError('DuplicateId', `Escrow ${id} already exists`, 'id');
    }
    this.stmts.insert.run(toRow({ ...record, id }));
  }

  get(id: number): EscrowRecord {
    const record = this.find(id);
    if (!record) throw notFound(id);
    return record;
  }

  find(id: number): EscrowRecord | null {
    const row = this.stmts.get.get(id);
    return row ? fromRow(row) : null;
  }

  has(id: number): boolean {
    return this.stmts.get.get(id) !== undefined;
  }

  update(id: number, record: EscrowRecord): void {
    const { changes } = this.stmts.update.run(toRow({ ...record, id }));
    if (changes === 0) throw notFound(id);
  }

  list(): EscrowRecord[] {
    return this.stmts.list.all().map(fromRow);
  }
}

// ── Counters ──────────────────────────────────────────────────────────────

type CounterName = 'next_id' | 'total_created';

class Counters {
  private readonly read;
  private readonly bump;

  constructor(db: SqliteDatabase) {
    this.read = db.prepare<[CounterName], { value: number }>(
      `SELECT value FROM counters WHERE name = ?`
    );
    this.bump = db.prepare<[CounterName]>(`UPDATE counters SET value = value + 1 WHERE name = ?`);
  }

  get(name: CounterName): number {
    const row = this.read.get(name);
    if (!row) throw new Error(`Counter ${name} missing; database not migrated`);
    return row.value;
  }

  increment(name: CounterName): void {
    this.bump.run(name);
  }
}

export class SqliteIdAllocator implements IdAllocator {
  constructor(private readonly counters: Counters) {}

  next(): number {
    const id = this.counters.get('next_id');
    this.counters.increment('next_id');
    return id;
  }

  peek(): number {
    return this.counters.get('next_id');
  }
}

export class SqliteEscrowRepository implements EscrowRepository {
  readonly records: SqliteRecordStore;
  readonly ids: SqliteIdAllocator;
  private readonly counters: Counters;

  constructor(private readonly db: SqliteDatabase) {
    this.counters = new Counters(db);
    this.records = new SqliteRecordStore(db);
    this.ids = new SqliteIdAllocator(this.counters);
  }

  totalCreated(): number {
    return this.counters.get('total_created');
  }

  recordCreated(): void {
    this.counters.increment('total_created');
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}

// ── Ledger ────────────────────────────────────────────────────────────────

export class SqliteLedger implements Ledger {
  private readonly stmts;

  constructor(private readonly db: SqliteDatabase) {
    this.stmts = {
      balance: db.prepare<[string], { amount: number }>(
        `SELECT amount FROM balances WHERE account = ?`
      ),
      add: db.prepare<{ account: string; amount: number }>(`
        INSERT INTO balances (account, amount) VALUES (@account, @amount)
        ON CONFLICT(account) DO UPDATE SET amount = amount + excluded.amount
      `),
      subtract: db.prepare<{ account: string; amount: number }>(
        `UPDATE balances SET amount = amount - @amount WHERE account = @account`
      )
    };
  }

  balanceOf(account: Identity): number {
    return this.stmts.balance.get(account)?.amount ?? 0;
  }

  credit(account: Identity, amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new Error(`Credit amount must be a positive integer, got ${amount}`);
    }
    this.stmts.add.run({ account, amount });
  }

  transfer(from: Identity, to: Identity, amount: number): TransferResult {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      return { ok: false, reason: 'TransferFailed', detail: `invalid amount ${amount}` };
    }
    const move = this.db.transaction((): TransferResult => {
      const available = this.balanceOf(from);
      if (available < amount) {
        return { ok: false, reason: 'InsufficientFunds', detail: `${from} holds ${available}` };
      }
      this.stmts.subtract.run({ account: from, amount });
      this.stmts.add.run({ account: to, amount });
      return { ok: true };
    });
    return move();
  }
}
