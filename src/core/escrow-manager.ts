// src/core/escrow-manager.ts

import { EventEmitter } from 'events';
import type {
  CreateEscrowParams,
  EscrowEvents,
  EscrowRecord,
  EscrowState,
  Identity,
  Logger
} from '../types/escrow';
import type { HeightOracle, Ledger } from '../types/ledger';
import type { EscrowRepository } from '../store/repository';
import { heightReached, isFinalized } from './preconditions';
import { secretMatches } from '../utils/crypto';
import { EscrowError, validateCreateParams, validateIdentity } from '../utils/validation';

export interface EscrowManagerDeps {
  readonly repository: EscrowRepository;
  readonly ledger: Ledger;
  readonly oracle: HeightOracle;
  /** Identity allowed to cancel before the unlock height. */
  readonly owner: Identity;
  /** Ledger account that custodies the value of every open escrow. */
  readonly holdingAccount: Identity;
  readonly logger?: Logger;
}

type TerminalEvent = 'claimed' | 'refunded' | 'cancelled';

/**
 * Escrow state machine. Every mutating operation validates its full
 * precondition set, then moves value through the ledger, then commits the
 * terminal state, inside one repository transaction.
 */
export class EscrowManager extends EventEmitter<EscrowEvents> {
  private readonly repository: EscrowRepository;
  private readonly ledger: Ledger;
  private readonly oracle: HeightOracle;
  private readonly logger: Logger;
  private readonly inFlight = new Set<number>();

  readonly owner: Identity;
  readonly holdingAccount: Identity;

  constructor(deps: EscrowManagerDeps) {
    super();
    validateIdentity(deps.owner, 'owner');
    validateIdentity(deps.holdingAccount, 'holdingAccount');
    this.repository = deps.repository;
    this.ledger = deps.ledger;
    this.oracle = deps.oracle;
    this.owner = deps.owner;
    this.holdingAccount = deps.holdingAccount;
    this.logger = deps.logger ?? console;
  }

  create(caller: Identity, params: CreateEscrowParams): number {
    validateCreateParams(caller, params);
    if (caller === this.holdingAccount) {
      throw new EscrowError('NotAuthorized', 'The holding account cannot open an escrow', 'caller');
    }
    if (params.recipient === this.holdingAccount) {
      throw new EscrowError('InvalidIdentity', 'recipient cannot be the holding account', 'recipient');
    }

    if (this.ledger.balanceOf(caller) < params.amount) {
      throw new EscrowError(
        'InsufficientBalance',
        `Balance of ${caller} is below ${params.amount}`,
        'amount'
      );
    }

    const record = this.repository.transaction(() => {
      const height = this.oracle.currentHeight();
      const unlockHeight = height + params.blocksAhead;
      if (!Number.isSafeInteger(unlockHeight)) {
        throw new EscrowError(
          'InvalidHeight',
          `blocksAhead ${params.blocksAhead} overflows the height range at ${height}`,
          'blocksAhead'
        );
      }
      const id = this.repository.ids.next();
      if (this.repository.records.has(id)) {
        throw new EscrowError('DuplicateId', `Escrow ${id} already exists`, 'id');
      }

      this.transferOrAbort(caller, this.holdingAccount, params.amount, 'InsufficientBalance');

      const created: EscrowRecord = {
        id,
        sender: caller,
        recipient: params.recipient,
        amount: params.amount,
        unlockHeight,
        secretHash: params.secretHash.toLowerCase(),
        state: 'OPEN',
        createdHeight: height
      };
      this.repository.records.insert(id, created);
      this.repository.recordCreated();
      return created;
    });

    this.logger.log(
      `Escrow ${record.id} created: ${record.amount} from ${record.sender} to ${record.recipient}, unlocks at ${record.unlockHeight}`
    );
    this.notify('created', record);
    return record.id;
  }

  claim(caller: Identity, id: number, secret: string): EscrowRecord {
    return this.finalize(id, 'CLAIMED', 'claimed', (record, height) => {
      if (caller !== record.recipient) {
        throw new EscrowError('NotAuthorized', 'Only the recipient can claim', 'caller');
      }
      this.assertOpen(record);
      if (!heightReached(record, height)) {
        throw new EscrowError(
          'HeightNotReached',
          `Escrow ${id} unlocks at height ${record.unlockHeight} (current ${height})`,
          'height'
        );
      }
      if (!secretMatches(secret, record.secretHash)) {
        throw new EscrowError('InvalidSecret', 'Secret does not match the stored hash', 'secret');
      }
      return record.recipient;
    });
  }

  refund(caller: Identity, id: number): EscrowRecord {
    return this.finalize(id, 'REFUNDED', 'refunded', (record, height) => {
      if (caller !== record.sender) {
        throw new EscrowError('NotAuthorized', 'Only the sender can refund', 'caller');
      }
      this.assertOpen(record);
      if (!heightReached(record, height)) {
        throw new EscrowError(
          'HeightNotReached',
          `Escrow ${id} unlocks at height ${record.unlockHeight} (current ${height})`,
          'height'
        );
      }
      return record.sender;
    });
  }

  emergencyCancel(caller: Identity, id: number): EscrowRecord {
    if (caller !== this.owner) {
      throw new EscrowError('NotAuthorized', 'Only the owner can cancel an escrow', 'caller');
    }
    return this.finalize(id, 'REFUNDED', 'cancelled', (record, height) => {
      this.assertOpen(record);
      if (height >= record.unlockHeight) {
        throw new EscrowError(
          'AlreadyExpired',
          `Escrow ${id} reached its unlock height ${record.unlockHeight}; cancel is no longer possible`,
          'height'
        );
      }
      return record.sender;
    });
  }

  /**
   * Shared read-check-transfer-commit path. `check` throws on the first
   * failed precondition and otherwise returns who receives the value.
   */
  private finalize(
    id: number,
    state: Exclude<EscrowState, 'OPEN'>,
    event: TerminalEvent,
    check: (record: EscrowRecord, height: number) => Identity
  ): EscrowRecord {
    if (this.inFlight.has(id)) {
      throw new EscrowError(
        'TransitionInProgress',
        `Escrow ${id} has a transition in progress`,
        'id'
      );
    }

    this.inFlight.add(id);
    try {
      const committed = this.repository.transaction(() => {
        const record = this.repository.records.get(id);
        const payee = check(record, this.oracle.currentHeight());

        this.transferOrAbort(this.holdingAccount, payee, record.amount, 'TransferFailed');

        const next: EscrowRecord = { ...record, state };
        this.repository.records.update(id, next);
        return next;
      });

      this.logger.log(`Escrow ${id} ${event}: ${committed.amount} released`);
      this.notify(event, committed);
      return committed;
    } finally {
      this.inFlight.delete(id);
    }
  }

  /** Listeners run after commit; their failures are logged, never thrown to the caller. */
  private notify(event: 'created' | TerminalEvent, record: EscrowRecord): void {
    try {
      this.emit(event, record);
    } catch (err) {
      this.logger.error(`Escrow ${record.id} ${event} listener failed:`, err);
    }
  }

  private assertOpen(record: EscrowRecord): void {
    if (isFinalized(record)) {
      throw new EscrowError(
        'AlreadyFinalized',
        `Escrow ${record.id} is already ${record.state.toLowerCase()}`,
        'state'
      );
    }
  }

  private transferOrAbort(
    from: Identity,
    to: Identity,
    amount: number,
    onInsufficient: 'InsufficientBalance' | 'TransferFailed'
  ): void {
    const result = this.ledger.transfer(from, to, amount);
    if (result.ok) return;

    const code = result.reason === 'InsufficientFunds' ? onInsufficient : 'TransferFailed';
    this.logger.warn(`Transfer of ${amount} from ${from} to ${to} failed: ${result.reason}`);
    throw new EscrowError(
      code,
      result.detail ? `Transfer failed: ${result.detail}` : `Transfer failed: ${result.reason}`,
      'amount'
    );
  }
}
