#!/usr/bin/env tsx
// scripts/simulate-escrow.ts — runs the claim, refund and cancel flows in process
//
// Usage: npx tsx scripts/simulate-escrow.ts

import {
  EscrowManager,
  EscrowQueries,
  InMemoryLedger,
  ManualHeightOracle,
  createMemoryRepository,
  generateSecret,
  isEscrowError
} from '../src/index';

const SENDER = 'a'.repeat(64);
const RECIPIENT = 'b'.repeat(64);
const OWNER = 'c'.repeat(64);
const HOLDING = 'escrow-holding';

let passed = 0, failed = 0;
function ok(cond: boolean, label: string) {
  if (cond) { console.log(`  ✅ ${label}`); passed++; }
  else { console.log(`  ❌ ${label}`); failed++; }
}

function errorCode(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    if (isEscrowError(err)) return err.code;
    throw err;
  }
}

function main() {
  console.log('==============================================');
  console.log('  Hash-Time-Locked Escrow — in-process flows  ');
  console.log('==============================================\n');

  const oracle = new ManualHeightOracle(100);
  const ledger = new InMemoryLedger({ [SENDER]: 5_000_000 });
  const repository = createMemoryRepository();
  const core = { repository, ledger, oracle, owner: OWNER, holdingAccount: HOLDING };
  const manager = new EscrowManager(core);
  const queries = new EscrowQueries(core);
  const { secret, secretHash } = generateSecret();

  console.log('═══ 1: Claim with the secret ═══');
  const id1 = manager.create(SENDER, { recipient: RECIPIENT, amount: 1_000_000, blocksAhead: 10, secretHash });
  ok(id1 === 1 && queries.get(id1)?.unlockHeight === 110, 'Escrow 1 unlocks at 110');
  ok(errorCode(() => manager.create(SENDER, { recipient: RECIPIENT, amount: 0, blocksAhead: 10, secretHash })) === 'InvalidAmount', 'Zero amount rejected');
  ok(errorCode(() => manager.claim(RECIPIENT, id1, secret)) === 'HeightNotReached', 'Claim at 100 refused');
  oracle.advanceTo(110);
  manager.claim(RECIPIENT, id1, secret);
  ok(ledger.balanceOf(RECIPIENT) === 1_000_000, 'Recipient received 1,000,000');
  ok(errorCode(() => manager.claim(RECIPIENT, id1, secret)) === 'AlreadyFinalized', 'Second claim refused');

  console.log('\n═══ 2: Refund after expiry ═══');
  const id2 = manager.create(SENDER, { recipient: RECIPIENT, amount: 1_000_000, blocksAhead: 1, secretHash });
  oracle.mine();
  ok(errorCode(() => manager.refund(RECIPIENT, id2)) === 'NotAuthorized', 'Recipient cannot refund');
  manager.refund(SENDER, id2);
  ok(queries.status(id2).refunded, 'Escrow 2 refunded');

  console.log('\n═══ 3: Emergency cancel ═══');
  const id3 = manager.create(SENDER, { recipient: RECIPIENT, amount: 1_000_000, blocksAhead: 10, secretHash });
  oracle.mine(5);
  manager.emergencyCancel(OWNER, id3);
  ok(queries.status(id3).refunded, 'Owner cancelled escrow 3 before unlock');
  ok(errorCode(() => manager.emergencyCancel(OWNER, id3)) === 'AlreadyFinalized', 'Second cancel refused');
  const id4 = manager.create(SENDER, { recipient: RECIPIENT, amount: 1_000_000, blocksAhead: 10, secretHash });
  oracle.mine(10);
  ok(errorCode(() => manager.emergencyCancel(OWNER, id4)) === 'AlreadyExpired', 'Cancel at unlock height refused');

  console.log('\nStats:', queries.stats());
  console.log(`\n${passed} passed, ${failed} failed`);
  if (failed > 0) process.exit(1);
}

main();
