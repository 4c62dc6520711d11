import test from 'node:test';
import assert from 'node:assert/strict';

import { PROFILES } from '../src/constants';
import { isMarketError, MarketError } from '../src/errors';
import { hashToField, utf8 } from '../src/hashing';
import type { IdentityVerifier, VerificationRequest } from '../src/types';
import {
  createHarness,
  enter,
  entryPrice,
  FOUNDATION,
  launchMarket,
  OPERATIONS,
  pastDeadline,
  SELLER,
  UNIT
} from './helpers';

const expectCode = (code: MarketError['code']) => (error: unknown) => isMarketError(error, code);

test('an entry forwards fees and grows the pool by the remainder', () => {
  const harness = createHarness();
  const market = launchMarket(harness);
  const record = enter(harness, market, 'alice', 111n);

  assert.equal(record.paidAmount, UNIT / 10n + UNIT / 100n);
  assert.equal(harness.bank.balanceOf(FOUNDATION), 3_000_000_000_000_000n);
  assert.equal(harness.bank.balanceOf(OPERATIONS), 2_000_000_000_000_000n);
  assert.equal(market.snapshot().prizePool, 95_000_000_000_000_000n);

  const entered = harness.events.find((event) => event.type === 'Entered');
  assert.deepEqual(entered, {
    type: 'Entered',
    marketId: 'market-1',
    participant: 'alice',
    nullifierHash: 111n,
    foundationFee: 3_000_000_000_000_000n,
    operationsFee: 2_000_000_000_000_000n,
    prizePool: 95_000_000_000_000_000n
  });
});

test('fee forwarding truncates on odd ticket prices', () => {
  const harness = createHarness();
  const market = launchMarket(harness, { ticketPrice: 199n, depositPerEntry: 10n, goalAmount: 1000n });
  enter(harness, market, 'alice', 1n);
  assert.equal(harness.bank.balanceOf(FOUNDATION), 5n);
  assert.equal(harness.bank.balanceOf(OPERATIONS), 3n);
  assert.equal(market.snapshot().prizePool, 191n);
});

test('distinct nullifiers both enter and the nullifier sum folds by xor', () => {
  const harness = createHarness();
  const market = launchMarket(harness);
  enter(harness, market, 'alice', 111n);
  enter(harness, market, 'bob', 222n);
  const state = market.snapshot();
  assert.deepEqual(state.ledger.participants, ['alice', 'bob']);
  assert.equal(state.ledger.nullifierHashSum, 111n ^ 222n);
});

test('a reused nullifier is refused whoever sends it', () => {
  const harness = createHarness();
  const market = launchMarket(harness);
  enter(harness, market, 'alice', 111n);
  assert.throws(() => enter(harness, market, 'alice-second-wallet', 111n), expectCode('AlreadyParticipated'));
  assert.throws(() => enter(harness, market, 'alice', 999n), expectCode('AlreadyParticipated'));
  assert.equal(market.snapshot().ledger.participants.length, 1);
});

test('payment must match ticket price plus deposit exactly', () => {
  const harness = createHarness();
  const market = launchMarket(harness);
  const price = entryPrice(market);
  harness.bank.mint('alice', price * 2n);
  const proof = { root: 1n, nullifierHash: 111n, proof: 'test-proof' };
  assert.throws(() => market.enter({ sender: 'alice', value: price - 1n }, proof), expectCode('InsufficientFunds'));
  assert.throws(() => market.enter({ sender: 'alice', value: price + 1n }, proof), expectCode('InsufficientFunds'));
  assert.equal(harness.bank.balanceOf('alice'), price * 2n);
});

test('a wallet without the funds cannot enter', () => {
  const harness = createHarness();
  const market = launchMarket(harness);
  assert.throws(
    () => market.enter({ sender: 'alice', value: entryPrice(market) }, { root: 1n, nullifierHash: 111n, proof: 'p' }),
    expectCode('InsufficientFunds')
  );
});

test('entries after the deadline are refused', () => {
  const harness = createHarness();
  const market = launchMarket(harness);
  pastDeadline(harness, market);
  assert.throws(() => enter(harness, market, 'alice', 111n), expectCode('TimeExpired'));
});

test('the seller cannot buy into their own market unless the profile allows it', () => {
  const harness = createHarness();
  const guarded = launchMarket(harness);
  assert.throws(() => enter(harness, guarded, SELLER, 111n), expectCode('Unauthorized'));

  const open = launchMarket(harness, { id: 'market-2', type: 'LOTTERY', profile: PROFILES.STANDALONE_LOTTERY });
  const record = enter(harness, open, SELLER, 111n);
  assert.equal(record.address, SELLER);
});

test('the verifier receives the caller signal and the app-scoped external nullifier', () => {
  const requests: VerificationRequest[] = [];
  const recorder: IdentityVerifier = { verify: (request) => void requests.push(request) };
  const harness = createHarness({}, recorder);
  const market = launchMarket(harness);
  enter(harness, market, 'alice', 111n);

  assert.equal(requests.length, 1);
  assert.deepEqual(requests[0], {
    root: 1n,
    groupId: 1n,
    signalHash: hashToField(utf8('alice')),
    nullifierHash: 111n,
    externalNullifierHash: hashToField(utf8('escrow-raffle'), utf8('enter-market')),
    proof: 'test-proof'
  });
});

test('a rejected identity proof aborts the entry without side effects', () => {
  const rejecting: IdentityVerifier = {
    verify: () => {
      throw new Error('bad proof');
    }
  };
  const harness = createHarness({}, rejecting);
  const market = launchMarket(harness);
  const price = entryPrice(market);
  assert.throws(() => enter(harness, market, 'alice', 111n), (error: unknown) => {
    assert.ok(isMarketError(error, 'VerificationFailed'));
    assert.ok(error.cause instanceof Error);
    assert.equal(error.cause.message, 'bad proof');
    return true;
  });
  assert.equal(harness.bank.balanceOf('alice'), price);
  assert.equal(harness.bank.balanceOf(FOUNDATION), 0n);
  assert.equal(market.snapshot().ledger.usedNullifiers.size, 0);
});

test('held balance covers everything owed after each entry', () => {
  const harness = createHarness();
  const market = launchMarket(harness);
  ['alice', 'bob', 'carol'].forEach((wallet, index) => {
    enter(harness, market, wallet, BigInt(index + 1));
    const { owed, held, solvent } = market.accounting();
    assert.ok(solvent);
    assert.equal(owed, held);
  });
});

test('a nullifier outside 256 bits is refused and leaves the market untouched', () => {
  const harness = createHarness();
  const market = launchMarket(harness);
  enter(harness, market, 'alice', 111n);
  const before = market.snapshot();
  const balancesBefore = harness.bank.snapshot();
  const price = entryPrice(market);

  for (const nullifierHash of [1n << 300n, 1n << 256n, -1n]) {
    assert.throws(
      () => market.enter({ sender: 'mallory', value: price }, { root: 1n, nullifierHash, proof: 'test-proof' }),
      expectCode('VerificationFailed')
    );
  }
  assert.deepEqual(market.snapshot(), before);
  assert.deepEqual(harness.bank.snapshot(), balancesBefore);

  const widest = (1n << 256n) - 1n;
  enter(harness, market, 'bob', widest);
  assert.equal(market.snapshot().ledger.nullifierHashSum, 111n ^ widest);
});
