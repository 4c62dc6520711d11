import test from 'node:test';
import assert from 'node:assert/strict';

import { ManualChain } from '../src/chain';
import { PROFILES } from '../src/constants';
import { isMarketError, MarketError } from '../src/errors';
import { bytes32, sha256, uint256, utf8 } from '../src/hashing';
import {
  commitmentOf,
  deriveSeed,
  drawIndex,
  drawWinners,
  openRevealWindow,
  precommitment,
  revealEligible,
  revealTimedOut
} from '../src/randomness';
import type { Hex } from '../src/types';
import { createHarness, enter, launchMarket, pastDeadline, pastRevealTimeout, SECRET, SELLER } from './helpers';

const expectCode = (code: MarketError['code']) => (error: unknown) => isMarketError(error, code);
const SEED: Hex = sha256(utf8('fixed-seed'));

test('commitments hash the secret, and the market address when precommitted', () => {
  assert.equal(commitmentOf(SECRET), sha256(bytes32(SECRET)));
  assert.equal(precommitment(SECRET, 'escrow:m1'), sha256(bytes32(SECRET), utf8('escrow:m1')));
  assert.notEqual(precommitment(SECRET, 'escrow:m1'), precommitment(SECRET, 'escrow:m2'));
});

test('the seed binds block entropy, secret and nullifier sum', () => {
  const entropy = sha256(utf8('block'));
  assert.equal(deriveSeed(entropy, SECRET, 5n), sha256(bytes32(entropy), bytes32(SECRET), uint256(5n)));
  assert.notEqual(deriveSeed(entropy, SECRET, 5n), deriveSeed(entropy, SECRET, 6n));
});

test('draw is a pure function of seed and pool', () => {
  const pool = ['a', 'b', 'c', 'd', 'e'];
  const first = drawWinners(SEED, pool, 3);
  const second = drawWinners(SEED, pool, 3);
  assert.deepEqual(first, second);
  assert.equal(new Set(first).size, 3);
  assert.ok(first.every((winner) => pool.includes(winner)));
  assert.deepEqual(pool, ['a', 'b', 'c', 'd', 'e']);
});

test('the first pick follows the hashed draw index', () => {
  const pool = ['a', 'b', 'c', 'd'];
  const expected = pool[drawIndex(SEED, 0, pool.length)];
  assert.equal(drawWinners(SEED, pool, 1)[0], expected);
});

test('drawing more winners than candidates returns a permutation of all of them', () => {
  const winners = drawWinners(SEED, ['a', 'b', 'c'], 10);
  assert.equal(winners.length, 3);
  assert.deepEqual([...winners].sort(), ['a', 'b', 'c']);
});

test('every candidate is reachable across seeds', () => {
  const pool = ['a', 'b', 'c', 'd'];
  const seen = new Set<string>();
  for (let i = 0; i < 200; i++) {
    drawWinners(sha256(utf8(`seed-${i}`)), pool, 1).forEach((winner) => seen.add(winner));
  }
  assert.deepEqual([...seen].sort(), pool);
});

test('drawIndex refuses an empty pool', () => {
  assert.throws(() => drawIndex(SEED, 0, 0), RangeError);
});

test('the reveal window opens after the delay and times out on both clocks', () => {
  const chain = new ManualChain({ startTime: 1000, startBlock: 10 });
  const window = openRevealWindow(chain, { revealDelayBlocks: 2, revealWindowBlocks: 5, revealTimeoutSeconds: 60 });
  assert.deepEqual(window, { revealStartBlock: 12, revealDeadlineBlock: 17, revealDeadline: 1060 });

  chain.mineBlocks(2);
  assert.equal(revealEligible(window, chain), false);
  chain.mineBlocks(1);
  assert.equal(revealEligible(window, chain), true);

  chain.mineBlocks(10);
  assert.equal(revealTimedOut(window, chain), false);
  chain.advanceTime(61);
  assert.equal(revealTimedOut(window, chain), true);
});

test('future block entropy is unavailable', () => {
  const chain = new ManualChain({ startBlock: 10 });
  assert.throws(() => chain.blockEntropy(11), RangeError);
  assert.match(chain.blockEntropy(10), /^0x[0-9a-f]{64}$/);
});

const closedContest = () => {
  const harness = createHarness();
  const market = launchMarket(harness, { preparedQuantity: 1 });
  enter(harness, market, 'alice', 111n);
  enter(harness, market, 'bob', 222n);
  pastDeadline(harness, market);
  assert.equal(market.closeEntries({ sender: 'anyone' }), 'CLOSED');
  return { harness, market };
};

test('post-close commit and reveal draw one winner from the entrants', () => {
  const { harness, market } = closedContest();
  const window = market.commit({ sender: SELLER }, commitmentOf(SECRET));
  assert.equal(market.status, 'COMMITTED');
  assert.throws(() => market.reveal({ sender: SELLER }, SECRET), expectCode('TimeNotReached'));

  harness.chain.mineBlocks(harness.settings.revealDelayBlocks + 1);
  const winners = market.reveal({ sender: SELLER }, SECRET);
  assert.equal(winners.length, 1);
  assert.ok(['alice', 'bob'].includes(winners[0]));

  const state = market.snapshot();
  assert.equal(state.status, 'REVEALED');
  assert.equal(state.randomness.secretRevealed, true);
  assert.equal(state.randomness.entropyBlock, window.revealStartBlock);
  const expectedSeed = deriveSeed(harness.chain.blockEntropy(window.revealStartBlock), SECRET, 111n ^ 222n);
  assert.equal(state.randomness.seed, expectedSeed);
  assert.deepEqual(state.winners, drawWinners(expectedSeed, ['alice', 'bob'], 1));
  assert.equal(market.participantInfo(winners[0])?.isWinner, true);
});

test('a wrong secret fails verification and the market stays committed', () => {
  const { harness, market } = closedContest();
  market.commit({ sender: SELLER }, commitmentOf(SECRET));
  harness.chain.mineBlocks(harness.settings.revealDelayBlocks + 1);
  const wrong: Hex = `0x${'cd'.repeat(32)}`;
  assert.throws(() => market.reveal({ sender: SELLER }, wrong), expectCode('VerificationFailed'));
  assert.equal(market.status, 'COMMITTED');
  assert.equal(market.snapshot().randomness.secretRevealed, false);
});

test('only the seller commits or reveals, and only once', () => {
  const { harness, market } = closedContest();
  assert.throws(() => market.commit({ sender: 'alice' }, commitmentOf(SECRET)), expectCode('Unauthorized'));
  assert.throws(() => market.commit({ sender: SELLER }, `0x${'0'.repeat(64)}`), expectCode('VerificationFailed'));
  market.commit({ sender: SELLER }, commitmentOf(SECRET));
  assert.throws(() => market.commit({ sender: SELLER }, commitmentOf(SECRET)), expectCode('InvalidState'));

  harness.chain.mineBlocks(harness.settings.revealDelayBlocks + 1);
  assert.throws(() => market.reveal({ sender: 'alice' }, SECRET), expectCode('Unauthorized'));
  market.reveal({ sender: SELLER }, SECRET);
  assert.throws(() => market.reveal({ sender: SELLER }, SECRET), expectCode('InvalidState'));
});

test('a reveal after the window elapses is refused', () => {
  const { harness, market } = closedContest();
  market.commit({ sender: SELLER }, commitmentOf(SECRET));
  pastRevealTimeout(harness);
  assert.throws(() => market.reveal({ sender: SELLER }, SECRET), expectCode('TimeExpired'));
});

test('a precommitted market reveals straight from CLOSED and refuses a late commitment', () => {
  const harness = createHarness();
  const market = launchMarket(harness, {
    preparedQuantity: 1,
    profile: PROFILES.ALL_IN_ONE,
    secretNullifier: SECRET
  });
  assert.equal(market.snapshot().randomness.commitment, precommitment(SECRET, market.address));
  enter(harness, market, 'alice', 111n);
  enter(harness, market, 'bob', 222n);
  pastDeadline(harness, market);
  market.closeEntries({ sender: 'anyone' });

  assert.throws(() => market.commit({ sender: SELLER }, commitmentOf(SECRET)), expectCode('InvalidState'));
  harness.chain.mineBlocks(harness.settings.revealDelayBlocks + 1);
  const winners = market.reveal({ sender: SELLER }, SECRET);
  assert.equal(winners.length, 1);
  assert.equal(market.status, 'REVEALED');
});
