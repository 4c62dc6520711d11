import type { Chain } from './chain';
import { bytes32, hexToBigInt, sha256, uint256, utf8 } from './hashing';
import type { Hex, RandomnessMode, RevealWindow } from './types';

/** Commitment fixed at creation: binds the seller's secret nullifier to this market. */
export const precommitment = (secretNullifier: Hex, marketAddress: string): Hex =>
  sha256(bytes32(secretNullifier), utf8(marketAddress));

/** Commitment submitted by the seller after entries close. */
export const commitmentOf = (secret: Hex): Hex => sha256(bytes32(secret));

export const expectedCommitment = (mode: RandomnessMode, secret: Hex, marketAddress: string): Hex =>
  mode === 'precommitted' ? precommitment(secret, marketAddress) : commitmentOf(secret);

export const deriveSeed = (blockEntropy: Hex, secret: Hex, nullifierHashSum: bigint): Hex =>
  sha256(bytes32(blockEntropy), bytes32(secret), uint256(nullifierHashSum));

export const drawIndex = (seed: Hex, draw: number, poolSize: number): number => {
  if (poolSize <= 0) {
    throw new RangeError('cannot draw from an empty pool');
  }
  const digest = hexToBigInt(sha256(bytes32(seed), uint256(BigInt(draw))));
  return Number(digest % BigInt(poolSize));
};

/**
 * Partial Fisher–Yates over one copy of the candidates: each draw picks from
 * the unchosen prefix and swaps the pick to the end of it.
 */
export const drawWinners = <T>(seed: Hex, candidates: readonly T[], count: number): T[] => {
  const pool = [...candidates];
  const total = Math.min(count, pool.length);
  const winners: T[] = [];
  for (let draw = 0; draw < total; draw++) {
    const remaining = pool.length - draw;
    const picked = drawIndex(seed, draw, remaining);
    const last = remaining - 1;
    [pool[picked], pool[last]] = [pool[last], pool[picked]];
    winners.push(pool[last]);
  }
  return winners;
};

export interface RevealTiming {
  revealDelayBlocks: number;
  revealWindowBlocks: number;
  revealTimeoutSeconds: number;
}

export const openRevealWindow = (chain: Chain, timing: RevealTiming): RevealWindow => {
  const revealStartBlock = chain.blockNumber() + timing.revealDelayBlocks;
  return {
    revealStartBlock,
    revealDeadlineBlock: revealStartBlock + timing.revealWindowBlocks,
    revealDeadline: chain.now() + timing.revealTimeoutSeconds
  };
};

export const revealEligible = (window: RevealWindow, chain: Chain) => chain.blockNumber() > window.revealStartBlock;

/** Both the wall-clock deadline and the block window must have passed. */
export const revealTimedOut = (window: RevealWindow, chain: Chain) =>
  chain.now() > window.revealDeadline && chain.blockNumber() > window.revealDeadlineBlock;
