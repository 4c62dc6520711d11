import type { FeeSchedule } from './types';

// Integer percentages over 100, truncating. Where two parties split an amount
// the second one takes the residual so the parts always sum to the input.

export const percentOf = (amount: bigint, percent: number): bigint => (amount * BigInt(percent)) / 100n;

export interface EntryFeeSplit {
  foundation: bigint;
  operations: bigint;
  pool: bigint;
}

export const splitEntryFee = (ticketPrice: bigint, fees: FeeSchedule): EntryFeeSplit => {
  const foundation = percentOf(ticketPrice, fees.foundationPercent);
  const operations = percentOf(ticketPrice, fees.operationsPercent);
  return { foundation, operations, pool: ticketPrice - foundation - operations };
};

export interface PrizeSplit {
  winner: bigint;
  operations: bigint;
}

export const splitLotteryPrize = (prizePool: bigint, winnerPercent: number): PrizeSplit => {
  const winner = percentOf(prizePool, winnerPercent);
  return { winner, operations: prizePool - winner };
};

export interface SlashSplit {
  operations: bigint;
  seller: bigint;
}

export const splitSlash = (sellerDeposit: bigint, slashPercent: number): SlashSplit => {
  const operations = percentOf(sellerDeposit, slashPercent);
  return { operations, seller: sellerDeposit - operations };
};

export const sellerDepositFor = (goalAmount: bigint, depositPercent: number) => percentOf(goalAmount, depositPercent);

/**
 * Pool share owed to one refund claimant of a failed market. Every claimant
 * gets `base / participants`; the last one also takes the truncation dust,
 * which is whatever is still left in the pool.
 */
export const refundShare = (base: bigint, remaining: bigint, participants: number, claimed: number): bigint => {
  if (participants <= 0) return 0n;
  if (claimed >= participants - 1) return remaining;
  return base / BigInt(participants);
};
