import type { MarketProfile, MarketSettings } from './types';

export const ZERO_HASH = `0x${'0'.repeat(64)}` as const;

export const PROFILES = {
  // Seller pre-commits at creation; winners confirm receipt to release funds.
  ALL_IN_ONE: { randomness: 'precommitted', settlement: 'confirm-receipt', forbidSellerEntry: true },
  FACTORY_DEPLOYED: { randomness: 'post-close', settlement: 'settle', forbidSellerEntry: true },
  STANDALONE_LOTTERY: { randomness: 'post-close', settlement: 'settle', forbidSellerEntry: false }
} as const satisfies Record<string, MarketProfile>;

export type ProfileName = keyof typeof PROFILES;

export const DEFAULT_SETTINGS: MarketSettings = {
  fees: { foundationPercent: 3, operationsPercent: 2 },
  lotteryWinnerPercent: 95,
  sellerDepositPercent: 10,
  slashPercent: 50,
  revealDelayBlocks: 2,
  revealWindowBlocks: 256,
  revealTimeoutSeconds: 24 * 60 * 60,
  confirmWindowSeconds: 7 * 24 * 60 * 60,
  identity: { appId: 'escrow-raffle', action: 'enter-market', groupId: 1n },
  trustedFactories: []
};
