import { Bank } from '../src/bank';
import { ManualChain } from '../src/chain';
import { DEFAULT_SETTINGS, PROFILES } from '../src/constants';
import { Market, type MarketDependencies } from '../src/market';
import { sellerDepositFor } from '../src/payout';
import { Treasury } from '../src/treasury';
import type {
  CreateMarketParams,
  Hex,
  IdentityVerifier,
  MarketEvent,
  MarketSettings,
  ParticipantRecord
} from '../src/types';

export const UNIT = 10n ** 18n;
export const SELLER = 'seller-wallet';
export const FOUNDATION = 'foundation-wallet';
export const OPERATIONS = 'operations-wallet';
export const OPERATOR = 'operator-wallet';
export const FACTORY = 'factory-wallet';
export const SECRET: Hex = `0x${'ab'.repeat(32)}`;

export const acceptAll: IdentityVerifier = { verify: () => undefined };

export interface Harness {
  bank: Bank;
  chain: ManualChain;
  treasury: Treasury;
  settings: MarketSettings;
  deps: MarketDependencies;
  events: MarketEvent[];
}

export const createHarness = (overrides: Partial<MarketSettings> = {}, verifier: IdentityVerifier = acceptAll): Harness => {
  const bank = new Bank();
  const chain = new ManualChain({ startTime: 1_700_000_000, startBlock: 100, salt: 'test-chain' });
  const treasury = new Treasury({ foundation: FOUNDATION, operations: OPERATIONS, operator: OPERATOR });
  const settings: MarketSettings = { ...DEFAULT_SETTINGS, ...overrides };
  return { bank, chain, treasury, settings, deps: { bank, chain, treasury, verifier, settings }, events: [] };
};

export const marketParams = (harness: Harness, overrides: Partial<CreateMarketParams> = {}): CreateMarketParams => ({
  id: 'market-1',
  type: 'RAFFLE',
  ticketPrice: UNIT / 10n,
  depositPerEntry: UNIT / 100n,
  goalAmount: UNIT,
  preparedQuantity: 2,
  endTime: harness.chain.now() + 3600,
  profile: PROFILES.FACTORY_DEPLOYED,
  ...overrides
});

/** Creates a market funded by the seller, without opening it. */
export const createMarket = (harness: Harness, overrides: Partial<CreateMarketParams> = {}): Market => {
  const params = marketParams(harness, overrides);
  const deposit = sellerDepositFor(params.goalAmount, harness.settings.sellerDepositPercent);
  harness.bank.mint(SELLER, deposit);
  return Market.create(harness.deps, params, { sender: SELLER, value: deposit }, (event) => harness.events.push(event));
};

export const launchMarket = (harness: Harness, overrides: Partial<CreateMarketParams> = {}): Market => {
  const market = createMarket(harness, overrides);
  market.open({ sender: SELLER });
  return market;
};

export const entryPrice = (market: Market) => {
  const { ticketPrice, depositPerEntry } = market.snapshot();
  return ticketPrice + depositPerEntry;
};

export const enter = (harness: Harness, market: Market, wallet: string, nullifierHash: bigint): ParticipantRecord => {
  const price = entryPrice(market);
  harness.bank.mint(wallet, price);
  return market.enter({ sender: wallet, value: price }, { root: 1n, nullifierHash, proof: 'test-proof' });
};

export const pastDeadline = (harness: Harness, market: Market) => {
  harness.chain.advanceTime(market.snapshot().endTime - harness.chain.now());
};

export const pastRevealTimeout = (harness: Harness) => {
  const { revealTimeoutSeconds, revealDelayBlocks, revealWindowBlocks } = harness.settings;
  harness.chain.advanceTime(revealTimeoutSeconds + 1);
  harness.chain.mineBlocks(revealDelayBlocks + revealWindowBlocks + 1);
};

export const eventTypes = (harness: Harness) => harness.events.map((event) => event.type);
