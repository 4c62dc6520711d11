import { randomUUID } from 'crypto';
import {
  Bank,
  DEFAULT_SETTINGS,
  Market,
  PROFILES,
  Treasury,
  type Caller,
  type Chain,
  type CreateMarketParams,
  type Hex,
  type IdentityProof,
  type IdentityVerifier,
  type MarketEvent,
  type MarketSettings,
  type PayableCall,
  type ProfileName
} from '../../../contracts/src';
import { env } from '../config/env';
import { getLogger } from '../utils/logger';
import { toJson } from '../utils/json';

export class MarketNotFoundError extends Error {
  constructor(readonly marketId: string) {
    super(`Market ${marketId} not found`);
    this.name = 'MarketNotFoundError';
  }
}

export class DuplicateMarketError extends Error {
  constructor(readonly marketId: string) {
    super(`Market ${marketId} already exists`);
    this.name = 'DuplicateMarketError';
  }
}

export type CreateMarketInput = Omit<CreateMarketParams, 'id' | 'profile'> & {
  id?: string;
  profile: ProfileName;
};

export interface MarketServiceOptions {
  chain: Chain;
  verifier: IdentityVerifier;
  treasury: Treasury;
  settings?: MarketSettings;
  bank?: Bank;
  publish?: (event: MarketEvent) => void;
}

export const settingsFromEnv = (): MarketSettings => ({
  ...DEFAULT_SETTINGS,
  fees: {
    foundationPercent: env.market.foundationFeePercent,
    operationsPercent: env.market.operationsFeePercent
  },
  lotteryWinnerPercent: env.market.lotteryWinnerPercent,
  sellerDepositPercent: env.market.sellerDepositPercent,
  slashPercent: env.market.slashPercent,
  revealDelayBlocks: env.market.revealDelayBlocks,
  revealWindowBlocks: env.market.revealWindowBlocks,
  revealTimeoutSeconds: env.market.revealTimeoutSeconds,
  confirmWindowSeconds: env.market.confirmWindowSeconds,
  identity: {
    appId: env.identity.appId,
    action: env.identity.action,
    groupId: env.identity.groupId
  },
  trustedFactories: env.market.trustedFactories
});

/** Hosts markets in memory and routes calls into them, one at a time. */
export class MarketService {
  readonly bank: Bank;
  readonly chain: Chain;
  readonly treasury: Treasury;
  readonly settings: MarketSettings;
  private readonly verifier: IdentityVerifier;
  private readonly publish?: (event: MarketEvent) => void;
  private readonly markets = new Map<string, Market>();
  private readonly logger = getLogger({ scope: 'marketService' });

  constructor(options: MarketServiceOptions) {
    this.bank = options.bank ?? new Bank();
    this.chain = options.chain;
    this.treasury = options.treasury;
    this.verifier = options.verifier;
    this.settings = options.settings ?? settingsFromEnv();
    this.publish = options.publish;
  }

  list(): Market[] {
    return [...this.markets.values()];
  }

  get(marketId: string): Market {
    const market = this.markets.get(marketId);
    if (!market) {
      throw new MarketNotFoundError(marketId);
    }
    return market;
  }

  create(input: CreateMarketInput, call: PayableCall): Market {
    const id = input.id ?? randomUUID();
    if (this.markets.has(id)) {
      throw new DuplicateMarketError(id);
    }
    const params: CreateMarketParams = { ...input, id, profile: PROFILES[input.profile] };
    const market = Market.create(
      { bank: this.bank, chain: this.chain, treasury: this.treasury, verifier: this.verifier, settings: this.settings },
      params,
      call,
      (event) => this.onEvent(event)
    );
    this.markets.set(id, market);
    this.logger.info({ marketId: id, seller: market.seller, profile: input.profile }, 'market created');
    return market;
  }

  open(marketId: string, call: Caller) {
    this.get(marketId).open(call);
  }

  enter(marketId: string, call: PayableCall, identity: IdentityProof) {
    return this.get(marketId).enter(call, identity);
  }

  closeEntries(marketId: string, call: Caller) {
    return this.get(marketId).closeEntries(call);
  }

  commit(marketId: string, call: Caller, commitment: Hex) {
    return this.get(marketId).commit(call, commitment);
  }

  reveal(marketId: string, call: Caller, secret: Hex) {
    return this.get(marketId).reveal(call, secret);
  }

  cancelByTimeout(marketId: string, call: Caller) {
    this.get(marketId).cancelByTimeout(call);
  }

  settle(marketId: string, call: Caller) {
    this.get(marketId).settle(call);
  }

  confirmReceipt(marketId: string, call: Caller) {
    this.get(marketId).confirmReceipt(call);
  }

  claimRefund(marketId: string, call: Caller) {
    return this.get(marketId).claimRefund(call);
  }

  refundAll(marketId: string, call: Caller) {
    return this.get(marketId).refundAll(call);
  }

  fund(address: string, amount: bigint) {
    this.bank.mint(address, amount);
    this.logger.info({ address, amount: amount.toString() }, 'wallet funded');
    return this.bank.balanceOf(address);
  }

  setFoundation(sender: string, foundation: string) {
    const previous = this.treasury.setFoundation(sender, foundation);
    this.logger.warn({ previous, foundation, operator: sender }, 'foundation address updated');
  }

  private onEvent(event: MarketEvent) {
    this.logger.info({ event: toJson(event) }, `market event ${event.type}`);
    try {
      this.publish?.(event);
    } catch (error) {
      this.logger.error({ err: error, marketId: event.marketId, event: event.type }, 'event publish failed');
    }
  }
}
