import { Bank, InsufficientBalanceError } from './bank';
import type { Chain } from './chain';
import { ZERO_HASH } from './constants';
import {
  createLedger,
  hasEntered,
  isNullifierUsed,
  markWinners,
  participantRecord,
  pendingRefunds,
  recordEntry,
  verificationRequestFor
} from './entryLedger';
import { invalidState, isMarketError, MarketError, unauthorized } from './errors';
import { ExecutionGuard } from './guard';
import { isBytes32, isUint256 } from './hashing';
import { refundShare, sellerDepositFor, splitEntryFee, splitLotteryPrize, splitSlash } from './payout';
import {
  deriveSeed,
  drawWinners,
  expectedCommitment,
  openRevealWindow,
  precommitment,
  revealEligible,
  revealTimedOut
} from './randomness';
import type { Treasury } from './treasury';
import type {
  Caller,
  CreateMarketParams,
  Hex,
  IdentityProof,
  IdentityVerifier,
  MarketAccounting,
  MarketEvent,
  MarketEventListener,
  MarketSettings,
  MarketState,
  MarketStatus,
  ParticipantRecord,
  PayableCall,
  RevealWindow
} from './types';

export interface MarketDependencies {
  bank: Bank;
  chain: Chain;
  treasury: Treasury;
  verifier: IdentityVerifier;
  settings: MarketSettings;
}

export const marketAddressFor = (id: string) => `escrow:${id}`;

const validateParams = (params: CreateMarketParams, now: number) => {
  const reject = (message: string) => new MarketError('InvalidTargetEntries', message, { marketId: params.id });
  if (!params.id.trim()) throw reject('market id must not be empty');
  if (params.ticketPrice <= 0n) throw reject('ticketPrice must be positive');
  if (params.goalAmount <= 0n) throw reject('goalAmount must be positive');
  if (params.depositPerEntry < 0n) throw reject('depositPerEntry must not be negative');
  if (!Number.isFinite(params.endTime) || params.endTime <= now) throw reject('endTime must be in the future');
  if (params.maxEntries !== undefined && (!Number.isInteger(params.maxEntries) || params.maxEntries < 1)) {
    throw reject('maxEntries must be a positive integer');
  }
  if (params.type === 'RAFFLE') {
    const quantity = params.preparedQuantity ?? 0;
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw reject('preparedQuantity must be a positive integer for a raffle');
    }
  }
  if (params.profile.randomness === 'precommitted') {
    if (!params.secretNullifier || !isBytes32(params.secretNullifier)) {
      throw reject('a precommitted market needs a 32-byte secretNullifier');
    }
  }
};

/**
 * One raffle or lottery market. Every mutating operation is all-or-nothing:
 * market state and custody balances are restored if any check or transfer
 * fails, and events are only delivered once the operation has committed.
 */
export class Market {
  private state: MarketState;
  private readonly guard = new ExecutionGuard();
  private readonly listeners = new Set<MarketEventListener>();
  private pending: MarketEvent[] = [];

  private constructor(private readonly deps: MarketDependencies, state: MarketState) {
    this.state = state;
  }

  /**
   * Direct and factory-forwarded creation share this path. A factory passes the
   * seller in `params.seller`; anyone else creates for themselves.
   */
  static create(
    deps: MarketDependencies,
    params: CreateMarketParams,
    call: PayableCall,
    listener?: MarketEventListener
  ): Market {
    const now = deps.chain.now();
    const seller = params.seller ?? call.sender;
    if (seller !== call.sender && !deps.settings.trustedFactories.includes(call.sender)) {
      throw unauthorized(call.sender, 'trusted factory');
    }
    validateParams(params, now);

    const address = marketAddressFor(params.id);
    const sellerDeposit = sellerDepositFor(params.goalAmount, deps.settings.sellerDepositPercent);
    if (call.value !== sellerDeposit) {
      throw new MarketError('InsufficientFunds', `seller deposit must be exactly ${sellerDeposit}`, {
        required: sellerDeposit.toString(),
        provided: call.value.toString()
      });
    }

    const commitment =
      params.profile.randomness === 'precommitted' && params.secretNullifier
        ? precommitment(params.secretNullifier, address)
        : undefined;

    const market = new Market(deps, {
      id: params.id,
      address,
      seller,
      type: params.type,
      profile: { ...params.profile },
      status: 'CREATED',
      ticketPrice: params.ticketPrice,
      depositPerEntry: params.depositPerEntry,
      sellerDeposit,
      prizePool: 0n,
      refundPoolBase: 0n,
      goalAmount: params.goalAmount,
      preparedQuantity: params.type === 'RAFFLE' ? params.preparedQuantity ?? 1 : 1,
      endTime: params.endTime,
      maxEntries: params.maxEntries,
      ledger: createLedger(),
      winners: [],
      randomness: { commitment, secretRevealed: false },
      refundsClaimed: 0,
      createdAt: now
    });
    if (listener) market.subscribe(listener);

    market.execute('create', () => {
      market.collect(call);
      market.emit({
        type: 'Created',
        marketId: params.id,
        seller,
        marketType: params.type,
        sellerDeposit,
        commitment
      });
    });
    return market;
  }

  get id() {
    return this.state.id;
  }

  get address() {
    return this.state.address;
  }

  get seller() {
    return this.state.seller;
  }

  get status(): MarketStatus {
    return this.state.status;
  }

  /**
   * Listeners run after the operation has committed. A listener that throws
   * surfaces its error to the caller of an operation that already took effect.
   */
  subscribe(listener: MarketEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Detached copy of the full market state. */
  snapshot(): MarketState {
    return structuredClone(this.state);
  }

  participantInfo(address: string): ParticipantRecord | undefined {
    const record = participantRecord(this.state.ledger, address);
    return record ? { ...record } : undefined;
  }

  accounting(): MarketAccounting {
    const unclaimedDeposits = BigInt(pendingRefunds(this.state.ledger).length) * this.state.depositPerEntry;
    const owed = this.state.prizePool + this.state.sellerDeposit + unclaimedDeposits;
    const held = this.deps.bank.balanceOf(this.state.address);
    return { owed, held, solvent: owed <= held };
  }

  open(call: Caller) {
    this.execute('open', () => {
      this.expectStatus('CREATED');
      this.requireSeller(call);
      this.state.status = 'OPEN';
      this.state.openedAt = this.deps.chain.now();
      this.emit({ type: 'Opened', marketId: this.state.id, endTime: this.state.endTime });
    });
  }

  enter(call: PayableCall, identity: IdentityProof): ParticipantRecord {
    return this.execute('enter', () => {
      const state = this.state;
      const { chain, settings, treasury } = this.deps;
      this.expectStatus('OPEN');
      if (chain.now() >= state.endTime) {
        throw new MarketError('TimeExpired', 'entry deadline has passed', { endTime: state.endTime });
      }
      if (this.capacityReached()) {
        throw new MarketError('CapacityReached', 'market has no entries left', {
          maxEntries: state.maxEntries ?? null
        });
      }
      if (state.profile.forbidSellerEntry && call.sender === state.seller) {
        throw unauthorized(call.sender, 'non-seller participant');
      }
      const price = state.ticketPrice + state.depositPerEntry;
      if (call.value !== price) {
        throw new MarketError('InsufficientFunds', `entry costs exactly ${price}`, {
          required: price.toString(),
          provided: call.value.toString()
        });
      }
      if (!isUint256(identity.nullifierHash)) {
        throw new MarketError('VerificationFailed', 'nullifier hash must fit in 256 bits', {
          nullifierHash: identity.nullifierHash.toString()
        });
      }
      if (isNullifierUsed(state.ledger, identity.nullifierHash)) {
        throw new MarketError('AlreadyParticipated', 'identity nullifier already used in this market', {
          nullifierHash: identity.nullifierHash.toString()
        });
      }
      if (hasEntered(state.ledger, call.sender)) {
        throw new MarketError('AlreadyParticipated', `${call.sender} already entered`, { sender: call.sender });
      }
      this.verifyIdentity(call.sender, identity);

      this.collect(call);
      const record = recordEntry(state.ledger, {
        address: call.sender,
        nullifierHash: identity.nullifierHash,
        paidAmount: call.value,
        enteredAt: chain.now()
      });
      const split = splitEntryFee(state.ticketPrice, settings.fees);
      state.prizePool += split.pool;
      this.pay(treasury.foundation, split.foundation);
      this.pay(treasury.operations, split.operations);

      this.emit({
        type: 'Entered',
        marketId: state.id,
        participant: call.sender,
        nullifierHash: identity.nullifierHash,
        foundationFee: split.foundation,
        operationsFee: split.operations,
        prizePool: state.prizePool
      });
      return { ...record };
    });
  }

  /** Permissionless once the deadline passes, capacity fills, or a lottery meets its goal. */
  closeEntries(call: Caller): MarketStatus {
    return this.execute('closeEntries', () => {
      const state = this.state;
      this.expectStatus('OPEN');
      const deadlinePassed = this.deps.chain.now() >= state.endTime;
      const goalMet = state.type === 'LOTTERY' && state.prizePool >= state.goalAmount;
      if (!deadlinePassed && !goalMet && !this.capacityReached()) {
        throw new MarketError('TimeNotReached', 'entries are still open', {
          endTime: state.endTime,
          caller: call.sender
        });
      }

      state.closedAt = this.deps.chain.now();
      const count = state.ledger.participants.length;

      if (state.type === 'LOTTERY' && !goalMet) {
        this.failWithDepositReturn('goal-not-met');
      } else if (count === 0) {
        this.failWithDepositReturn('no-participants');
      } else if (state.type === 'RAFFLE' && count <= state.preparedQuantity) {
        // No scarcity: everyone wins and no randomness is needed.
        state.winners = [...state.ledger.participants];
        markWinners(state.ledger, state.winners);
        state.status = 'REVEALED';
        state.revealedAt = state.closedAt;
        this.emitClosed();
        this.emit({ type: 'WinnersSelected', marketId: state.id, winners: [...state.winners] });
      } else {
        state.status = 'CLOSED';
        state.randomness.window = openRevealWindow(this.deps.chain, this.deps.settings);
        this.emitClosed();
      }
      return state.status;
    });
  }

  commit(call: Caller, commitment: Hex): RevealWindow {
    return this.execute('commit', () => {
      const state = this.state;
      this.expectStatus('CLOSED');
      if (state.profile.randomness !== 'post-close') {
        throw invalidState(state.status, 'CLOSED', 'commitment was fixed when the market was created');
      }
      this.requireSeller(call);
      if (this.timedOut()) {
        throw new MarketError('TimeExpired', 'reveal window closed before a commitment was made');
      }
      if (!isBytes32(commitment) || commitment === ZERO_HASH) {
        throw new MarketError('VerificationFailed', 'commitment must be a non-zero 32-byte hash');
      }
      const window = openRevealWindow(this.deps.chain, this.deps.settings);
      state.randomness.commitment = commitment;
      state.randomness.window = window;
      state.status = 'COMMITTED';
      this.emit({ type: 'Committed', marketId: state.id, commitment, revealStartBlock: window.revealStartBlock });
      return { ...window };
    });
  }

  reveal(call: Caller, secret: Hex): string[] {
    return this.execute('reveal', () => {
      const state = this.state;
      const { chain } = this.deps;
      this.expectStatus(state.profile.randomness === 'precommitted' ? 'CLOSED' : 'COMMITTED');
      this.requireSeller(call);
      const window = this.revealWindow();
      if (!revealEligible(window, chain)) {
        throw new MarketError('TimeNotReached', `reveal opens after block ${window.revealStartBlock}`, {
          revealStartBlock: window.revealStartBlock,
          currentBlock: chain.blockNumber()
        });
      }
      if (revealTimedOut(window, chain)) {
        throw new MarketError('TimeExpired', 'reveal window has elapsed', {
          revealDeadline: window.revealDeadline,
          revealDeadlineBlock: window.revealDeadlineBlock
        });
      }
      if (state.randomness.secretRevealed) {
        throw invalidState(state.status, 'REVEALED', 'secret was already revealed');
      }
      const { commitment } = state.randomness;
      if (!isBytes32(secret) || !commitment || expectedCommitment(state.profile.randomness, secret, state.address) !== commitment) {
        throw new MarketError('VerificationFailed', 'secret does not match the commitment');
      }

      const entropy = chain.blockEntropy(window.revealStartBlock);
      const seed = deriveSeed(entropy, secret, state.ledger.nullifierHashSum);
      const winnerCount = state.type === 'LOTTERY' ? 1 : state.preparedQuantity;
      state.randomness.secretRevealed = true;
      state.randomness.entropyBlock = window.revealStartBlock;
      state.randomness.seed = seed;
      state.winners = drawWinners(seed, state.ledger.participants, winnerCount);
      markWinners(state.ledger, state.winners);
      state.status = 'REVEALED';
      state.revealedAt = chain.now();

      this.emit({ type: 'Revealed', marketId: state.id, seed, entropyBlock: window.revealStartBlock });
      this.emit({ type: 'WinnersSelected', marketId: state.id, winners: [...state.winners] });
      return [...state.winners];
    });
  }

  /** Seller missed the reveal: market fails and part of the seller deposit is slashed. */
  cancelByTimeout(call: Caller) {
    this.execute('cancelByTimeout', () => {
      const state = this.state;
      this.expectStatus(['CLOSED', 'COMMITTED']);
      if (!this.timedOut()) {
        const window = this.revealWindow();
        throw new MarketError('TimeNotReached', 'reveal window is still open', {
          revealDeadline: window.revealDeadline,
          revealDeadlineBlock: window.revealDeadlineBlock,
          caller: call.sender
        });
      }
      const split = splitSlash(state.sellerDeposit, this.deps.settings.slashPercent);
      state.sellerDeposit = 0n;
      state.refundPoolBase = state.prizePool;
      state.status = 'FAILED';
      state.finalizedAt = this.deps.chain.now();
      this.pay(this.deps.treasury.operations, split.operations);
      this.pay(state.seller, split.seller);
      this.emit({
        type: 'Slashed',
        marketId: state.id,
        seller: state.seller,
        slashed: split.operations,
        returned: split.seller
      });
      this.emit({ type: 'Failed', marketId: state.id, reason: 'reveal-timeout', sellerRefund: split.seller });
    });
  }

  settle(call: Caller) {
    this.execute('settle', () => {
      const state = this.state;
      this.expectStatus('REVEALED');
      if (state.profile.settlement === 'confirm-receipt') {
        this.requireSeller(call);
        const opensAt = (state.revealedAt ?? 0) + this.deps.settings.confirmWindowSeconds;
        if (this.deps.chain.now() < opensAt) {
          throw new MarketError('TimeNotReached', 'winners can still confirm receipt', { opensAt });
        }
      }
      this.finalizeSettlement();
    });
  }

  /** Winner acknowledges the prize; releases their deposit and, once all winners confirm, the market. */
  confirmReceipt(call: Caller) {
    this.execute('confirmReceipt', () => {
      const state = this.state;
      this.expectStatus('REVEALED');
      if (state.profile.settlement !== 'confirm-receipt') {
        throw invalidState(state.status, 'REVEALED', 'this market settles without receipt confirmation');
      }
      const record = participantRecord(state.ledger, call.sender);
      if (!record?.isWinner) {
        throw unauthorized(call.sender, 'winner');
      }
      if (record.receiptConfirmed) {
        throw new MarketError('AlreadyClaimed', 'receipt already confirmed', { winner: call.sender });
      }
      record.receiptConfirmed = true;
      record.depositRefunded = true;
      this.pay(call.sender, state.depositPerEntry);
      this.emit({
        type: 'ReceiptConfirmed',
        marketId: state.id,
        winner: call.sender,
        depositRefund: state.depositPerEntry
      });

      const allConfirmed = state.winners.every(
        (winner) => participantRecord(state.ledger, winner)?.receiptConfirmed ?? false
      );
      if (state.type === 'LOTTERY' || allConfirmed) {
        this.finalizeSettlement();
      }
    });
  }

  claimRefund(call: Caller): bigint {
    return this.execute('claimRefund', () => {
      this.expectStatus(['FAILED', 'COMPLETED']);
      const record = participantRecord(this.state.ledger, call.sender);
      if (!record) {
        throw unauthorized(call.sender, 'participant');
      }
      if (record.depositRefunded) {
        throw new MarketError('AlreadyClaimed', 'refund already claimed', { participant: call.sender });
      }
      return this.refund(record);
    });
  }

  /**
   * Pays every outstanding refund of a failed market in entry order. One
   * recipient rejecting its transfer aborts the whole batch.
   */
  refundAll(call: Caller): number {
    return this.execute('refundAll', () => {
      this.expectStatus('FAILED');
      const outstanding = pendingRefunds(this.state.ledger);
      if (outstanding.length === 0) {
        throw new MarketError('NoParticipants', 'no refunds outstanding', { caller: call.sender });
      }
      outstanding.forEach((record) => this.refund(record));
      return outstanding.length;
    });
  }

  private refund(record: ParticipantRecord): bigint {
    const state = this.state;
    const share =
      state.status === 'FAILED'
        ? refundShare(state.refundPoolBase, state.prizePool, state.ledger.participants.length, state.refundsClaimed)
        : 0n;
    const amount = state.depositPerEntry + share;
    record.depositRefunded = true;
    state.refundsClaimed += 1;
    state.prizePool -= share;
    this.pay(record.address, amount);
    this.emit({ type: 'RefundClaimed', marketId: state.id, participant: record.address, amount });
    return amount;
  }

  private finalizeSettlement() {
    const state = this.state;
    const pool = state.prizePool;
    const sellerRefund = state.sellerDeposit;
    let prizeRecipient = state.seller;
    let prizeAmount = pool;
    let operationsAmount = 0n;

    if (state.type === 'LOTTERY') {
      const [winner] = state.winners;
      if (!winner) {
        throw new MarketError('NoParticipants', 'lottery has no winner to pay');
      }
      const split = splitLotteryPrize(pool, this.deps.settings.lotteryWinnerPercent);
      prizeRecipient = winner;
      prizeAmount = split.winner;
      operationsAmount = split.operations;
    }

    state.prizePool = 0n;
    state.sellerDeposit = 0n;
    state.status = 'COMPLETED';
    state.finalizedAt = this.deps.chain.now();

    if (state.type === 'RAFFLE') {
      this.pay(state.seller, prizeAmount + sellerRefund);
    } else {
      this.pay(prizeRecipient, prizeAmount);
      this.pay(this.deps.treasury.operations, operationsAmount);
      this.pay(state.seller, sellerRefund);
    }
    this.emit({ type: 'Settled', marketId: state.id, prizeRecipient, prizeAmount, operationsAmount, sellerRefund });
  }

  private failWithDepositReturn(reason: 'goal-not-met' | 'no-participants') {
    const state = this.state;
    const sellerRefund = state.sellerDeposit;
    state.sellerDeposit = 0n;
    state.refundPoolBase = state.prizePool;
    state.status = 'FAILED';
    state.finalizedAt = state.closedAt;
    this.pay(state.seller, sellerRefund);
    this.emitClosed();
    this.emit({ type: 'Failed', marketId: state.id, reason, sellerRefund });
  }

  private emitClosed() {
    const state = this.state;
    const outcome = state.status === 'FAILED' ? 'FAILED' : state.status === 'REVEALED' ? 'REVEALED' : 'CLOSED';
    this.emit({
      type: 'Closed',
      marketId: state.id,
      outcome,
      participants: state.ledger.participants.length,
      prizePool: state.prizePool
    });
  }

  private capacityReached() {
    const { maxEntries, ledger } = this.state;
    return maxEntries !== undefined && ledger.participants.length >= maxEntries;
  }

  private revealWindow(): RevealWindow {
    const { window } = this.state.randomness;
    if (!window) {
      throw invalidState(this.state.status, 'CLOSED', 'reveal window was never opened');
    }
    return window;
  }

  private timedOut() {
    return revealTimedOut(this.revealWindow(), this.deps.chain);
  }

  private verifyIdentity(sender: string, identity: IdentityProof) {
    try {
      this.deps.verifier.verify(verificationRequestFor(this.deps.settings.identity, sender, identity));
    } catch (error) {
      if (isMarketError(error)) throw error;
      throw new MarketError('VerificationFailed', 'identity proof was rejected', { sender }, { cause: error });
    }
  }

  private expectStatus(expected: MarketStatus | MarketStatus[]) {
    const allowed = Array.isArray(expected) ? expected : [expected];
    if (!allowed.includes(this.state.status)) {
      throw invalidState(this.state.status, expected);
    }
  }

  private requireSeller(call: Caller) {
    if (call.sender !== this.state.seller) {
      throw unauthorized(call.sender, 'seller');
    }
  }

  private collect(call: PayableCall) {
    try {
      this.deps.bank.transfer(call.sender, this.state.address, call.value);
    } catch (error) {
      if (error instanceof InsufficientBalanceError) {
        throw new MarketError('InsufficientFunds', error.message, { sender: call.sender }, { cause: error });
      }
      throw error;
    }
  }

  private pay(recipient: string, amount: bigint) {
    try {
      this.deps.bank.transfer(this.state.address, recipient, amount);
    } catch (error) {
      throw new MarketError('TransferFailed', `transfer of ${amount} to ${recipient} failed`, { recipient }, {
        cause: error
      });
    }
  }

  private emit(event: MarketEvent) {
    this.pending.push(event);
  }

  private execute<T>(operation: string, body: () => T): T {
    const result = this.guard.run(operation, () => {
      const stateBefore = structuredClone(this.state);
      const balancesBefore = this.deps.bank.snapshot();
      this.pending = [];
      try {
        return body();
      } catch (error) {
        this.state = stateBefore;
        this.deps.bank.restore(balancesBefore);
        this.pending = [];
        throw error;
      }
    });
    const events = this.pending;
    this.pending = [];
    events.forEach((event) => this.listeners.forEach((listener) => listener(event)));
    return result;
  }
}
