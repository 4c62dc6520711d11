export type Hex = `0x${string}`;

export type MarketType = 'LOTTERY' | 'RAFFLE';

export type MarketStatus =
  | 'CREATED'
  | 'OPEN'
  | 'CLOSED'
  | 'COMMITTED'
  | 'REVEALED'
  | 'COMPLETED'
  | 'FAILED';

export type RandomnessMode = 'precommitted' | 'post-close';
export type SettlementMode = 'settle' | 'confirm-receipt';

export interface MarketProfile {
  randomness: RandomnessMode;
  settlement: SettlementMode;
  forbidSellerEntry: boolean;
}

export interface FeeSchedule {
  foundationPercent: number;
  operationsPercent: number;
}

export interface IdentityScope {
  appId: string;
  action: string;
  groupId: bigint;
}

export interface MarketSettings {
  fees: FeeSchedule;
  lotteryWinnerPercent: number;
  sellerDepositPercent: number;
  slashPercent: number;
  revealDelayBlocks: number;
  revealWindowBlocks: number;
  revealTimeoutSeconds: number;
  confirmWindowSeconds: number;
  identity: IdentityScope;
  trustedFactories: string[];
}

export interface Caller {
  sender: string;
}

export interface PayableCall extends Caller {
  value: bigint;
}

export interface CreateMarketParams {
  id: string;
  type: MarketType;
  /** Only honoured when the call comes through a trusted factory. */
  seller?: string;
  ticketPrice: bigint;
  depositPerEntry: bigint;
  goalAmount: bigint;
  preparedQuantity?: number;
  endTime: number;
  maxEntries?: number;
  profile: MarketProfile;
  secretNullifier?: Hex;
}

export interface IdentityProof {
  root: bigint;
  nullifierHash: bigint;
  proof: string;
}

export interface VerificationRequest {
  root: bigint;
  groupId: bigint;
  signalHash: bigint;
  nullifierHash: bigint;
  externalNullifierHash: bigint;
  proof: string;
}

export interface IdentityVerifier {
  /** Returns on acceptance, throws on rejection. */
  verify(request: VerificationRequest): void;
}

export interface ParticipantRecord {
  address: string;
  nullifierHash: bigint;
  hasEntered: boolean;
  isWinner: boolean;
  paidAmount: bigint;
  depositRefunded: boolean;
  receiptConfirmed: boolean;
  enteredAt: number;
}

export interface LedgerState {
  participants: string[];
  records: Map<string, ParticipantRecord>;
  usedNullifiers: Set<bigint>;
  nullifierHashSum: bigint;
}

export interface RevealWindow {
  revealStartBlock: number;
  revealDeadlineBlock: number;
  revealDeadline: number;
}

export interface RandomnessState {
  commitment?: Hex;
  window?: RevealWindow;
  secretRevealed: boolean;
  entropyBlock?: number;
  seed?: Hex;
}

export interface MarketState {
  id: string;
  address: string;
  seller: string;
  type: MarketType;
  profile: MarketProfile;
  status: MarketStatus;
  ticketPrice: bigint;
  depositPerEntry: bigint;
  sellerDeposit: bigint;
  prizePool: bigint;
  refundPoolBase: bigint;
  goalAmount: bigint;
  preparedQuantity: number;
  endTime: number;
  maxEntries?: number;
  ledger: LedgerState;
  winners: string[];
  randomness: RandomnessState;
  refundsClaimed: number;
  createdAt: number;
  openedAt?: number;
  closedAt?: number;
  revealedAt?: number;
  finalizedAt?: number;
}

export type CloseOutcome = 'CLOSED' | 'FAILED' | 'REVEALED';
export type FailureReason = 'goal-not-met' | 'no-participants' | 'reveal-timeout';

export type MarketEvent =
  | { type: 'Created'; marketId: string; seller: string; marketType: MarketType; sellerDeposit: bigint; commitment?: Hex }
  | { type: 'Opened'; marketId: string; endTime: number }
  | {
      type: 'Entered';
      marketId: string;
      participant: string;
      nullifierHash: bigint;
      foundationFee: bigint;
      operationsFee: bigint;
      prizePool: bigint;
    }
  | { type: 'Closed'; marketId: string; outcome: CloseOutcome; participants: number; prizePool: bigint }
  | { type: 'Failed'; marketId: string; reason: FailureReason; sellerRefund: bigint }
  | { type: 'Committed'; marketId: string; commitment: Hex; revealStartBlock: number }
  | { type: 'Revealed'; marketId: string; seed: Hex; entropyBlock: number }
  | { type: 'WinnersSelected'; marketId: string; winners: string[] }
  | {
      type: 'Settled';
      marketId: string;
      prizeRecipient: string;
      prizeAmount: bigint;
      operationsAmount: bigint;
      sellerRefund: bigint;
    }
  | { type: 'ReceiptConfirmed'; marketId: string; winner: string; depositRefund: bigint }
  | { type: 'RefundClaimed'; marketId: string; participant: string; amount: bigint }
  | { type: 'Slashed'; marketId: string; seller: string; slashed: bigint; returned: bigint };

export type MarketEventListener = (event: MarketEvent) => void;

export interface MarketAccounting {
  owed: bigint;
  held: bigint;
  solvent: boolean;
}
