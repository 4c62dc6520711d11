import { hashToField, utf8 } from './hashing';
import type { IdentityProof, IdentityScope, LedgerState, ParticipantRecord, VerificationRequest } from './types';

export const createLedger = (): LedgerState => ({
  participants: [],
  records: new Map(),
  usedNullifiers: new Set(),
  nullifierHashSum: 0n
});

export const hasEntered = (ledger: LedgerState, address: string) => ledger.records.get(address)?.hasEntered ?? false;

export const isNullifierUsed = (ledger: LedgerState, nullifierHash: bigint) => ledger.usedNullifiers.has(nullifierHash);

/** Public inputs an identity proof is checked against: the entrant's wallet is the signal. */
export const verificationRequestFor = (scope: IdentityScope, sender: string, identity: IdentityProof): VerificationRequest => ({
  root: identity.root,
  groupId: scope.groupId,
  signalHash: hashToField(utf8(sender)),
  nullifierHash: identity.nullifierHash,
  externalNullifierHash: hashToField(utf8(scope.appId), utf8(scope.action)),
  proof: identity.proof
});

export interface EntryInput {
  address: string;
  nullifierHash: bigint;
  paidAmount: bigint;
  enteredAt: number;
}

export const recordEntry = (ledger: LedgerState, entry: EntryInput): ParticipantRecord => {
  if (isNullifierUsed(ledger, entry.nullifierHash) || hasEntered(ledger, entry.address)) {
    throw new Error(`entry already recorded for ${entry.address}`);
  }
  const record: ParticipantRecord = {
    address: entry.address,
    nullifierHash: entry.nullifierHash,
    hasEntered: true,
    isWinner: false,
    paidAmount: entry.paidAmount,
    depositRefunded: false,
    receiptConfirmed: false,
    enteredAt: entry.enteredAt
  };
  ledger.usedNullifiers.add(entry.nullifierHash);
  ledger.participants.push(entry.address);
  ledger.records.set(entry.address, record);
  ledger.nullifierHashSum ^= entry.nullifierHash;
  return record;
};

export const participantRecord = (ledger: LedgerState, address: string): ParticipantRecord | undefined =>
  ledger.records.get(address);

export const markWinners = (ledger: LedgerState, winners: readonly string[]) => {
  winners.forEach((winner) => {
    const record = ledger.records.get(winner);
    if (!record) {
      throw new Error(`winner ${winner} has no participant record`);
    }
    record.isWinner = true;
  });
};

export const pendingRefunds = (ledger: LedgerState): ParticipantRecord[] =>
  ledger.participants
    .map((address) => ledger.records.get(address))
    .filter((record): record is ParticipantRecord => record !== undefined && !record.depositRefunded);
