import type { MarketStatus } from './types';

export type MarketErrorCode =
  | 'InvalidState'
  | 'InsufficientFunds'
  | 'AlreadyParticipated'
  | 'Unauthorized'
  | 'TimeNotReached'
  | 'TimeExpired'
  | 'VerificationFailed'
  | 'TransferFailed'
  | 'NoParticipants'
  | 'InvalidTargetEntries'
  | 'CapacityReached'
  | 'AlreadyClaimed'
  | 'Reentrancy';

export type ErrorDetails = Record<string, string | number | boolean | null>;

export class MarketError extends Error {
  readonly code: MarketErrorCode;
  readonly details: ErrorDetails;

  constructor(code: MarketErrorCode, message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MarketError';
    this.code = code;
    this.details = details;
  }
}

export const isMarketError = (error: unknown, code?: MarketErrorCode): error is MarketError =>
  error instanceof MarketError && (code === undefined || error.code === code);

export const invalidState = (current: MarketStatus, expected: MarketStatus | MarketStatus[], reason?: string) => {
  const expectedList = Array.isArray(expected) ? expected.join('|') : expected;
  return new MarketError(
    'InvalidState',
    reason ?? `market is ${current}, expected ${expectedList}`,
    { current, expected: expectedList }
  );
};

export const unauthorized = (sender: string, role: string) =>
  new MarketError('Unauthorized', `${sender} is not the ${role}`, { sender, role });
