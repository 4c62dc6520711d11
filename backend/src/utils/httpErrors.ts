import type { Response } from 'express';
import { ZodError } from 'zod';
import { MarketError, type MarketErrorCode } from '../../../contracts/src';
import { DuplicateMarketError, MarketNotFoundError } from '../services/marketService';
import { getLogger } from './logger';

const logger = getLogger({ scope: 'http' });

const STATUS_BY_CODE: Record<MarketErrorCode, number> = {
  InvalidState: 409,
  InsufficientFunds: 400,
  AlreadyParticipated: 409,
  Unauthorized: 403,
  TimeNotReached: 425,
  TimeExpired: 410,
  VerificationFailed: 422,
  TransferFailed: 502,
  NoParticipants: 409,
  InvalidTargetEntries: 400,
  CapacityReached: 409,
  AlreadyClaimed: 409,
  Reentrancy: 409
};

export const sendError = (res: Response, error: unknown) => {
  if (error instanceof ZodError) {
    return res.status(400).json({ error: 'Invalid request body', issues: error.flatten().fieldErrors });
  }
  if (error instanceof MarketError) {
    return res.status(STATUS_BY_CODE[error.code]).json({ error: error.message, code: error.code, details: error.details });
  }
  if (error instanceof MarketNotFoundError) {
    return res.status(404).json({ error: error.message });
  }
  if (error instanceof DuplicateMarketError) {
    return res.status(409).json({ error: error.message });
  }
  logger.error({ err: error }, 'unhandled request error');
  return res.status(500).json({ error: error instanceof Error ? error.message : 'Internal error' });
};
