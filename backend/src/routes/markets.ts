import { Router } from 'express';
import type { Response } from 'express';
import { z } from 'zod';
import { PROFILES, isBytes32, isUint256, type Market, type ProfileName } from '../../../contracts/src';
import { authenticatedUser, requireUserToken } from '../middleware/auth';
import type { MarketService } from '../services/marketService';
import { sendError } from '../utils/httpErrors';
import { toJson } from '../utils/json';

const amount = z
  .string()
  .regex(/^\d+$/, 'amount must be a decimal string')
  .transform((value) => BigInt(value));

const field = z
  .string()
  .regex(/^(0x[0-9a-fA-F]+|\d+)$/, 'must be an unsigned integer')
  .transform((value) => BigInt(value))
  .refine(isUint256, 'must fit in 256 bits');

const hex32 = z.string().refine(isBytes32, 'must be a 0x-prefixed 32 byte hex string');

const isProfileName = (value: string): value is ProfileName => Object.prototype.hasOwnProperty.call(PROFILES, value);

const createSchema = z.object({
  id: z.string().min(1).max(64).optional(),
  type: z.enum(['RAFFLE', 'LOTTERY']),
  profile: z.string().refine(isProfileName, 'unknown market profile'),
  seller: z.string().min(1).optional(),
  ticketPrice: amount,
  depositPerEntry: amount,
  goalAmount: amount,
  preparedQuantity: z.number().int().positive().optional(),
  endTime: z.number().int().positive(),
  maxEntries: z.number().int().positive().optional(),
  secretNullifier: hex32.optional(),
  value: amount
});

const enterSchema = z.object({
  value: amount,
  identity: z.object({
    root: field,
    nullifierHash: field,
    proof: z.string().min(1)
  })
});

const commitSchema = z.object({ commitment: hex32 });
const revealSchema = z.object({ secret: hex32 });

export const serializeMarket = (market: Market) => {
  const { ledger, ...state } = market.snapshot();
  return toJson({
    ...state,
    address: market.address,
    participantCount: ledger.participants.length,
    participants: ledger.participants,
    accounting: market.accounting()
  });
};

const sender = (res: Response) => ({ sender: authenticatedUser(res).id });

export const createMarketsRouter = (service: MarketService) => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ markets: service.list().map((market) => serializeMarket(market)) });
  });

  router.get('/:id', (req, res) => {
    try {
      res.json({ market: serializeMarket(service.get(req.params.id)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/:id/participants/:address', (req, res) => {
    try {
      const record = service.get(req.params.id).participantInfo(req.params.address);
      if (!record) {
        return res.status(404).json({ error: 'Participant not found' });
      }
      res.json({ participant: toJson(record) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/:id/accounting', (req, res) => {
    try {
      res.json({ accounting: toJson(service.get(req.params.id).accounting()) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/', requireUserToken, (req, res) => {
    try {
      const { value, ...input } = createSchema.parse(req.body);
      const market = service.create(input, { sender: authenticatedUser(res).id, value });
      res.status(201).json({ market: serializeMarket(market) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/open', requireUserToken, (req, res) => {
    try {
      service.open(req.params.id, sender(res));
      res.json({ market: serializeMarket(service.get(req.params.id)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/enter', requireUserToken, (req, res) => {
    try {
      const { value, identity } = enterSchema.parse(req.body);
      const record = service.enter(req.params.id, { sender: authenticatedUser(res).id, value }, identity);
      res.status(201).json({ participant: toJson(record) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/close', requireUserToken, (req, res) => {
    try {
      const status = service.closeEntries(req.params.id, sender(res));
      res.json({ status });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/commit', requireUserToken, (req, res) => {
    try {
      const { commitment } = commitSchema.parse(req.body);
      const window = service.commit(req.params.id, sender(res), commitment);
      res.json({ revealWindow: toJson(window) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/reveal', requireUserToken, (req, res) => {
    try {
      const { secret } = revealSchema.parse(req.body);
      const winners = service.reveal(req.params.id, sender(res), secret);
      res.json({ winners });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/timeout', requireUserToken, (req, res) => {
    try {
      service.cancelByTimeout(req.params.id, sender(res));
      res.json({ market: serializeMarket(service.get(req.params.id)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/settle', requireUserToken, (req, res) => {
    try {
      service.settle(req.params.id, sender(res));
      res.json({ market: serializeMarket(service.get(req.params.id)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/confirm-receipt', requireUserToken, (req, res) => {
    try {
      service.confirmReceipt(req.params.id, sender(res));
      res.json({ market: serializeMarket(service.get(req.params.id)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/refund', requireUserToken, (req, res) => {
    try {
      const refunded = service.claimRefund(req.params.id, sender(res));
      res.json({ refunded: refunded.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/refund-all', requireUserToken, (req, res) => {
    try {
      const refundedCount = service.refundAll(req.params.id, sender(res));
      res.json({ refundedCount });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
};
