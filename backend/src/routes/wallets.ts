import { Router } from 'express';
import { z } from 'zod';
import { requireServiceToken } from '../middleware/auth';
import type { MarketService } from '../services/marketService';
import { sendError } from '../utils/httpErrors';

const fundSchema = z.object({
  amount: z
    .string()
    .regex(/^\d+$/, 'amount must be a decimal string')
    .transform((value) => BigInt(value))
    .refine((value) => value > 0n, 'amount must be positive')
});

export const createWalletsRouter = (service: MarketService) => {
  const router = Router();

  router.get('/:address', (req, res) => {
    res.json({ address: req.params.address, balance: service.bank.balanceOf(req.params.address).toString() });
  });

  // Test-network faucet; balances only exist inside this process.
  router.post('/:address/fund', requireServiceToken, (req, res) => {
    try {
      const { amount } = fundSchema.parse(req.body);
      const balance = service.fund(req.params.address, amount);
      res.json({ address: req.params.address, balance: balance.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
};
