import { Router } from 'express';
import { z } from 'zod';
import { authenticatedUser, requireUserToken } from '../middleware/auth';
import type { MarketService } from '../services/marketService';
import { sendError } from '../utils/httpErrors';

const foundationSchema = z.object({ foundation: z.string().trim().min(1) });

export const createTreasuryRouter = (service: MarketService) => {
  const router = Router();

  router.get('/', (_req, res) => {
    const { treasury } = service;
    res.json({ foundation: treasury.foundation, operations: treasury.operations, operator: treasury.operator });
  });

  router.put('/foundation', requireUserToken, (req, res) => {
    try {
      const { foundation } = foundationSchema.parse(req.body);
      service.setFoundation(authenticatedUser(res).id, foundation);
      res.json({ foundation: service.treasury.foundation });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
};
