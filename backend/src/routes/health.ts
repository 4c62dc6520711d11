import { Router } from 'express';
import type { MarketService } from '../services/marketService';
import { isWebSocketHealthy } from '../ws';

export const createHealthRouter = (service: MarketService) => {
  const router = Router();

  router.get('/', (_req, res) => {
    const markets = service.list();
    const insolvent = markets.filter((market) => !market.accounting().solvent).map((market) => market.id);
    const wsOk = isWebSocketHealthy();
    res.json({
      status: wsOk && insolvent.length === 0 ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      ws_ok: wsOk,
      markets: markets.length,
      insolvent_markets: insolvent,
      block_number: service.chain.blockNumber()
    });
  });

  return router;
};
