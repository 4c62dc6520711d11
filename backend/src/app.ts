import cors from 'cors';
import express from 'express';
import { env } from './config/env';
import { createHealthRouter } from './routes/health';
import { createMarketsRouter } from './routes/markets';
import { createTreasuryRouter } from './routes/treasury';
import { createWalletsRouter } from './routes/wallets';
import type { MarketService } from './services/marketService';

export const createApp = (service: MarketService) => {
  const app = express();

  const corsOptions = env.corsOrigins.length
    ? {
        origin: env.corsOrigins,
        credentials: true
      }
    : undefined;

  app.use(cors(corsOptions));
  app.use(express.json());

  app.get('/', (_req, res) => {
    res.json({ service: 'escrow-market-backend', status: 'online' });
  });

  app.use('/healthz', createHealthRouter(service));
  app.use('/markets', createMarketsRouter(service));
  app.use('/wallets', createWalletsRouter(service));
  app.use('/treasury', createTreasuryRouter(service));

  return app;
};
