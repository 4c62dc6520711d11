import pino from 'pino';
import { env } from '../config/env';

const baseLogger = pino({
  level: env.logLevel,
  base: { service: 'escrow-market-backend' }
});

export const getLogger = (bindings?: pino.Bindings) => baseLogger.child(bindings ?? {});

export const logger = getLogger();
