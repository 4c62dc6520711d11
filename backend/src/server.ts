import http from 'http';
import { Treasury } from '../../contracts/src';
import { createApp } from './app';
import { env } from './config/env';
import { WallClockChain } from './services/chainClock';
import { AttestationVerifier } from './services/identityVerifier';
import { MarketService } from './services/marketService';
import { logger } from './utils/logger';
import { broadcastMarketEvent, initWebSocketHub } from './ws';

const service = new MarketService({
  chain: new WallClockChain({ blockTimeMs: env.chain.blockTimeMs }),
  verifier: new AttestationVerifier({ secret: env.identity.attesterSecret, roots: env.identity.roots }),
  treasury: new Treasury(env.treasury),
  publish: broadcastMarketEvent
});

const server = http.createServer(createApp(service));
const hub = initWebSocketHub(server);

server.listen(env.port, () => {
  logger.info({ port: env.port, blockTimeMs: env.chain.blockTimeMs }, 'escrow market backend listening');
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'shutting down');
  hub.close();
  server.close((error) => {
    if (error) {
      logger.error({ err: error }, 'server close failed');
      process.exitCode = 1;
    }
  });
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
