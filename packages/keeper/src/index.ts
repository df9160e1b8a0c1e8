import 'dotenv/config';
import { pino } from 'pino';
import { serve } from '@hono/node-server';
import { describeConfig, loadConfig } from './config';
import { createEnvironment } from './environment';
import { PositionStorage } from './storage';
import { TickProducer } from './tick-producer';
import { KeeperSentinel } from './sentinel';
import { createKeeperAPI } from './api';

async function main() {
  const config = loadConfig();

  // Initialize logger
  const logger = pino({
    level: config.logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  });

  logger.info('Initializing keeper...');

  const env = createEnvironment(config, logger);
  const storage = new PositionStorage();

  const tickProducer = new TickProducer(
    env.clock,
    { tickInterval: config.tickInterval },
    logger.child({ component: 'ticks' })
  );

  const sentinel = new KeeperSentinel(
    env.ledger,
    storage,
    {
      syncInterval: config.syncInterval,
      keeperAddress: config.keeperAddress,
      budget: config.keeperBudget,
      autoLiquidate: config.autoLiquidate,
    },
    logger.child({ component: 'sentinel' })
  );

  const app = createKeeperAPI(env, storage, sentinel, logger.child({ component: 'api' }), {
    collateralAssetId: config.collateralAssetId,
  });

  env.ledger.onEvent((event) => {
    logger.debug({ event: event.type }, 'Ledger event');
  });

  logger.info({ config: describeConfig(config) }, 'Starting keeper');

  tickProducer.start();
  sentinel.start();

  const server = serve({
    fetch: app.fetch,
    port: config.apiPort,
  });

  logger.info({ port: config.apiPort }, 'Keeper API server started');

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down keeper...');
    tickProducer.stop();
    sentinel.stop();
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error starting keeper:', error);
  process.exit(1);
});
