import { loadEnvironment } from '../config/environment.js';
import { loadInstruments } from '../config/instruments.js';
import { createLogger } from '../utils/logger.js';
import { millisecondsUntil } from '../utils/timing.js';
import { createApp } from './app.js';
import { registerRoutes } from '../routes/index.js';
import { MarketRealtimeRepository } from '../services/market-data/market-realtime.repository.js';
import { UpstreamPusherClient } from '../services/market-data/upstream-pusher-ws.client.js';
import { UpstreamIngestionService } from '../services/market-data/upstream-ingestion.service.js';
import { MarketPusherGateway } from './market-pusher.gateway.js';

async function start(): Promise<void> {
  try {
    const env = loadEnvironment();
    const logger = createLogger();

    logger.info('Starting market pusher...');
    logger.info(`Environment: ${env.NODE_ENV}`);

    const instruments = await loadInstruments(env.INSTRUMENTS_FILE);
    const repository = new MarketRealtimeRepository();
    repository.registerInstruments(instruments);

    const app = await createApp();
    const gateway = new MarketPusherGateway(app, repository, {
      path: env.PUSHER_WS_PATH,
      sendTimeoutMs: env.BROADCAST_SEND_TIMEOUT_MS,
    });

    const client = new UpstreamPusherClient(repository, {
      heartbeatIntervalMs: env.UPSTREAM_HEARTBEAT_MS,
    });
    const ingestion = new UpstreamIngestionService(client, {
      host: env.UPSTREAM_WS_HOST,
      port: env.UPSTREAM_WS_PORT,
      isins: instruments.map((instrument) => instrument.isin),
      reconnectBaseMs: env.UPSTREAM_RECONNECT_BASE_MS,
      reconnectMaxMs: env.UPSTREAM_RECONNECT_MAX_MS,
    });

    await registerRoutes(app, { repository, gateway, ingestion });

    await app.listen({
      port: env.PORT,
      host: env.HOST,
    });
    logger.info(`Serving has started on ws://${env.HOST}:${env.PORT}${env.PUSHER_WS_PATH}`);

    ingestion.start();

    let shuttingDown = false;
    const shutdown = async (reason: string): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info(`${reason}, shutting down gracefully...`);

      await ingestion.stop();
      gateway.close();
      await app.close();
      logger.info('Serving has ended');
      process.exit(0);
    };

    const requestShutdown = (reason: string): void => {
      shutdown(reason).catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
    };

    if (env.MARKET_END_TIME) {
      const delay = millisecondsUntil(env.MARKET_END_TIME);
      logger.info({ marketEndTime: env.MARKET_END_TIME, delay }, 'Shutdown scheduled at market end');
      setTimeout(() => requestShutdown('Market end time reached'), delay);
    }

    process.on('SIGTERM', () => requestShutdown('SIGTERM received'));
    process.on('SIGINT', () => requestShutdown('SIGINT received'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void start();
