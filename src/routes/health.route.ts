import type { FastifyInstance } from 'fastify';
import { HEALTH_ROUTE } from '../config/constants.js';
import type { MarketRealtimeRepository } from '../services/market-data/market-realtime.repository.js';
import type { UpstreamIngestionService } from '../services/market-data/upstream-ingestion.service.js';
import type { MarketPusherGateway } from '../server/market-pusher.gateway.js';

export type HealthDependencies = {
  repository: MarketRealtimeRepository;
  gateway: MarketPusherGateway;
  ingestion: Pick<UpstreamIngestionService, 'isConnected'>;
};

/**
 * Health check route
 * Reports 503 while the upstream feed is disconnected.
 */
export async function healthRoute(app: FastifyInstance, deps: HealthDependencies): Promise<void> {
  app.get(HEALTH_ROUTE, async (_request, reply) => {
    const upstreamConnected = deps.ingestion.isConnected();
    if (!upstreamConnected) {
      reply.status(503);
    }

    return {
      status: upstreamConnected ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      service: 'market-pusher',
      upstream: upstreamConnected ? 'connected' : 'disconnected',
      instruments: deps.repository.instrumentCount(),
      connections: deps.gateway.connectionCount(),
      channels: deps.gateway.channelCount(),
    };
  });
}
