import type { FastifyInstance } from 'fastify';
import { type HealthDependencies, healthRoute } from './health.route.js';

export async function registerRoutes(
  app: FastifyInstance,
  deps: HealthDependencies,
): Promise<void> {
  await healthRoute(app, deps);
}
