import type { FastifyInstance } from 'fastify';
import type { ResolverManager } from '../apply/manager.js';

export async function registerStatsRoutes(app: FastifyInstance, manager: ResolverManager): Promise<void> {
  app.get(
    '/api/stats',
    {
      config: {
        rateLimit: {
          max: 120,
          timeWindow: '1 minute'
        }
      }
    },
    async () => {
      return manager.readStats();
    }
  );
}
