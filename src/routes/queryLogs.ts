import type { FastifyInstance } from 'fastify';
import type { ResolverManager } from '../apply/manager.js';

export async function registerQueryLogsRoutes(app: FastifyInstance, manager: ResolverManager): Promise<void> {
  app.get(
    '/api/query-log',
    {
      config: {
        rateLimit: {
          max: 60,
          timeWindow: '1 minute'
        }
      }
    },
    async () => {
      return { items: await manager.readQueryLog() };
    }
  );

  app.get(
    '/api/top-domains',
    {
      config: {
        rateLimit: {
          // Scans up to 2 MiB of log per call.
          max: 30,
          timeWindow: '1 minute'
        }
      }
    },
    async () => {
      return { items: await manager.readTopDomains(25) };
    }
  );
}
