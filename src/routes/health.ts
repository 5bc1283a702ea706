import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';
import type { ResolverManager } from '../apply/manager.js';

export async function registerHealthRoutes(app: FastifyInstance, config: AppConfig, manager: ResolverManager): Promise<void> {
  app.get('/api/health', async () => {
    const status = manager.applyStatus;
    return {
      ok: true,
      env: config.NODE_ENV,
      time: new Date().toISOString(),
      applyState: status.state,
      // Installed configuration is not active until the next successful reload.
      degraded: status.pendingReload
    };
  });
}
