import Fastify, { type FastifyBaseLogger } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import type { AppConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { ApplyController } from './apply/controller.js';
import { ResolverManager, type BootstrapReport } from './apply/manager.js';
import { startRefreshScheduler, type SchedulerHandle } from './scheduler.js';
import { SettingsStore, storePaths } from './settings/store.js';
import { UnboundControl, type ResolverControl } from './unbound/control.js';
import { resolverLayout } from './unbound/layout.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerVersionRoutes } from './routes/version.js';
import { registerSettingsRoutes } from './routes/settings.js';
import { registerBlocklistsRoutes } from './routes/blocklists.js';
import { registerWhitelistRoutes } from './routes/whitelist.js';
import { registerLocalRecordsRoutes } from './routes/localRecords.js';
import { registerCacheRoutes } from './routes/cache.js';
import { registerStatsRoutes } from './routes/stats.js';
import { registerQueryLogsRoutes } from './routes/queryLogs.js';

export type BuildAppOptions = {
  /** Defaults to the unbound-checkconf / unbound-control binaries. */
  control?: ResolverControl;
  /** Defaults to on outside NODE_ENV=test. */
  enableScheduler?: boolean;
  logger?: Logger;
};

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}) {
  const log = options.logger ?? createLogger(config);

  // Request logs go through the same pino instance as the components.
  const requestLog: FastifyBaseLogger = log.child({ component: 'http' });
  const app = Fastify({
    logger: requestLog,
    // Home Assistant ingress proxies every request.
    trustProxy: true
  });

  // Plain HTTP behind ingress: no CSP upgrade, no HSTS.
  await app.register(helmet, { global: true, contentSecurityPolicy: false, hsts: false });

  await app.register(rateLimit, {
    global: false,
    max: 200,
    timeWindow: '1 minute'
  });

  const layout = resolverLayout(config);
  const control =
    options.control ??
    new UnboundControl({
      checkconfBin: config.UNBOUND_CHECKCONF_BIN,
      controlBin: config.UNBOUND_CONTROL_BIN,
      configPath: layout.configPath,
      checkconfTimeoutMs: config.CHECKCONF_TIMEOUT_MS,
      controlTimeoutMs: config.CONTROL_TIMEOUT_MS
    });

  const store = new SettingsStore(storePaths(config.DATA_DIR, config.OPTIONS_PATH), log.child({ component: 'store' }));
  const controller = new ApplyController(layout, control, log.child({ component: 'apply' }));
  const manager = new ResolverManager({
    config,
    store,
    controller,
    control,
    layout,
    log: log.child({ component: 'manager' })
  });

  const boot: BootstrapReport = await manager.bootstrap();

  const scheduler: SchedulerHandle = startRefreshScheduler({
    config,
    manager,
    rootHintsPath: layout.rootHintsPath,
    hasPriorState: boot.hasPriorState,
    log: log.child({ component: 'scheduler' }),
    enabled: options.enableScheduler
  });

  await registerHealthRoutes(app, config, manager);
  await registerVersionRoutes(app);
  await registerSettingsRoutes(app, manager);
  await registerBlocklistsRoutes(app, manager);
  await registerWhitelistRoutes(app, manager);
  await registerLocalRecordsRoutes(app, manager);
  await registerCacheRoutes(app, manager);
  await registerStatsRoutes(app, manager);
  await registerQueryLogsRoutes(app, manager);

  return {
    app,
    manager,
    controller,
    scheduler,
    close: async () => {
      await scheduler.close();
      await app.close();
    }
  };
}
