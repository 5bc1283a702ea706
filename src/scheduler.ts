import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { describeError } from './errors.js';
import type { RefreshOutcome, ResolverManager } from './apply/manager.js';
import { updateRootHints } from './unbound/rootHints.js';

export type SchedulerHandle = {
  /** Manual refresh; shares the apply single-flight with everything else. */
  triggerNow: () => Promise<RefreshOutcome>;
  close: () => Promise<void>;
};

export type SchedulerOptions = {
  config: AppConfig;
  manager: ResolverManager;
  rootHintsPath: string;
  /** From ResolverManager.bootstrap(). */
  hasPriorState: boolean;
  log: Logger;
  /** Defaults to false when NODE_ENV=test. */
  enabled?: boolean;
};

/**
 * Startup sequence and the periodic blocklist refresh.
 * First run without an installed config refreshes eagerly; otherwise the
 * stored state is re-applied and the next download waits for the interval.
 */
export function startRefreshScheduler(opts: SchedulerOptions): SchedulerHandle {
  const { config, manager, log } = opts;
  const triggerNow = () => manager.refreshBlocklists();

  // Avoid background timers in unit/integration tests.
  const enabled = opts.enabled ?? config.NODE_ENV !== 'test';
  if (!enabled) {
    return { triggerNow, close: async () => undefined };
  }

  let closed = false;

  const startup = async () => {
    try {
      await updateRootHints(config.ROOT_HINTS_URL, opts.rootHintsPath, log);
      if (closed) return;
      if (opts.hasPriorState) {
        const result = await manager.applyCurrent('startup');
        log.info({ status: result.status }, 'applied stored configuration');
      } else {
        const outcome = await manager.refreshBlocklists();
        log.info({ status: outcome.result.status, domainsBlocked: outcome.domainsBlocked }, 'initial blocklist refresh done');
      }
    } catch (err) {
      log.error({ err: describeError(err) }, 'startup apply failed');
    }
  };

  const tick = async () => {
    try {
      const urls = await manager.listBlocklists();
      if (!urls.length) return;
      log.info({ sources: urls.length }, 'scheduled blocklist refresh');
      const outcome = await manager.refreshBlocklists();
      log.info(
        { status: outcome.result.status, domainsBlocked: outcome.domainsBlocked, failures: outcome.failures.length },
        'scheduled blocklist refresh done'
      );
    } catch (err) {
      log.error({ err: describeError(err) }, 'scheduled blocklist refresh failed');
    }
  };

  const initial = setTimeout(() => void startup(), 0);
  const interval = setInterval(() => void tick(), config.BLOCKLIST_REFRESH_INTERVAL_HOURS * 60 * 60 * 1000);

  // Don't keep the process alive solely due to refresh timers.
  initial.unref?.();
  interval.unref?.();

  return {
    triggerNow,
    close: async () => {
      closed = true;
      clearTimeout(initial);
      clearInterval(interval);
    }
  };
}
