import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { ControlCommandError, CustomConfigMissingError } from '../errors.js';
import { fileExists, readTextOrNull } from '../persistedFile.js';
import { fetchSources, mergeSources, type SourceFailure, type SourceReport } from '../blocklists/pipeline.js';
import { restartRequiredChanges, type Settings, type SettingsKey } from '../settings/schema.js';
import type { BlocklistStatus, LocalRecord, SettingsStore } from '../settings/store.js';
import type { ResolverControl } from '../unbound/control.js';
import { resolveCustomConfigPath } from '../unbound/customConfig.js';
import type { ResolverLayout } from '../unbound/layout.js';
import { compileLocalRecords } from '../unbound/localRecords.js';
import { parseQueryLog, readLogTail, rotateQueryLogIfNeeded, topDomains, type DomainCount, type QueryLogEntry } from '../unbound/queryLog.js';
import { parseStats, summarizeStats, type StatsSummary } from '../unbound/stats.js';
import { customConfig, parseBlocklistFragment, synthesize, type GeneratedConfig } from '../unbound/synthesize.js';
import type { ApplyController, ApplyOptions, ApplyResult, ControllerStatus } from './controller.js';

const QUERY_LOG_VIEW_BYTES = 100 * 1024;
const TOP_DOMAINS_BYTES = 2 * 1024 * 1024;

export type ManagerOptions = {
  config: AppConfig;
  store: SettingsStore;
  controller: ApplyController;
  control: ResolverControl;
  layout: ResolverLayout;
  log: Logger;
};

export type BootstrapReport = {
  seeded: boolean;
  /** A live unbound.conf was already installed before this process started. */
  hasPriorState: boolean;
  blockedDomains: number;
};

export type SettingsUpdate = {
  result: ApplyResult;
  settings: Settings;
  restartRequired: SettingsKey[];
};

export type RefreshOutcome = {
  result: ApplyResult;
  domainsBlocked: number;
  unionSize: number;
  failures: SourceFailure[];
  sources: SourceReport[];
};

export type ListChange<T> = {
  /** null when the item was not found (remove) or already present (add). */
  item: T | null;
  /** null when nothing was applied. */
  result: ApplyResult | null;
};

export type BlocklistView = {
  url: string;
  domains: number | null;
  last_refresh: number | null;
  error: string | null;
};

/**
 * Ties the store, the blocklist pipeline and the apply controller together.
 * User edits that change the resolver configuration are persisted only when
 * the validator did not reject the configuration they produce.
 */
export class ResolverManager {
  private readonly config: AppConfig;
  private readonly store: SettingsStore;
  private readonly controller: ApplyController;
  private readonly control: ResolverControl;
  private readonly layout: ResolverLayout;
  private readonly log: Logger;

  private blocked: string[] = [];
  // Pre-whitelist union from the last refresh in this process.
  private union: ReadonlySet<string> | null = null;

  constructor(opts: ManagerOptions) {
    this.config = opts.config;
    this.store = opts.store;
    this.controller = opts.controller;
    this.control = opts.control;
    this.layout = opts.layout;
    this.log = opts.log;
  }

  get blockedCount(): number {
    return this.blocked.length;
  }

  get applyStatus(): ControllerStatus {
    return this.controller.getStatus();
  }

  async bootstrap(): Promise<BootstrapReport> {
    const seeded = await this.store.seedIfMissing();
    await this.store.ensureListDocuments();

    const fragment = await readTextOrNull(this.layout.blocklistPath);
    this.blocked = fragment ? parseBlocklistFragment(fragment) : [];

    const hasPriorState = await fileExists(this.layout.configPath);
    this.log.info({ seeded, hasPriorState, blockedDomains: this.blocked.length }, 'bootstrap complete');
    return { seeded, hasPriorState, blockedDomains: this.blocked.length };
  }

  getSettings(): Promise<Settings> {
    return this.store.get();
  }

  private async buildCandidate(settings: Settings, blocked: readonly string[], records: readonly LocalRecord[]): Promise<GeneratedConfig> {
    const localFragment = compileLocalRecords(records);
    if (!settings.custom_config) return synthesize(settings, blocked, localFragment, this.layout);

    const customPath = await resolveCustomConfigPath(this.config);
    const text = await readTextOrNull(customPath);
    if (text === null) throw new CustomConfigMissingError(customPath);
    this.log.info({ file: customPath }, 'using custom config');
    return customConfig(text, blocked, localFragment);
  }

  private async rotateQueryLog(settings: Settings): Promise<void> {
    if (!settings.log_queries) return;
    const rotated = await rotateQueryLogIfNeeded(this.layout.queryLogPath, this.config.QUERY_LOG_MAX_BYTES);
    if (rotated) this.log.info({ file: this.layout.queryLogPath }, 'rotated query log');
  }

  private rejectIfBusy(opts: ApplyOptions): boolean {
    return opts.ifBusy === 'reject' && this.controller.busy;
  }

  /** Regenerates from stored state and applies it. */
  async applyCurrent(reason = 'startup'): Promise<ApplyResult> {
    return this.controller.exclusive(async () => {
      const settings = await this.store.get();
      await this.rotateQueryLog(settings);
      const candidate = await this.buildCandidate(settings, this.blocked, await this.store.listLocalRecords());
      return this.controller.applyLocked(candidate, reason);
    });
  }

  async updateSettings(patch: unknown, opts: ApplyOptions = {}): Promise<SettingsUpdate> {
    // Validation errors surface even when another apply is running.
    await this.store.prepareUpdate(patch);

    if (this.rejectIfBusy(opts)) {
      return { result: { status: 'busy' }, settings: await this.store.get(), restartRequired: [] };
    }

    return this.controller.exclusive(async () => {
      const { before, after } = await this.store.prepareUpdate(patch);
      await this.rotateQueryLog(after);

      const candidate = await this.buildCandidate(after, this.blocked, await this.store.listLocalRecords());
      const result = await this.controller.applyLocked(candidate, 'settings');
      if (result.status === 'rejected') return { result, settings: before, restartRequired: [] };

      await this.store.save(after);
      const restartRequired = restartRequiredChanges(before, after);
      if (restartRequired.length) this.log.warn({ keys: restartRequired }, 'settings saved; resolver restart required');
      return { result, settings: after, restartRequired };
    });
  }

  async refreshBlocklists(opts: ApplyOptions = {}): Promise<RefreshOutcome> {
    const urls = await this.store.listBlocklists();
    this.log.info({ sources: urls.length }, 'refreshing blocklists');

    // Downloads run outside the apply lock; only merge and install are serialized.
    const fetched = await fetchSources(urls, {
      timeoutMs: this.config.BLOCKLIST_FETCH_TIMEOUT_MS,
      maxBytes: this.config.BLOCKLIST_MAX_BYTES,
      concurrency: this.config.BLOCKLIST_FETCH_CONCURRENCY,
      log: this.log
    });

    const status: BlocklistStatus = {};
    for (const r of fetched.reports) {
      status[r.url] = { domains: r.domains, last_refresh: Math.floor(r.fetchedAt / 1000), error: r.error };
    }
    await this.store.mergeBlocklistStatus(status);

    if (this.rejectIfBusy(opts)) {
      return { result: { status: 'busy' }, domainsBlocked: this.blocked.length, unionSize: 0, failures: fetched.failures, sources: fetched.reports };
    }

    return this.controller.exclusive(async () => {
      const merged = mergeSources(fetched, await this.store.listWhitelist());
      const settings = await this.store.get();
      const candidate = await this.buildCandidate(settings, merged.domains, await this.store.listLocalRecords());
      const result = await this.controller.applyLocked(candidate, 'blocklist refresh');

      if (result.status !== 'rejected') {
        this.blocked = merged.domains;
        this.union = merged.union;
      }
      this.log.info(
        { domainsBlocked: merged.domains.length, failures: fetched.failures.length, status: result.status },
        'blocklist refresh complete'
      );
      return {
        result,
        domainsBlocked: merged.domains.length,
        unionSize: merged.union.size,
        failures: fetched.failures,
        sources: fetched.reports
      };
    });
  }

  // --- blocklist sources (take effect on the next refresh) ---

  async listBlocklists(): Promise<BlocklistView[]> {
    const [urls, status] = await Promise.all([this.store.listBlocklists(), this.store.getBlocklistStatus()]);
    return urls.map((url) => {
      const s = status[url];
      return { url, domains: s?.domains ?? null, last_refresh: s?.last_refresh ?? null, error: s?.error ?? null };
    });
  }

  addBlocklist(url: string): Promise<boolean> {
    return this.store.addBlocklist(url);
  }

  removeBlocklistAt(index: number): Promise<string | null> {
    return this.store.removeBlocklistAt(index);
  }

  // --- whitelist ---

  listWhitelist(): Promise<string[]> {
    return this.store.listWhitelist();
  }

  /** Re-subtracts from the cached union when one exists; otherwise the change waits for the next refresh. */
  private async reapplyWhitelist(): Promise<ApplyResult | null> {
    return this.controller.exclusive(async () => {
      // Union of the latest refresh queued ahead of this edit.
      const union = this.union;
      if (!union) return null;
      const merged = mergeSources({ lists: [{ url: 'cached', domains: new Set(union) }] }, await this.store.listWhitelist());
      const candidate = await this.buildCandidate(await this.store.get(), merged.domains, await this.store.listLocalRecords());
      const result = await this.controller.applyLocked(candidate, 'whitelist');
      if (result.status !== 'rejected') this.blocked = merged.domains;
      return result;
    });
  }

  async addWhitelist(domain: string): Promise<ListChange<string>> {
    const added = await this.store.addWhitelist(domain);
    if (!added) return { item: null, result: null };
    return { item: domain, result: await this.reapplyWhitelist() };
  }

  async removeWhitelistAt(index: number): Promise<ListChange<string>> {
    const removed = await this.store.removeWhitelistAt(index);
    if (removed === null) return { item: null, result: null };
    return { item: removed, result: await this.reapplyWhitelist() };
  }

  // --- local records ---

  listLocalRecords(): Promise<LocalRecord[]> {
    return this.store.listLocalRecords();
  }

  private async applyLocalRecords(next: LocalRecord[]): Promise<ApplyResult> {
    const candidate = await this.buildCandidate(await this.store.get(), this.blocked, next);
    const result = await this.controller.applyLocked(candidate, 'local records');
    if (result.status !== 'rejected') await this.store.saveLocalRecords(next);
    return result;
  }

  /** `item` is null when a record for the hostname already exists. */
  async addLocalRecord(record: LocalRecord): Promise<ListChange<LocalRecord>> {
    return this.controller.exclusive(async () => {
      const records = await this.store.listLocalRecords();
      if (records.some((r) => r.hostname === record.hostname)) return { item: null, result: null };
      return { item: record, result: await this.applyLocalRecords([...records, record]) };
    });
  }

  async removeLocalRecordAt(index: number): Promise<ListChange<LocalRecord>> {
    return this.controller.exclusive(async () => {
      const records = await this.store.listLocalRecords();
      if (!Number.isInteger(index) || index < 0 || index >= records.length) return { item: null, result: null };
      const [removed] = records.splice(index, 1);
      return { item: removed, result: await this.applyLocalRecords(records) };
    });
  }

  // --- daemon operations ---

  async flushCache(): Promise<void> {
    const res = await this.control.flushZone('.');
    if (!res.ok) throw new ControlCommandError('flush_zone .', res.output);
    this.log.info('cache flushed');
  }

  async flushDomain(domain: string): Promise<void> {
    const res = await this.control.flushDomain(domain);
    if (!res.ok) throw new ControlCommandError(`flush ${domain}`, res.output);
    this.log.info({ domain }, 'domain flushed from cache');
  }

  async readStats(): Promise<StatsSummary> {
    const res = await this.control.stats();
    if (!res.ok) throw new ControlCommandError('stats_noreset', res.output);
    return summarizeStats(parseStats(res.output), this.blocked.length);
  }

  async readQueryLog(): Promise<QueryLogEntry[]> {
    return parseQueryLog(await readLogTail(this.layout.queryLogPath, QUERY_LOG_VIEW_BYTES));
  }

  async readTopDomains(limit = 25): Promise<DomainCount[]> {
    return topDomains(parseQueryLog(await readLogTail(this.layout.queryLogPath, TOP_DOMAINS_BYTES)), limit);
  }
}
