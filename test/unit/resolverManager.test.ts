import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApplyController } from '../../src/apply/controller.js';
import { ResolverManager } from '../../src/apply/manager.js';
import type { AppConfig } from '../../src/config.js';
import { ControlCommandError, CustomConfigMissingError, SettingsValidationError } from '../../src/errors.js';
import { SettingsStore, storePaths } from '../../src/settings/store.js';
import { resolverLayout, type ResolverLayout } from '../../src/unbound/layout.js';
import { FakeControl, fetchFromTable, mkTmpDir, silentLogger, testConfig } from '../_fakes.js';

const LIST_A = 'https://lists.example.test/a.txt';
const LIST_B = 'https://lists.example.test/b.txt';

type Env = {
  dir: string;
  config: AppConfig;
  layout: ResolverLayout;
  store: SettingsStore;
  control: FakeControl;
  manager: ResolverManager;
};

async function setup(env: Record<string, string> = {}): Promise<Env> {
  const dir = await mkTmpDir();
  const config = testConfig(dir, env);
  const layout = resolverLayout(config);
  const log = silentLogger();
  const store = new SettingsStore(storePaths(config.DATA_DIR, config.OPTIONS_PATH), log);
  const control = new FakeControl();
  const controller = new ApplyController(layout, control, log);
  const manager = new ResolverManager({ config, store, controller, control, layout, log });
  await manager.bootstrap();
  return { dir, config, layout, store, control, manager };
}

async function readConfigJson(config: AppConfig): Promise<unknown> {
  return JSON.parse(await fs.readFile(path.join(config.DATA_DIR, 'config.json'), 'utf8'));
}

describe('ResolverManager', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('bootstraps a fresh data directory', async () => {
    const dir = await mkTmpDir();
    const config = testConfig(dir);
    const layout = resolverLayout(config);
    const log = silentLogger();
    const control = new FakeControl();
    const manager = new ResolverManager({
      config,
      store: new SettingsStore(storePaths(config.DATA_DIR, config.OPTIONS_PATH), log),
      controller: new ApplyController(layout, control, log),
      control,
      layout,
      log
    });

    expect(await manager.bootstrap()).toEqual({ seeded: true, hasPriorState: false, blockedDomains: 0 });
    expect(JSON.parse(await fs.readFile(path.join(config.DATA_DIR, 'whitelist.json'), 'utf8'))).toEqual([]);
  });

  it('recovers the blocked domains from an installed fragment', async () => {
    const dir = await mkTmpDir();
    const config = testConfig(dir);
    const layout = resolverLayout(config);
    await fs.mkdir(config.UNBOUND_DIR, { recursive: true });
    await fs.writeFile(layout.configPath, 'server:\n');
    await fs.writeFile(
      layout.blocklistPath,
      'local-zone: "a.example." always_refuse\nlocal-zone: "b.example." always_refuse\n'
    );
    const log = silentLogger();
    const control = new FakeControl();
    const manager = new ResolverManager({
      config,
      store: new SettingsStore(storePaths(config.DATA_DIR, config.OPTIONS_PATH), log),
      controller: new ApplyController(layout, control, log),
      control,
      layout,
      log
    });

    expect(await manager.bootstrap()).toEqual({ seeded: true, hasPriorState: true, blockedDomains: 2 });

    await manager.applyCurrent();
    expect(await fs.readFile(layout.blocklistPath, 'utf8')).toBe(
      'local-zone: "a.example." always_refuse\nlocal-zone: "b.example." always_refuse\n'
    );
  });

  it('persists accepted settings and flags restart-only changes', async () => {
    const { config, layout, manager } = await setup();

    const update = await manager.updateSettings({ num_threads: 4, prefetch: false });

    expect(update.result).toEqual({ status: 'live', output: 'ok' });
    expect(update.restartRequired).toEqual(['num_threads']);
    expect(await readConfigJson(config)).toMatchObject({ num_threads: 4, prefetch: false });
    const main = await fs.readFile(layout.configPath, 'utf8');
    expect(main.split('\n')).toContain('    num-threads: 4');
    expect(main.split('\n')).toContain('    prefetch: no');
  });

  it('does not persist settings whose configuration is rejected', async () => {
    const { config, layout, control, manager } = await setup();
    await manager.applyCurrent();
    const liveBefore = await fs.readFile(layout.configPath, 'utf8');
    control.checkResult = { ok: false, output: 'error: bad forwarder' };

    const update = await manager.updateSettings({ forward_servers: ['9.9.9.9'] });

    expect(update.result).toEqual({ status: 'rejected', diagnostics: 'error: bad forwarder' });
    expect(update.settings.forward_servers).toEqual([]);
    expect(await readConfigJson(config)).toMatchObject({ forward_servers: [] });
    expect(await fs.readFile(layout.configPath, 'utf8')).toBe(liveBefore);
  });

  it('rejects an invalid patch before touching the resolver', async () => {
    const { control, manager } = await setup();

    await expect(manager.updateSettings({ verbosity: 9 })).rejects.toBeInstanceOf(SettingsValidationError);
    expect(control.calls).toEqual([]);
  });

  it('installs a custom config verbatim', async () => {
    const { config, layout, manager } = await setup();
    const customDir = path.join(config.ADDON_CONFIGS_DIR, 'local-unbound');
    await fs.mkdir(customDir, { recursive: true });
    const custom = 'server:\n  interface: 0.0.0.0\n  include: "/etc/unbound/blocklist.conf"\n';
    await fs.writeFile(path.join(customDir, 'unbound.conf'), custom);

    const update = await manager.updateSettings({ custom_config: true });

    expect(update.result.status).toBe('live');
    expect(await fs.readFile(layout.configPath, 'utf8')).toBe(custom);
  });

  it('fails custom mode without a custom file and keeps the setting off', async () => {
    const { config, control, manager } = await setup();

    await expect(manager.updateSettings({ custom_config: true })).rejects.toBeInstanceOf(CustomConfigMissingError);
    expect(await readConfigJson(config)).toMatchObject({ custom_config: false });
    expect(control.calls).toEqual([]);
  });

  it('refreshes blocklists, records per-source status and installs the fragment', async () => {
    const { layout, store, manager } = await setup();
    vi.spyOn(globalThis, 'fetch').mockImplementation(
      fetchFromTable({ [LIST_A]: '0.0.0.0 b.example\n0.0.0.0 a.example\n' })
    );
    await store.addBlocklist(LIST_A);
    await store.addBlocklist(LIST_B);

    const outcome = await manager.refreshBlocklists();

    expect(outcome.result.status).toBe('live');
    expect(outcome.domainsBlocked).toBe(2);
    expect(outcome.failures).toEqual([{ url: LIST_B, reason: 'HTTP 404' }]);
    expect(await fs.readFile(layout.blocklistPath, 'utf8')).toBe(
      'local-zone: "a.example." always_refuse\nlocal-zone: "b.example." always_refuse\n'
    );

    const status = await store.getBlocklistStatus();
    expect(status[LIST_A]).toMatchObject({ domains: 2, error: null });
    expect(status[LIST_B]).toMatchObject({ domains: 0, error: 'HTTP 404' });
    expect(manager.blockedCount).toBe(2);
  });

  it('writes once for two concurrent identical refreshes', async () => {
    const { control, store, manager } = await setup();
    vi.spyOn(globalThis, 'fetch').mockImplementation(fetchFromTable({ [LIST_A]: '0.0.0.0 a.example\n' }));
    await store.addBlocklist(LIST_A);

    const [first, second] = await Promise.all([manager.refreshBlocklists(), manager.refreshBlocklists()]);

    // Whichever download finishes first installs; the other finds nothing to change.
    expect([first.result.status, second.result.status].sort()).toEqual(['live', 'unchanged']);
    expect(control.calls).toEqual(['checkconf', 'reload']);
  });

  it('re-subtracts the whitelist from the cached union without refetching', async () => {
    const { layout, store, manager } = await setup();
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockImplementation(fetchFromTable({ [LIST_A]: '0.0.0.0 a.example\n0.0.0.0 b.example\n' }));
    await store.addBlocklist(LIST_A);
    await manager.refreshBlocklists();

    const added = await manager.addWhitelist('a.example');

    expect(added.item).toBe('a.example');
    expect(added.result?.status).toBe('live');
    expect(await fs.readFile(layout.blocklistPath, 'utf8')).toBe('local-zone: "b.example." always_refuse\n');

    const removed = await manager.removeWhitelistAt(0);
    expect(removed.item).toBe('a.example');
    expect(manager.blockedCount).toBe(2);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('keeps a newer refresh when a whitelist edit queues behind it', async () => {
    const { layout, store, control, manager } = await setup();
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(fetchFromTable({ [LIST_A]: '0.0.0.0 old.example\n' }));
    await store.addBlocklist(LIST_A);
    await manager.refreshBlocklists();

    fetchSpy.mockImplementation(fetchFromTable({ [LIST_A]: '0.0.0.0 new.example\n' }));
    let release = () => {};
    const gate = new Promise<void>((r) => {
      release = () => r();
    });
    let reached = () => {};
    const atCheck = new Promise<void>((r) => {
      reached = () => r();
    });
    control.onCheck = () => {
      reached();
      return gate;
    };

    const refreshing = manager.refreshBlocklists();
    await atCheck;
    const whitelisting = manager.addWhitelist('unrelated.example');
    await vi.waitFor(async () => expect(await store.listWhitelist()).toEqual(['unrelated.example']));
    await new Promise((r) => setTimeout(r, 0));
    release();

    expect((await refreshing).result).toEqual({ status: 'live', output: 'ok' });
    expect(await whitelisting).toEqual({ item: 'unrelated.example', result: { status: 'unchanged' } });
    expect(await fs.readFile(layout.blocklistPath, 'utf8')).toBe('local-zone: "new.example." always_refuse\n');
    expect(manager.blockedCount).toBe(1);
  });

  it('defers whitelist changes to the next refresh when nothing is cached', async () => {
    const { control, manager } = await setup();

    expect(await manager.addWhitelist('a.example')).toEqual({ item: 'a.example', result: null });
    expect(await manager.addWhitelist('a.example')).toEqual({ item: null, result: null });
    expect(control.calls).toEqual([]);
  });

  it('applies local records and refuses duplicate hostnames', async () => {
    const { layout, store, manager } = await setup();

    const added = await manager.addLocalRecord({ hostname: 'nas.home', ip: '192.168.1.20' });
    expect(added.result?.status).toBe('live');
    expect(await fs.readFile(layout.localRecordsPath, 'utf8')).toBe(
      'local-zone: "nas.home." redirect\nlocal-data: "nas.home. A 192.168.1.20"\n'
    );

    expect(await manager.addLocalRecord({ hostname: 'nas.home', ip: '192.168.1.21' })).toEqual({ item: null, result: null });

    const removed = await manager.removeLocalRecordAt(0);
    expect(removed.item).toEqual({ hostname: 'nas.home', ip: '192.168.1.20' });
    expect(await store.listLocalRecords()).toEqual([]);
    expect(await fs.readFile(layout.localRecordsPath, 'utf8')).toBe('');
    expect(await manager.removeLocalRecordAt(0)).toEqual({ item: null, result: null });
  });

  it('does not store a local record whose configuration is rejected', async () => {
    const { control, store, manager } = await setup();
    control.checkResult = { ok: false, output: 'error' };

    const added = await manager.addLocalRecord({ hostname: 'nas.home', ip: '192.168.1.20' });

    expect(added.result).toEqual({ status: 'rejected', diagnostics: 'error' });
    expect(await store.listLocalRecords()).toEqual([]);
  });

  it('returns busy for a settings edit while another apply runs, when asked not to wait', async () => {
    const { control, manager } = await setup();
    let release = () => {};
    const gate = new Promise<void>((r) => {
      release = () => r();
    });
    control.onCheck = () => gate;

    const running = manager.applyCurrent();

    const update = await manager.updateSettings({ prefetch: false }, { ifBusy: 'reject' });
    expect(update.result).toEqual({ status: 'busy' });
    expect(update.restartRequired).toEqual([]);

    release();
    expect((await running).status).toBe('live');
  });

  it('rotates an oversized query log before enabling query logging', async () => {
    const { layout, manager } = await setup({ QUERY_LOG_MAX_BYTES: '10' });
    await fs.mkdir(path.dirname(layout.queryLogPath), { recursive: true });
    await fs.writeFile(layout.queryLogPath, 'x'.repeat(32));

    await manager.updateSettings({ log_queries: true });

    expect(await fs.readFile(`${layout.queryLogPath}.old`, 'utf8')).toBe('x'.repeat(32));
    expect(await fs.readFile(layout.queryLogPath, 'utf8')).toBe('');
  });

  it('summarizes resolver stats with the blocked domain count', async () => {
    const { manager } = await setup();

    const stats = await manager.readStats();

    expect(stats.total_queries).toBe(200);
    expect(stats.cache_hit_rate).toBe(75);
    expect(stats.blocked_domains).toBe(0);
  });

  it('surfaces control channel failures', async () => {
    const { control, manager } = await setup();
    control.statsResult = { ok: false, output: 'error: could not connect' };
    control.flushResult = { ok: false, output: 'error: could not connect' };

    await expect(manager.readStats()).rejects.toBeInstanceOf(ControlCommandError);
    await expect(manager.flushCache()).rejects.toThrow('flush_zone . failed: error: could not connect');
  });

  it('flushes the cache through the control channel', async () => {
    const { control, manager } = await setup();
    await manager.flushCache();
    await manager.flushDomain('ads.example.com');
    expect(control.calls).toEqual(['flush_zone .', 'flush ads.example.com']);
  });
});
