import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { pino } from 'pino';
import { loadConfig, type AppConfig } from '../src/config.js';
import type { Logger } from '../src/logger.js';
import type { CommandResult, ResolverControl } from '../src/unbound/control.js';

export async function mkTmpDir(prefix = 'unbound-steward-test-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Config rooted in `dir`; nothing points at the real /data or /etc/unbound. */
export function testConfig(dir: string, env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    DATA_DIR: path.join(dir, 'data'),
    UNBOUND_DIR: path.join(dir, 'unbound'),
    UNBOUND_KEY_DIR: path.join(dir, 'keys'),
    ADDON_CONFIGS_DIR: path.join(dir, 'addon_configs'),
    HOSTNAME: 'local-unbound',
    ...env
  });
}

export const SAMPLE_STATS = [
  'thread0.num.queries=40',
  'total.num.queries=200',
  'total.num.cachehits=150',
  'total.num.cachemiss=50',
  'total.recursion.time.avg=0.045000',
  'total.recursion.time.median=0.031250',
  'time.up=100.000000',
  'num.threads=2',
  'num.prefetch=7',
  'unwanted.queries=0',
  'unwanted.replies=3',
  'num.answer.rcode.NOERROR=180',
  'num.answer.rcode.SERVFAIL=0',
  'num.answer.rcode.NXDOMAIN=20',
  'num.query.type.A=120',
  'num.query.type.AAAA=80',
  'mem.cache.rrset=1048576',
  'mem.cache.message=524288'
].join('\n');

/**
 * In-process stand-in for unbound-checkconf / unbound-control. Records every
 * call and the main document it was asked to validate.
 */
export class FakeControl implements ResolverControl {
  readonly calls: string[] = [];
  readonly checkedConfigs: string[] = [];
  checkResult: CommandResult = { ok: true, output: 'unbound-checkconf: no errors' };
  reloadResult: CommandResult = { ok: true, output: 'ok' };
  flushResult: CommandResult = { ok: true, output: 'ok' };
  statsResult: CommandResult = { ok: true, output: SAMPLE_STATS };
  /** Runs inside checkConf before it returns, e.g. to hold an apply open. */
  onCheck: (() => Promise<void>) | null = null;

  async checkConf(configPath: string): Promise<CommandResult> {
    this.calls.push('checkconf');
    this.checkedConfigs.push(await fs.readFile(configPath, 'utf8'));
    if (this.onCheck) await this.onCheck();
    return this.checkResult;
  }

  async reload(): Promise<CommandResult> {
    this.calls.push('reload');
    return this.reloadResult;
  }

  async flushZone(zone: string): Promise<CommandResult> {
    this.calls.push(`flush_zone ${zone}`);
    return this.flushResult;
  }

  async flushDomain(domain: string): Promise<CommandResult> {
    this.calls.push(`flush ${domain}`);
    return this.flushResult;
  }

  async stats(): Promise<CommandResult> {
    this.calls.push('stats_noreset');
    return this.statsResult;
  }
}

export function streamFromChunks(chunks: string[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const c of chunks) controller.enqueue(new TextEncoder().encode(c));
      controller.close();
    }
  });
}

/** Replaces global fetch with a URL -> listing table. Unknown URLs get a 404. */
export function fetchFromTable(table: Record<string, string>) {
  return async (input: string | URL | Request): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const body = table[url];
    if (body === undefined) return new Response('not found', { status: 404 });
    return new Response(streamFromChunks([body]), { status: 200 });
  };
}
