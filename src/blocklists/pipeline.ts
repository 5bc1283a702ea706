import type { Logger } from '../logger.js';
import { SourceFetchError, describeError } from '../errors.js';
import { fetchSourceLines, type FetchSourceOptions } from './fetch.js';
import { parseHostsLine, subtractWhitelist, unionDomains } from './parse.js';

export type SourceFailure = {
  url: string;
  reason: string;
};

export type SourceReport = {
  url: string;
  domains: number;
  error: string | null;
  /** Unix milliseconds. */
  fetchedAt: number;
};

export type FetchedSources = {
  lists: Array<{ url: string; domains: Set<string> }>;
  failures: SourceFailure[];
  reports: SourceReport[];
};

export type MergedBlocklist = {
  /** Every accepted domain across sources, before whitelist subtraction. */
  union: ReadonlySet<string>;
  /** Sorted, whitelist applied. */
  domains: string[];
};

export type BlocklistRefresh = MergedBlocklist & {
  failures: SourceFailure[];
  reports: SourceReport[];
};

export type PipelineOptions = FetchSourceOptions & {
  concurrency: number;
  log: Logger;
  now?: () => number;
};

async function mapWithConcurrency<T, R>(items: readonly T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const idx = next++;
      results[idx] = await fn(items[idx]);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

type SourceOutcome = { ok: true; url: string; domains: Set<string> } | { ok: false; url: string; reason: string };

async function fetchOne(url: string, opts: PipelineOptions): Promise<SourceOutcome> {
  const domains = new Set<string>();
  try {
    for await (const line of fetchSourceLines(url, opts)) {
      const domain = parseHostsLine(line);
      if (domain) domains.add(domain);
    }
    opts.log.info({ url, domains: domains.size }, 'downloaded blocklist');
    return { ok: true, url, domains };
  } catch (err) {
    const reason = err instanceof SourceFetchError ? err.reason : describeError(err);
    opts.log.warn({ url, reason }, 'failed to download blocklist');
    return { ok: false, url, reason };
  }
}

/** Downloads and parses every source. One unreachable feed never fails the batch. */
export async function fetchSources(urls: readonly string[], opts: PipelineOptions): Promise<FetchedSources> {
  const now = opts.now ?? Date.now;
  const outcomes = await mapWithConcurrency(urls, opts.concurrency, (url) => fetchOne(url, opts));

  const out: FetchedSources = { lists: [], failures: [], reports: [] };
  for (const o of outcomes) {
    if (o.ok) {
      out.lists.push({ url: o.url, domains: o.domains });
      out.reports.push({ url: o.url, domains: o.domains.size, error: null, fetchedAt: now() });
    } else {
      out.failures.push({ url: o.url, reason: o.reason });
      out.reports.push({ url: o.url, domains: 0, error: o.reason, fetchedAt: now() });
    }
  }
  return out;
}

export function mergeSources(fetched: Pick<FetchedSources, 'lists'>, whitelist: Iterable<string>): MergedBlocklist {
  const union = unionDomains(fetched.lists.map((l) => l.domains));
  return { union, domains: subtractWhitelist(union, whitelist) };
}

export async function refreshBlocklists(
  urls: readonly string[],
  whitelist: Iterable<string>,
  opts: PipelineOptions
): Promise<BlocklistRefresh> {
  const fetched = await fetchSources(urls, opts);
  return { ...mergeSources(fetched, whitelist), failures: fetched.failures, reports: fetched.reports };
}
