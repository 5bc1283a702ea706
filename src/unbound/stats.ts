export type StatsMap = Record<string, string>;

export type StatsSummary = {
  total_queries: number;
  cache_hits: number;
  cache_misses: number;
  cache_hit_rate: number;
  blocked_domains: number;
  num_threads: string;
  uptime: string;
  queries_per_sec: number;
  recursion_time_avg: string;
  recursion_time_median: string;
  prefetch: number;
  unwanted_queries: number;
  unwanted_replies: number;
  rcodes: Record<string, number>;
  qtypes: Record<string, number>;
  memory: Record<string, number>;
};

/** Parses `unbound-control stats_noreset` output (`key=value` per line). */
export function parseStats(raw: string): StatsMap {
  const stats: StatsMap = {};
  for (const line of raw.split('\n')) {
    const eq = line.indexOf('=');
    if (eq < 0) continue;
    stats[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }
  return stats;
}

function num(stats: StatsMap, key: string): number {
  const n = Number.parseFloat(stats[key] ?? '0');
  return Number.isFinite(n) ? n : 0;
}

function countsWithPrefix(stats: StatsMap, prefix: string): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(stats)) {
    if (!key.startsWith(prefix)) continue;
    const count = Math.trunc(Number.parseFloat(value));
    if (count > 0) out[key.slice(prefix.length)] = count;
  }
  return out;
}

const round1 = (n: number): number => Math.round(n * 10) / 10;

export function summarizeStats(stats: StatsMap, blockedDomains: number): StatsSummary {
  const total = num(stats, 'total.num.queries');
  const hits = num(stats, 'total.num.cachehits');
  const uptime = num(stats, 'time.up');

  const memory: Record<string, number> = {};
  for (const [key, value] of Object.entries(stats)) {
    if (key.startsWith('mem.')) memory[key.slice(4)] = Math.trunc(Number.parseFloat(value)) || 0;
  }

  return {
    total_queries: Math.trunc(total),
    cache_hits: Math.trunc(hits),
    cache_misses: Math.trunc(num(stats, 'total.num.cachemiss')),
    cache_hit_rate: total > 0 ? round1((hits / total) * 100) : 0,
    blocked_domains: blockedDomains,
    num_threads: stats['num.threads'] ?? 'N/A',
    uptime: stats['time.up'] ?? 'N/A',
    queries_per_sec: uptime > 0 ? round1(total / uptime) : 0,
    recursion_time_avg: stats['total.recursion.time.avg'] ?? 'N/A',
    recursion_time_median: stats['total.recursion.time.median'] ?? 'N/A',
    prefetch: Math.trunc(num(stats, 'num.prefetch')),
    unwanted_queries: Math.trunc(num(stats, 'unwanted.queries')),
    unwanted_replies: Math.trunc(num(stats, 'unwanted.replies')),
    rcodes: countsWithPrefix(stats, 'num.answer.rcode.'),
    qtypes: countsWithPrefix(stats, 'num.query.type.'),
    memory
  };
}
