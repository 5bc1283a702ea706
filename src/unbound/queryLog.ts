import fs from 'node:fs/promises';
import { fileSize } from '../persistedFile.js';

export type QueryLogEntry = {
  /** Unix seconds as logged by the daemon. */
  timestamp: number;
  client: string;
  domain: string;
  type: string;
  class: string;
};

export type DomainCount = {
  domain: string;
  count: number;
};

// [1708012345] unbound[1:0] info: 192.168.1.1 example.com. A IN
const QUERY_LINE = /\[(\d+)\]\s+unbound\[\d+:\d+\]\s+info:\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)/;

export function parseQueryLog(text: string): QueryLogEntry[] {
  const entries: QueryLogEntry[] = [];
  for (const line of text.split('\n')) {
    const m = QUERY_LINE.exec(line);
    if (!m) continue;
    entries.push({
      timestamp: Number.parseInt(m[1], 10),
      client: m[2],
      domain: m[3].replace(/\.+$/, ''),
      type: m[4],
      class: m[5]
    });
  }
  return entries;
}

/** Most queried first; ties keep first-seen order. */
export function topDomains(entries: readonly QueryLogEntry[], limit = 25): DomainCount[] {
  const counts = new Map<string, number>();
  for (const e of entries) counts.set(e.domain, (counts.get(e.domain) ?? 0) + 1);
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([domain, count]) => ({ domain, count }));
}

/**
 * Reads at most the last `maxBytes` of a log file. When the read starts mid-file
 * the first (partial) line is dropped. A missing file reads as ''.
 */
export async function readLogTail(filePath: string, maxBytes: number): Promise<string> {
  const size = await fileSize(filePath);
  if (size === null || size === 0) return '';

  const start = Math.max(0, size - maxBytes);
  const handle = await fs.open(filePath, 'r');
  try {
    const buf = Buffer.alloc(size - start);
    const { bytesRead } = await handle.read(buf, 0, buf.length, start);
    const text = buf.subarray(0, bytesRead).toString('utf8');
    if (start === 0) return text;
    const nl = text.indexOf('\n');
    return nl < 0 ? '' : text.slice(nl + 1);
  } finally {
    await handle.close();
  }
}

/** Moves an oversized log to `<path>.old` and leaves an empty file behind. Returns true when rotated. */
export async function rotateQueryLogIfNeeded(filePath: string, maxBytes: number): Promise<boolean> {
  const size = await fileSize(filePath);
  if (size === null || size <= maxBytes) return false;
  await fs.rename(filePath, `${filePath}.old`);
  await fs.writeFile(filePath, '');
  return true;
}
