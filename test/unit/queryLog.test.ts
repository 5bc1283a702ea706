import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { parseQueryLog, readLogTail, rotateQueryLogIfNeeded, topDomains } from '../../src/unbound/queryLog.js';
import { mkTmpDir } from '../_fakes.js';

const LOG = [
  '[1708012345] unbound[1:0] info: 192.168.1.10 example.com. A IN',
  '[1708012346] unbound[1:0] info: 192.168.1.11 example.com. AAAA IN',
  '[1708012347] unbound[1:1] info: 192.168.1.10 cdn.example.net. A IN',
  '[1708012348] unbound[1:0] info: resolving example.org. A IN NOERROR',
  'not a log line',
  ''
].join('\n');

describe('query log', () => {
  it('extracts query lines and strips the trailing dot', () => {
    const entries = parseQueryLog(LOG);
    expect(entries).toHaveLength(4);
    expect(entries[0]).toEqual({
      timestamp: 1708012345,
      client: '192.168.1.10',
      domain: 'example.com',
      type: 'A',
      class: 'IN'
    });
    expect(entries[2].domain).toBe('cdn.example.net');
  });

  it('counts domains most-queried first', () => {
    const entries = parseQueryLog(LOG).slice(0, 3);
    expect(topDomains(entries)).toEqual([
      { domain: 'example.com', count: 2 },
      { domain: 'cdn.example.net', count: 1 }
    ]);
    expect(topDomains(entries, 1)).toEqual([{ domain: 'example.com', count: 2 }]);
  });

  it('reads the tail of a large file without the partial first line', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'q.log');
    await fs.writeFile(file, 'first line\nsecond line\nthird\n');

    expect(await readLogTail(file, 15)).toBe('third\n');
    expect(await readLogTail(file, 1024)).toBe('first line\nsecond line\nthird\n');
    expect(await readLogTail(path.join(dir, 'missing.log'), 1024)).toBe('');
  });

  it('rotates only past the size limit', async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, 'q.log');
    await fs.writeFile(file, '0123456789');

    expect(await rotateQueryLogIfNeeded(file, 10)).toBe(false);
    expect(await rotateQueryLogIfNeeded(file, 9)).toBe(true);
    expect(await fs.readFile(`${file}.old`, 'utf8')).toBe('0123456789');
    expect(await fs.readFile(file, 'utf8')).toBe('');
    expect(await rotateQueryLogIfNeeded(path.join(dir, 'missing.log'), 1)).toBe(false);
  });
});
