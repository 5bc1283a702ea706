import { describe, expect, it } from 'vitest';
import { SerialQueue } from '../../src/serialQueue.js';

const tick = () => new Promise((r) => setTimeout(r, 5));

describe('SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const q = new SerialQueue();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([q.run(task('a')), q.run(task('b')), q.run(task('c'))]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('keeps going after a failed task', async () => {
    const q = new SerialQueue();

    const failed = q.run(async () => {
      throw new Error('boom');
    });
    const next = q.run(async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    expect(await next).toBe('ok');
  });

  it('reports pending work', async () => {
    const q = new SerialQueue();
    expect(q.busy).toBe(false);

    const a = q.run(tick);
    const b = q.run(tick);
    expect(q.size).toBe(2);
    expect(q.busy).toBe(true);

    await Promise.all([a, b]);
    expect(q.size).toBe(0);
  });
});
