import { describe, expect, it } from 'vitest';
import { KeyedLock } from '../../../src/utils/KeyedLock';
import { sleep } from '../../../src/utils/retry';

describe('KeyedLock', () => {
  it('runs work for the same key one at a time, in order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const task = (name: string, ms: number) =>
      lock.run('job-1', async () => {
        events.push(`start ${name}`);
        await sleep(ms);
        events.push(`end ${name}`);
        return name;
      });

    const results = await Promise.all([task('a', 15), task('b', 1), task('c', 1)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('lets different keys overlap', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('job-1', async () => {
        events.push('start 1');
        await sleep(15);
        events.push('end 1');
      }),
      lock.run('job-2', async () => {
        events.push('start 2');
        await sleep(1);
        events.push('end 2');
      }),
    ]);

    expect(events).toEqual(['start 1', 'start 2', 'end 2', 'end 1']);
  });

  it('releases the key when work throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('job-1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(lock.run('job-1', async () => 'next')).resolves.toBe('next');
  });
});
