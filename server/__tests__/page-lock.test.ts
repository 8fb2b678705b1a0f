import { describe, it, expect } from '@jest/globals';
import { PageLock } from '../browser/page-lock';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('PageLock', () => {
  it('runs operations one at a time in call order', async () => {
    const lock = new PageLock();
    const events: string[] = [];

    const task = (name: string, ms: number) => lock.run(async () => {
      events.push(`${name} start`);
      await delay(ms);
      events.push(`${name} end`);
      return name;
    });

    const results = await Promise.all([task('check', 20), task('screenshot', 5), task('maintain', 1)]);

    expect(results).toEqual(['check', 'screenshot', 'maintain']);
    expect(events).toEqual([
      'check start',
      'check end',
      'screenshot start',
      'screenshot end',
      'maintain start',
      'maintain end',
    ]);
  });

  it('releases the lock when an operation rejects', async () => {
    const lock = new PageLock();

    const failing = lock.run(async () => {
      throw new Error('page crashed');
    });
    const next = lock.run(async () => 'recovered');

    await expect(failing).rejects.toThrow('page crashed');
    await expect(next).resolves.toBe('recovered');
    expect(lock.size).toBe(0);
  });

  it('counts queued and running operations', async () => {
    const lock = new PageLock();
    let release: () => void = () => undefined;
    const blocker = lock.run(() => new Promise<void>((resolve) => {
      release = resolve;
    }));
    const queued = lock.run(async () => undefined);

    expect(lock.size).toBe(2);

    release();
    await Promise.all([blocker, queued]);
    expect(lock.size).toBe(0);
  });
});
