import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../utils/keyed-lock';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs tasks on the same key one at a time, in order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run('dr_patel', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.run('dr_patel', async () => {
      events.push('second:start');
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(lock.size).toBe(0);
  });

  it('lets different keys run concurrently', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const slow = lock.run('dr_patel', async () => {
      await gate.promise;
      events.push('patel');
    });
    await lock.run('dr_reyes', async () => {
      events.push('reyes');
    });

    expect(events).toEqual(['reyes']);
    gate.resolve();
    await slow;
    expect(events).toEqual(['reyes', 'patel']);
  });

  it('releases the key when a task throws', async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run(['a', 'b'], async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run(['b', 'a'], async () => 'ok')).resolves.toBe('ok');
    expect(lock.size).toBe(0);
  });
});
