import { describe, expect, it } from 'vitest';
import { KeyedLock } from '../src/keyed-lock.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 5));

describe('KeyedLock', () => {
  it('runs tasks with the same key one after another', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([lock.runExclusive('demo', task('a')), lock.runExclusive('demo', task('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(lock.isLocked('demo')).toBe(false);
  });

  it('lets different keys overlap', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
    };

    await Promise.all([lock.runExclusive('one', task('a')), lock.runExclusive('two', task('b'))]);

    expect(events.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('releases the key when a task fails', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.runExclusive('demo', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(await lock.runExclusive('demo', async () => 'next')).toBe('next');
    expect(lock.isLocked('demo')).toBe(false);
  });
});
