import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../../src/utils/keyed-lock.js';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('KeyedLock', () => {
  it('serializes sections sharing a key', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const section = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([lock.run('k', section('a')), lock.run('k', section('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('runs different keys independently', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const section = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
    };

    await Promise.all([lock.run('x', section('a')), lock.run('y', section('b'))]);

    expect(events.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('releases the key after a failing section', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    const next = await lock.run('k', async () => 'next');

    expect(next).toBe('next');
    expect(lock.size).toBe(0);
  });
});
