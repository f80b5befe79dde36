import { describe, expect, it } from 'vitest';
import { AsyncMutex } from './async-mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('AsyncMutex', () => {
  it('should return the critical section result', async () => {
    const mutex = new AsyncMutex();

    await expect(mutex.runExclusive(() => Promise.resolve(42))).resolves.toBe(42);
  });

  it('should run sections one at a time in arrival order', async () => {
    const mutex = new AsyncMutex();
    const events: string[] = [];

    const section = (name: string, ms: number) => async (): Promise<string> => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive(section('a', 20)),
      mutex.runExclusive(section('b', 0)),
      mutex.runExclusive(section('c', 5)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('should release the lock after a rejection', async () => {
    const mutex = new AsyncMutex();

    const failed = mutex.runExclusive(() => Promise.reject(new Error('boom')));
    const next = mutex.runExclusive(() => Promise.resolve('ran'));

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ran');
  });

  it('should hold later sections until the running one settles', async () => {
    const mutex = new AsyncMutex();
    let finish: () => void = () => undefined;
    const blocker = new Promise<void>((resolve) => {
      finish = resolve;
    });
    let secondStarted = false;

    const first = mutex.runExclusive(() => blocker);
    const second = mutex.runExclusive(() => {
      secondStarted = true;
      return Promise.resolve();
    });

    await delay(10);
    expect(secondStarted).toBe(false);

    finish();
    await Promise.all([first, second]);
    expect(secondStarted).toBe(true);
  });
});
