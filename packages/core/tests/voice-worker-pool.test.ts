import { describe, expect, test } from 'vitest';
import { WorkerPool } from '../src/voice/worker-pool';
import { ExclusiveFlag } from '../src/voice/exclusive';
import { ErrorCodes, VoiceError } from '../src/errors';
import { deferred } from './fixtures/helpers';

describe('WorkerPool', () => {
  test('runs at most one playback task at a time', async () => {
    const pool = new WorkerPool();
    const first = deferred<string>();
    const order: string[] = [];

    const a = pool.run('playback', async () => {
      order.push('a:start');
      const value = await first.promise;
      order.push('a:end');
      return value;
    });
    const b = pool.run('playback', async () => {
      order.push('b:start');
      return 'b';
    });

    await Promise.resolve();
    expect(pool.getStats().active.playback).toBe(1);
    expect(pool.getStats().queued.playback).toBe(1);

    first.resolve('a');
    expect(await a).toBe('a');
    expect(await b).toBe('b');
    expect(order).toEqual(['a:start', 'a:end', 'b:start']);
  });

  test('limits network tasks to the configured slots', async () => {
    const pool = new WorkerPool({ networkSlots: 2 });
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const runs = gates.map((gate) => pool.run('network', () => gate.promise));

    await Promise.resolve();
    expect(pool.getStats().active.network).toBe(2);
    expect(pool.getStats().queued.network).toBe(1);

    for (const gate of gates) gate.resolve();
    await Promise.all(runs);
    expect(pool.getStats().active.network).toBe(0);
  });

  test('shutdown aborts running tasks and rejects queued ones', async () => {
    const pool = new WorkerPool({ networkSlots: 1 });
    let seenSignal: AbortSignal | null = null;

    const running = pool.run('network', (signal) => {
      seenSignal = signal;
      return new Promise<string>((resolve) => {
        signal.addEventListener('abort', () => resolve('aborted'), { once: true });
      });
    });
    const queued = expect(pool.run('network', async () => 'never')).rejects.toMatchObject({
      code: ErrorCodes.DISPOSED,
    });

    await pool.shutdown();

    expect(await running).toBe('aborted');
    await queued;
    expect(seenSignal).toBe(pool.signal);
    expect(pool.signal.aborted).toBe(true);
    expect(pool.isClosed()).toBe(true);
  });

  test('rejects new work once shut down', async () => {
    const pool = new WorkerPool();
    await pool.shutdown();
    await expect(pool.run('capture', async () => 1)).rejects.toBeInstanceOf(VoiceError);
  });

  test('propagates task errors', async () => {
    const pool = new WorkerPool();
    await expect(pool.run('network', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(pool.getStats().active.network).toBe(0);
  });
});

describe('ExclusiveFlag', () => {
  test('only one holder at a time', () => {
    const flag = new ExclusiveFlag('output');
    const lease = flag.tryAcquire();
    expect(lease).not.toBeNull();
    expect(flag.tryAcquire()).toBeNull();
    expect(flag.isHeld()).toBe(true);

    expect(lease?.release()).toBe(true);
    expect(flag.isHeld()).toBe(false);
    expect(flag.tryAcquire()).not.toBeNull();
  });

  test('a lease releases exactly once', () => {
    const flag = new ExclusiveFlag('microphone');
    const lease = flag.tryAcquire();
    expect(lease?.release()).toBe(true);

    const next = flag.tryAcquire();
    expect(lease?.release()).toBe(false);
    expect(flag.isHeld()).toBe(true);
    expect(next?.release()).toBe(true);
    expect(flag.getStats()).toEqual({ name: 'microphone', held: false, acquisitions: 2, releases: 2 });
  });
});
