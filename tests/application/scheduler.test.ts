import { describe, it, expect, beforeEach } from 'vitest';
import { runLoop, sleep } from '../../src/application/scheduler.js';
import { fakeLogger } from '../helpers.js';

describe('runLoop', () => {
  let log: ReturnType<typeof fakeLogger>;
  let waits: number[];
  const recordSleep = async (ms: number): Promise<void> => {
    waits.push(ms);
  };

  beforeEach(() => {
    log = fakeLogger();
    waits = [];
  });

  it('waits the tick interval after every successful step', async () => {
    const ac = new AbortController();
    let steps = 0;

    await runLoop(
      async () => {
        steps++;
        if (steps === 3) ac.abort();
      },
      { tickIntervalMs: 5000, errorBackoffMs: 30_000, signal: ac.signal, log, sleep: recordSleep },
    );

    expect(steps).toBe(3);
    expect(waits).toEqual([5000, 5000, 5000]);
  });

  it('backs off for the error interval and keeps going after a failing step', async () => {
    const ac = new AbortController();
    let steps = 0;

    await runLoop(
      async () => {
        steps++;
        if (steps === 2) throw new Error('event log busy');
        if (steps === 3) ac.abort();
      },
      { tickIntervalMs: 5000, errorBackoffMs: 30_000, signal: ac.signal, log, sleep: recordSleep },
    );

    expect(steps).toBe(3);
    expect(waits).toEqual([5000, 30_000, 5000]);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error), backoffMs: 30_000 }),
      'Tick failed, backing off',
    );
  });

  it('never runs a step once aborted', async () => {
    const ac = new AbortController();
    ac.abort();
    let steps = 0;

    await runLoop(
      async () => {
        steps++;
      },
      { tickIntervalMs: 5000, errorBackoffMs: 30_000, signal: ac.signal, log, sleep: recordSleep },
    );

    expect(steps).toBe(0);
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it('resolves early when the signal aborts', async () => {
    const ac = new AbortController();
    const started = Date.now();
    const pending = sleep(60_000, ac.signal);
    ac.abort();

    await pending;

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('resolves immediately for an already aborted signal', async () => {
    const ac = new AbortController();
    ac.abort();
    await expect(sleep(60_000, ac.signal)).resolves.toBeUndefined();
  });
});
