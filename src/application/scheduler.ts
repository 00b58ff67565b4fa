import type { Logger } from 'pino';

/** Waits `ms` milliseconds; resolves early (never rejects) once `signal` aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface LoopOptions {
  /** Pause after a successful step. */
  tickIntervalMs: number;
  /** Pause after a step that threw. */
  errorBackoffMs: number;
  signal: AbortSignal;
  log: Logger;
  sleep?: Sleep | undefined;
}

/**
 * Runs `step` repeatedly until `signal` aborts.
 *
 * A throwing step is logged and followed by the longer error backoff;
 * the loop itself never rejects. Abort is checked between steps only, so
 * a step in progress always runs to completion.
 */
export async function runLoop(step: () => Promise<void>, opts: LoopOptions): Promise<void> {
  const wait = opts.sleep ?? sleep;

  while (!opts.signal.aborted) {
    try {
      await step();
    } catch (err: unknown) {
      opts.log.error({ err, backoffMs: opts.errorBackoffMs }, 'Tick failed, backing off');
      await wait(opts.errorBackoffMs, opts.signal);
      continue;
    }
    await wait(opts.tickIntervalMs, opts.signal);
  }
}
