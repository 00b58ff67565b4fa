import type { Logger } from 'pino';
import { z } from 'zod';
import { chunk } from '../../application/batcher.js';
import type { DeliveryReport, Sender } from '../../application/ports.js';
import type { Sleep } from '../../application/scheduler.js';
import { sleep } from '../../application/scheduler.js';
import type { CanonicalEvent } from '../../domain/index.js';
import { toWireEvent } from '../../domain/index.js';

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 5000;
const DEFAULT_BATCH_PAUSE_MS = 1000;
const DEFAULT_TIMEOUT_MS = 30_000;
const PING_TIMEOUT_MS = 5000;
const USER_AGENT = 'spoolwatch-agent/0.1.0';

/** Success body returned by the collector; only `message` is used, for logging. */
const collectorResponseSchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
});

export interface CollectorSenderOptions {
  url: string;
  log: Logger;
  /** Attempts per batch, including the first. */
  maxRetries?: number | undefined;
  retryDelayMs?: number | undefined;
  batchPauseMs?: number | undefined;
  timeoutMs?: number | undefined;
  sleep?: Sleep | undefined;
}

function describeFailure(err: unknown): string {
  if (err instanceof Error && err.name === 'TimeoutError') return 'Collector request timed out';
  return 'Collector request failed';
}

/**
 * HTTP client for the collector's `POST /api/print_events` endpoint.
 *
 * Only a 200 response counts as delivered. Each batch gets its own retry
 * budget with a fixed delay between attempts and none after the last one.
 */
export class CollectorSender implements Sender {
  private readonly url: string;
  private readonly log: Logger;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly batchPauseMs: number;
  private readonly timeoutMs: number;
  private readonly sleep: Sleep;

  constructor(opts: CollectorSenderOptions) {
    this.url = opts.url;
    this.log = opts.log;
    this.maxRetries = Math.max(1, opts.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.batchPauseMs = opts.batchPauseMs ?? DEFAULT_BATCH_PAUSE_MS;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.sleep = opts.sleep ?? sleep;
  }

  async deliver(batch: readonly CanonicalEvent[]): Promise<boolean> {
    if (batch.length === 0) return true;

    const body = JSON.stringify({ events: batch.map(toWireEvent) });

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await fetch(this.url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'User-Agent': USER_AGENT,
          },
          body,
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (response.status === 200) {
          const message = await this.readMessage(response);
          this.log.debug({ events: batch.length, attempt, message }, 'Collector accepted events');
          return true;
        }

        const text = await response.text().catch(() => '');
        this.log.error(
          { status: response.status, attempt, maxRetries: this.maxRetries, body: text.slice(0, 200) },
          'Collector rejected events',
        );
      } catch (err: unknown) {
        this.log.warn({ err, attempt, maxRetries: this.maxRetries }, describeFailure(err));
      }

      if (attempt < this.maxRetries) {
        await this.sleep(this.retryDelayMs);
      }
    }

    return false;
  }

  async deliverAll(events: readonly CanonicalEvent[], batchSize: number): Promise<DeliveryReport> {
    const batches = chunk(events, batchSize);
    this.log.info(
      { events: events.length, batches: batches.length, batchSize },
      'Sending events in batches',
    );

    let delivered = 0;
    const failedBatches: number[] = [];

    for (const [index, batch] of batches.entries()) {
      this.log.info({ batch: index + 1, of: batches.length, size: batch.length }, 'Sending batch');

      if (await this.deliver(batch)) {
        delivered += batch.length;
      } else {
        failedBatches.push(index);
        this.log.warn({ batch: index + 1, of: batches.length }, 'Batch not delivered');
      }

      if (index < batches.length - 1) {
        await this.sleep(this.batchPauseMs);
      }
    }

    this.log.info({ delivered, total: events.length }, 'Batch delivery finished');
    return { ok: failedBatches.length === 0, delivered, total: events.length, failedBatches };
  }

  /** GET on the collector's origin root; 200 means reachable. */
  async ping(): Promise<boolean> {
    const root = new URL('/', this.url);
    try {
      const response = await fetch(root, { signal: AbortSignal.timeout(PING_TIMEOUT_MS) });
      await response.text().catch(() => '');
      if (response.status === 200) return true;

      this.log.warn({ status: response.status, url: root.href }, 'Collector health check returned non-200');
      return false;
    } catch (err: unknown) {
      this.log.warn({ err, url: root.href }, 'Collector health check failed');
      return false;
    }
  }

  private async readMessage(response: Response): Promise<string | undefined> {
    try {
      const parsed = collectorResponseSchema.safeParse(await response.json());
      return parsed.success ? parsed.data.message : undefined;
    } catch (err: unknown) {
      this.log.debug({ err }, 'Collector response body is not JSON');
      return undefined;
    }
  }
}
