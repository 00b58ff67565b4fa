import type { Logger } from 'pino';
import type { CanonicalEvent, RawEvent } from '../domain/index.js';
import { identity } from '../domain/index.js';
import type { AgentConfig } from '../infrastructure/config/config.js';
import type { DedupStore, LoadResult } from './dedup-store.js';
import { extractEvent } from './extractor.js';
import type { EventSource, Sender } from './ports.js';
import type { Sleep } from './scheduler.js';
import { runLoop } from './scheduler.js';

/** Buffer size above which a failed tick drops the oldest events. */
export const MAX_BUFFERED = 1_000;
/** Events kept after an overflow drop. */
export const BUFFER_KEEP = 500;

const MAX_EXAMPLES = 5;

export type AgentPhase = 'idle' | 'startup' | 'catch-up' | 'polling' | 'draining' | 'stopped';

/** Raised at startup when the host print log cannot be read at all. */
export class SourceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

export interface StartupReport {
  readonly ledger: LoadResult;
  readonly collectorReachable: boolean;
}

export type CatchUpResult =
  | { readonly status: 'empty' }
  | { readonly status: 'up-to-date'; readonly total: number; readonly alreadyDelivered: number }
  | {
      readonly status: 'complete';
      readonly total: number;
      readonly alreadyDelivered: number;
      readonly delivered: number;
      readonly pages: number;
    }
  | {
      readonly status: 'incomplete';
      readonly total: number;
      readonly alreadyDelivered: number;
      readonly attempted: number;
      readonly failedBatches: readonly number[];
    };

export interface TickResult {
  readonly fetched: number;
  readonly accepted: number;
  readonly delivered: number;
  readonly dropped: number;
  readonly buffered: number;
  readonly compacted: number;
}

export interface AgentDeps {
  config: AgentConfig;
  source: EventSource;
  sender: Sender;
  store: DedupStore;
  log: Logger;
  sleep?: Sleep | undefined;
}

/**
 * The print-audit agent.
 *
 * Single sequential worker: `start` → optional `catchUp` → `tick` on a
 * fixed cadence → `drain`. The buffer and the store are owned here and
 * never touched concurrently.
 *
 * Identities reach the persisted ledger only after the collector answered
 * 200 for the request that carried them.
 */
export class Agent {
  private buffer: CanonicalEvent[] = [];
  private currentPhase: AgentPhase = 'idle';

  private readonly config: AgentConfig;
  private readonly source: EventSource;
  private readonly sender: Sender;
  private readonly store: DedupStore;
  private readonly log: Logger;
  private readonly sleep: Sleep | undefined;

  constructor(deps: AgentDeps) {
    this.config = deps.config;
    this.source = deps.source;
    this.sender = deps.sender;
    this.store = deps.store;
    this.log = deps.log;
    this.sleep = deps.sleep;
  }

  get phase(): AgentPhase {
    return this.currentPhase;
  }

  /** Events accepted but not yet confirmed, oldest first. */
  get buffered(): readonly CanonicalEvent[] {
    return this.buffer;
  }

  /**
   * Loads the ledger and checks both ends of the pipeline.
   *
   * An unreadable event log is fatal; an unreachable collector is not,
   * events simply wait in the buffer.
   */
  async start(): Promise<StartupReport> {
    this.currentPhase = 'startup';
    this.log.info(
      { host: this.config.host, collector: this.config.collectorUrl, intervalMs: this.config.checkIntervalMs },
      'Starting print agent',
    );

    const ledger = await this.store.load();

    if (!(await this.source.isAvailable())) {
      throw new SourceUnavailableError('Print event log is not readable on this host');
    }

    const collectorReachable = await this.sender.ping();
    if (collectorReachable) {
      this.log.info({ collector: this.config.collectorUrl }, 'Collector reachable');
    } else {
      this.log.warn(
        { collector: this.config.collectorUrl },
        'Collector unreachable, events will be buffered until it responds',
      );
    }

    return { ledger, collectorReachable };
  }

  /**
   * Reconciles the full log history with the ledger.
   *
   * All-or-nothing: identities are marked delivered only when every batch
   * of the pass succeeded. A partial failure marks nothing and the whole
   * pass is repeated on the next start, so the collector must tolerate
   * duplicate rows.
   */
  async catchUp(): Promise<CatchUpResult> {
    this.currentPhase = 'catch-up';
    this.log.info('Catch-up pass started');

    const raw = await this.source.fetchAll();
    if (raw.length === 0) {
      this.log.info('No print events found in the log');
      return { status: 'empty' };
    }

    const unseen = new Map<string, RawEvent>();
    let alreadyDelivered = 0;
    for (const event of raw) {
      const id = identity(event.host, event.sequence);
      if (this.store.contains(id)) {
        alreadyDelivered++;
      } else if (!unseen.has(id)) {
        unseen.set(id, event);
      }
    }

    this.log.info(
      { total: raw.length, alreadyDelivered, unseen: unseen.size },
      'Catch-up scan complete',
    );

    const events = this.extractAll(unseen.values());
    if (events.length === 0) {
      this.log.info('All print events were delivered previously');
      return { status: 'up-to-date', total: raw.length, alreadyDelivered };
    }

    const pages = events.reduce((sum, e) => sum + e.pages, 0);
    const multiPage = events.filter((e) => e.pages > 1);
    this.log.info(
      { events: events.length, pages, multiPage: multiPage.length },
      'Catch-up events extracted',
    );
    for (const e of multiPage.slice(0, MAX_EXAMPLES)) {
      this.log.info(
        { date: e.date, user: e.user, document: e.document.slice(0, 30), pages: e.pages },
        'Multi-page job',
      );
    }

    const report = await this.sender.deliverAll(events, this.config.batchSize);
    if (!report.ok) {
      this.log.warn(
        { delivered: report.delivered, total: report.total, failedBatches: report.failedBatches },
        'Catch-up incomplete, nothing marked delivered; the pass will be retried on next start',
      );
      return {
        status: 'incomplete',
        total: raw.length,
        alreadyDelivered,
        attempted: events.length,
        failedBatches: report.failedBatches,
      };
    }

    this.store.confirm(events.map((e) => e.identity));
    await this.store.persist();
    this.log.info(
      { delivered: events.length, highWaterMark: this.store.highWaterMark },
      'Catch-up events delivered and recorded',
    );

    return { status: 'complete', total: raw.length, alreadyDelivered, delivered: events.length, pages };
  }

  /**
   * One steady-state poll.
   *
   * Accepts only local events above the high-water mark that are neither
   * delivered nor already buffered, then tries to deliver the whole buffer
   * in one request.
   */
  async tick(): Promise<TickResult> {
    const raw = await this.source.fetchSince(this.config.lookbackMs);

    let accepted = 0;
    for (const event of raw) {
      if (event.host !== this.config.host || event.sequence <= this.store.highWaterMark) continue;

      const id = identity(event.host, event.sequence);
      if (this.store.isKnown(id)) continue;

      const extracted = this.extractOne(event);
      if (extracted === null) continue;

      this.buffer.push(extracted);
      this.store.markPending(id);
      accepted++;
    }

    if (accepted > 0) {
      this.log.info({ accepted, buffered: this.buffer.length }, 'New print events buffered');
    }

    let delivered = 0;
    let dropped = 0;
    if (this.buffer.length > 0) {
      if (await this.sender.deliver(this.buffer)) {
        delivered = this.buffer.length;
        this.store.confirm(this.buffer.map((e) => e.identity));
        this.buffer = [];
        await this.store.persist();
        this.log.info({ delivered, highWaterMark: this.store.highWaterMark }, 'Buffer delivered');
      } else {
        this.log.warn({ buffered: this.buffer.length }, 'Delivery failed, keeping buffer for next tick');
        dropped = this.trimBuffer();
      }
    }

    const compacted = this.store.compactInMemory();

    return { fetched: raw.length, accepted, delivered, dropped, buffered: this.buffer.length, compacted };
  }

  /**
   * Final delivery attempt on shutdown. The ledger is saved whether or
   * not the collector accepted the buffer.
   */
  async drain(): Promise<boolean> {
    this.currentPhase = 'draining';

    let ok = true;
    if (this.buffer.length > 0) {
      this.log.info({ buffered: this.buffer.length }, 'Delivering remaining events before exit');
      ok = await this.sender.deliver(this.buffer);
      if (ok) {
        this.store.confirm(this.buffer.map((e) => e.identity));
        this.buffer = [];
      } else {
        this.log.warn(
          { remaining: this.buffer.length },
          'Final delivery failed; undelivered events will be picked up by the next catch-up pass',
        );
      }
    }

    await this.store.persist();
    this.currentPhase = 'stopped';
    this.log.info({ highWaterMark: this.store.highWaterMark }, 'Print agent stopped');
    return ok;
  }

  /**
   * Full lifecycle. Resolves once `signal` aborts and the buffer has been
   * drained. Rejects only when startup fails.
   */
  async run(signal: AbortSignal): Promise<void> {
    await this.start();

    if (this.config.catchUpOnStart) {
      try {
        await this.catchUp();
      } catch (err: unknown) {
        this.log.error({ err }, 'Catch-up pass failed');
      }
    } else {
      this.log.info('Catch-up pass disabled');
    }

    this.currentPhase = 'polling';
    this.log.info({ intervalMs: this.config.checkIntervalMs }, 'Watching for new print events');

    await runLoop(
      async () => {
        await this.tick();
      },
      {
        tickIntervalMs: this.config.checkIntervalMs,
        errorBackoffMs: this.config.retryIntervalMs,
        signal,
        log: this.log,
        sleep: this.sleep,
      },
    );

    await this.drain();
  }

  private extractOne(raw: RawEvent): CanonicalEvent | null {
    const result = extractEvent(raw);
    if (!result.ok) {
      this.log.warn({ identity: result.identity, error: result.error }, 'Failed to extract print event');
      return null;
    }

    if (result.rejectedPageCounts.length > 0) {
      this.log.warn(
        { identity: result.event.identity, rejected: result.rejectedPageCounts, pages: result.event.pages },
        'Page count out of range, ignored',
      );
    } else if (result.fallbacks.includes('pages')) {
      this.log.warn({ identity: result.event.identity, pages: result.event.pages }, 'Page count not found, using 1');
    }
    if (result.fallbacks.length > 0) {
      this.log.debug(
        { identity: result.event.identity, fallbacks: result.fallbacks, language: result.language },
        'Print event extracted with default values',
      );
    }

    return result.event;
  }

  private extractAll(events: Iterable<RawEvent>): CanonicalEvent[] {
    const out: CanonicalEvent[] = [];
    for (const raw of events) {
      const event = this.extractOne(raw);
      if (event !== null) out.push(event);
    }
    return out;
  }

  /** Applies the overflow rule after a failed delivery. Returns the number dropped. */
  private trimBuffer(): number {
    if (this.buffer.length <= MAX_BUFFERED) return 0;

    const dropped = this.buffer.splice(0, this.buffer.length - BUFFER_KEEP);
    this.store.discard(dropped.map((e) => e.identity));
    this.log.error(
      {
        dropped: dropped.length,
        kept: this.buffer.length,
        oldest: dropped[0]?.identity,
        newest: dropped.at(-1)?.identity,
      },
      'Buffer overflow, oldest events dropped without delivery',
    );
    return dropped.length;
  }
}
