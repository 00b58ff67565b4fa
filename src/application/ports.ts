import type { CanonicalEvent, PersistedState, RawEvent } from '../domain/index.js';

/**
 * Host log reader.
 *
 * Fetches must not throw for a transiently unavailable log; they return
 * an empty list instead.
 */
export interface EventSource {
  /** Startup check; false means the agent cannot run on this host. */
  isAvailable(): Promise<boolean>;
  fetchAll(): Promise<RawEvent[]>;
  /** Events created within the last `windowMs` milliseconds. */
  fetchSince(windowMs: number): Promise<RawEvent[]>;
}

/** Durable storage for the delivery ledger. */
export interface StateRepository {
  /** Returns null when nothing has been saved yet. */
  load(): Promise<PersistedState | null>;
  save(state: PersistedState): Promise<void>;
}

export interface DeliveryReport {
  readonly ok: boolean;
  readonly delivered: number;
  readonly total: number;
  /** Zero-based indexes of batches that exhausted their retries. */
  readonly failedBatches: readonly number[];
}

/** Collector client. */
export interface Sender {
  /** One request carrying every event in `batch`. */
  deliver(batch: readonly CanonicalEvent[]): Promise<boolean>;
  /** Splits `events` into batches of `batchSize` and delivers each. */
  deliverAll(events: readonly CanonicalEvent[], batchSize: number): Promise<DeliveryReport>;
  /** Reachability probe; never throws. */
  ping(): Promise<boolean>;
}
