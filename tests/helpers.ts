import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { DeliveryReport, EventSource, Sender, StateRepository } from '../src/application/index.js';
import type { CanonicalEvent, PersistedState, RawEvent } from '../src/domain/index.js';
import { createCanonicalEvent, identity } from '../src/domain/index.js';
import type { AgentConfig } from '../src/infrastructure/index.js';

/** Minimal fake logger; every level is a spy. */
export function fakeLogger() {
  return {
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  } as unknown as Logger;
}

export const LOCAL_HOST = 'PC1';

/** English PrintService message for a job. */
export function englishMessage(doc: string, user: string, printer: string, pages: number, jobId = 1): string {
  return `Document ${jobId}, ${doc} owned by ${user} on \\\\${LOCAL_HOST} was printed on ${printer} through port USB001. Size in bytes: 2048. Pages printed: ${pages}. No user action is required.`;
}

/**
 * Factory for raw events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeRaw(sequence: number, overrides: Partial<RawEvent> = {}): RawEvent {
  return {
    sequence,
    host: overrides.host ?? LOCAL_HOST,
    timestamp: overrides.timestamp ?? '2026-03-02 09:15:00',
    message: overrides.message ?? englishMessage(`doc-${sequence}.pdf`, 'alice', 'HP-LaserJet', 2),
  };
}

export function makeCanonical(sequence: number, host = LOCAL_HOST): CanonicalEvent {
  return createCanonicalEvent({
    identity: identity(host, sequence),
    sequence,
    date: '2026-03-02 09:15:00',
    user: 'alice',
    machine: host,
    printer: 'HP-LaserJet',
    document: `doc-${sequence}.pdf`,
    pages: 1,
  });
}

/** StateRepository kept in memory; records every save. */
export class MemoryStateRepository implements StateRepository {
  readonly saves: PersistedState[] = [];
  failSaves = false;

  constructor(private state: PersistedState | null = null) {}

  async load(): Promise<PersistedState | null> {
    return this.state;
  }

  async save(state: PersistedState): Promise<void> {
    if (this.failSaves) throw new Error('disk full');
    this.saves.push(state);
    this.state = state;
  }

  get current(): PersistedState | null {
    return this.state;
  }
}

/** Scriptable EventSource: `history` for fetchAll, `recent` for fetchSince. */
export class FakeEventSource implements EventSource {
  available = true;
  history: RawEvent[] = [];
  recent: RawEvent[] = [];
  readonly windows: number[] = [];

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async fetchAll(): Promise<RawEvent[]> {
    return [...this.history];
  }

  async fetchSince(windowMs: number): Promise<RawEvent[]> {
    this.windows.push(windowMs);
    return [...this.recent];
  }
}

/**
 * Sender that records every request. `outcomes` is consumed one entry per
 * request; when empty, `fallback` decides.
 */
export class FakeSender implements Sender {
  readonly requests: string[][] = [];
  outcomes: boolean[] = [];
  fallback = true;
  reachable = true;

  async deliver(batch: readonly CanonicalEvent[]): Promise<boolean> {
    this.requests.push(batch.map((e) => e.identity));
    return this.outcomes.shift() ?? this.fallback;
  }

  async deliverAll(events: readonly CanonicalEvent[], batchSize: number): Promise<DeliveryReport> {
    let delivered = 0;
    const failedBatches: number[] = [];
    for (let i = 0; i < events.length; i += batchSize) {
      const batch = events.slice(i, i + batchSize);
      if (await this.deliver(batch)) delivered += batch.length;
      else failedBatches.push(i / batchSize);
    }
    return { ok: failedBatches.length === 0, delivered, total: events.length, failedBatches };
  }

  async ping(): Promise<boolean> {
    return this.reachable;
  }

  get delivered(): string[] {
    return this.requests.flat();
  }
}

export function testConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    collectorUrl: 'http://collector.test/api/print_events',
    host: LOCAL_HOST,
    checkIntervalMs: 5000,
    retryIntervalMs: 30_000,
    lookbackMs: 300_000,
    requestTimeoutMs: 30_000,
    maxRetries: 3,
    batchSize: 50,
    catchUpOnStart: true,
    stateFile: 'processed_events.json',
    logLevel: 'silent',
    logFile: null,
    ...overrides,
  };
}
