import type { Logger } from 'pino';
import type { PersistedState } from '../domain/index.js';
import { migrateLegacyIdentity, parseIdentity } from '../domain/index.js';
import type { StateRepository } from './ports.js';

export interface CompactionLimits {
  /** Persist-time compaction kicks in above this many delivered identities. */
  readonly persistThreshold: number;
  /** Identities kept per host by persist-time compaction. */
  readonly retainPerHost: number;
  /** In-memory compaction kicks in above this many delivered identities. */
  readonly workingSetThreshold: number;
  /** Local identities more than this far below the high-water mark are dropped in memory. */
  readonly highWaterWindow: number;
}

export const DEFAULT_LIMITS: CompactionLimits = {
  persistThreshold: 50_000,
  retainPerHost: 10_000,
  workingSetThreshold: 10_000,
  highWaterWindow: 5_000,
};

export interface DedupStoreOptions {
  localHost: string;
  repository: StateRepository;
  log: Logger;
  limits?: Partial<CompactionLimits> | undefined;
  now?: (() => Date) | undefined;
}

export interface LoadResult {
  readonly total: number;
  readonly local: number;
  readonly migrated: number;
  readonly highWaterMark: number;
}

/**
 * Set of event identities already confirmed by the collector.
 *
 * Three disjoint groups are tracked:
 * - delivered: confirmed, written on `persist()`, subject to compaction
 * - pending: buffered for delivery but not confirmed yet, never compacted
 * - discarded: dropped on buffer overflow, remembered so they are not re-buffered
 *
 * Compaction removes identities from the delivered set but records, per
 * host, the highest sequence it removed. Identities at or below that floor
 * still count as delivered, across restarts too.
 *
 * Only `markDelivered` moves the local high-water mark, and only upwards.
 */
export class DedupStore {
  private delivered = new Set<string>();
  private readonly pending = new Set<string>();
  private readonly discarded = new Set<string>();
  private floors = new Map<string, number>();
  private highWater = 0;

  private readonly localHost: string;
  private readonly repository: StateRepository;
  private readonly log: Logger;
  private readonly limits: CompactionLimits;
  private readonly now: () => Date;

  constructor(opts: DedupStoreOptions) {
    this.localHost = opts.localHost;
    this.repository = opts.repository;
    this.log = opts.log;
    this.limits = { ...DEFAULT_LIMITS, ...opts.limits };
    this.now = opts.now ?? (() => new Date());
  }

  /** Highest confirmed sequence number for the local host (0 when none). */
  get highWaterMark(): number {
    return this.highWater;
  }

  /** Number of delivered identities held in memory. */
  get size(): number {
    return this.delivered.size;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Reads the persisted ledger.
   *
   * Bare-integer entries from older state files are rewritten as local
   * identities. An unreadable file is logged and treated as empty, so a
   * corrupt ledger costs re-delivery rather than a crash.
   */
  async load(): Promise<LoadResult> {
    let state: PersistedState | null = null;
    try {
      state = await this.repository.load();
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to load delivery ledger, starting empty');
    }

    const next = new Set<string>();
    let migrated = 0;

    for (const entry of state?.processed_ids ?? []) {
      const id = migrateLegacyIdentity(entry, this.localHost);
      if (id === null) continue;
      if (id !== entry) migrated++;
      next.add(id);
    }

    this.delivered = next;
    this.floors = new Map(Object.entries(state?.compaction_floors ?? {}));
    this.highWater = this.floors.get(this.localHost) ?? 0;
    let local = 0;
    for (const id of next) {
      const parsed = parseIdentity(id);
      if (parsed?.host !== this.localHost) continue;
      local++;
      this.highWater = Math.max(this.highWater, parsed.sequence);
    }

    const result: LoadResult = { total: next.size, local, migrated, highWaterMark: this.highWater };
    this.log.info({ ...result, host: this.localHost }, 'Delivery ledger loaded');
    return result;
  }

  /** True when the collector has confirmed `id`, including compacted identities. */
  contains(id: string): boolean {
    return this.delivered.has(id) || this.belowFloor(id);
  }

  isPending(id: string): boolean {
    return this.pending.has(id);
  }

  /** True for delivered, pending and discarded identities alike. */
  isKnown(id: string): boolean {
    return this.contains(id) || this.pending.has(id) || this.discarded.has(id);
  }

  markPending(id: string): void {
    if (this.contains(id)) return;
    this.pending.add(id);
  }

  /** Records a confirmed delivery in memory. Does not persist. */
  markDelivered(id: string): void {
    this.record(id);
    this.pruneDiscarded();
  }

  confirm(ids: Iterable<string>): void {
    for (const id of ids) {
      this.record(id);
    }
    this.pruneDiscarded();
  }

  /**
   * Gives up on pending identities whose events were dropped from the
   * buffer. They stay known so the next poll does not buffer them again.
   */
  discard(ids: Iterable<string>): void {
    for (const id of ids) {
      if (this.pending.delete(id)) {
        this.discarded.add(id);
      }
    }
  }

  /**
   * Durably writes the delivered set plus metadata.
   *
   * Runs persist-time compaction first. Returns false when the write
   * fails; the in-memory state stays authoritative for this process.
   */
  async persist(): Promise<boolean> {
    const removed = this.compactForPersist();
    if (removed > 0) {
      this.log.info({ removed, retained: this.delivered.size }, 'Delivery ledger compacted before save');
    }

    try {
      await this.repository.save(this.toState());
      this.log.debug({ total: this.delivered.size }, 'Delivery ledger saved');
      return true;
    } catch (err: unknown) {
      this.log.error({ err, total: this.delivered.size }, 'Failed to save delivery ledger');
      return false;
    }
  }

  /**
   * Bounds the working set between saves.
   *
   * Once more than `workingSetThreshold` identities are held, local
   * identities at or below `highWaterMark - highWaterWindow` are dropped
   * and the local floor is raised to the highest of them.
   * Identities of other hosts are left to persist-time compaction.
   */
  compactInMemory(): number {
    if (this.delivered.size <= this.limits.workingSetThreshold) return 0;

    const cutoff = this.highWater - this.limits.highWaterWindow;
    let removed = 0;
    let highestRemoved = -1;
    for (const id of this.delivered) {
      const parsed = parseIdentity(id);
      if (parsed?.host === this.localHost && parsed.sequence <= cutoff) {
        this.delivered.delete(id);
        removed++;
        highestRemoved = Math.max(highestRemoved, parsed.sequence);
      }
    }

    if (removed > 0) {
      this.raiseFloor(this.localHost, highestRemoved);
      this.log.info(
        { removed, retained: this.delivered.size, floor: highestRemoved },
        'Delivery ledger compacted in memory',
      );
    }
    return removed;
  }

  /** Builds the on-disk document for the current delivered set. */
  toState(): PersistedState {
    const stats: Record<string, number> = {};
    for (const id of this.delivered) {
      const host = parseIdentity(id)?.host;
      if (host !== undefined) {
        stats[host] = (stats[host] ?? 0) + 1;
      }
    }

    return {
      processed_ids: [...this.delivered],
      last_update: this.now().toISOString(),
      highest_id_this_machine: this.highWater,
      total_processed: this.delivered.size,
      stats_by_machine: stats,
      compaction_floors: Object.fromEntries(this.floors),
    };
  }

  /** Keeps the newest `retainPerHost` identities of every host, by sequence. */
  private compactForPersist(): number {
    if (this.delivered.size <= this.limits.persistThreshold) return 0;

    const byHost = new Map<string, Array<{ sequence: number; id: string }>>();
    for (const id of this.delivered) {
      const parsed = parseIdentity(id);
      if (parsed === null) continue;
      const list = byHost.get(parsed.host) ?? [];
      list.push({ sequence: parsed.sequence, id });
      byHost.set(parsed.host, list);
    }

    const retained = new Set<string>();
    for (const [host, list] of byHost) {
      list.sort((a, b) => a.sequence - b.sequence);
      const cut = Math.max(0, list.length - this.limits.retainPerHost);
      const lastDropped = list[cut - 1];
      if (lastDropped !== undefined) this.raiseFloor(host, lastDropped.sequence);
      for (const { id } of list.slice(cut)) {
        retained.add(id);
      }
    }

    const removed = this.delivered.size - retained.size;
    this.delivered = retained;
    return removed;
  }

  private record(id: string): void {
    this.pending.delete(id);
    this.discarded.delete(id);
    this.delivered.add(id);

    const parsed = parseIdentity(id);
    if (parsed?.host === this.localHost && parsed.sequence > this.highWater) {
      this.highWater = parsed.sequence;
    }
  }

  /** Overflow-dropped identities are released once the high-water mark passes them. */
  private pruneDiscarded(): void {
    for (const id of this.discarded) {
      const parsed = parseIdentity(id);
      if (parsed?.host === this.localHost && parsed.sequence <= this.highWater) {
        this.discarded.delete(id);
      }
    }
  }

  private belowFloor(id: string): boolean {
    const parsed = parseIdentity(id);
    if (parsed === null) return false;
    const floor = this.floors.get(parsed.host);
    return floor !== undefined && parsed.sequence <= floor;
  }

  private raiseFloor(host: string, sequence: number): void {
    this.floors.set(host, Math.max(this.floors.get(host) ?? 0, sequence));
  }
}
