/**
 * Domain Memory - which fetch strategies have worked for each host
 *
 * Membership only, no counts. A success removes the strategy from the
 * host's failed set; a failure never removes it from the successful set.
 * Hosts are created on first sight and live for the process, or across
 * runs when a persistence path is attached.
 */

import { z } from 'zod';
import { STRATEGY_ORDER, isStrategyId, type StrategyId } from '../types/index.js';
import { PersistentStore } from '../utils/persistent-store.js';
import { logger } from '../utils/logger.js';

const log = logger.memory;

export interface DomainRecord {
  successful: Set<StrategyId>;
  failed: Set<StrategyId>;
}

// Unknown strategy ids in a stored file are dropped rather than rejected
const strategyListSchema = z
  .array(z.string())
  .default([])
  .transform((ids) => ids.filter(isStrategyId));

export const memorySnapshotSchema = z.record(
  z.string(),
  z.object({
    successful: strategyListSchema,
    failed: strategyListSchema,
  })
);

export type MemorySnapshot = z.infer<typeof memorySnapshotSchema>;

/**
 * Read-only view handed to strategy policies
 */
export interface DomainMemoryView {
  successfulStrategies(domain: string): Set<StrategyId>;
  failedStrategies(domain: string): Set<StrategyId>;
}

export interface DomainMemoryOptions {
  /** JSON file to persist memory to; writes are debounced */
  persistPath?: string;
  debounceMs?: number;
}

function sortByCost(ids: Iterable<StrategyId>): StrategyId[] {
  const present = new Set(ids);
  return STRATEGY_ORDER.filter((id) => present.has(id));
}

export class DomainMemory implements DomainMemoryView {
  private records: Map<string, DomainRecord> = new Map();
  private locks: Map<string, Promise<void>> = new Map();
  private store: PersistentStore<typeof memorySnapshotSchema> | null;

  constructor(options: DomainMemoryOptions = {}) {
    this.store = options.persistPath
      ? new PersistentStore(options.persistPath, memorySnapshotSchema, {
          componentName: 'DomainMemory',
          ...(options.debounceMs !== undefined && { debounceMs: options.debounceMs }),
        })
      : null;
  }

  /**
   * Create a memory and seed it from its persistence file, if one exists
   */
  static async load(persistPath: string, options: Omit<DomainMemoryOptions, 'persistPath'> = {}): Promise<DomainMemory> {
    const memory = new DomainMemory({ ...options, persistPath });
    const snapshot = await memory.store?.load();
    if (snapshot) {
      memory.restore(snapshot);
      log.info('Loaded domain memory', { path: persistPath, domains: memory.records.size });
    }
    return memory;
  }

  private normalize(domain: string): string {
    return domain.trim().toLowerCase();
  }

  private ensure(domain: string): DomainRecord {
    const key = this.normalize(domain);
    let record = this.records.get(key);
    if (!record) {
      record = { successful: new Set(), failed: new Set() };
      this.records.set(key, record);
    }
    return record;
  }

  /**
   * Record the outcome of one attempt. Idempotent.
   */
  record(domain: string, strategy: StrategyId, succeeded: boolean): void {
    const entry = this.ensure(domain);
    if (succeeded) {
      entry.successful.add(strategy);
      entry.failed.delete(strategy);
    } else {
      entry.failed.add(strategy);
    }
    log.debug('Recorded strategy outcome', { domain, strategy, succeeded });
    this.store?.schedule(this.snapshot());
  }

  successfulStrategies(domain: string): Set<StrategyId> {
    return new Set(this.records.get(this.normalize(domain))?.successful);
  }

  failedStrategies(domain: string): Set<StrategyId> {
    return new Set(this.records.get(this.normalize(domain))?.failed);
  }

  /**
   * Run fn while holding this domain's lock. Calls for the same domain run
   * one at a time in arrival order; other domains are unaffected.
   */
  async withDomainLock<T>(domain: string, fn: () => T | Promise<T>): Promise<T> {
    const key = this.normalize(domain);
    const previous = this.locks.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Serialized variant of record() for concurrent crawls
   */
  async recordSafely(domain: string, strategy: StrategyId, succeeded: boolean): Promise<void> {
    await this.withDomainLock(domain, () => this.record(domain, strategy, succeeded));
  }

  domains(): string[] {
    return Array.from(this.records.keys());
  }

  /**
   * Export memory as plain JSON, strategies in cost order
   */
  snapshot(): MemorySnapshot {
    const out: MemorySnapshot = {};
    for (const [domain, record] of this.records) {
      out[domain] = {
        successful: sortByCost(record.successful),
        failed: sortByCost(record.failed),
      };
    }
    return out;
  }

  /**
   * Merge a snapshot into memory. Later evidence wins: a strategy listed
   * as successful is removed from failed.
   */
  restore(snapshot: MemorySnapshot): void {
    for (const [domain, entry] of Object.entries(snapshot)) {
      const record = this.ensure(domain);
      for (const id of entry.failed) record.failed.add(id);
      for (const id of entry.successful) {
        record.successful.add(id);
        record.failed.delete(id);
      }
    }
  }

  clear(): void {
    this.records.clear();
    this.store?.cancel();
  }

  /**
   * Write pending changes to the persistence file, if any
   */
  async flush(): Promise<void> {
    await this.store?.flush();
  }
}
