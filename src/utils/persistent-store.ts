/**
 * Persistent Store - Debounced & Atomic JSON File Persistence
 *
 * - Debounced writes: rapid schedule() calls collapse into one write
 * - Atomic writes: temp file + rename, so a crash never leaves half a file
 * - Validated loads: the file is parsed through a zod schema
 *
 * Usage:
 *   const store = new PersistentStore('./memory.json', snapshotSchema);
 *   store.schedule(data);           // debounced
 *   await store.flush();            // write anything pending now
 *   const data = await store.load(); // null when the file does not exist
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { z } from 'zod';
import { logger } from './logger.js';

export interface PersistentStoreConfig {
  /** Debounce delay in milliseconds (default: 1000ms) */
  debounceMs: number;

  /** JSON indentation spaces, 0 for compact output (default: 2) */
  indent: number;

  /** Component name for logging */
  componentName: string;
}

export const DEFAULT_PERSISTENT_STORE_CONFIG: PersistentStoreConfig = {
  debounceMs: 1000,
  indent: 2,
  componentName: 'PersistentStore',
};

export interface PersistentStoreStats {
  saveRequests: number;
  actualWrites: number;
  failedWrites: number;
  lastWriteTime: number | null;
  lastError: string | null;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class PersistentStore<S extends z.ZodTypeAny> {
  private readonly filePath: string;
  private readonly config: PersistentStoreConfig;
  private readonly stats: PersistentStoreStats = {
    saveRequests: 0,
    actualWrites: 0,
    failedWrites: 0,
    lastWriteTime: null,
    lastError: null,
  };

  private pendingData: z.infer<S> | undefined;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    filePath: string,
    private readonly schema: S,
    config: Partial<PersistentStoreConfig> = {}
  ) {
    this.filePath = path.resolve(filePath);
    this.config = { ...DEFAULT_PERSISTENT_STORE_CONFIG, ...config };
  }

  getStats(): PersistentStoreStats {
    return { ...this.stats };
  }

  /**
   * Queue data for a debounced write. Only the latest data is written.
   * Write failures are logged and counted in stats; flush() surfaces them.
   */
  schedule(data: z.infer<S>): void {
    this.stats.saveRequests++;
    this.pendingData = data;

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.writePending().catch((error: unknown) => {
        logger.store.warn(`${this.config.componentName}: debounced write failed`, {
          path: this.filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.config.debounceMs);
    this.debounceTimer.unref();
  }

  /**
   * Write data now, cancelling any pending debounced write
   */
  async saveImmediate(data: z.infer<S>): Promise<void> {
    this.stats.saveRequests++;
    this.cancel();
    await this.enqueueWrite(data);
  }

  /**
   * Write any pending data immediately and wait for in-flight writes
   */
  async flush(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    await this.writePending();
  }

  /**
   * Load and validate the file. Returns null if it does not exist.
   */
  async load(): Promise<z.infer<S> | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      logger.store.error(`${this.config.componentName}: Failed to load from ${this.filePath}`, { error });
      throw error;
    }
    const parsed: unknown = JSON.parse(content);
    return this.schema.parse(parsed);
  }

  cancel(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    this.pendingData = undefined;
  }

  hasPendingWrite(): boolean {
    return this.pendingData !== undefined;
  }

  private async writePending(): Promise<void> {
    const data = this.pendingData;
    this.pendingData = undefined;
    if (data !== undefined) {
      await this.enqueueWrite(data);
    } else {
      await this.writeChain;
    }
  }

  /**
   * Writes run one after another so an older snapshot never lands last
   */
  private enqueueWrite(data: z.infer<S>): Promise<void> {
    const next = this.writeChain.then(() => this.atomicWrite(data));
    this.writeChain = next.catch((error: unknown) => {
      this.stats.lastError = String(error);
    });
    return next;
  }

  private async atomicWrite(data: z.infer<S>): Promise<void> {
    const tempPath = `${this.filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2)}`;
    const content = this.config.indent > 0
      ? JSON.stringify(data, null, this.config.indent)
      : JSON.stringify(data);

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);

      this.stats.actualWrites++;
      this.stats.lastWriteTime = Date.now();
      this.stats.lastError = null;
      logger.store.debug(`${this.config.componentName}: Saved to ${this.filePath}`, { size: content.length });
    } catch (error) {
      this.stats.failedWrites++;
      this.stats.lastError = String(error);
      logger.store.error(`${this.config.componentName}: Failed to save to ${this.filePath}`, { error });
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
