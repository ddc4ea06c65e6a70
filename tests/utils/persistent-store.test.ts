/**
 * Tests for PersistentStore - debounced, atomic, schema-validated JSON files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { PersistentStore } from '../../src/utils/persistent-store.js';

const counterSchema = z.object({ count: z.number() });

describe('PersistentStore', () => {
  let testDir: string;
  let filePath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'persistent-store-test-'));
    filePath = path.join(testDir, 'nested', 'store.json');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should return null when the file does not exist', async () => {
    const store = new PersistentStore(filePath, counterSchema);
    expect(await store.load()).toBeNull();
  });

  it('should write immediately and read back through the schema', async () => {
    const store = new PersistentStore(filePath, counterSchema);
    await store.saveImmediate({ count: 2 });

    expect(await store.load()).toEqual({ count: 2 });
    expect(await fs.readFile(filePath, 'utf-8')).toBe('{\n  "count": 2\n}');
  });

  it('should collapse scheduled writes into the latest data on flush', async () => {
    const store = new PersistentStore(filePath, counterSchema, { debounceMs: 60000 });
    store.schedule({ count: 1 });
    store.schedule({ count: 2 });
    store.schedule({ count: 3 });
    expect(store.hasPendingWrite()).toBe(true);

    await store.flush();

    expect(store.hasPendingWrite()).toBe(false);
    expect(await store.load()).toEqual({ count: 3 });
    expect(store.getStats()).toMatchObject({ saveRequests: 3, actualWrites: 1, failedWrites: 0 });
  });

  it('should drop pending data on cancel', async () => {
    const store = new PersistentStore(filePath, counterSchema, { debounceMs: 60000 });
    store.schedule({ count: 1 });
    store.cancel();
    await store.flush();

    expect(await store.load()).toBeNull();
  });

  it('should reject a file that fails the schema', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify({ count: 'three' }), 'utf-8');

    const store = new PersistentStore(filePath, counterSchema);
    await expect(store.load()).rejects.toThrow();
  });

  it('should leave no temp files behind', async () => {
    const store = new PersistentStore(filePath, counterSchema, { indent: 0 });
    await store.saveImmediate({ count: 7 });

    expect(await fs.readdir(path.dirname(filePath))).toEqual(['store.json']);
    expect(await fs.readFile(filePath, 'utf-8')).toBe('{"count":7}');
  });
});
