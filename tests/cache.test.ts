import { describe, it, expect, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import {
  buildCacheEntry,
  buildCacheKey,
  FileKeyValueStore,
  fingerprint,
  MemoryKeyValueStore,
  readCache,
  stableStringify,
  writeCache,
} from '../src/utils/cache';

const ValueSchema = z.object({ synonyms: z.array(z.string()) });

const meta = {
  agentName: 'SynonymExpansion',
  promptVersion: 'v1',
  schemaVersion: 'v1',
  model: 'test-model',
  inputHash: 'abc',
  durationMs: 5,
};

describe('stableStringify', () => {
  it('sorts keys and drops undefined members', () => {
    expect(stableStringify({ b: 1, a: [1, { d: undefined, c: 2 }] })).toBe('{"a":[1,{"c":2}],"b":1}');
  });

  it('gives the same fingerprint regardless of key order', () => {
    expect(fingerprint({ x: 1, y: 'two' })).toBe(fingerprint({ y: 'two', x: 1 }));
    expect(fingerprint({ x: 1 })).not.toBe(fingerprint({ x: 2 }));
  });
});

describe('buildCacheKey', () => {
  it('separates models but shares the input hash', () => {
    const base = { agentName: 'A', promptVersion: 'v1', schemaVersion: 'v1', input: { keyword: 'graph' } };
    const a = buildCacheKey({ ...base, model: 'model-a' });
    const b = buildCacheKey({ ...base, model: 'model-b' });
    expect(a.key).not.toBe(b.key);
    expect(a.inputHash).toBe(b.inputHash);
    expect(a.key).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('readCache / writeCache', () => {
  it('round-trips a validated value', async () => {
    const store = new MemoryKeyValueStore();
    await writeCache(store, 'k', buildCacheEntry(meta, { synonyms: ['gnn'] }));
    await expect(readCache(store, 'k', ValueSchema)).resolves.toEqual({ synonyms: ['gnn'] });
    expect(store.size).toBe(1);
  });

  it('treats corrupt or off-schema entries as misses', async () => {
    const store = new MemoryKeyValueStore();
    await store.set('corrupt', '{not json');
    await writeCache(store, 'stale', buildCacheEntry(meta, { synonyms: 'gnn' }));

    await expect(readCache(store, 'corrupt', ValueSchema)).resolves.toBeNull();
    await expect(readCache(store, 'stale', ValueSchema)).resolves.toBeNull();
    await expect(readCache(store, 'missing', ValueSchema)).resolves.toBeNull();
  });
});

describe('FileKeyValueStore', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) await fs.rm(root, { recursive: true, force: true });
  });

  it('persists entries as files and leaves no temp files behind', async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'kv-'));
    const store = new FileKeyValueStore(root);

    await expect(store.get('entry')).resolves.toBeUndefined();
    await store.set('entry', '{"ok":true}');
    await expect(store.get('entry')).resolves.toBe('{"ok":true}');
    await expect(fs.readdir(root)).resolves.toEqual(['entry.json']);
  });
});
