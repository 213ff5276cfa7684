import { createHash, randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

export const DEFAULT_CACHE_ROOT = path.resolve('.cache/paper_ranker');

/**
 * Key-value backing for memoized synonym sets and rubric scores.
 * Implementations must be local: a read never waits on the network.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private entries = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  get size(): number {
    return this.entries.size;
  }
}

export class FileKeyValueStore implements KeyValueStore {
  constructor(private readonly root: string = DEFAULT_CACHE_ROOT) {}

  private filePath(key: string): string {
    return path.join(this.root, `${key}.json`);
  }

  async get(key: string): Promise<string | undefined> {
    try {
      return await fs.readFile(this.filePath(key), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  async set(key: string, value: string): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
    const filePath = this.filePath(key);
    const tmpPath = `${filePath}.${randomUUID()}.tmp`;
    await fs.writeFile(tmpPath, value, { encoding: 'utf8' });
    await fs.rename(tmpPath, filePath);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function stableStringify(value: unknown): string {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return 'null';
  }

  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    const mapped = value.map((item) => stableStringify(item));
    return `[${mapped.join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined && typeof v !== 'function' && typeof v !== 'symbol')
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const mapped = entries.map(
    ([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`
  );
  return `{${mapped.join(',')}}`;
}

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function fingerprint(value: unknown): string {
  return sha256(stableStringify(value));
}

export interface CacheKeyParts {
  agentName: string;
  model: string;
  promptVersion: string;
  schemaVersion: string;
  input: unknown;
}

export interface CacheMeta {
  createdAt: string;
  durationMs: number;
  agentName: string;
  promptVersion: string;
  schemaVersion: string;
  model: string;
  inputHash: string;
  outputHash: string;
}

export interface CacheEntry<T> {
  meta: CacheMeta;
  value: T;
}

export function buildCacheKey(parts: CacheKeyParts): {
  key: string;
  inputHash: string;
} {
  const inputHash = fingerprint(parts.input);
  const raw = [
    parts.model,
    parts.agentName,
    parts.promptVersion,
    parts.schemaVersion,
    inputHash,
  ].join('|');
  return {
    key: sha256(raw),
    inputHash,
  };
}

export function buildCacheEntry<T>(
  meta: Omit<CacheMeta, 'outputHash' | 'createdAt'>,
  value: T
): CacheEntry<T> {
  return {
    meta: {
      ...meta,
      outputHash: fingerprint(value),
      createdAt: new Date().toISOString(),
    },
    value,
  };
}

const CacheEnvelopeSchema = z.object({
  meta: z.object({ agentName: z.string() }).passthrough(),
  value: z.unknown(),
});

/**
 * Reads a cached value and re-validates it against the schema that produced
 * it. Entries that no longer parse are reported as misses.
 */
export async function readCache<T>(
  store: KeyValueStore,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T | null> {
  const raw = await store.get(key);
  if (raw === undefined) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const envelope = CacheEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return null;
  }
  const value = schema.safeParse(envelope.data.value);
  return value.success ? value.data : null;
}

export async function writeCache<T>(
  store: KeyValueStore,
  key: string,
  entry: CacheEntry<T>
): Promise<void> {
  await store.set(key, JSON.stringify(entry));
}
