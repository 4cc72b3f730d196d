import { DEFAULT_CACHE_MAX_SIZE, DEFAULT_CACHE_TTL_MS } from '../config/constants.js';
import type { FieldDescriptor } from './types.js';

export interface GenerationCacheOptions {
  ttlMs?: number;
  maxSize?: number;
  now?: () => number;
}

interface CacheEntry {
  value: string;
  expiresAt: number;
}

/**
 * In-memory answers keyed by (kind, field name, options). Oldest entries are
 * evicted first once `maxSize` is reached.
 */
export class GenerationCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(opts: GenerationCacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxSize = opts.maxSize ?? DEFAULT_CACHE_MAX_SIZE;
    this.now = opts.now ?? Date.now;
  }

  static keyFor(field: FieldDescriptor): string {
    return JSON.stringify([field.kind, field.name, field.options ?? []]);
  }

  get size(): number {
    return this.entries.size;
  }

  get(field: FieldDescriptor): string | undefined {
    const key = GenerationCache.keyFor(field);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(field: FieldDescriptor, value: string): void {
    const key = GenerationCache.keyFor(field);
    this.entries.delete(key);
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }
}
