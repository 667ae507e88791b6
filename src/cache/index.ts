/**
 * Response Cache Module
 *
 * Bounded, TTL-based in-memory cache for LLM responses. It is an ordinary
 * object: the orchestrator (or whoever builds the LLM executor) creates one and
 * passes it in, so separate pipelines and tests never share entries.
 *
 * Keys are SHA-256 hashes of an operation name plus its parameters serialized
 * with sorted keys, so parameter order does not matter.
 *
 * Usage:
 * ```typescript
 * const cache = new ResponseCache<LLMCompletion>({ ttlMs: 3600000, maxEntries: 500 });
 * const key = ResponseCache.key('generate', { prompt, model, temperature });
 * const hit = cache.get(key);
 * ```
 */

import { createHash } from 'crypto';

// ============================================================================
// Type Definitions
// ============================================================================

export interface CacheOptions {
  /** Entry lifetime in milliseconds (default: 3600000) */
  ttlMs?: number;
  /** Entries kept before the least recently used is evicted (default: 500) */
  maxEntries?: number;
  /** Clock, injectable for tests (default: Date.now) */
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  entries: number;
  /** Sum of costs reported through recordSavings */
  costSaved: number;
}

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * JSON serialization with object keys sorted at every level
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

// ============================================================================
// Cache
// ============================================================================

export class ResponseCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private costSaved = 0;

  constructor(options: CacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 3600000;
    this.maxEntries = Math.max(1, options.maxEntries ?? 500);
    this.now = options.now ?? Date.now;
  }

  /**
   * Cache key for an operation and its parameters
   */
  static key(operation: string, params: Record<string, unknown>): string {
    return createHash('sha256').update(`${operation}:${stableStringify(params)}`).digest('hex');
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    // re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  /**
   * Count the cost a cache hit avoided
   */
  recordSavings(cost: number): void {
    this.costSaved += cost;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      entries: this.entries.size,
      costSaved: this.costSaved,
    };
  }

  clear(): void {
    this.entries.clear();
  }
}

export default {
  ResponseCache,
  stableStringify,
};
