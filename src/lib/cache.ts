/**
 * Parse Cache - LRU cache of parse results keyed by input text
 * Parsing is pure, so entries never expire; the least recently used entry is evicted at capacity
 */

import { config } from "../config.ts";
import { type ParseResult, tryParseLatex } from "./latex/index.ts";

export interface ParseCacheConfig {
  /** Maximum number of cached inputs (0 disables caching) */
  max_entries: number;
  /** Nesting bound passed to the parser */
  max_depth: number;
}

export interface CacheStats {
  size: number;
  max: number;
  hit_rate: number;
  hits: number;
  misses: number;
  evictions: number;
}

class ParseCacheImpl {
  // Map iteration order is insertion order: first key = least recently used
  private cache = new Map<string, ParseResult>();
  private config: ParseCacheConfig;

  private totalHits = 0;
  private totalMisses = 0;
  private totalEvictions = 0;

  constructor(config: ParseCacheConfig) {
    this.config = { ...config };
  }

  /**
   * Parse through the cache
   * Failures are cached too: the same input always fails the same way.
   */
  parse(input: string): ParseResult {
    const cached = this.cache.get(input);
    if (cached) {
      this.totalHits++;
      // Re-insert to mark as most recently used
      this.cache.delete(input);
      this.cache.set(input, cached);
      return cached;
    }

    this.totalMisses++;
    const result = tryParseLatex(input, { maxDepth: this.config.max_depth });
    this.store(input, result);
    return result;
  }

  private store(input: string, result: ParseResult): void {
    if (this.config.max_entries <= 0) return;

    while (this.cache.size >= this.config.max_entries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
      this.totalEvictions++;
    }
    this.cache.set(input, result);
  }

  has(input: string): boolean {
    return this.cache.has(input);
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): CacheStats {
    const lookups = this.totalHits + this.totalMisses;
    return {
      size: this.cache.size,
      max: this.config.max_entries,
      hit_rate: lookups > 0 ? this.totalHits / lookups : 0,
      hits: this.totalHits,
      misses: this.totalMisses,
      evictions: this.totalEvictions,
    };
  }

  /**
   * Clear all cached entries and reset stats
   */
  clear(): number {
    const count = this.cache.size;
    this.cache.clear();
    this.totalHits = 0;
    this.totalMisses = 0;
    this.totalEvictions = 0;
    return count;
  }

  /**
   * Update configuration; a smaller capacity or a new depth bound drops all entries
   */
  configure(config: Partial<ParseCacheConfig>): void {
    const next = { ...this.config, ...config };
    if (next.max_depth !== this.config.max_depth || next.max_entries < this.cache.size) {
      this.cache.clear();
    }
    this.config = next;
  }
}

// Singleton instance
export const parseCache = new ParseCacheImpl({
  max_entries: config.cacheSize,
  max_depth: config.maxDepth,
});

// Export class for testing with custom config
export { ParseCacheImpl as ParseCache };
