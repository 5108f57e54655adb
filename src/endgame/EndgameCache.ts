/**
 * EndgameCache - Transposition cache for one move decision
 *
 * Keys are exact position strings (placement, side to move, castling, en
 * passant), so there are no hash collisions to guard against. An entry only
 * answers a probe when it was searched at least as deep as requested and its
 * bound settles the current window.
 *
 * Capacity is fixed; once full, the oldest entry is evicted.
 */

import type { CacheBound, CacheEntry, CacheStats, Score } from './types.js';

export class EndgameCache {
  private entries: Map<string, CacheEntry> = new Map();
  private capacity: number;
  private hits = 0;
  private misses = 0;
  private stores = 0;
  private evictions = 0;

  constructor(capacity: number = 200_000) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  /**
   * Score usable in place of a search, or null
   * @param minDepth - Depth the caller is about to search
   */
  lookup(key: string, minDepth: number, alpha: Score, beta: Score): Score | null {
    const entry = this.entries.get(key);
    if (!entry || entry.depth < minDepth) {
      this.misses++;
      return null;
    }

    if (
      entry.bound === 'exact' ||
      (entry.bound === 'lower' && entry.score >= beta) ||
      (entry.bound === 'upper' && entry.score <= alpha)
    ) {
      this.hits++;
      return entry.score;
    }

    this.misses++;
    return null;
  }

  /**
   * Store a result. A deeper entry for the same key is never replaced by a
   * shallower one.
   */
  store(key: string, depth: number, score: Score, bound: CacheBound): void {
    const existing = this.entries.get(key);
    if (existing) {
      if (depth < existing.depth) return;
      this.entries.delete(key);
    } else {
      while (this.entries.size >= this.capacity) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
        this.evictions++;
      }
    }

    this.entries.set(key, { score, depth, bound });
    this.stores++;
  }

  /** Raw entry, for diagnostics */
  peek(key: string): CacheEntry | null {
    return this.entries.get(key) ?? null;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.stores = 0;
    this.evictions = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      stores: this.stores,
      evictions: this.evictions,
    };
  }
}
