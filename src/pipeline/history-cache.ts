/**
 * Bounded record of URLs already emitted by earlier runs.
 *
 * Backed by a Set, whose iteration order is insertion order: the first
 * element is always the oldest, so FIFO eviction is O(1) alongside O(1)
 * membership tests.
 */

import { DEFAULT_LIMITS } from '../shared/constants.js';

export class HistoryCache {
  private readonly entries = new Set<string>();
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_LIMITS.HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  /**
   * Records a URL. Re-adding a known URL is a no-op and does not refresh
   * its position. Returns the URLs evicted to stay within capacity.
   */
  add(url: string): string[] {
    if (this.entries.has(url)) {
      return [];
    }

    this.entries.add(url);

    const evicted: string[] = [];
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.values().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      evicted.push(oldest.value);
    }
    return evicted;
  }

  addAll(urls: Iterable<string>): string[] {
    const evicted: string[] = [];
    for (const url of urls) {
      evicted.push(...this.add(url));
    }
    return evicted;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Oldest first. */
  values(): string[] {
    return [...this.entries];
  }

  /** Empties the cache; later runs re-emit previously seen URLs. */
  clear(): number {
    const cleared = this.entries.size;
    this.entries.clear();
    return cleared;
  }
}
