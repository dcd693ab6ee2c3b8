/**
 * Bounded LRU Store
 *
 * Map-backed: insertion order doubles as recency order, so the first key
 * is always the least recently used. get() and set() both move a key to
 * the back; inserting into a full store evicts from the front.
 */

import { ConfigError } from '../errors';

export class BucketStore<T> {
  private entries = new Map<string, T>();
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigError(`Bucket store capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get(key: string): T | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;

    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  set(key: string, value: T): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, value);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
