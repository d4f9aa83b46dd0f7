/**
 * packages/core/src/layout/engine/attributeCache.ts — Bounded LRU of computed layouts.
 *
 * Entries are keyed by message id. A lookup only hits when the stored
 * fingerprint, position and item width all equal the requested ones, so an
 * edited message (new fingerprint) or a moved one never reuses stale geometry.
 * Map insertion order doubles as recency order: a hit re-inserts the record.
 */

import { throwCode } from "../../errors.js";
import type { Position } from "../../model/entry.js";
import type { LayoutAttributes, Size } from "../types.js";

export const DEFAULT_ATTRIBUTE_CACHE_CAPACITY = 512;

export type CachedLayout = Readonly<{ attributes: LayoutAttributes; size: Size }>;

type CacheRecord = Readonly<{
  fingerprint: string;
  section: number;
  item: number;
  itemWidth: number;
  layout: CachedLayout;
}>;

export type AttributeCacheStats = Readonly<{
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  capacity: number;
}>;

export type AttributeCache = Readonly<{
  size: number;
  capacity: number;
  lookup(id: string, fingerprint: string, at: Position, itemWidth: number): CachedLayout | null;
  store(id: string, fingerprint: string, at: Position, itemWidth: number, layout: CachedLayout): void;
  /** Drop one entry; returns whether it was present. */
  invalidate(id: string): boolean;
  invalidateAll(): void;
  stats(): AttributeCacheStats;
}>;

export function requireCacheCapacity(capacity: unknown): number {
  if (typeof capacity !== "number" || !Number.isSafeInteger(capacity) || capacity <= 0) {
    throwCode(
      "CHATLAYOUT_INVALID_CONFIG",
      `cacheCapacity must be a positive integer (got ${String(capacity)})`,
    );
  }
  return capacity;
}

export function createAttributeCache(
  capacity: number = DEFAULT_ATTRIBUTE_CACHE_CAPACITY,
): AttributeCache {
  const cap = requireCacheCapacity(capacity);
  const records = new Map<string, CacheRecord>();
  let hits = 0;
  let misses = 0;
  let evictions = 0;

  function evictOldest(): void {
    const oldest = records.keys().next();
    if (oldest.done === true) return;
    records.delete(oldest.value);
    evictions++;
  }

  return Object.freeze({
    get size() {
      return records.size;
    },
    get capacity() {
      return cap;
    },
    lookup(id: string, fingerprint: string, at: Position, itemWidth: number): CachedLayout | null {
      const record = records.get(id);
      if (
        record === undefined ||
        record.fingerprint !== fingerprint ||
        record.section !== at.section ||
        record.item !== at.item ||
        record.itemWidth !== itemWidth
      ) {
        misses++;
        return null;
      }
      records.delete(id);
      records.set(id, record);
      hits++;
      return record.layout;
    },
    store(
      id: string,
      fingerprint: string,
      at: Position,
      itemWidth: number,
      layout: CachedLayout,
    ): void {
      records.delete(id);
      while (records.size >= cap) evictOldest();
      records.set(
        id,
        Object.freeze({ fingerprint, section: at.section, item: at.item, itemWidth, layout }),
      );
    },
    invalidate(id: string): boolean {
      return records.delete(id);
    },
    invalidateAll(): void {
      records.clear();
    },
    stats(): AttributeCacheStats {
      return Object.freeze({ hits, misses, evictions, size: records.size, capacity: cap });
    },
  });
}
