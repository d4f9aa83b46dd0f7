/**
 * packages/core/src/layout/engine/layoutEngine.ts — Cached per-entry geometry.
 *
 * Why: Calculators are pure but not cheap (text shaping). The engine
 * dispatches each entry to its calculator and keeps computed layouts in a
 * bounded cache keyed by message id and content fingerprint.
 *
 * Phase rules:
 *   - runExclusive(fn) marks the application of an update plan
 *   - computing geometry inside the phase is a fatal re-entrant call
 *   - invalidations requested inside the phase are deferred and flushed
 *     when the phase ends, so the cache never changes mid-application
 */

import { throwCode } from "../../errors.js";
import { type Entry, type Position, describePosition } from "../../model/entry.js";
import { contentFingerprint } from "../../model/fingerprint.js";
import type { Message } from "../../model/message.js";
import { perfCount, perfMarkEnd, perfMarkStart } from "../../perf/perf.js";
import type { MessageSource } from "../../source.js";
import { createCalculatorTable } from "../calculators/table.js";
import {
  type SizingConfigOverrides,
  type SizingConfiguration,
  resolveSizingConfig,
} from "../config.js";
import { type WarnSink, createDevWarnings } from "../devWarnings.js";
import type { LayoutPolicy } from "../policy.js";
import { type TextMeasurer, createTextMeasurer } from "../textMeasure.js";
import type { LayoutAttributes, Size } from "../types.js";
import {
  type AttributeCacheStats,
  type CachedLayout,
  DEFAULT_ATTRIBUTE_CACHE_CAPACITY,
  createAttributeCache,
  requireCacheCapacity,
} from "./attributeCache.js";

/** Tunables shared by the programmatic and environment configuration paths. */
export type EngineTuning = Readonly<{
  cacheCapacity: number;
  itemWidth: number;
  devMode: boolean;
}>;

export type LayoutEngineOptions = Readonly<{
  /** Required. */
  source?: MessageSource;
  /** Required. */
  policy?: LayoutPolicy;
  config?: SizingConfigOverrides;
  measurer?: TextMeasurer;
  cacheCapacity?: number;
  itemWidth?: number;
  devMode?: boolean;
  warn?: WarnSink;
}>;

export type LayoutEngine = Readonly<{
  itemWidth: number;
  config: SizingConfiguration;
  /** True while runExclusive() is running. */
  inExclusivePhase: boolean;
  setItemWidth(width: number): void;
  attributesFor(entry: Entry): LayoutAttributes;
  cellSizeFor(entry: Entry): Size;
  /** Geometry of the message the source holds at `at`. */
  attributesAt(at: Position): LayoutAttributes;
  cellSizeAt(at: Position): Size;
  invalidate(id: string): void;
  invalidateAll(): void;
  cacheStats(): AttributeCacheStats;
  runExclusive<T>(fn: () => T): T;
}>;

function requireItemWidth(width: unknown): number {
  if (typeof width !== "number" || !Number.isFinite(width) || width < 0) {
    throwCode(
      "CHATLAYOUT_INVALID_CONFIG",
      `itemWidth must be a finite number >= 0 (got ${String(width)})`,
    );
  }
  return width;
}

/** Apply defaults to engine tunables, validating every value. */
export function resolveEngineOptions(
  opts: Readonly<{ cacheCapacity?: unknown; itemWidth?: unknown; devMode?: unknown }> = {},
): EngineTuning {
  const devMode = opts.devMode ?? false;
  if (typeof devMode !== "boolean") {
    throwCode("CHATLAYOUT_INVALID_CONFIG", `devMode must be a boolean (got ${String(devMode)})`);
  }
  return Object.freeze({
    cacheCapacity: requireCacheCapacity(opts.cacheCapacity ?? DEFAULT_ATTRIBUTE_CACHE_CAPACITY),
    itemWidth: requireItemWidth(opts.itemWidth ?? 0),
    devMode,
  });
}

export function createLayoutEngine(opts: LayoutEngineOptions): LayoutEngine {
  const { source, policy } = opts;
  if (source === undefined) {
    throwCode("CHATLAYOUT_MISSING_COLLABORATOR", "createLayoutEngine: a message source is required");
  }
  if (policy === undefined) {
    throwCode("CHATLAYOUT_MISSING_COLLABORATOR", "createLayoutEngine: a layout policy is required");
  }

  const tuning = resolveEngineOptions(opts);
  const config = resolveSizingConfig(opts.config);
  const warnings = createDevWarnings(tuning.devMode, opts.warn);
  const cache = createAttributeCache(tuning.cacheCapacity);

  let itemWidth = tuning.itemWidth;
  let exclusiveDepth = 0;
  let pendingInvalidateAll = false;
  const pendingInvalidations = new Set<string>();

  const table = createCalculatorTable({
    source,
    policy,
    config,
    measurer: opts.measurer ?? createTextMeasurer(),
    itemWidth: () => itemWidth,
    warnings,
  });

  function assertNotExclusive(op: string): void {
    if (exclusiveDepth > 0) {
      throwCode("CHATLAYOUT_REENTRANT_CALL", `${op} called while an update is being applied`);
    }
  }

  function computeMessage(message: Message, at: Position): CachedLayout {
    const token = perfMarkStart("measure");
    try {
      perfCount("calculatorCalls");
      const calculator = table.calculatorFor(message, at);
      return Object.freeze({
        attributes: calculator.computeAttributes(message, at),
        size: calculator.computeCellSize(message, at),
      });
    } finally {
      perfMarkEnd("measure", token);
    }
  }

  function layoutMessage(message: Message, at: Position): CachedLayout {
    const fingerprint = contentFingerprint(message);
    const cached = cache.lookup(message.id, fingerprint, at, itemWidth);
    if (cached !== null) {
      perfCount("cacheHits");
      return cached;
    }
    perfCount("cacheMisses");
    const computed = computeMessage(message, at);
    cache.store(message.id, fingerprint, at, itemWidth, computed);
    return computed;
  }

  function layoutEntry(entry: Entry, op: string): CachedLayout {
    assertNotExclusive(op);
    if (entry.kind === "typingIndicator") {
      return Object.freeze({
        attributes: table.typingIndicator.computeAttributes(),
        size: table.typingIndicator.computeCellSize(),
      });
    }
    const token = perfMarkStart("layout");
    try {
      return layoutMessage(entry.message, entry.position);
    } finally {
      perfMarkEnd("layout", token);
    }
  }

  function layoutAt(at: Position, op: string): CachedLayout {
    assertNotExclusive(op);
    const inRange =
      at.section >= 0 &&
      at.section < source.sectionCount() &&
      at.item >= 0 &&
      at.item < source.itemCount(at.section);
    if (!inRange) {
      throwCode("CHATLAYOUT_INVALID_POSITION", `${op}: no message at ${describePosition(at)}`);
    }
    const token = perfMarkStart("layout");
    try {
      return layoutMessage(source.message(at), at);
    } finally {
      perfMarkEnd("layout", token);
    }
  }

  function flushDeferred(): void {
    if (pendingInvalidateAll) {
      cache.invalidateAll();
    } else {
      for (const id of pendingInvalidations) cache.invalidate(id);
    }
    pendingInvalidateAll = false;
    pendingInvalidations.clear();
  }

  return Object.freeze({
    get itemWidth() {
      return itemWidth;
    },
    get config() {
      return config;
    },
    get inExclusivePhase() {
      return exclusiveDepth > 0;
    },
    setItemWidth(width: number): void {
      const next = requireItemWidth(width);
      if (next === itemWidth) return;
      itemWidth = next;
      if (next === 0) {
        warnings.warnOnce(
          "layout",
          "itemWidth:0",
          "item width set to 0; every cell collapses to its minimum size.",
        );
      }
      if (exclusiveDepth > 0) {
        pendingInvalidateAll = true;
        return;
      }
      cache.invalidateAll();
    },
    attributesFor: (entry: Entry): LayoutAttributes => layoutEntry(entry, "attributesFor").attributes,
    cellSizeFor: (entry: Entry): Size => layoutEntry(entry, "cellSizeFor").size,
    attributesAt: (at: Position): LayoutAttributes => layoutAt(at, "attributesAt").attributes,
    cellSizeAt: (at: Position): Size => layoutAt(at, "cellSizeAt").size,
    invalidate(id: string): void {
      if (exclusiveDepth > 0) {
        pendingInvalidations.add(id);
        return;
      }
      cache.invalidate(id);
    },
    invalidateAll(): void {
      if (exclusiveDepth > 0) {
        pendingInvalidateAll = true;
        return;
      }
      cache.invalidateAll();
    },
    cacheStats: (): AttributeCacheStats => cache.stats(),
    runExclusive<T>(fn: () => T): T {
      assertNotExclusive("runExclusive");
      exclusiveDepth++;
      try {
        return fn();
      } finally {
        exclusiveDepth--;
        flushDeferred();
      }
    },
  });
}
