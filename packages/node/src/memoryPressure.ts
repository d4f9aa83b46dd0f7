/**
 * packages/node/src/memoryPressure.ts — Drop cached layouts under memory pressure.
 *
 * Pressure is detected by polling heap usage against a limit, or reported by
 * an OS signal or the host (notifyPressure). Whatever the origin, the cache
 * flush is marshalled onto the main line with setImmediate, and bursts of
 * notifications before it runs coalesce into a single invalidateAll().
 */

import { getHeapStatistics } from "node:v8";

const DEFAULT_INTERVAL_MS = 1000;
const DEFAULT_HEAP_LIMIT_RATIO = 0.85;

export type MemoryPressureLogEvent = Readonly<{
  level: "info" | "warn";
  message: string;
  heapUsedBytes?: number;
}>;

/** Anything that can drop its cache; a LayoutEngine fits. */
export type InvalidationTarget = Readonly<{ invalidateAll: () => void }>;

export type MemoryPressureWatcherOptions = Readonly<{
  target: InvalidationTarget;
  /** Heap usage (bytes) above which the cache is flushed. Defaults to 85% of the V8 heap limit. */
  heapUsedLimitBytes?: number;
  /** Poll period. */
  intervalMs?: number;
  /** Optional signal treated as a pressure notification (e.g. "SIGUSR2"). */
  signal?: NodeJS.Signals;
  /** Heap usage reader; defaults to process.memoryUsage().heapUsed. */
  readHeapUsed?: () => number;
  log?: (event: MemoryPressureLogEvent) => void;
}>;

export type MemoryPressureWatcher = Readonly<{
  start: () => void;
  stop: () => void;
  isRunning: () => boolean;
  /** Report pressure from any context; the flush runs on a later turn. */
  notifyPressure: () => void;
  /** Sample heap usage once, as the poll timer does. */
  checkNow: () => void;
  /** Number of flushes performed. */
  flushCount: () => number;
}>;

function ensurePositiveInt(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
}

function ensurePositiveNumber(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive finite number`);
  }
  return value;
}

function defaultHeapLimit(): number {
  return Math.floor(getHeapStatistics().heap_size_limit * DEFAULT_HEAP_LIMIT_RATIO);
}

function defaultReadHeapUsed(): number {
  return process.memoryUsage().heapUsed;
}

export function createMemoryPressureWatcher(
  opts: MemoryPressureWatcherOptions,
): MemoryPressureWatcher {
  const { target } = opts;
  const intervalMs = ensurePositiveInt("intervalMs", opts.intervalMs ?? DEFAULT_INTERVAL_MS);
  const limit = ensurePositiveNumber(
    "heapUsedLimitBytes",
    opts.heapUsedLimitBytes ?? defaultHeapLimit(),
  );
  const readHeapUsed = opts.readHeapUsed ?? defaultReadHeapUsed;
  const log = opts.log;

  let running = false;
  let pollTimer: ReturnType<typeof setInterval> | null = null;
  let pending: ReturnType<typeof setImmediate> | null = null;
  // Edge-triggered: re-armed once usage falls back under the limit.
  let aboveLimit = false;
  let flushes = 0;

  function flush(): void {
    pending = null;
    target.invalidateAll();
    flushes++;
    log?.({ level: "info", message: "layout cache flushed under memory pressure" });
  }

  function notifyPressure(): void {
    if (pending !== null) return;
    pending = setImmediate(flush);
  }

  function checkNow(): void {
    const used = readHeapUsed();
    if (used <= limit) {
      aboveLimit = false;
      return;
    }
    if (aboveLimit) return;
    aboveLimit = true;
    log?.({ level: "warn", message: "heap usage above limit", heapUsedBytes: used });
    notifyPressure();
  }

  function onSignal(): void {
    notifyPressure();
  }

  return Object.freeze({
    start(): void {
      if (running) return;
      running = true;
      pollTimer = setInterval(checkNow, intervalMs);
      pollTimer.unref();
      if (opts.signal !== undefined) process.on(opts.signal, onSignal);
      log?.({ level: "info", message: "memory pressure watcher started" });
    },
    stop(): void {
      if (!running) return;
      running = false;
      if (pollTimer !== null) {
        clearInterval(pollTimer);
        pollTimer = null;
      }
      if (pending !== null) {
        clearImmediate(pending);
        pending = null;
      }
      if (opts.signal !== undefined) process.off(opts.signal, onSignal);
      log?.({ level: "info", message: "memory pressure watcher stopped" });
    },
    isRunning: (): boolean => running,
    notifyPressure,
    checkNow,
    flushCount: (): number => flushes,
  });
}
