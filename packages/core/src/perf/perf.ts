/**
 * packages/core/src/perf/perf.ts — Opt-in phase timings and event counters.
 *
 * Enabled with CHATLAYOUT_PERF=1. When disabled every entry point returns before
 * touching the recorder.
 */

/** Phases of an update or a geometry request. */
export type InstrumentationPhase = "collect" | "reconcile" | "apply" | "layout" | "measure";

export const PERF_PHASES: readonly InstrumentationPhase[] = Object.freeze([
  "collect",
  "reconcile",
  "apply",
  "layout",
  "measure",
]);

export type PerfCounter = "calculatorCalls" | "cacheHits" | "cacheMisses";

export const PERF_COUNTERS: readonly PerfCounter[] = Object.freeze([
  "calculatorCalls",
  "cacheHits",
  "cacheMisses",
]);

/** Accumulated timings of one phase, in milliseconds. */
export type PhaseTotals = Readonly<{
  count: number;
  totalMs: number;
  maxMs: number;
}>;

export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in InstrumentationPhase]?: PhaseTotals }>;
  counters: Readonly<{ [K in PerfCounter]?: number }>;
}>;

/** Start time returned by markStart. */
export type PerfToken = number;

export type PerfRecorder = Readonly<{
  markStart: () => PerfToken;
  markEnd: (phase: InstrumentationPhase, token: PerfToken) => void;
  count: (counter: PerfCounter, delta: number) => void;
  snapshot: () => PerfSnapshot;
  reset: () => void;
}>;

const EMPTY_SNAPSHOT: PerfSnapshot = Object.freeze({
  phases: Object.freeze({}),
  counters: Object.freeze({}),
});

/** Uses globalThis.process so core stays free of Node imports. */
export const PERF_ENABLED: boolean = (() => {
  const g = globalThis as { process?: { env?: { CHATLAYOUT_PERF?: string } } };
  return g.process?.env?.CHATLAYOUT_PERF === "1";
})();

function defaultClock(): number {
  return typeof performance !== "undefined" ? performance.now() : Date.now();
}

type MutableTotals = { count: number; totalMs: number; maxMs: number };

/** A standalone recorder; the module-level functions share one instance. */
export function createPerfRecorder(clock: () => number = defaultClock): PerfRecorder {
  const phases = new Map<InstrumentationPhase, MutableTotals>();
  const counters = new Map<PerfCounter, number>();

  return Object.freeze({
    markStart: () => clock(),
    markEnd(phase: InstrumentationPhase, token: PerfToken): void {
      const dt = Math.max(0, clock() - token);
      const totals = phases.get(phase);
      if (totals === undefined) {
        phases.set(phase, { count: 1, totalMs: dt, maxMs: dt });
        return;
      }
      totals.count++;
      totals.totalMs += dt;
      if (dt > totals.maxMs) totals.maxMs = dt;
    },
    count(counter: PerfCounter, delta: number): void {
      counters.set(counter, (counters.get(counter) ?? 0) + delta);
    },
    snapshot(): PerfSnapshot {
      const phaseOut: { [K in InstrumentationPhase]?: PhaseTotals } = {};
      for (const p of PERF_PHASES) {
        const totals = phases.get(p);
        if (totals !== undefined) phaseOut[p] = Object.freeze({ ...totals });
      }
      const counterOut: { [K in PerfCounter]?: number } = {};
      for (const c of PERF_COUNTERS) {
        const v = counters.get(c);
        if (v !== undefined) counterOut[c] = v;
      }
      return Object.freeze({ phases: Object.freeze(phaseOut), counters: Object.freeze(counterOut) });
    },
    reset(): void {
      phases.clear();
      counters.clear();
    },
  });
}

let shared: PerfRecorder | null = null;

function recorder(): PerfRecorder {
  if (shared === null) shared = createPerfRecorder();
  return shared;
}

export function perfMarkStart(_phase: InstrumentationPhase): PerfToken {
  if (!PERF_ENABLED) return 0;
  return recorder().markStart();
}

export function perfMarkEnd(phase: InstrumentationPhase, token: PerfToken): void {
  if (!PERF_ENABLED) return;
  recorder().markEnd(phase, token);
}

export function perfCount(counter: PerfCounter, delta = 1): void {
  if (!PERF_ENABLED) return;
  recorder().count(counter, delta);
}

/** Empty when perf is disabled. */
export function perfSnapshot(): PerfSnapshot {
  if (!PERF_ENABLED) return EMPTY_SNAPSHOT;
  return recorder().snapshot();
}

export function perfReset(): void {
  if (!PERF_ENABLED) return;
  recorder().reset();
}
