/**
 * packages/core/src/runtime/reconcile.ts — Thread entry reconciliation.
 *
 * Why: Compares the previous and a fresh entry snapshot and decides the
 * smallest update the presenter has to apply. Identity is the entry id;
 * content equality is the message fingerprint.
 *
 * Reconciliation rules:
 *   - Duplicate ids within a snapshot are fatal errors
 *   - Any id added or removed makes the update structural (full re-apply)
 *   - Same id set: only entries whose fingerprint changed are refreshed,
 *     in the previous ordering; a pure reorder is not an update
 *   - The typing indicator is matched by its sentinel id and never refreshed
 */

import { type ChatLayoutResult, fatal, ok } from "../errors.js";
import {
  type Entry,
  type EntrySnapshot,
  type MessageEntry,
  entryFingerprint,
  messageEntry,
} from "../model/entry.js";

/** An entry id with its index in the snapshot it was taken from. */
export type IndexedId = Readonly<{ id: string; index: number }>;

export type StructuralPlan = Readonly<{
  kind: "structural";
  entries: EntrySnapshot;
  /** Ids new in `entries`, with their index there. */
  inserted: readonly IndexedId[];
  /** Ids gone from the previous snapshot, with their index there. */
  removed: readonly IndexedId[];
  /** Kept ids whose relative order changed, in their new order. */
  moved: readonly string[];
}>;

export type RefreshPlan = Readonly<{
  kind: "refresh";
  /** Previous ordering carrying the new message values. */
  entries: EntrySnapshot;
  refreshed: readonly IndexedId[];
}>;

export type NonePlan = Readonly<{ kind: "none" }>;

export type UpdatePlan = StructuralPlan | RefreshPlan | NonePlan;

export type ReconcileResult = ChatLayoutResult<UpdatePlan>;

const NONE_PLAN: NonePlan = Object.freeze({ kind: "none" });
const EMPTY_IDS: readonly string[] = Object.freeze([]);

function duplicateIdDetail(label: string, id: string, aIndex: number, bIndex: number): string {
  return `duplicate entry id "${id}" in ${label} snapshot (indices ${String(aIndex)} and ${String(bIndex)})`;
}

function indexIds(snapshot: EntrySnapshot, label: string): ChatLayoutResult<Map<string, number>> {
  const byId = new Map<string, number>();
  for (let i = 0; i < snapshot.length; i++) {
    const entry = snapshot[i];
    if (!entry) continue;
    const existing = byId.get(entry.id);
    if (existing !== undefined) {
      return fatal("CHATLAYOUT_DUPLICATE_ID", duplicateIdDetail(label, entry.id, existing, i));
    }
    byId.set(entry.id, i);
  }
  return ok(byId);
}

/**
 * Indices (into `seq`) of one longest strictly increasing subsequence.
 * Patience sorting with predecessor links; ties resolve to the earliest tail.
 */
function longestIncreasingRun(seq: readonly number[]): Set<number> {
  const tails: number[] = [];
  const prev = new Array<number>(seq.length).fill(-1);
  for (let i = 0; i < seq.length; i++) {
    const v = seq[i] ?? 0;
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if ((seq[tails[mid] ?? 0] ?? 0) < v) lo = mid + 1;
      else hi = mid;
    }
    if (lo > 0) prev[i] = tails[lo - 1] ?? -1;
    tails[lo] = i;
  }
  const keep = new Set<number>();
  let cursor = tails.length > 0 ? (tails[tails.length - 1] ?? -1) : -1;
  while (cursor >= 0) {
    keep.add(cursor);
    cursor = prev[cursor] ?? -1;
  }
  return keep;
}

function movedIds(next: EntrySnapshot, prevById: ReadonlyMap<string, number>): readonly string[] {
  const keptIds: string[] = [];
  const prevRanks: number[] = [];
  for (const entry of next) {
    const prevIndex = prevById.get(entry.id);
    if (prevIndex === undefined) continue;
    keptIds.push(entry.id);
    prevRanks.push(prevIndex);
  }
  const stable = longestIncreasingRun(prevRanks);
  if (stable.size === keptIds.length) return EMPTY_IDS;
  const moved: string[] = [];
  for (let i = 0; i < keptIds.length; i++) {
    const id = keptIds[i];
    if (id !== undefined && !stable.has(i)) moved.push(id);
  }
  return Object.freeze(moved);
}

function refreshedEntry(prev: Entry, next: Entry): MessageEntry | null {
  if (prev.kind !== "message" || next.kind !== "message") return null;
  if (entryFingerprint(prev) === entryFingerprint(next)) return null;
  return messageEntry(next.message, prev.position);
}

/**
 * Plan the update from `previous` to `next`.
 * Pure: neither snapshot is modified and equal inputs give equal plans.
 */
export function planUpdate(previous: EntrySnapshot, next: EntrySnapshot): ReconcileResult {
  const prevIndexed = indexIds(previous, "previous");
  if (!prevIndexed.ok) return prevIndexed;
  const nextIndexed = indexIds(next, "next");
  if (!nextIndexed.ok) return nextIndexed;
  const prevById = prevIndexed.value;
  const nextById = nextIndexed.value;

  const inserted: IndexedId[] = [];
  for (let i = 0; i < next.length; i++) {
    const entry = next[i];
    if (entry && !prevById.has(entry.id)) inserted.push(Object.freeze({ id: entry.id, index: i }));
  }
  const removed: IndexedId[] = [];
  for (let i = 0; i < previous.length; i++) {
    const entry = previous[i];
    if (entry && !nextById.has(entry.id)) removed.push(Object.freeze({ id: entry.id, index: i }));
  }

  if (inserted.length > 0 || removed.length > 0) {
    return ok(
      Object.freeze({
        kind: "structural",
        entries: next,
        inserted: Object.freeze(inserted),
        removed: Object.freeze(removed),
        moved: movedIds(next, prevById),
      }),
    );
  }

  const refreshed: IndexedId[] = [];
  let entries: Entry[] | null = null;
  for (let i = 0; i < previous.length; i++) {
    const prev = previous[i];
    if (!prev) continue;
    const nextIndex = nextById.get(prev.id);
    const nextEntry = nextIndex === undefined ? undefined : next[nextIndex];
    if (!nextEntry) continue;
    const updated = refreshedEntry(prev, nextEntry);
    if (updated === null) continue;
    entries ??= [...previous];
    entries[i] = updated;
    refreshed.push(Object.freeze({ id: prev.id, index: i }));
  }

  if (entries === null) return ok(NONE_PLAN);
  return ok(
    Object.freeze({
      kind: "refresh",
      entries: Object.freeze(entries),
      refreshed: Object.freeze(refreshed),
    }),
  );
}
