/**
 * packages/core/src/app/createThread.ts — Thread controller.
 *
 * Why: Wires the message source, the layout engine and the reconciler. Each
 * update() snapshots the source, plans against the previous snapshot and
 * hands the plan to the presenter inside the engine's exclusive phase.
 *
 * Invariants:
 *   - Re-entrant update() (e.g. from presenter.apply) throws CHATLAYOUT_REENTRANT_CALL
 *   - "none" plans never reach the presenter
 *   - Cache invalidations for removed and refreshed ids are flushed after apply
 *   - The stored snapshot is always the one the presenter last received
 *   - A presenter failure leaves the previous snapshot in place
 */

import { throwCode, unwrapResult } from "../errors.js";
import { createDevWarnings } from "../layout/devWarnings.js";
import {
  type LayoutEngine,
  type LayoutEngineOptions,
  createLayoutEngine,
} from "../layout/engine/layoutEngine.js";
import type { LayoutAttributes, Size } from "../layout/types.js";
import {
  type Entry,
  type EntrySnapshot,
  type Position,
  describePosition,
} from "../model/entry.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import { collectEntries } from "../runtime/entries.js";
import {
  type RefreshPlan,
  type StructuralPlan,
  type UpdatePlan,
  planUpdate,
} from "../runtime/reconcile.js";

/** Receives every plan that changes what is on screen. */
export interface ThreadPresenter {
  apply(plan: StructuralPlan | RefreshPlan): void;
}

export type ThreadOptions = LayoutEngineOptions &
  Readonly<{
    /** Required. */
    presenter?: ThreadPresenter;
    /** Apply every change as structural instead of refreshing selectively. */
    forceFullReload?: boolean;
    typingIndicatorVisible?: boolean;
  }>;

export type Thread = Readonly<{
  entries: EntrySnapshot;
  layout: LayoutEngine;
  isTypingIndicatorVisible: boolean;
  update(): UpdatePlan;
  /** Toggle the indicator and run update() when the visibility changed. */
  setTypingIndicatorVisible(visible: boolean): UpdatePlan;
  attributesAt(at: Position): LayoutAttributes;
  cellSizeAt(at: Position): Size;
}>;

const NONE_PLAN: UpdatePlan = Object.freeze({ kind: "none" });
const EMPTY_MOVED: readonly string[] = Object.freeze([]);

/** Structural plan replacing everything with `next`. */
function fullReload(next: EntrySnapshot): StructuralPlan {
  return Object.freeze({
    kind: "structural",
    entries: next,
    inserted: Object.freeze([]),
    removed: Object.freeze([]),
    moved: EMPTY_MOVED,
  });
}

function sameOrder(a: EntrySnapshot, b: EntrySnapshot): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i]?.id !== b[i]?.id) return false;
  }
  return true;
}

function indexByPosition(entries: EntrySnapshot): Map<string, Entry> {
  const byPosition = new Map<string, Entry>();
  for (const entry of entries) byPosition.set(describePosition(entry.position), entry);
  return byPosition;
}

export function createThread(opts: ThreadOptions): Thread {
  const { presenter, source } = opts;
  if (presenter === undefined) {
    throwCode("CHATLAYOUT_MISSING_COLLABORATOR", "createThread: a presenter is required");
  }
  if (source === undefined) {
    throwCode("CHATLAYOUT_MISSING_COLLABORATOR", "createThread: a message source is required");
  }
  const layout = createLayoutEngine(opts);

  const forceFullReload = opts.forceFullReload === true;
  const warnings = createDevWarnings(opts.devMode === true, opts.warn);
  let typingIndicatorVisible = opts.typingIndicatorVisible === true;
  let updating = false;

  let entries = collectEntries(source, { typingIndicatorVisible });
  let byPosition = indexByPosition(entries);

  function apply(plan: StructuralPlan | RefreshPlan, stale: readonly string[]): void {
    const token = perfMarkStart("apply");
    try {
      layout.runExclusive(() => {
        presenter.apply(plan);
        for (const id of stale) layout.invalidate(id);
      });
    } finally {
      perfMarkEnd("apply", token);
    }
  }

  function update(): UpdatePlan {
    if (updating || layout.inExclusivePhase) {
      throwCode("CHATLAYOUT_REENTRANT_CALL", "update() called while an update is being applied");
    }
    updating = true;
    try {
      const collectToken = perfMarkStart("collect");
      const next = collectEntries(source, { typingIndicatorVisible });
      perfMarkEnd("collect", collectToken);

      const reconcileToken = perfMarkStart("reconcile");
      const planned = unwrapResult(planUpdate(entries, next));
      perfMarkEnd("reconcile", reconcileToken);

      if (planned.kind === "none") {
        if (!sameOrder(entries, next)) {
          warnings.warnOnce(
            "thread",
            "reorder",
            "entries were reordered without content changes; the reorder is not applied.",
          );
        }
        return NONE_PLAN;
      }

      let plan: StructuralPlan | RefreshPlan = planned;
      let stale: readonly string[];
      if (planned.kind === "refresh") {
        stale = planned.refreshed.map((r) => r.id);
        if (forceFullReload) plan = fullReload(next);
      } else {
        stale = planned.removed.map((r) => r.id);
      }

      apply(plan, stale);
      entries = plan.entries;
      byPosition = indexByPosition(entries);
      return plan;
    } finally {
      updating = false;
    }
  }

  function entryAt(at: Position): Entry {
    const entry = byPosition.get(describePosition(at));
    if (entry === undefined) {
      throwCode("CHATLAYOUT_INVALID_POSITION", `thread: no entry at ${describePosition(at)}`);
    }
    return entry;
  }

  return Object.freeze({
    get entries() {
      return entries;
    },
    get layout() {
      return layout;
    },
    get isTypingIndicatorVisible() {
      return typingIndicatorVisible;
    },
    update,
    setTypingIndicatorVisible(visible: boolean): UpdatePlan {
      if (visible === typingIndicatorVisible) return NONE_PLAN;
      if (updating || layout.inExclusivePhase) {
        throwCode(
          "CHATLAYOUT_REENTRANT_CALL",
          "setTypingIndicatorVisible() called while an update is being applied",
        );
      }
      typingIndicatorVisible = visible;
      try {
        return update();
      } catch (err) {
        typingIndicatorVisible = !visible;
        throw err;
      }
    },
    attributesAt: (at: Position): LayoutAttributes => layout.attributesFor(entryAt(at)),
    cellSizeAt: (at: Position): Size => layout.cellSizeFor(entryAt(at)),
  });
}
