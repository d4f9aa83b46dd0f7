/**
 * packages/core/src/runtime/entries.ts — Snapshot the message source.
 */

import {
  type Entry,
  type EntrySnapshot,
  messageEntry,
  position,
  typingIndicatorEntry,
} from "../model/entry.js";
import type { MessageSource } from "../source.js";

export type CollectOptions = Readonly<{ typingIndicatorVisible: boolean }>;

/**
 * Walk every section and item of the source in order. A visible typing
 * indicator is appended in its own trailing section.
 */
export function collectEntries(source: MessageSource, opts: CollectOptions): EntrySnapshot {
  const entries: Entry[] = [];
  const sections = source.sectionCount();
  for (let section = 0; section < sections; section++) {
    const items = source.itemCount(section);
    for (let item = 0; item < items; item++) {
      const at = position(section, item);
      entries.push(messageEntry(source.message(at), at));
    }
  }
  if (opts.typingIndicatorVisible) {
    entries.push(typingIndicatorEntry(position(sections, 0)));
  }
  return Object.freeze(entries);
}
