/**
 * packages/core/src/model/entry.ts — Renderable thread entries.
 *
 * Identity for diffing is `id` (the message id, or a fixed sentinel for the
 * typing indicator). Content equality is the stricter fingerprint comparison.
 */

import { contentFingerprint } from "./fingerprint.js";
import type { Message } from "./message.js";

/** Section/item coordinates of one entry in the thread. */
export type Position = Readonly<{ section: number; item: number }>;

export const TYPING_INDICATOR_ID = "__typingIndicator__" as const;

/** Fingerprint shared by every typing indicator entry: its content never changes. */
export const TYPING_INDICATOR_FINGERPRINT = "typing-indicator";

export type MessageEntry = Readonly<{
  kind: "message";
  id: string;
  message: Message;
  position: Position;
}>;

export type TypingIndicatorEntry = Readonly<{
  kind: "typingIndicator";
  id: typeof TYPING_INDICATOR_ID;
  position: Position;
}>;

export type Entry = MessageEntry | TypingIndicatorEntry;

/** Ordered entries produced by one read of the message source. */
export type EntrySnapshot = readonly Entry[];

export function position(section: number, item: number): Position {
  return Object.freeze({ section, item });
}

export function messageEntry(message: Message, at: Position): MessageEntry {
  return Object.freeze({ kind: "message", id: message.id, message, position: at });
}

export function typingIndicatorEntry(at: Position): TypingIndicatorEntry {
  return Object.freeze({ kind: "typingIndicator", id: TYPING_INDICATOR_ID, position: at });
}

export function entryFingerprint(entry: Entry): string {
  return entry.kind === "message" ? contentFingerprint(entry.message) : TYPING_INDICATOR_FINGERPRINT;
}

export function describePosition(at: Position): string {
  return `${String(at.section)}:${String(at.item)}`;
}
