/**
 * packages/core/src/model/message.ts — Message value types.
 *
 * Messages are immutable. An edit is a replacement value with the same `id`;
 * the reconciler tells edits apart from identity changes through
 * contentFingerprint().
 */

import type { Font, Size } from "../layout/types.js";

export type Sender = Readonly<{ id: string; displayName: string }>;

export type TextSpan = Readonly<{ text: string; font: Font }>;

/** Styled (attributed) text: an ordered run of spans. */
export type StyledText = readonly TextSpan[];

export type MediaItem = Readonly<{
  url?: string;
  size: Size;
  placeholderSize?: Size;
}>;

export type LocationItem = Readonly<{ latitude: number; longitude: number; size: Size }>;

export type AudioItem = Readonly<{ url?: string; durationSec: number; size: Size }>;

export type ContactItem = Readonly<{
  displayName: string;
  initials?: string;
  phoneNumbers: readonly string[];
  emails: readonly string[];
}>;

export type LinkItem = Readonly<{
  text?: string;
  attributedText?: StyledText;
  url: string;
  title?: string;
  teaser?: string;
}>;

export type CustomData = Readonly<Record<string, unknown>>;

/** Closed set of message kinds, tagged by `type`. */
export type MessageKind =
  | Readonly<{ type: "text"; text: string }>
  | Readonly<{ type: "attributedText"; text: StyledText }>
  | Readonly<{ type: "emoji"; text: string }>
  | Readonly<{ type: "photo"; media: MediaItem }>
  | Readonly<{ type: "video"; media: MediaItem }>
  | Readonly<{ type: "location"; location: LocationItem }>
  | Readonly<{ type: "audio"; audio: AudioItem }>
  | Readonly<{ type: "contact"; contact: ContactItem }>
  | Readonly<{ type: "linkPreview"; link: LinkItem }>
  | Readonly<{ type: "custom"; data: CustomData }>
  | Readonly<{ type: "system"; text: StyledText }>;

export type MessageKindType = MessageKind["type"];

export const MESSAGE_KIND_TYPES: readonly MessageKindType[] = Object.freeze([
  "text",
  "attributedText",
  "emoji",
  "photo",
  "video",
  "location",
  "audio",
  "contact",
  "linkPreview",
  "custom",
  "system",
]);

export type Message = Readonly<{
  id: string;
  sender: Sender;
  /** Milliseconds since epoch. */
  sentAt?: number;
  kind: MessageKind;
}>;

export function styledText(text: string, font: Font): StyledText {
  return Object.freeze([Object.freeze({ text, font })]);
}

export function styledTextLength(text: StyledText): number {
  let n = 0;
  for (let i = 0; i < text.length; i++) {
    n += text[i]?.text.length ?? 0;
  }
  return n;
}
