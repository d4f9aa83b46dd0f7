/**
 * packages/core/src/layout/types.ts — Geometry and layout attribute types.
 *
 * All quantities are abstract layout units. Text is shaped in terminal-cell
 * columns and converted to units through font metrics (see textMeasure.ts).
 */

/** Size dimensions (width and height) in layout units. */
export type Size = Readonly<{ w: number; h: number }>;

export type EdgeInsets = Readonly<{ top: number; left: number; bottom: number; right: number }>;

export type HorizontalInsets = Readonly<{ left: number; right: number }>;

export const ZERO_SIZE: Size = Object.freeze({ w: 0, h: 0 });
export const ZERO_INSETS: EdgeInsets = Object.freeze({ top: 0, left: 0, bottom: 0, right: 0 });
export const ZERO_HORIZONTAL_INSETS: HorizontalInsets = Object.freeze({ left: 0, right: 0 });

export function insets(top: number, left: number, bottom: number, right: number): EdgeInsets {
  return Object.freeze({ top, left, bottom, right });
}

export function horizontalOf(i: EdgeInsets | HorizontalInsets): number {
  return i.left + i.right;
}

export function verticalOf(i: EdgeInsets): number {
  return i.top + i.bottom;
}

export function isZeroSize(s: Size): boolean {
  return s.w === 0 && s.h === 0;
}

/**
 * Font metrics used to convert shaped columns into layout units.
 *
 * - `advance`: units per terminal-cell column
 * - `lineHeight`: units per line
 */
export type Font = Readonly<{ name: string; advance: number; lineHeight: number }>;

/** Vertical anchor of the avatar, relative to the message container or the cell. */
export type AvatarVerticalAnchor =
  | "cellTop"
  | "messageLabelTop"
  | "messageTop"
  | "messageCenter"
  | "messageBottom"
  | "cellBottom";

export type AvatarHorizontalAnchor = "cellLeading" | "cellTrailing" | "natural";

export type AvatarPosition = Readonly<{
  vertical: AvatarVerticalAnchor;
  horizontal: AvatarHorizontalAnchor;
}>;

/** Avatar position after sender direction is known: never "natural". */
export type ResolvedAvatarPosition = Readonly<{
  vertical: AvatarVerticalAnchor;
  horizontal: Exclude<AvatarHorizontalAnchor, "natural">;
}>;

export const AVATAR_VERTICAL_ANCHORS: readonly AvatarVerticalAnchor[] = Object.freeze([
  "cellTop",
  "messageLabelTop",
  "messageTop",
  "messageCenter",
  "messageBottom",
  "cellBottom",
]);

export type AccessoryPosition =
  | "messageLabelTop"
  | "messageTop"
  | "messageCenter"
  | "messageBottom"
  | "cellTop"
  | "cellBottom";

export const ACCESSORY_POSITIONS: readonly AccessoryPosition[] = Object.freeze([
  "messageLabelTop",
  "messageTop",
  "messageCenter",
  "messageBottom",
  "cellTop",
  "cellBottom",
]);

export type TextAlignment = "left" | "center" | "right" | "natural" | "justified";

export const TEXT_ALIGNMENTS: readonly TextAlignment[] = Object.freeze([
  "left",
  "center",
  "right",
  "natural",
  "justified",
]);

export type LabelAlignment = Readonly<{ textAlignment: TextAlignment; textInsets: EdgeInsets }>;

export type LinkPreviewFonts = Readonly<{ title: Font; teaser: Font; domain: Font }>;

/**
 * Computed geometry for one entry.
 * Built once per computation and frozen; cached copies are shared.
 */
export type LayoutAttributes = Readonly<{
  avatarSize: Size;
  avatarPosition: ResolvedAvatarPosition;
  avatarLeadingTrailingPadding: number;

  messageContainerSize: Size;
  messageContainerPadding: EdgeInsets;
  messageLabelFont: Font;
  messageLabelInsets: EdgeInsets;

  cellTopLabelSize: Size;
  cellTopLabelAlignment: LabelAlignment;
  cellBottomLabelSize: Size;
  cellBottomLabelAlignment: LabelAlignment;

  messageTopLabelSize: Size;
  messageTopLabelAlignment: LabelAlignment;
  messageBottomLabelSize: Size;
  messageBottomLabelAlignment: LabelAlignment;

  messageTimeLabelSize: Size;

  accessoryViewSize: Size;
  accessoryViewPadding: HorizontalInsets;
  accessoryViewPosition: AccessoryPosition;

  attachmentSize: Size;
  attachmentPadding: EdgeInsets;

  linkPreviewFonts: LinkPreviewFonts;
}>;
