/**
 * packages/core/src/layout/config.ts — Per-sender sizing configuration.
 *
 * Supplied once at engine construction and read-only during layout. Overrides
 * are merged over the defaults and validated; invalid values are fatal
 * (CHATLAYOUT_INVALID_CONFIG).
 */

import { throwCode } from "../errors.js";
import {
  ACCESSORY_POSITIONS,
  AVATAR_VERTICAL_ANCHORS,
  type AccessoryPosition,
  type AvatarPosition,
  type EdgeInsets,
  type Font,
  type HorizontalInsets,
  type LabelAlignment,
  type LinkPreviewFonts,
  type Size,
  TEXT_ALIGNMENTS,
  ZERO_HORIZONTAL_INSETS,
  ZERO_INSETS,
  ZERO_SIZE,
  insets,
} from "./types.js";

/** Style parameters that differ between incoming and outgoing messages. */
export type SenderSizing = Readonly<{
  avatarSize: Size;
  avatarPosition: AvatarPosition;
  messagePadding: EdgeInsets;
  messageLabelInsets: EdgeInsets;
  cellTopLabelAlignment: LabelAlignment;
  cellBottomLabelAlignment: LabelAlignment;
  messageTopLabelAlignment: LabelAlignment;
  messageBottomLabelAlignment: LabelAlignment;
  accessorySize: Size;
  accessoryPadding: HorizontalInsets;
  accessoryPosition: AccessoryPosition;
  attachmentPadding: EdgeInsets;
  contactLabelInsets: EdgeInsets;
}>;

export type SizingConfiguration = Readonly<{
  incoming: SenderSizing;
  outgoing: SenderSizing;
  /** Fixed padding between the avatar and the cell edge. */
  avatarLeadingTrailingPadding: number;
  messageLabelFont: Font;
  emojiFont: Font;
  contactLabelFont: Font;
  contactMinHeight: number;
  linkPreviewFonts: LinkPreviewFonts;
  linkPreviewImageSize: number;
  linkPreviewImageMargin: number;
  systemMessagePadding: EdgeInsets;
  typingIndicatorHeight: number;
}>;

export type SizingConfigOverrides = Readonly<
  Partial<Omit<SizingConfiguration, "incoming" | "outgoing">> & {
    incoming?: Partial<SenderSizing>;
    outgoing?: Partial<SenderSizing>;
  }
>;

export const DEFAULT_BODY_FONT: Font = Object.freeze({ name: "body", advance: 8, lineHeight: 20 });
export const DEFAULT_EMOJI_FONT: Font = Object.freeze({ name: "emoji", advance: 16, lineHeight: 40 });

function alignment(textAlignment: LabelAlignment["textAlignment"], textInsets: EdgeInsets) {
  return Object.freeze({ textAlignment, textInsets });
}

const CENTERED: LabelAlignment = alignment("center", ZERO_INSETS);
const INCOMING_LABEL: LabelAlignment = alignment("left", insets(0, 42, 0, 0));
const OUTGOING_LABEL: LabelAlignment = alignment("right", insets(0, 0, 0, 42));

const DEFAULT_INCOMING: SenderSizing = Object.freeze({
  avatarSize: Object.freeze({ w: 30, h: 30 }),
  avatarPosition: Object.freeze({ vertical: "cellBottom", horizontal: "natural" }),
  messagePadding: insets(0, 4, 0, 30),
  messageLabelInsets: insets(7, 18, 7, 14),
  cellTopLabelAlignment: CENTERED,
  cellBottomLabelAlignment: INCOMING_LABEL,
  messageTopLabelAlignment: INCOMING_LABEL,
  messageBottomLabelAlignment: INCOMING_LABEL,
  accessorySize: ZERO_SIZE,
  accessoryPadding: ZERO_HORIZONTAL_INSETS,
  accessoryPosition: "messageCenter",
  attachmentPadding: insets(0, 18, 7, 14),
  contactLabelInsets: insets(7, 46, 7, 30),
});

const DEFAULT_OUTGOING: SenderSizing = Object.freeze({
  avatarSize: Object.freeze({ w: 30, h: 30 }),
  avatarPosition: Object.freeze({ vertical: "cellBottom", horizontal: "natural" }),
  messagePadding: insets(0, 30, 0, 4),
  messageLabelInsets: insets(7, 14, 7, 18),
  cellTopLabelAlignment: CENTERED,
  cellBottomLabelAlignment: OUTGOING_LABEL,
  messageTopLabelAlignment: OUTGOING_LABEL,
  messageBottomLabelAlignment: OUTGOING_LABEL,
  accessorySize: ZERO_SIZE,
  accessoryPadding: ZERO_HORIZONTAL_INSETS,
  accessoryPosition: "messageCenter",
  attachmentPadding: insets(0, 14, 7, 18),
  contactLabelInsets: insets(7, 41, 7, 35),
});

export const DEFAULT_SIZING_CONFIG: SizingConfiguration = Object.freeze({
  incoming: DEFAULT_INCOMING,
  outgoing: DEFAULT_OUTGOING,
  avatarLeadingTrailingPadding: 0,
  messageLabelFont: DEFAULT_BODY_FONT,
  emojiFont: DEFAULT_EMOJI_FONT,
  contactLabelFont: DEFAULT_BODY_FONT,
  contactMinHeight: 65,
  linkPreviewFonts: Object.freeze({
    title: Object.freeze({ name: "footnote", advance: 7, lineHeight: 16 }),
    teaser: Object.freeze({ name: "caption2", advance: 6, lineHeight: 13 }),
    domain: Object.freeze({ name: "caption1", advance: 6, lineHeight: 14 }),
  }),
  linkPreviewImageSize: 60,
  linkPreviewImageMargin: 8,
  systemMessagePadding: insets(8, 16, 8, 16),
  typingIndicatorHeight: 62,
});

/* ---------- validation ---------- */

function invalidConfig(detail: string): never {
  throwCode("CHATLAYOUT_INVALID_CONFIG", detail);
}

function requireNonNegative(name: string, v: unknown): number {
  if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
    invalidConfig(`${name} must be a finite number >= 0`);
  }
  return v;
}

function requirePositive(name: string, v: unknown): number {
  if (typeof v !== "number" || !Number.isFinite(v) || v <= 0) {
    invalidConfig(`${name} must be a finite number > 0`);
  }
  return v;
}

function requireOneOf<T extends string>(name: string, v: unknown, allowed: readonly T[]): T {
  for (const candidate of allowed) {
    if (v === candidate) return candidate;
  }
  invalidConfig(`${name} must be one of ${allowed.join(", ")}`);
}

function validateSize(name: string, s: Size): Size {
  return Object.freeze({
    w: requireNonNegative(`${name}.w`, s.w),
    h: requireNonNegative(`${name}.h`, s.h),
  });
}

function validateInsets(name: string, i: EdgeInsets): EdgeInsets {
  return insets(
    requireNonNegative(`${name}.top`, i.top),
    requireNonNegative(`${name}.left`, i.left),
    requireNonNegative(`${name}.bottom`, i.bottom),
    requireNonNegative(`${name}.right`, i.right),
  );
}

function validateHorizontalInsets(name: string, i: HorizontalInsets): HorizontalInsets {
  return Object.freeze({
    left: requireNonNegative(`${name}.left`, i.left),
    right: requireNonNegative(`${name}.right`, i.right),
  });
}

function validateFont(name: string, f: Font): Font {
  if (typeof f.name !== "string") invalidConfig(`${name}.name must be a string`);
  return Object.freeze({
    name: f.name,
    advance: requirePositive(`${name}.advance`, f.advance),
    lineHeight: requireNonNegative(`${name}.lineHeight`, f.lineHeight),
  });
}

function validateAlignment(name: string, a: LabelAlignment): LabelAlignment {
  return Object.freeze({
    textAlignment: requireOneOf(`${name}.textAlignment`, a.textAlignment, TEXT_ALIGNMENTS),
    textInsets: validateInsets(`${name}.textInsets`, a.textInsets),
  });
}

function validateAvatarPosition(name: string, p: AvatarPosition): AvatarPosition {
  return Object.freeze({
    vertical: requireOneOf(`${name}.vertical`, p.vertical, AVATAR_VERTICAL_ANCHORS),
    horizontal: requireOneOf(`${name}.horizontal`, p.horizontal, [
      "cellLeading",
      "cellTrailing",
      "natural",
    ] as const),
  });
}

function resolveSender(
  name: string,
  base: SenderSizing,
  o: Partial<SenderSizing> | undefined,
): SenderSizing {
  const m: SenderSizing = o === undefined ? base : { ...base, ...o };
  return Object.freeze({
    avatarSize: validateSize(`${name}.avatarSize`, m.avatarSize),
    avatarPosition: validateAvatarPosition(`${name}.avatarPosition`, m.avatarPosition),
    messagePadding: validateInsets(`${name}.messagePadding`, m.messagePadding),
    messageLabelInsets: validateInsets(`${name}.messageLabelInsets`, m.messageLabelInsets),
    cellTopLabelAlignment: validateAlignment(`${name}.cellTopLabelAlignment`, m.cellTopLabelAlignment),
    cellBottomLabelAlignment: validateAlignment(
      `${name}.cellBottomLabelAlignment`,
      m.cellBottomLabelAlignment,
    ),
    messageTopLabelAlignment: validateAlignment(
      `${name}.messageTopLabelAlignment`,
      m.messageTopLabelAlignment,
    ),
    messageBottomLabelAlignment: validateAlignment(
      `${name}.messageBottomLabelAlignment`,
      m.messageBottomLabelAlignment,
    ),
    accessorySize: validateSize(`${name}.accessorySize`, m.accessorySize),
    accessoryPadding: validateHorizontalInsets(`${name}.accessoryPadding`, m.accessoryPadding),
    accessoryPosition: requireOneOf(
      `${name}.accessoryPosition`,
      m.accessoryPosition,
      ACCESSORY_POSITIONS,
    ),
    attachmentPadding: validateInsets(`${name}.attachmentPadding`, m.attachmentPadding),
    contactLabelInsets: validateInsets(`${name}.contactLabelInsets`, m.contactLabelInsets),
  });
}

/** Apply defaults to user-provided overrides, validating every value. */
export function resolveSizingConfig(overrides?: SizingConfigOverrides): SizingConfiguration {
  if (!overrides) return DEFAULT_SIZING_CONFIG;
  const d = DEFAULT_SIZING_CONFIG;
  const fonts = overrides.linkPreviewFonts ?? d.linkPreviewFonts;

  return Object.freeze({
    incoming: resolveSender("incoming", d.incoming, overrides.incoming),
    outgoing: resolveSender("outgoing", d.outgoing, overrides.outgoing),
    avatarLeadingTrailingPadding: requireNonNegative(
      "avatarLeadingTrailingPadding",
      overrides.avatarLeadingTrailingPadding ?? d.avatarLeadingTrailingPadding,
    ),
    messageLabelFont: validateFont("messageLabelFont", overrides.messageLabelFont ?? d.messageLabelFont),
    emojiFont: validateFont("emojiFont", overrides.emojiFont ?? d.emojiFont),
    contactLabelFont: validateFont("contactLabelFont", overrides.contactLabelFont ?? d.contactLabelFont),
    contactMinHeight: requireNonNegative(
      "contactMinHeight",
      overrides.contactMinHeight ?? d.contactMinHeight,
    ),
    linkPreviewFonts: Object.freeze({
      title: validateFont("linkPreviewFonts.title", fonts.title),
      teaser: validateFont("linkPreviewFonts.teaser", fonts.teaser),
      domain: validateFont("linkPreviewFonts.domain", fonts.domain),
    }),
    linkPreviewImageSize: requireNonNegative(
      "linkPreviewImageSize",
      overrides.linkPreviewImageSize ?? d.linkPreviewImageSize,
    ),
    linkPreviewImageMargin: requireNonNegative(
      "linkPreviewImageMargin",
      overrides.linkPreviewImageMargin ?? d.linkPreviewImageMargin,
    ),
    systemMessagePadding: validateInsets(
      "systemMessagePadding",
      overrides.systemMessagePadding ?? d.systemMessagePadding,
    ),
    typingIndicatorHeight: requireNonNegative(
      "typingIndicatorHeight",
      overrides.typingIndicatorHeight ?? d.typingIndicatorHeight,
    ),
  });
}
