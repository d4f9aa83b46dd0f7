/**
 * packages/core/src/layout/sizing/messageSizing.ts — Shared message cell composition.
 *
 * Every bubble-style kind shares the same cell structure: avatar, four caption
 * labels, an optional accessory, an optional attachment, and a message
 * container whose base size comes from a per-kind ContainerStrategy. The
 * strategy is the only part that varies between kinds.
 *
 * Cell height depends on where the avatar is anchored:
 *
 *   messageCenter, cellTop, cellBottom:
 *     max(avatar, cellTop + msgTop + container + padV + msgBottom + cellBottom)
 *   messageBottom:
 *     msgBottom + cellBottom + max(container + padV + cellTop + msgTop, avatar)
 *   messageTop:
 *     cellTop + msgTop + max(container + padV + msgBottom + cellBottom, avatar)
 *   messageLabelTop:
 *     cellTop + max(container + msgBottom + padV + msgTop + cellBottom, avatar)
 *
 * and the accessory height is always a lower bound.
 */

import { throwCode } from "../../errors.js";
import type { Position } from "../../model/entry.js";
import type { Message } from "../../model/message.js";
import { orDefault } from "../../model/option.js";
import type { SenderSizing, SizingConfiguration } from "../config.js";
import { type TextMeasurer, measureUnconstrained } from "../textMeasure.js";
import {
  type AvatarPosition,
  type AvatarVerticalAnchor,
  type EdgeInsets,
  type Font,
  type LabelAlignment,
  type LayoutAttributes,
  type ResolvedAvatarPosition,
  type Size,
  ZERO_HORIZONTAL_INSETS,
  ZERO_INSETS,
  ZERO_SIZE,
  horizontalOf,
  isZeroSize,
  verticalOf,
} from "../types.js";
import type { SizeCalculator, SizingContext } from "./types.js";

/** Per-message values resolved once and handed to the container strategy. */
export type MessageGeometry = Readonly<{
  mine: boolean;
  sender: SenderSizing;
  config: SizingConfiguration;
  measurer: TextMeasurer;
  itemWidth: number;
  avatarSize: Size;
  accessorySize: Size;
  /** Raw width budget; negative when the item is too narrow. */
  containerMaxWidth: number;
  attachmentSize: Size;
}>;

export type MessageLabel = Readonly<{ font: Font; insets: EdgeInsets }>;

/** Kind-specific part of a message calculator. */
export type ContainerStrategy = Readonly<{
  /** Container size before attachments are added. */
  containerSize: (message: Message, geometry: MessageGeometry) => Size;
  /** Label font and insets carried in the attributes; config font and zero insets when absent. */
  messageLabel?: (message: Message, geometry: MessageGeometry) => MessageLabel;
}>;

export type CellHeightParts = Readonly<{
  cellTopLabel: number;
  messageTopLabel: number;
  container: number;
  containerPaddingVertical: number;
  messageBottomLabel: number;
  cellBottomLabel: number;
  avatar: number;
  accessory: number;
}>;

function anchoredHeight(vertical: AvatarVerticalAnchor, p: CellHeightParts): number {
  switch (vertical) {
    case "messageCenter":
    case "cellTop":
    case "cellBottom":
      return Math.max(
        p.avatar,
        p.cellTopLabel +
          p.messageTopLabel +
          p.container +
          p.containerPaddingVertical +
          p.messageBottomLabel +
          p.cellBottomLabel,
      );
    case "messageBottom":
      return (
        p.messageBottomLabel +
        p.cellBottomLabel +
        Math.max(p.container + p.containerPaddingVertical + p.cellTopLabel + p.messageTopLabel, p.avatar)
      );
    case "messageTop":
      return (
        p.cellTopLabel +
        p.messageTopLabel +
        Math.max(
          p.container + p.containerPaddingVertical + p.messageBottomLabel + p.cellBottomLabel,
          p.avatar,
        )
      );
    case "messageLabelTop":
      return (
        p.cellTopLabel +
        Math.max(
          p.container +
            p.messageBottomLabel +
            p.containerPaddingVertical +
            p.messageTopLabel +
            p.cellBottomLabel,
          p.avatar,
        )
      );
  }
}

/** Cell content height for a vertical avatar anchor. */
export function cellContentHeight(vertical: AvatarVerticalAnchor, parts: CellHeightParts): number {
  return Math.max(anchoredHeight(vertical, parts), parts.accessory);
}

/** Replace "natural" with the side the sender's messages sit on. */
export function resolveAvatarPosition(p: AvatarPosition, mine: boolean): ResolvedAvatarPosition {
  const horizontal: ResolvedAvatarPosition["horizontal"] =
    p.horizontal === "natural" ? (mine ? "cellTrailing" : "cellLeading") : p.horizontal;
  return Object.freeze({ vertical: p.vertical, horizontal });
}

/** Negative and non-finite policy answers collapse to zero. */
export function nonNegative(v: number): number {
  return Number.isFinite(v) && v > 0 ? v : 0;
}

function sanitizeSize(s: Size): Size {
  const w = nonNegative(s.w);
  const h = nonNegative(s.h);
  return w === s.w && h === s.h ? s : Object.freeze({ w, h });
}

export function unsupportedKind(message: Message, calculator: string): never {
  throwCode(
    "CHATLAYOUT_UNSUPPORTED_KIND",
    `${calculator}: message ${message.id} has unsupported kind "${message.kind.type}"`,
  );
}

const CENTERED_ALIGNMENT: LabelAlignment = Object.freeze({
  textAlignment: "center",
  textInsets: ZERO_INSETS,
});

/**
 * Attributes with every part zero-sized; base for cells that only carry a
 * container (system messages, typing indicator).
 */
export function emptyAttributes(config: SizingConfiguration): LayoutAttributes {
  return Object.freeze({
    avatarSize: ZERO_SIZE,
    avatarPosition: Object.freeze({ vertical: "cellBottom", horizontal: "cellLeading" }),
    avatarLeadingTrailingPadding: 0,
    messageContainerSize: ZERO_SIZE,
    messageContainerPadding: ZERO_INSETS,
    messageLabelFont: config.messageLabelFont,
    messageLabelInsets: ZERO_INSETS,
    cellTopLabelSize: ZERO_SIZE,
    cellTopLabelAlignment: CENTERED_ALIGNMENT,
    cellBottomLabelSize: ZERO_SIZE,
    cellBottomLabelAlignment: CENTERED_ALIGNMENT,
    messageTopLabelSize: ZERO_SIZE,
    messageTopLabelAlignment: CENTERED_ALIGNMENT,
    messageBottomLabelSize: ZERO_SIZE,
    messageBottomLabelAlignment: CENTERED_ALIGNMENT,
    messageTimeLabelSize: ZERO_SIZE,
    accessoryViewSize: ZERO_SIZE,
    accessoryViewPadding: ZERO_HORIZONTAL_INSETS,
    accessoryViewPosition: "messageCenter",
    attachmentSize: ZERO_SIZE,
    attachmentPadding: ZERO_INSETS,
    linkPreviewFonts: config.linkPreviewFonts,
  });
}

type MeasuredCell = Readonly<{
  geometry: MessageGeometry;
  avatarPosition: ResolvedAvatarPosition;
  container: Size;
  cellTopLabel: Size;
  cellBottomLabel: Size;
  messageTopLabel: Size;
  messageBottomLabel: Size;
}>;

/** Calculator for one family of bubble kinds. */
export function createMessageSizing(ctx: SizingContext, strategy: ContainerStrategy): SizeCalculator {
  const { policy, config, measurer } = ctx;

  function resolveGeometry(message: Message, at: Position): MessageGeometry {
    const mine = ctx.source.isMine(message);
    const sender = mine ? config.outgoing : config.incoming;
    const itemWidth = nonNegative(ctx.itemWidth());
    const avatarSize = sanitizeSize(orDefault(policy.avatarSize?.(message, at), sender.avatarSize));
    const accessorySize = sanitizeSize(
      orDefault(policy.accessorySize?.(message, at), sender.accessorySize),
    );

    const containerMaxWidth =
      itemWidth -
      avatarSize.w -
      horizontalOf(sender.messagePadding) -
      accessorySize.w -
      horizontalOf(sender.accessoryPadding) -
      config.avatarLeadingTrailingPadding;
    if (containerMaxWidth < 0) {
      ctx.warnings.warnOnce(
        "layout",
        `containerWidth:${message.id}`,
        `message ${message.id}: container max width ${String(containerMaxWidth)} at item width ${String(itemWidth)}; measuring at 0.`,
      );
    }

    const attachmentMaxWidth = Math.max(
      0,
      containerMaxWidth - horizontalOf(sender.attachmentPadding),
    );
    const answer = policy.attachmentHeight?.(message, at, attachmentMaxWidth);
    const attachmentSize: Size =
      answer?.some === true
        ? Object.freeze({ w: attachmentMaxWidth, h: nonNegative(answer.value) })
        : ZERO_SIZE;

    return Object.freeze({
      mine,
      sender,
      config,
      measurer,
      itemWidth,
      avatarSize,
      accessorySize,
      containerMaxWidth,
      attachmentSize,
    });
  }

  function labelSize(width: number, height: number): Size {
    return Object.freeze({ w: width, h: nonNegative(height) });
  }

  function measure(message: Message, at: Position): MeasuredCell {
    const geometry = resolveGeometry(message, at);
    const { sender, itemWidth, attachmentSize } = geometry;

    let container = strategy.containerSize(message, geometry);
    if (!isZeroSize(attachmentSize)) {
      container = Object.freeze({
        w: Math.max(0, geometry.containerMaxWidth),
        h: container.h + attachmentSize.h + verticalOf(sender.attachmentPadding),
      });
    }

    return {
      geometry,
      avatarPosition: resolveAvatarPosition(
        orDefault(policy.avatarPosition?.(message, at), sender.avatarPosition),
        geometry.mine,
      ),
      container,
      cellTopLabel: labelSize(itemWidth, policy.cellTopLabelHeight(message, at)),
      cellBottomLabel: labelSize(itemWidth, policy.cellBottomLabelHeight(message, at)),
      messageTopLabel: labelSize(itemWidth, policy.messageTopLabelHeight(message, at)),
      messageBottomLabel: labelSize(itemWidth, policy.messageBottomLabelHeight(message, at)),
    };
  }

  function heightOf(cell: MeasuredCell): number {
    return cellContentHeight(cell.avatarPosition.vertical, {
      cellTopLabel: cell.cellTopLabel.h,
      messageTopLabel: cell.messageTopLabel.h,
      container: cell.container.h,
      containerPaddingVertical: verticalOf(cell.geometry.sender.messagePadding),
      messageBottomLabel: cell.messageBottomLabel.h,
      cellBottomLabel: cell.cellBottomLabel.h,
      avatar: cell.geometry.avatarSize.h,
      accessory: cell.geometry.accessorySize.h,
    });
  }

  function timeLabelSize(message: Message, at: Position): Size {
    const label = ctx.source.timestampLabel?.(message, at);
    if (label === undefined || !label.some) return ZERO_SIZE;
    return measureUnconstrained(measurer, label.value);
  }

  return {
    computeAttributes(message: Message, at: Position): LayoutAttributes {
      const cell = measure(message, at);
      const { geometry } = cell;
      const { sender } = geometry;
      const label = strategy.messageLabel?.(message, geometry);

      return Object.freeze({
        avatarSize: geometry.avatarSize,
        avatarPosition: cell.avatarPosition,
        avatarLeadingTrailingPadding: config.avatarLeadingTrailingPadding,
        messageContainerSize: cell.container,
        messageContainerPadding: sender.messagePadding,
        messageLabelFont: label?.font ?? config.messageLabelFont,
        messageLabelInsets: label?.insets ?? ZERO_INSETS,
        cellTopLabelSize: cell.cellTopLabel,
        cellTopLabelAlignment: orDefault(
          policy.cellTopLabelAlignment?.(message, at),
          sender.cellTopLabelAlignment,
        ),
        cellBottomLabelSize: cell.cellBottomLabel,
        cellBottomLabelAlignment: orDefault(
          policy.cellBottomLabelAlignment?.(message, at),
          sender.cellBottomLabelAlignment,
        ),
        messageTopLabelSize: cell.messageTopLabel,
        messageTopLabelAlignment: orDefault(
          policy.messageTopLabelAlignment?.(message, at),
          sender.messageTopLabelAlignment,
        ),
        messageBottomLabelSize: cell.messageBottomLabel,
        messageBottomLabelAlignment: orDefault(
          policy.messageBottomLabelAlignment?.(message, at),
          sender.messageBottomLabelAlignment,
        ),
        messageTimeLabelSize: timeLabelSize(message, at),
        accessoryViewSize: geometry.accessorySize,
        accessoryViewPadding: sender.accessoryPadding,
        accessoryViewPosition: orDefault(
          policy.accessoryPosition?.(message, at),
          sender.accessoryPosition,
        ),
        attachmentSize: geometry.attachmentSize,
        attachmentPadding: sender.attachmentPadding,
        linkPreviewFonts: config.linkPreviewFonts,
      });
    },

    computeCellSize(message: Message, at: Position): Size {
      const cell = measure(message, at);
      return Object.freeze({ w: cell.geometry.itemWidth, h: heightOf(cell) });
    },
  };
}
