/**
 * packages/core/src/layout/calculators/text.ts — Text, attributed text and emoji.
 *
 * The container is the wrapped label plus the sender's label insets. Text is
 * wrapped at the container budget minus the horizontal insets.
 */

import {
  type Message,
  type StyledText,
  styledText,
  styledTextLength,
} from "../../model/message.js";
import type { SizingConfiguration } from "../config.js";
import {
  type ContainerStrategy,
  type MessageGeometry,
  type MessageLabel,
  unsupportedKind,
} from "../sizing/messageSizing.js";
import { type Font, type Size, horizontalOf, isZeroSize, verticalOf } from "../types.js";

/** Styled text carried by a text-bearing message; throws for other kinds. */
export function messageText(message: Message, config: SizingConfiguration): StyledText {
  const kind = message.kind;
  switch (kind.type) {
    case "text":
      return styledText(kind.text, config.messageLabelFont);
    case "emoji":
      return styledText(kind.text, config.emojiFont);
    case "attributedText":
      return kind.text;
    case "linkPreview":
      return kind.link.attributedText ?? styledText(kind.link.text ?? "", config.messageLabelFont);
    default:
      return unsupportedKind(message, "text calculator");
  }
}

/**
 * Font reported for the message label: the first span's font for attributed
 * text with content, the emoji font for emoji, else the configured font.
 */
export function messageLabelFont(message: Message, config: SizingConfiguration): Font {
  const kind = message.kind;
  if (kind.type === "emoji") return config.emojiFont;
  if (kind.type === "attributedText" && styledTextLength(kind.text) > 0) {
    return kind.text[0]?.font ?? config.messageLabelFont;
  }
  return config.messageLabelFont;
}

/** Label size plus insets; zero-length text beside an attachment keeps only the top inset. */
export function textContainerSize(text: StyledText, g: MessageGeometry): Size {
  const labelInsets = g.sender.messageLabelInsets;
  const maxWidth = Math.max(0, g.containerMaxWidth - horizontalOf(labelInsets));
  const label = g.measurer.measure(text, maxWidth);

  const h =
    !isZeroSize(g.attachmentSize) && styledTextLength(text) === 0
      ? labelInsets.top
      : label.h + verticalOf(labelInsets);
  return Object.freeze({ w: label.w + horizontalOf(labelInsets), h });
}

export function textLabel(message: Message, g: MessageGeometry): MessageLabel {
  return Object.freeze({
    font: messageLabelFont(message, g.config),
    insets: g.sender.messageLabelInsets,
  });
}

export const textStrategy: ContainerStrategy = Object.freeze({
  containerSize: (message: Message, g: MessageGeometry): Size => {
    if (message.kind.type === "linkPreview") return unsupportedKind(message, "text calculator");
    return textContainerSize(messageText(message, g.config), g);
  },
  messageLabel: textLabel,
});
