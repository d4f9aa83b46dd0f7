/**
 * packages/core/src/layout/calculators/contact.ts — Contact cards.
 *
 * The display name is wrapped inside the sender's contact label insets (the
 * left inset leaves room for the initials badge, the right one for the
 * disclosure mark); the card never gets shorter than the configured minimum.
 */

import { type Message, styledText } from "../../model/message.js";
import {
  type ContainerStrategy,
  type MessageGeometry,
  type MessageLabel,
  unsupportedKind,
} from "../sizing/messageSizing.js";
import { type Size, horizontalOf, verticalOf } from "../types.js";

export const contactStrategy: ContainerStrategy = Object.freeze({
  containerSize: (message: Message, g: MessageGeometry): Size => {
    const kind = message.kind;
    if (kind.type !== "contact") return unsupportedKind(message, "contact calculator");

    const labelInsets = g.sender.contactLabelInsets;
    const maxWidth = Math.max(0, g.containerMaxWidth - horizontalOf(labelInsets));
    const label = g.measurer.measure(
      styledText(kind.contact.displayName, g.config.contactLabelFont),
      maxWidth,
    );
    return Object.freeze({
      w: label.w + horizontalOf(labelInsets),
      h: Math.max(g.config.contactMinHeight, label.h + verticalOf(labelInsets)),
    });
  },
  messageLabel: (_message: Message, g: MessageGeometry): MessageLabel =>
    Object.freeze({ font: g.config.contactLabelFont, insets: g.sender.contactLabelInsets }),
});
