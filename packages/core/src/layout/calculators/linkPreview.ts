/**
 * packages/core/src/layout/calculators/linkPreview.ts — Text with a link preview block.
 *
 * The text container is widened to the full budget. Below the text sits the
 * preview: a square thumbnail beside title, teaser and domain lines measured
 * in the configured link-preview fonts. The block is at least as tall as the
 * thumbnail.
 */

import { type Message, styledText } from "../../model/message.js";
import {
  type ContainerStrategy,
  type MessageGeometry,
  unsupportedKind,
} from "../sizing/messageSizing.js";
import { type Font, type Size, horizontalOf, verticalOf } from "../types.js";
import { messageText, textContainerSize, textLabel } from "./text.js";

/** Host shown on the domain line; the raw url when it does not parse. */
export function linkDomain(url: string): string {
  try {
    const host = new URL(url).host;
    return host.length > 0 ? host : url;
  } catch {
    return url;
  }
}

function lineHeight(g: MessageGeometry, text: string | undefined, font: Font, maxWidth: number): number {
  if (text === undefined || text.length === 0) return 0;
  return g.measurer.measure(styledText(text, font), maxWidth).h;
}

export const linkPreviewStrategy: ContainerStrategy = Object.freeze({
  containerSize: (message: Message, g: MessageGeometry): Size => {
    const kind = message.kind;
    if (kind.type !== "linkPreview") return unsupportedKind(message, "link preview calculator");

    const { config } = g;
    const labelInsets = g.sender.messageLabelInsets;
    const imageSize = config.linkPreviewImageSize;
    const fonts = config.linkPreviewFonts;

    const base = textContainerSize(messageText(message, config), g);
    const width = Math.max(base.w, Math.max(0, g.containerMaxWidth));
    const minHeight = base.h + imageSize;
    const previewMaxWidth = Math.max(
      0,
      width - (imageSize + config.linkPreviewImageMargin + horizontalOf(labelInsets)),
    );

    let height = base.h;
    height += lineHeight(g, kind.link.title, fonts.title, previewMaxWidth);
    height += lineHeight(g, kind.link.teaser, fonts.teaser, previewMaxWidth);
    height += lineHeight(g, linkDomain(kind.link.url), fonts.domain, previewMaxWidth);

    return Object.freeze({ w: width, h: Math.max(minHeight, height) + verticalOf(labelInsets) });
  },
  messageLabel: textLabel,
});
