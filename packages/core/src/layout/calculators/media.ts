/**
 * packages/core/src/layout/calculators/media.ts — Photo, video, location and audio.
 */

import type { Message } from "../../model/message.js";
import {
  type ContainerStrategy,
  type MessageGeometry,
  unsupportedKind,
} from "../sizing/messageSizing.js";
import { type Size, ZERO_SIZE, isZeroSize } from "../types.js";

/**
 * Scale `size` down to `maxWidth`, keeping its aspect ratio. Sizes already
 * within the budget are kept; heights round up to whole units.
 */
export function fitToWidth(size: Size, maxWidth: number): Size {
  if (!(size.w > 0) || !(size.h > 0) || !(maxWidth > 0)) return ZERO_SIZE;
  if (!Number.isFinite(size.w) || !Number.isFinite(size.h)) return ZERO_SIZE;
  if (size.w <= maxWidth) return Object.freeze({ w: size.w, h: Math.ceil(size.h) });
  return Object.freeze({ w: maxWidth, h: Math.ceil((size.h * maxWidth) / size.w) });
}

/** Intrinsic size of a media-like item; a zero photo size falls back to its placeholder. */
export function intrinsicMediaSize(message: Message): Size {
  const kind = message.kind;
  switch (kind.type) {
    case "photo":
    case "video": {
      const { size, placeholderSize } = kind.media;
      return isZeroSize(size) && placeholderSize !== undefined ? placeholderSize : size;
    }
    case "location":
      return kind.location.size;
    case "audio":
      return kind.audio.size;
    default:
      return unsupportedKind(message, "media calculator");
  }
}

export const mediaStrategy: ContainerStrategy = Object.freeze({
  containerSize: (message: Message, g: MessageGeometry): Size =>
    fitToWidth(intrinsicMediaSize(message), g.containerMaxWidth),
});
