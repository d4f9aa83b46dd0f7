/**
 * packages/core/src/layout/calculators/system.ts — Full-width system notices.
 *
 * System messages have no avatar, labels or accessory: the container spans
 * the item width and the cell is the wrapped text plus the fixed padding.
 */

import type { Position } from "../../model/entry.js";
import type { Message } from "../../model/message.js";
import { emptyAttributes, nonNegative, unsupportedKind } from "../sizing/messageSizing.js";
import type { SizeCalculator, SizingContext } from "../sizing/types.js";
import { type LayoutAttributes, type Size, horizontalOf, verticalOf } from "../types.js";

export function createSystemSizing(ctx: SizingContext): SizeCalculator {
  const padding = ctx.config.systemMessagePadding;
  const base = emptyAttributes(ctx.config);

  function containerSize(message: Message): Size {
    const kind = message.kind;
    if (kind.type !== "system") return unsupportedKind(message, "system calculator");
    const itemWidth = nonNegative(ctx.itemWidth());
    const label = ctx.measurer.measure(kind.text, Math.max(0, itemWidth - horizontalOf(padding)));
    return Object.freeze({ w: itemWidth, h: label.h });
  }

  return {
    computeAttributes(message: Message, _at: Position): LayoutAttributes {
      return Object.freeze({
        ...base,
        messageContainerSize: containerSize(message),
        messageContainerPadding: padding,
      });
    },
    computeCellSize(message: Message, _at: Position): Size {
      const container = containerSize(message);
      return Object.freeze({ w: container.w, h: container.h + verticalOf(padding) });
    },
  };
}
