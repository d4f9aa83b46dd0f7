/**
 * packages/core/src/layout/calculators/typingIndicator.ts — Typing indicator cell.
 */

import { emptyAttributes, nonNegative } from "../sizing/messageSizing.js";
import type { SizingContext } from "../sizing/types.js";
import type { LayoutAttributes, Size } from "../types.js";

export type TypingIndicatorSizing = Readonly<{
  computeAttributes: () => LayoutAttributes;
  computeCellSize: () => Size;
}>;

/** Item-wide cell of the configured height; every attribute is zero-sized. */
export function createTypingIndicatorSizing(ctx: SizingContext): TypingIndicatorSizing {
  const attributes = emptyAttributes(ctx.config);
  return Object.freeze({
    computeAttributes: () => attributes,
    computeCellSize: (): Size =>
      Object.freeze({ w: nonNegative(ctx.itemWidth()), h: ctx.config.typingIndicatorHeight }),
  });
}
