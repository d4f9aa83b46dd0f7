/**
 * packages/core/src/layout/sizing/types.ts — Size calculator contract.
 */

import type { Position } from "../../model/entry.js";
import type { Message } from "../../model/message.js";
import type { MessageSource } from "../../source.js";
import type { SizingConfiguration } from "../config.js";
import type { DevWarnings } from "../devWarnings.js";
import type { LayoutPolicy } from "../policy.js";
import type { TextMeasurer } from "../textMeasure.js";
import type { LayoutAttributes, Size } from "../types.js";

/**
 * Computes geometry for messages of the kinds it handles.
 * Both methods are idempotent: equal inputs produce equal outputs.
 */
export interface SizeCalculator {
  computeAttributes(message: Message, at: Position): LayoutAttributes;
  computeCellSize(message: Message, at: Position): Size;
}

/** Collaborators shared by every built-in calculator of one engine. */
export type SizingContext = Readonly<{
  source: MessageSource;
  policy: LayoutPolicy;
  config: SizingConfiguration;
  measurer: TextMeasurer;
  /** Current item width; the engine may change it between passes. */
  itemWidth: () => number;
  warnings: DevWarnings;
}>;
