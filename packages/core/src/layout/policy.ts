/**
 * packages/core/src/layout/policy.ts — Layout policy collaborator.
 *
 * Every override returns an Option: `none` declines and the calculator falls
 * back to the per-sender configuration. Label heights are mandatory since only
 * the host knows which captions it shows.
 */

import type { Position } from "../model/entry.js";
import type { Message } from "../model/message.js";
import { type Option, none } from "../model/option.js";
import type { SizeCalculator } from "./sizing/types.js";
import type { AccessoryPosition, AvatarPosition, LabelAlignment, Size } from "./types.js";

export interface LayoutPolicy {
  cellTopLabelHeight(message: Message, at: Position): number;
  cellBottomLabelHeight(message: Message, at: Position): number;
  messageTopLabelHeight(message: Message, at: Position): number;
  messageBottomLabelHeight(message: Message, at: Position): number;

  avatarSize?(message: Message, at: Position): Option<Size>;
  avatarPosition?(message: Message, at: Position): Option<AvatarPosition>;
  cellTopLabelAlignment?(message: Message, at: Position): Option<LabelAlignment>;
  cellBottomLabelAlignment?(message: Message, at: Position): Option<LabelAlignment>;
  messageTopLabelAlignment?(message: Message, at: Position): Option<LabelAlignment>;
  messageBottomLabelAlignment?(message: Message, at: Position): Option<LabelAlignment>;
  accessorySize?(message: Message, at: Position): Option<Size>;
  accessoryPosition?(message: Message, at: Position): Option<AccessoryPosition>;
  /** Height of an inline attachment laid out within `maxWidth`. */
  attachmentHeight?(message: Message, at: Position, maxWidth: number): Option<number>;
  /** Calculator for `custom` messages. */
  customCalculator?(message: Message, at: Position): Option<SizeCalculator>;
}

export type LabelHeights = Readonly<{
  cellTop?: number;
  cellBottom?: number;
  messageTop?: number;
  messageBottom?: number;
}>;

/** Fixed label heights; declines every other override. */
export function defaultLayoutPolicy(heights: LabelHeights = {}): LayoutPolicy {
  return {
    cellTopLabelHeight: () => heights.cellTop ?? 0,
    cellBottomLabelHeight: () => heights.cellBottom ?? 0,
    messageTopLabelHeight: () => heights.messageTop ?? 0,
    messageBottomLabelHeight: () => heights.messageBottom ?? 0,
    attachmentHeight: () => none,
  };
}
