/**
 * packages/core/src/layout/calculators/table.ts — Calculator dispatch by message kind.
 *
 * Kinds share calculators through composition: the same shared message sizing
 * is instantiated once per container strategy. `custom` messages are sized by
 * whatever calculator the layout policy supplies.
 */

import { throwCode } from "../../errors.js";
import type { Position } from "../../model/entry.js";
import { MESSAGE_KIND_TYPES, type Message, type MessageKindType } from "../../model/message.js";
import { createMessageSizing } from "../sizing/messageSizing.js";
import type { SizeCalculator, SizingContext } from "../sizing/types.js";
import { contactStrategy } from "./contact.js";
import { linkPreviewStrategy } from "./linkPreview.js";
import { mediaStrategy } from "./media.js";
import { createSystemSizing } from "./system.js";
import { textStrategy } from "./text.js";
import { type TypingIndicatorSizing, createTypingIndicatorSizing } from "./typingIndicator.js";

export type CalculatorTable = Readonly<{
  calculatorFor: (message: Message, at: Position) => SizeCalculator;
  typingIndicator: TypingIndicatorSizing;
}>;

export function createCalculatorTable(ctx: SizingContext): CalculatorTable {
  const text = createMessageSizing(ctx, textStrategy);
  const media = createMessageSizing(ctx, mediaStrategy);
  const byKind: Readonly<Record<Exclude<MessageKindType, "custom">, SizeCalculator>> = {
    text,
    attributedText: text,
    emoji: text,
    photo: media,
    video: media,
    location: media,
    audio: media,
    contact: createMessageSizing(ctx, contactStrategy),
    linkPreview: createMessageSizing(ctx, linkPreviewStrategy),
    system: createSystemSizing(ctx),
  };
  // Lookup by runtime tag: messages built outside the type system may carry anything.
  const lookup = new Map<string, SizeCalculator>();
  for (const type of MESSAGE_KIND_TYPES) {
    if (type !== "custom") lookup.set(type, byKind[type]);
  }

  return Object.freeze({
    calculatorFor(message: Message, at: Position): SizeCalculator {
      const type: string = message.kind.type;
      if (type === "custom") {
        const custom = ctx.policy.customCalculator?.(message, at);
        if (custom?.some === true) return custom.value;
        throwCode(
          "CHATLAYOUT_UNSUPPORTED_KIND",
          `message ${message.id}: custom kind without a policy customCalculator`,
        );
      }
      const calculator = lookup.get(type);
      if (calculator === undefined) {
        throwCode(
          "CHATLAYOUT_UNSUPPORTED_KIND",
          `message ${message.id}: no calculator for kind "${type}"`,
        );
      }
      return calculator;
    },
    typingIndicator: createTypingIndicatorSizing(ctx),
  });
}
