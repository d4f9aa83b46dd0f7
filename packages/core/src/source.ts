/**
 * packages/core/src/source.ts — Message source contract and an array-backed source.
 */

import { ChatLayoutError } from "./errors.js";
import type { Position } from "./model/entry.js";
import type { Message, StyledText } from "./model/message.js";
import { type Option, none } from "./model/option.js";

/**
 * Supplies messages to the engine.
 * Must stay consistent within one reconciliation pass.
 */
export interface MessageSource {
  sectionCount(): number;
  itemCount(section: number): number;
  message(at: Position): Message;
  /** True when the message was sent by the current user. */
  isMine(message: Message): boolean;
  /** Styled text of the timestamp label shown beside the message, if any. */
  timestampLabel?(message: Message, at: Position): Option<StyledText>;
}

/**
 * - "sectionPerMessage": one section per message (item is always 0)
 * - "singleSection": all messages in section 0
 */
export type MessageListLayout = "sectionPerMessage" | "singleSection";

export type MessageListSourceOptions = Readonly<{
  currentSenderId: string;
  layout?: MessageListLayout;
  timestampLabel?: (message: Message, at: Position) => Option<StyledText>;
}>;

export type MessageListSource = MessageSource &
  Readonly<{
    /** Replace the backing list; takes effect on the next reconciliation pass. */
    setMessages(messages: readonly Message[]): void;
    readonly messages: readonly Message[];
  }>;

export function createMessageListSource(
  initial: readonly Message[],
  opts: MessageListSourceOptions,
): MessageListSource {
  const layout: MessageListLayout = opts.layout ?? "sectionPerMessage";
  let messages: readonly Message[] = Object.freeze([...initial]);

  function indexOf(at: Position): number {
    return layout === "sectionPerMessage" ? at.section : at.item;
  }

  return {
    get messages() {
      return messages;
    },
    setMessages(next: readonly Message[]): void {
      messages = Object.freeze([...next]);
    },
    sectionCount(): number {
      if (layout === "sectionPerMessage") return messages.length;
      return messages.length === 0 ? 0 : 1;
    },
    itemCount(section: number): number {
      if (layout === "sectionPerMessage") {
        return section >= 0 && section < messages.length ? 1 : 0;
      }
      return section === 0 ? messages.length : 0;
    },
    message(at: Position): Message {
      const m = messages[indexOf(at)];
      if (m === undefined) {
        throw new ChatLayoutError(
          "CHATLAYOUT_INVALID_POSITION",
          `message source: no message at section=${String(at.section)} item=${String(at.item)}`,
        );
      }
      return m;
    },
    isMine(message: Message): boolean {
      return message.sender.id === opts.currentSenderId;
    },
    timestampLabel(message: Message, at: Position): Option<StyledText> {
      return opts.timestampLabel ? opts.timestampLabel(message, at) : none;
    },
  };
}
