import type { Font } from "../layout/types.js";
import type { Message, MessageKind, Sender } from "../model/message.js";
import { type MessageListSource, createMessageListSource } from "../source.js";

export const ME: Sender = Object.freeze({ id: "me", displayName: "Me" });
export const THEM: Sender = Object.freeze({ id: "them", displayName: "Them" });

/** One unit per column, one unit per line: sizes read as column/line counts. */
export const UNIT_FONT: Font = Object.freeze({ name: "unit", advance: 1, lineHeight: 1 });

export function message(id: string, kind: MessageKind, sender: Sender = THEM): Message {
  return Object.freeze({ id, sender, kind });
}

export function textMessage(id: string, text: string, sender: Sender = THEM): Message {
  return message(id, { type: "text", text }, sender);
}

export function listSource(messages: readonly Message[]): MessageListSource {
  return createMessageListSource(messages, { currentSenderId: ME.id });
}

/** Collects dev warnings instead of printing them. */
export function captureWarnings(): { warn: (message: string) => void; messages: string[] } {
  const messages: string[] = [];
  return {
    warn: (m: string) => {
      messages.push(m);
    },
    messages,
  };
}
