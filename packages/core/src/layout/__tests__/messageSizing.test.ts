import { assert, describe, test } from "@chatlayout/testkit";
import { ME, UNIT_FONT, captureWarnings, listSource, textMessage } from "../../__tests__/helpers.js";
import { position } from "../../model/entry.js";
import { styledText } from "../../model/message.js";
import { some } from "../../model/option.js";
import { type MessageSource, createMessageListSource } from "../../source.js";
import { DEFAULT_BODY_FONT, DEFAULT_SIZING_CONFIG } from "../config.js";
import { createDevWarnings } from "../devWarnings.js";
import { type LayoutPolicy, defaultLayoutPolicy } from "../policy.js";
import {
  type CellHeightParts,
  type ContainerStrategy,
  type MessageGeometry,
  cellContentHeight,
  createMessageSizing,
  resolveAvatarPosition,
} from "../sizing/messageSizing.js";
import type { SizingContext } from "../sizing/types.js";
import { createTextMeasurer } from "../textMeasure.js";
import type { Size } from "../types.js";

const AT = position(0, 0);

function context(
  policy: LayoutPolicy,
  itemWidth = 300,
  warn: (message: string) => void = () => {},
  source: MessageSource = listSource([]),
): SizingContext {
  return {
    source,
    policy,
    config: DEFAULT_SIZING_CONFIG,
    measurer: createTextMeasurer(),
    itemWidth: () => itemWidth,
    warnings: createDevWarnings(true, warn),
  };
}

function fixedContainer(size: Size, seen: MessageGeometry[] = []): ContainerStrategy {
  return {
    containerSize: (_message, geometry) => {
      seen.push(geometry);
      return size;
    },
  };
}

const CONTAINER_120x40: Size = { w: 120, h: 40 };

describe("cellContentHeight", () => {
  const parts: CellHeightParts = {
    cellTopLabel: 10,
    messageTopLabel: 5,
    container: 40,
    containerPaddingVertical: 2,
    messageBottomLabel: 6,
    cellBottomLabel: 4,
    avatar: 30,
    accessory: 0,
  };

  test("every anchor sums the same parts when the avatar is small", () => {
    assert.equal(cellContentHeight("messageCenter", parts), 67);
    assert.equal(cellContentHeight("cellTop", parts), 67);
    assert.equal(cellContentHeight("cellBottom", parts), 67);
    assert.equal(cellContentHeight("messageBottom", parts), 67);
    assert.equal(cellContentHeight("messageTop", parts), 67);
    assert.equal(cellContentHeight("messageLabelTop", parts), 67);
  });

  test("a tall avatar stacks with the labels outside its anchor", () => {
    const tall = { ...parts, avatar: 100 };
    assert.equal(cellContentHeight("messageCenter", tall), 100);
    assert.equal(cellContentHeight("cellTop", tall), 100);
    assert.equal(cellContentHeight("cellBottom", tall), 100);
    assert.equal(cellContentHeight("messageBottom", tall), 110);
    assert.equal(cellContentHeight("messageTop", tall), 115);
    assert.equal(cellContentHeight("messageLabelTop", tall), 110);
  });

  test("the accessory height is a lower bound", () => {
    const withAccessory = { ...parts, avatar: 100, accessory: 120 };
    assert.equal(cellContentHeight("messageBottom", withAccessory), 120);
    assert.equal(cellContentHeight("messageTop", withAccessory), 120);
  });
});

describe("resolveAvatarPosition", () => {
  test("natural follows the sender side", () => {
    const natural = { vertical: "messageTop", horizontal: "natural" } as const;
    assert.deepEqual(resolveAvatarPosition(natural, true), {
      vertical: "messageTop",
      horizontal: "cellTrailing",
    });
    assert.deepEqual(resolveAvatarPosition(natural, false), {
      vertical: "messageTop",
      horizontal: "cellLeading",
    });
  });

  test("explicit sides are kept", () => {
    assert.deepEqual(resolveAvatarPosition({ vertical: "cellTop", horizontal: "cellTrailing" }, false), {
      vertical: "cellTop",
      horizontal: "cellTrailing",
    });
  });
});

describe("createMessageSizing", () => {
  test("avatar anchored at the cell bottom with no labels: max(avatar, container)", () => {
    const sizing = createMessageSizing(context(defaultLayoutPolicy()), fixedContainer(CONTAINER_120x40));
    assert.deepEqual(sizing.computeCellSize(textMessage("m1", "x"), AT), { w: 300, h: 40 });
  });

  test("an accessory taller than the content sets the height", () => {
    const policy: LayoutPolicy = {
      ...defaultLayoutPolicy(),
      accessorySize: () => some({ w: 20, h: 60 }),
    };
    const seen: MessageGeometry[] = [];
    const sizing = createMessageSizing(context(policy), fixedContainer(CONTAINER_120x40, seen));
    assert.deepEqual(sizing.computeCellSize(textMessage("m1", "x"), AT), { w: 300, h: 60 });
    assert.equal(seen[0]?.containerMaxWidth, 216);
  });

  test("container budget subtracts avatar, padding and accessory", () => {
    const seen: MessageGeometry[] = [];
    const sizing = createMessageSizing(context(defaultLayoutPolicy()), fixedContainer(CONTAINER_120x40, seen));
    sizing.computeCellSize(textMessage("m1", "x"), AT);
    sizing.computeCellSize(textMessage("m2", "x", ME), AT);
    assert.equal(seen[0]?.containerMaxWidth, 236);
    assert.equal(seen[0]?.mine, false);
    assert.equal(seen[1]?.containerMaxWidth, 236);
    assert.equal(seen[1]?.mine, true);
  });

  test("caption labels span the item width and stack around the container", () => {
    const policy = defaultLayoutPolicy({ cellTop: 10, messageTop: 5, messageBottom: 6, cellBottom: 4 });
    const sizing = createMessageSizing(context(policy), fixedContainer(CONTAINER_120x40));
    const m = textMessage("m1", "x");
    assert.deepEqual(sizing.computeCellSize(m, AT), { w: 300, h: 65 });

    const attrs = sizing.computeAttributes(m, AT);
    assert.deepEqual(attrs.cellTopLabelSize, { w: 300, h: 10 });
    assert.deepEqual(attrs.messageTopLabelSize, { w: 300, h: 5 });
    assert.deepEqual(attrs.messageBottomLabelSize, { w: 300, h: 6 });
    assert.deepEqual(attrs.cellBottomLabelSize, { w: 300, h: 4 });
  });

  test("policy avatar overrides change the anchor formula", () => {
    const policy: LayoutPolicy = {
      ...defaultLayoutPolicy({ cellTop: 10, messageTop: 5, messageBottom: 6, cellBottom: 4 }),
      avatarSize: () => some({ w: 30, h: 100 }),
      avatarPosition: () => some({ vertical: "messageTop", horizontal: "natural" }),
    };
    const sizing = createMessageSizing(context(policy), fixedContainer(CONTAINER_120x40));
    const m = textMessage("m1", "x");
    assert.deepEqual(sizing.computeCellSize(m, AT), { w: 300, h: 115 });
    assert.deepEqual(sizing.computeAttributes(m, AT).avatarPosition, {
      vertical: "messageTop",
      horizontal: "cellLeading",
    });
  });

  test("an attachment widens the container to the budget and adds its padded height", () => {
    const policy: LayoutPolicy = {
      ...defaultLayoutPolicy(),
      attachmentHeight: () => some(50),
    };
    const sizing = createMessageSizing(context(policy), fixedContainer(CONTAINER_120x40));
    const m = textMessage("m1", "x");
    const attrs = sizing.computeAttributes(m, AT);
    assert.deepEqual(attrs.attachmentSize, { w: 204, h: 50 });
    assert.deepEqual(attrs.messageContainerSize, { w: 236, h: 97 });
    assert.deepEqual(sizing.computeCellSize(m, AT), { w: 300, h: 97 });
  });

  test("negative and non-finite policy answers collapse to zero", () => {
    const policy: LayoutPolicy = {
      ...defaultLayoutPolicy({ cellTop: -8 }),
      avatarSize: () => some({ w: Number.NaN, h: -3 }),
    };
    const sizing = createMessageSizing(context(policy), fixedContainer(CONTAINER_120x40));
    const attrs = sizing.computeAttributes(textMessage("m1", "x"), AT);
    assert.deepEqual(attrs.avatarSize, { w: 0, h: 0 });
    assert.deepEqual(attrs.cellTopLabelSize, { w: 300, h: 0 });
  });

  test("a negative container budget warns once per message in dev mode", () => {
    const sink = captureWarnings();
    const seen: MessageGeometry[] = [];
    const sizing = createMessageSizing(
      context(defaultLayoutPolicy(), 50, sink.warn),
      fixedContainer(CONTAINER_120x40, seen),
    );
    const m = textMessage("m1", "x");
    assert.deepEqual(sizing.computeCellSize(m, AT), { w: 50, h: 40 });
    sizing.computeCellSize(m, AT);
    assert.equal(seen[0]?.containerMaxWidth, -14);
    assert.deepEqual(sink.messages, [
      "[chatlayout][layout] message m1: container max width -14 at item width 50; measuring at 0.",
    ]);
  });

  test("attributes carry sender defaults when the policy declines", () => {
    const sizing = createMessageSizing(context(defaultLayoutPolicy()), fixedContainer(CONTAINER_120x40));
    const incoming = sizing.computeAttributes(textMessage("m1", "x"), AT);
    assert.deepEqual(incoming.avatarPosition, { vertical: "cellBottom", horizontal: "cellLeading" });
    assert.equal(incoming.messageContainerPadding, DEFAULT_SIZING_CONFIG.incoming.messagePadding);
    assert.equal(incoming.messageLabelFont, DEFAULT_BODY_FONT);
    assert.deepEqual(incoming.messageLabelInsets, { top: 0, left: 0, bottom: 0, right: 0 });
    assert.equal(incoming.accessoryViewPosition, "messageCenter");
    assert.equal(incoming.messageBottomLabelAlignment.textAlignment, "left");
    assert.deepEqual(incoming.messageTimeLabelSize, { w: 0, h: 0 });

    const outgoing = sizing.computeAttributes(textMessage("m2", "x", ME), AT);
    assert.deepEqual(outgoing.avatarPosition, { vertical: "cellBottom", horizontal: "cellTrailing" });
    assert.equal(outgoing.messageBottomLabelAlignment.textAlignment, "right");
  });

  test("the time label is measured unconstrained from the source", () => {
    const source = createMessageListSource([], {
      currentSenderId: ME.id,
      timestampLabel: () => some(styledText("09:41", UNIT_FONT)),
    });
    const sizing = createMessageSizing(
      context(defaultLayoutPolicy(), 300, () => {}, source),
      fixedContainer(CONTAINER_120x40),
    );
    assert.deepEqual(sizing.computeAttributes(textMessage("m1", "x"), AT).messageTimeLabelSize, {
      w: 5,
      h: 1,
    });
  });
});
