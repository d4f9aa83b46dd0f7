import { type Rng, assert, describe, test, withSeed } from "@chatlayout/testkit";
import { createLayoutEngine } from "../layout/engine/layoutEngine.js";
import { type LayoutPolicy, defaultLayoutPolicy } from "../layout/policy.js";
import type { LayoutAttributes } from "../layout/types.js";
import { type EntrySnapshot, messageEntry, position, typingIndicatorEntry } from "../model/entry.js";
import { type Message, type MessageKind, styledText } from "../model/message.js";
import { some } from "../model/option.js";
import { planUpdate } from "../runtime/reconcile.js";
import { ME, THEM, UNIT_FONT, listSource } from "./helpers.js";

const WORDS = ["hi", "hello", "ok", "see you", "lunch?", "日本", "👍", "a", "longerwordthanmost", ""];

function randomText(rng: Rng): string {
  const count = rng.int(0, 8);
  const words: string[] = [];
  for (let i = 0; i < count; i++) words.push(rng.pick(WORDS));
  return words.join(rng.bool() ? " " : "\n");
}

function randomKind(rng: Rng): MessageKind {
  switch (rng.int(0, 6)) {
    case 0:
      return { type: "emoji", text: rng.pick(["👍", "🎉🎉", "日本"]) };
    case 1:
      return { type: "photo", media: { size: { w: rng.int(0, 800), h: rng.int(0, 800) } } };
    case 2:
      return { type: "audio", audio: { durationSec: rng.int(1, 90), size: { w: rng.int(0, 300), h: 35 } } };
    case 3:
      return {
        type: "contact",
        contact: { displayName: randomText(rng), phoneNumbers: [], emails: [] },
      };
    case 4:
      return {
        type: "linkPreview",
        link: { text: randomText(rng), url: "https://example.test/p", title: randomText(rng), teaser: randomText(rng) },
      };
    case 5:
      return { type: "attributedText", text: styledText(randomText(rng), UNIT_FONT) };
    default:
      return { type: "text", text: randomText(rng) };
  }
}

function randomMessage(rng: Rng, id: string): Message {
  return { id, sender: rng.bool() ? ME : THEM, kind: randomKind(rng) };
}

function randomPolicy(rng: Rng): LayoutPolicy {
  const accessory = { w: rng.int(0, 40), h: rng.int(0, 120) };
  const avatar = { w: rng.int(0, 60), h: rng.int(0, 120) };
  return {
    ...defaultLayoutPolicy({
      cellTop: rng.int(0, 20),
      cellBottom: rng.int(0, 20),
      messageTop: rng.int(0, 20),
      messageBottom: rng.int(0, 20),
    }),
    avatarSize: () => some(avatar),
    accessorySize: () => some(accessory),
    avatarPosition: () => some({ vertical: "messageCenter", horizontal: "natural" }),
  };
}

function assertNonNegative(value: unknown, path: string): void {
  if (typeof value === "number") {
    assert.ok(Number.isFinite(value) && value >= 0, `${path} = ${String(value)}`);
    return;
  }
  if (value === null || typeof value !== "object") return;
  for (const [key, member] of Object.entries(value)) assertNonNegative(member, `${path}.${key}`);
}

function stackedHeight(a: LayoutAttributes): number {
  return (
    a.cellTopLabelSize.h +
    a.messageTopLabelSize.h +
    a.messageContainerSize.h +
    a.messageContainerPadding.top +
    a.messageContainerPadding.bottom +
    a.messageBottomLabelSize.h +
    a.cellBottomLabelSize.h
  );
}

function snapshotOf(messages: readonly Message[], typing = false): EntrySnapshot {
  const entries = messages.map((m, i) => messageEntry(m, position(i, 0)));
  return typing ? [...entries, typingIndicatorEntry(position(messages.length, 0))] : entries;
}

describe("layout properties", () => {
  test("computations are deterministic and never negative", () => {
    for (let seed = 1; seed <= 120; seed++) {
      withSeed("layout-determinism", seed, (rng) => {
        const policy = randomPolicy(rng);
        const itemWidth = rng.int(0, 400);
        const m = randomMessage(rng, `m${String(seed)}`);
        const entry = messageEntry(m, position(0, 0));
        const a = createLayoutEngine({ source: listSource([]), policy, itemWidth });
        const b = createLayoutEngine({ source: listSource([]), policy, itemWidth });

        const attrs = a.attributesFor(entry);
        assert.deepEqual(b.attributesFor(entry), attrs);
        assert.deepEqual(b.cellSizeFor(entry), a.cellSizeFor(entry));
        a.invalidateAll();
        assert.deepEqual(a.attributesFor(entry), attrs);

        assertNonNegative(attrs, "attributes");
        assertNonNegative(a.cellSizeFor(entry), "cellSize");
      });
    }
  });

  test("a message-centered avatar cell is max(avatar, stacked content), never below the accessory", () => {
    for (let seed = 1; seed <= 120; seed++) {
      withSeed("layout-composition", seed, (rng) => {
        const engine = createLayoutEngine({
          source: listSource([]),
          policy: randomPolicy(rng),
          itemWidth: rng.int(0, 400),
        });
        const entry = messageEntry(randomMessage(rng, "m"), position(0, 0));
        const attrs = engine.attributesFor(entry);
        const { h } = engine.cellSizeFor(entry);

        assert.equal(
          h,
          Math.max(attrs.avatarSize.h, stackedHeight(attrs), attrs.accessoryViewSize.h),
        );
        assert.ok(h >= attrs.accessoryViewSize.h);
      });
    }
  });
});

describe("reconcile properties", () => {
  test("exactly one edited message refreshes exactly that entry", () => {
    for (let seed = 1; seed <= 100; seed++) {
      withSeed("reconcile-minimality", seed, (rng) => {
        const count = rng.int(1, 20);
        const messages: Message[] = [];
        for (let i = 0; i < count; i++) messages.push(randomMessage(rng, `m${String(i)}`));
        const editIndex = rng.int(0, count - 1);
        const edited = messages.map((m, i) =>
          i === editIndex ? { ...m, kind: { type: "text" as const, text: `edited ${String(seed)}` } } : m,
        );
        const typing = rng.bool();

        const result = planUpdate(snapshotOf(messages, typing), snapshotOf(edited, typing));
        if (!result.ok) assert.fail(result.fatal.detail);
        const plan = result.value;
        assert.equal(plan.kind, "refresh");
        if (plan.kind !== "refresh") return;
        assert.deepEqual(plan.refreshed, [{ id: `m${String(editIndex)}`, index: editIndex }]);
      });
    }
  });

  test("adding or removing any single entry is structural", () => {
    for (let seed = 1; seed <= 100; seed++) {
      withSeed("reconcile-structural", seed, (rng) => {
        const count = rng.int(1, 20);
        const messages: Message[] = [];
        for (let i = 0; i < count; i++) messages.push(randomMessage(rng, `m${String(i)}`));
        const typing = rng.bool();
        const before = snapshotOf(messages, typing);

        let after: EntrySnapshot;
        switch (rng.int(0, 2)) {
          case 0:
            after = snapshotOf([...messages, randomMessage(rng, "new")], typing);
            break;
          case 1: {
            const drop = rng.int(0, count - 1);
            after = snapshotOf(
              messages.filter((_, i) => i !== drop),
              typing,
            );
            break;
          }
          default:
            after = snapshotOf(messages, !typing);
            break;
        }

        const result = planUpdate(before, after);
        if (!result.ok) assert.fail(result.fatal.detail);
        assert.equal(result.value.kind, "structural");
      });
    }
  });
});
