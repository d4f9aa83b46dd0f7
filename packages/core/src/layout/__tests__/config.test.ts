import { assert, describe, test } from "@chatlayout/testkit";
import { ChatLayoutError } from "../../errors.js";
import {
  DEFAULT_SIZING_CONFIG,
  type SizingConfigOverrides,
  resolveSizingConfig,
} from "../config.js";

function isInvalidConfig(err: unknown): boolean {
  return err instanceof ChatLayoutError && err.code === "CHATLAYOUT_INVALID_CONFIG";
}

/** Overrides as they arrive from an untyped host (e.g. a JSON settings file). */
function parseOverrides(json: string): SizingConfigOverrides {
  return JSON.parse(json);
}

describe("resolveSizingConfig", () => {
  test("returns the shared defaults without overrides", () => {
    assert.equal(resolveSizingConfig(), DEFAULT_SIZING_CONFIG);
  });

  test("defaults mirror each other between incoming and outgoing", () => {
    const { incoming, outgoing } = DEFAULT_SIZING_CONFIG;
    assert.deepEqual(incoming.messagePadding, { top: 0, left: 4, bottom: 0, right: 30 });
    assert.deepEqual(outgoing.messagePadding, { top: 0, left: 30, bottom: 0, right: 4 });
    assert.deepEqual(incoming.avatarSize, { w: 30, h: 30 });
    assert.equal(incoming.avatarPosition.vertical, "cellBottom");
    assert.equal(outgoing.avatarPosition.horizontal, "natural");
  });

  test("merges per-sender overrides over the defaults", () => {
    const config = resolveSizingConfig({
      incoming: { avatarSize: { w: 40, h: 36 } },
      typingIndicatorHeight: 48,
    });
    assert.deepEqual(config.incoming.avatarSize, { w: 40, h: 36 });
    assert.deepEqual(config.outgoing.avatarSize, { w: 30, h: 30 });
    assert.equal(config.typingIndicatorHeight, 48);
    assert.equal(config.contactMinHeight, 65);
    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.incoming));
  });

  test("rejects negative sizes", () => {
    assert.throws(() => resolveSizingConfig({ typingIndicatorHeight: -1 }), isInvalidConfig);
    assert.throws(
      () => resolveSizingConfig({ outgoing: { avatarSize: { w: 30, h: -2 } } }),
      isInvalidConfig,
    );
  });

  test("rejects fonts without a positive advance", () => {
    assert.throws(
      () => resolveSizingConfig({ messageLabelFont: { name: "body", advance: 0, lineHeight: 20 } }),
      isInvalidConfig,
    );
  });

  test("rejects unknown anchors and alignments", () => {
    assert.throws(
      () => resolveSizingConfig(parseOverrides('{"incoming":{"accessoryPosition":"sideways"}}')),
      isInvalidConfig,
    );
    assert.throws(
      () =>
        resolveSizingConfig(
          parseOverrides('{"outgoing":{"avatarPosition":{"vertical":"middle","horizontal":"natural"}}}'),
        ),
      isInvalidConfig,
    );
  });

  test("names the offending field", () => {
    assert.throws(
      () => resolveSizingConfig({ incoming: { messagePadding: { top: 0, left: -1, bottom: 0, right: 0 } } }),
      (err: unknown) =>
        err instanceof ChatLayoutError &&
        err.message === "incoming.messagePadding.left must be a finite number >= 0",
    );
  });
});
