import { assert, describe, test } from "@chatlayout/testkit";
import { ChatLayoutError } from "../../../errors.js";
import { position } from "../../../model/entry.js";
import { DEFAULT_SIZING_CONFIG } from "../../config.js";
import { emptyAttributes } from "../../sizing/messageSizing.js";
import { type CachedLayout, createAttributeCache } from "../attributeCache.js";

const AT = position(0, 0);

function layout(h: number): CachedLayout {
  return { attributes: emptyAttributes(DEFAULT_SIZING_CONFIG), size: { w: 300, h } };
}

describe("createAttributeCache", () => {
  test("hits only when fingerprint, position and width all match", () => {
    const cache = createAttributeCache(4);
    const stored = layout(40);
    cache.store("m1", "fp-a", AT, 300, stored);

    assert.equal(cache.lookup("m1", "fp-a", AT, 300), stored);
    assert.equal(cache.lookup("m1", "fp-b", AT, 300), null);
    assert.equal(cache.lookup("m1", "fp-a", position(1, 0), 300), null);
    assert.equal(cache.lookup("m1", "fp-a", AT, 320), null);
    assert.equal(cache.lookup("m2", "fp-a", AT, 300), null);

    assert.deepEqual(cache.stats(), { hits: 1, misses: 4, evictions: 0, size: 1, capacity: 4 });
  });

  test("evicts the least recently used entry", () => {
    const cache = createAttributeCache(2);
    cache.store("m1", "fp", AT, 300, layout(1));
    cache.store("m2", "fp", AT, 300, layout(2));
    // Touch m1 so m2 becomes the oldest.
    assert.notEqual(cache.lookup("m1", "fp", AT, 300), null);
    cache.store("m3", "fp", AT, 300, layout(3));

    assert.equal(cache.size, 2);
    assert.equal(cache.lookup("m2", "fp", AT, 300), null);
    assert.equal(cache.lookup("m1", "fp", AT, 300)?.size.h, 1);
    assert.equal(cache.lookup("m3", "fp", AT, 300)?.size.h, 3);
    assert.equal(cache.stats().evictions, 1);
  });

  test("re-storing an id replaces its record without evicting", () => {
    const cache = createAttributeCache(2);
    cache.store("m1", "fp-a", AT, 300, layout(1));
    cache.store("m2", "fp", AT, 300, layout(2));
    cache.store("m1", "fp-b", AT, 300, layout(5));
    assert.equal(cache.size, 2);
    assert.equal(cache.stats().evictions, 0);
    assert.equal(cache.lookup("m1", "fp-b", AT, 300)?.size.h, 5);
  });

  test("invalidate drops one id; invalidateAll drops everything", () => {
    const cache = createAttributeCache();
    cache.store("m1", "fp", AT, 300, layout(1));
    cache.store("m2", "fp", AT, 300, layout(2));

    assert.equal(cache.invalidate("m1"), true);
    assert.equal(cache.invalidate("m1"), false);
    assert.equal(cache.size, 1);

    cache.invalidateAll();
    assert.equal(cache.size, 0);
    assert.equal(cache.capacity, 512);
  });

  test("rejects capacities that are not positive integers", () => {
    for (const capacity of [0, -1, 1.5, Number.NaN]) {
      assert.throws(
        () => createAttributeCache(capacity),
        (err: unknown) => err instanceof ChatLayoutError && err.code === "CHATLAYOUT_INVALID_CONFIG",
      );
    }
  });
});
