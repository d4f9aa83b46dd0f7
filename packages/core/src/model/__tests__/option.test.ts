import { assert, describe, test } from "@chatlayout/testkit";
import { none, orDefault, some } from "../option.js";

describe("Option", () => {
  test("orDefault falls back when the value is absent or declined", () => {
    assert.equal(orDefault(undefined, 4), 4);
    assert.equal(orDefault(none, 4), 4);
    assert.equal(orDefault(some(0), 4), 0);
  });

  test("some values are frozen", () => {
    assert.ok(Object.isFrozen(some({ w: 1 })));
    assert.ok(Object.isFrozen(none));
  });
});
