export { createRng, type Rng, withSeed } from "./rng.js";
export { assert, describe, test } from "./nodeTest.js";
