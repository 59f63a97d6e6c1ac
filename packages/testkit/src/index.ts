export { createManualClock, type ManualClock } from "./clock.js";
export { assert, describe, test } from "./nodeTest.js";
export { createRng, type Rng } from "./rng.js";
export { withTempDir } from "./tempDir.js";
