/**
 * Vitest Global Setup
 *
 * Resets the config cache before each test so vi.stubEnv() calls made in
 * a test (or at file level) are picked up by the config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
