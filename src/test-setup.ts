/**
 * Test setup - runs before each test file.
 * Silences logging unless TEST_VERBOSE=1.
 */

import { logger } from "./core/logging/logger";

if (process.env.TEST_VERBOSE !== "1") {
  process.env.LOG_LEVEL = "silent";
  logger.level = "silent";
}
