/**
 * Vitest Global Setup
 *
 * Runs before every test file of both workspaces.
 */

import { afterEach } from 'vitest';
import { resetAllRateLimits } from '@/services/rateLimit.service';

// Set before anything reads it: verbose error messages, no production log filtering
process.env.NODE_ENV = 'test';

// Keep test output readable; individual tests spy on console when they assert logs
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}

afterEach(() => {
  resetAllRateLimits();
});
