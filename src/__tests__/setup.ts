/**
 * Global test setup for vitest
 * Runs before all test files
 */

import { afterEach, beforeAll, vi } from 'vitest';

beforeAll(() => {
  // Suppress console output during tests (CLI output, pino-pretty fallbacks)
  global.console = {
    ...console,
    log: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {}
  };
});

afterEach(() => {
  vi.useRealTimers();
});
