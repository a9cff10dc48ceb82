/**
 * Shared Vitest setup for praxis-gate
 *
 * The logger writes through console to stderr; tests that assert on log
 * lines spy on console themselves. Debug logging is process-wide state and
 * is reset after every test.
 */

import { afterEach, vi } from 'vitest';
import { setDebugLogging } from './src/telemetry/logger.js';

afterEach(() => {
  setDebugLogging(false);
  vi.restoreAllMocks();
});
