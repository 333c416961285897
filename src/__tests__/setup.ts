/**
 * Test setup and configuration
 */

import { beforeEach, vi } from 'vitest';

beforeEach(() => {
  process.env['NODE_ENV'] = 'test';

  // Operator logs go to stderr; keep test output clean unless asked
  if (!process.env['VERBOSE_TESTS']) {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  }
});
