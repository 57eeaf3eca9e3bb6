/**
 * Centralized Vitest Setup for labelbook
 *
 * Operations log every record they append. Keep stderr quiet unless a test
 * opts back in with setLogLevel().
 */

import { beforeEach } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

beforeEach(() => {
  setLogLevel('silent');
});
