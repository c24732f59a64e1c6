/**
 * Default configuration values.
 * All values are overridable via flags, env, or config file.
 */

import type { ProbeTarget } from '../schema/index.js';

export const TASKRUN_VERSION = '0.1.0';

export const PROBE_TARGET: ProbeTarget = {
  host: 'localhost',
  port: 4221,
  path: '/',
};

export const TIMEOUTS = {
  PROBE_TIMEOUT: 5_000,
} as const;

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  CONFIG: 2,
} as const;
