#!/usr/bin/env node

/**
 * taskrun CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';

import { EXIT_CODES } from '../config/index.js';
import * as log from '../utils/logger.js';
import { runCli } from './index.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    log.error(message);
    process.exitCode = EXIT_CODES.FAILURE;
  });
