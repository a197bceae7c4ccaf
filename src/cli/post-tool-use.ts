#!/usr/bin/env node
/**
 * PostToolUse entry point.
 *
 * Reads one payload from stdin, records the edit, prints {"continue":true}
 * and exits 0 whatever happens.
 */

import { loadConfig } from '../config/index.js';
import { runPostToolUseHook } from '../hooks/index.js';
import { createLogger } from '../shared/logger.js';
import { runHookCli } from './run.js';

runHookCli('build-impact-tracker', (raw) => {
  const config = loadConfig();
  const logger = createLogger(config.debug === true, 'PostToolUse');
  return runPostToolUseHook(raw, config, { logger });
}).finally(() => {
  process.exitCode = 0;
});
