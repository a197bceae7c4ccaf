#!/usr/bin/env node
/**
 * UserPromptSubmit entry point for skill activation.
 */

import { loadConfig } from '../config/index.js';
import { processPrompt } from '../features/index.js';
import { parseHookInput } from '../hooks/index.js';
import { runHookCli } from './run.js';

runHookCli('skill-activation', (raw) => {
  const input = parseHookInput(raw);
  return input?.prompt ? processPrompt(input.prompt, loadConfig()) : { continue: true };
}).finally(() => {
  process.exitCode = 0;
});
