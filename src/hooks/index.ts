/**
 * Hooks Module
 */

export {
  handlePostToolUse,
  runPostToolUseHook,
  parseHookInput,
  hasExcludedSuffix,
  getCacheRoot,
} from './post-tool-use.js';

export type {
  SkipReason,
  TrackedStep,
  TrackOutcome,
  PostToolUseOptions,
} from './post-tool-use.js';
