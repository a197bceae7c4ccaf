/**
 * build-impact-tracker
 *
 * Post-edit hook that records which repos a session touched and which
 * build and typecheck commands should run against them, plus a prompt
 * hook that suggests skills from a rule file.
 */

// Config
export {
  loadConfig,
  loadJsoncFile,
  loadEnvConfig,
  getConfigPaths,
  deepMerge,
  resolveRepoNames,
  resolveTrackerConfig,
  DEFAULT_CONFIG,
  DEFAULT_REPO_NAMES,
} from './config/index.js';

// Tracker
export { classify, resolveCommands, repoDir } from './tracker/index.js';

// State
export {
  SessionStore,
  readEdits,
  readAffectedRepos,
  readCommands,
} from './state/index.js';

// Hooks
export {
  handlePostToolUse,
  runPostToolUseHook,
  parseHookInput,
} from './hooks/index.js';
export type { TrackOutcome, SkipReason } from './hooks/index.js';

// Features
export {
  loadSkillRules,
  matchSkills,
  formatBanner,
  processPrompt,
} from './features/index.js';

// Types
export type {
  PluginConfig,
  HookInput,
  HookOutput,
  UserPromptSubmitOutput,
  RepoId,
  RepoNameLists,
  ResolvedCommands,
  ValidationCommand,
  EditRecord,
  StoreResult,
  SkillRule,
  SkillRules,
  SkillMatch,
} from './shared/types.js';
