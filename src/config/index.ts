/**
 * Config Module
 *
 * Re-exports everything from the loader for clean imports:
 *   import { loadConfig, DEFAULT_CONFIG } from './config/index.js';
 */

export {
  loadConfig,
  loadJsoncFile,
  loadEnvConfig,
  getConfigPaths,
  deepMerge,
  isPlainObject,
  resolveRepoNames,
  resolveTrackerConfig,
  DEFAULT_TRACKER,
  DEFAULT_CONFIG,
  DEFAULT_REPO_NAMES,
  PROJECT_ROOT_ENV,
} from './loader.js';

export type { TrackerSettings } from './loader.js';
