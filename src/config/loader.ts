/**
 * Configuration Loader
 *
 * Loads and merges configuration from multiple sources with a clear precedence:
 *   defaults → user config → project config → env vars
 *
 * Config files use JSONC (JSON with Comments):
 *
 *   // <project>/.claude/build-impact-tracker.jsonc
 *   {
 *     "tracker": {
 *       // Treat "mobile" as a frontend repo
 *       "repoNames": { "frontend": ["frontend", "client", "web", "app", "ui", "mobile"] }
 *     }
 *   }
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import jsonc from 'jsonc-parser';
import type { ParseError } from 'jsonc-parser';
import type { PluginConfig, RepoNameLists } from '../shared/types.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_REPO_NAMES: RepoNameLists = {
  frontend: ['frontend', 'client', 'web', 'app', 'ui'],
  backend: ['backend', 'server', 'api', 'src', 'services'],
  database: ['database', 'prisma', 'migrations'],
};

/** Tracker settings with every field filled in. */
export interface TrackerSettings {
  cacheDir: string;
  mutatingTools: string[];
  excludedSuffixes: string[];
  repoNames: RepoNameLists;
}

export const DEFAULT_TRACKER: TrackerSettings = {
  cacheDir: join('.claude', 'tsc-cache'),
  mutatingTools: ['Edit', 'MultiEdit', 'Write'],
  excludedSuffixes: ['.md', '.markdown'],
  repoNames: DEFAULT_REPO_NAMES,
};

export const DEFAULT_CONFIG: PluginConfig = {
  features: {
    buildTracking: true,
    skillActivation: true,
  },
  tracker: DEFAULT_TRACKER,
  skillRulesFile: join('.claude', 'skills', 'skill-rules.json'),
  debug: false,
};

/** Environment variable naming the absolute project root. */
export const PROJECT_ROOT_ENV = 'CLAUDE_PROJECT_DIR';

// ---------------------------------------------------------------------------
// Config file paths
// ---------------------------------------------------------------------------

/**
 * Get paths for user-level and project-level config files.
 *
 *   User:    ~/.config/build-impact-tracker/config.jsonc
 *   Project: <project>/.claude/build-impact-tracker.jsonc
 *
 * XDG_CONFIG_HOME is respected if set. Without a project root there is
 * no project config.
 */
export function getConfigPaths(
  env: NodeJS.ProcessEnv,
  projectRoot?: string
): {
  user: string;
  project?: string;
} {
  const userConfigDir = env.XDG_CONFIG_HOME ?? join(homedir(), '.config');

  return {
    user: join(userConfigDir, 'build-impact-tracker', 'config.jsonc'),
    project: projectRoot
      ? join(projectRoot, '.claude', 'build-impact-tracker.jsonc')
      : undefined,
  };
}

// ---------------------------------------------------------------------------
// JSONC file loader
// ---------------------------------------------------------------------------

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and parse a JSONC file. Returns null if the file doesn't exist,
 * can't be parsed, or isn't an object.
 *
 * A file may not set projectRoot; that comes from the environment only.
 */
export function loadJsoncFile(path: string): PluginConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const errors: ParseError[] = [];
    const result: unknown = jsonc.parse(content, errors, {
      allowTrailingComma: true,
      allowEmptyContent: true,
    });

    if (errors.length > 0) {
      // A partially valid config still applies
      console.warn(
        `Warning: Parse errors in ${path}:`,
        errors.map((e) => jsonc.printParseErrorCode(e.error)).join(', ')
      );
    }

    if (!isPlainObject(result)) return null;
    const { projectRoot: _ignored, ...rest } = result;
    return rest as PluginConfig;
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

/**
 * Recursively merge source into target. Objects are merged key-by-key,
 * primitives and arrays are replaced wholesale.
 *
 *   deepMerge(
 *     { tracker: { cacheDir: '.claude/tsc-cache', mutatingTools: ['Edit'] } },
 *     { tracker: { mutatingTools: ['Edit', 'Write'] } }
 *   )
 *   // → { tracker: { cacheDir: '.claude/tsc-cache', mutatingTools: ['Edit', 'Write'] } }
 */
export function deepMerge<T extends object>(
  target: T,
  source: Partial<T>
): T {
  const result = { ...target };

  for (const key of Object.keys(source) as (keyof T)[]) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge<Record<string, unknown>>(
        targetValue,
        sourceValue
      ) as T[keyof T];
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[keyof T];
    }
  }

  return result;
}

// ---------------------------------------------------------------------------
// Environment variable overrides
// ---------------------------------------------------------------------------

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

/**
 * Load config overrides from environment variables. Highest precedence.
 *
 *   CLAUDE_PROJECT_DIR        → projectRoot
 *   BUILD_TRACKER_ENABLED     → features.buildTracking
 *   BUILD_TRACKER_SKILLS      → features.skillActivation
 *   BUILD_TRACKER_CACHE_DIR   → tracker.cacheDir
 *   BUILD_TRACKER_DEBUG       → debug
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv): Partial<PluginConfig> {
  const config: Partial<PluginConfig> = {};

  const projectRoot = env[PROJECT_ROOT_ENV];
  if (projectRoot !== undefined && projectRoot.trim().length > 0) {
    config.projectRoot = projectRoot;
  }

  const tracking = parseFlag(env.BUILD_TRACKER_ENABLED);
  if (tracking !== undefined) {
    config.features = { ...config.features, buildTracking: tracking };
  }

  const skills = parseFlag(env.BUILD_TRACKER_SKILLS);
  if (skills !== undefined) {
    config.features = { ...config.features, skillActivation: skills };
  }

  const cacheDir = env.BUILD_TRACKER_CACHE_DIR;
  if (cacheDir !== undefined && cacheDir.length > 0) {
    config.tracker = { cacheDir };
  }

  const debug = parseFlag(env.BUILD_TRACKER_DEBUG);
  if (debug !== undefined) {
    config.debug = debug;
  }

  return config;
}

// ---------------------------------------------------------------------------
// Main loader
// ---------------------------------------------------------------------------

/**
 * Load the fully merged configuration.
 *
 * Merge order (lowest to highest precedence):
 *   1. DEFAULT_CONFIG
 *   2. User config          — ~/.config/build-impact-tracker/config.jsonc
 *   3. Project config       — <project>/.claude/build-impact-tracker.jsonc
 *   4. Environment vars     — CLAUDE_PROJECT_DIR, BUILD_TRACKER_*
 *
 * The project root comes from the environment, so it is resolved before
 * the project config can be located.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PluginConfig {
  let config: PluginConfig = { ...DEFAULT_CONFIG };

  const envConfig = loadEnvConfig(env);
  const paths = getConfigPaths(env, envConfig.projectRoot);

  const userConfig = loadJsoncFile(paths.user);
  if (userConfig) {
    config = deepMerge(config, userConfig);
  }

  if (paths.project) {
    const projectConfig = loadJsoncFile(paths.project);
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  if (Object.keys(envConfig).length > 0) {
    config = deepMerge(config, envConfig);
  }

  return config;
}

/** Repo name lists with defaults filled in for any list the config leaves out. */
export function resolveRepoNames(config: PluginConfig): RepoNameLists {
  return { ...DEFAULT_REPO_NAMES, ...config.tracker?.repoNames };
}

/**
 * Tracker settings with defaults filled in for anything the config leaves
 * out, so a partial config never disables a filter.
 */
export function resolveTrackerConfig(config: PluginConfig): TrackerSettings {
  const tracker = config.tracker ?? {};
  return {
    cacheDir: tracker.cacheDir ?? DEFAULT_TRACKER.cacheDir,
    mutatingTools: tracker.mutatingTools ?? DEFAULT_TRACKER.mutatingTools,
    excludedSuffixes: tracker.excludedSuffixes ?? DEFAULT_TRACKER.excludedSuffixes,
    repoNames: resolveRepoNames(config),
  };
}
