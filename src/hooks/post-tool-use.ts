/**
 * PostToolUse Hook Logic
 *
 * After every tool call the host sends us the tool name, its input and the
 * session id. For file-mutating tools we work out which repo the file
 * belongs to and record the edit, the repo, and the repo's validation
 * commands in the session cache.
 *
 * handlePostToolUse reports exactly what happened so it can be tested;
 * runPostToolUseHook is the boundary the CLI calls and always lets the
 * host continue.
 */

import { join } from 'path';
import { isPlainObject, resolveTrackerConfig } from '../config/loader.js';
import { classify } from '../tracker/classify.js';
import { resolveCommands } from '../tracker/commands.js';
import { SessionStore, sanitizeSessionId } from '../state/session-store.js';
import { errorMessage, silentLogger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import { UNKNOWN_REPO } from '../shared/types.js';
import type {
  HookInput,
  HookOutput,
  PluginConfig,
  RepoId,
  ResolvedCommands,
  StoreResult,
} from '../shared/types.js';

export type SkipReason =
  | 'disabled'
  | 'non-mutating-tool'
  | 'no-file-path'
  | 'excluded-suffix'
  | 'no-project-root'
  | 'unknown-repo';

export interface TrackedStep {
  step: 'ensure' | 'recordEdit' | 'markAffected' | 'recordCommands';
  result: StoreResult;
}

export type TrackOutcome =
  | { tracked: false; reason: SkipReason }
  | {
      tracked: true;
      sessionId: string;
      repoId: RepoId;
      commands: ResolvedCommands;
      steps: TrackedStep[];
    };

export interface PostToolUseOptions {
  /** Clock in unix seconds */
  now?: () => number;
  logger?: Logger;
}

const unixNow = (): number => Math.floor(Date.now() / 1000);

// ---------------------------------------------------------------------------
// Input parsing
// ---------------------------------------------------------------------------

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse the raw hook payload. Returns null when it isn't a JSON object.
 * Fields of the wrong type are dropped; unknown fields are ignored.
 */
export function parseHookInput(raw: string): HookInput | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isPlainObject(parsed)) return null;

  const toolInput = parsed.tool_input;
  const filePath = isPlainObject(toolInput)
    ? stringField(toolInput, 'file_path')
    : undefined;

  return {
    sessionId: stringField(parsed, 'session_id'),
    toolName: stringField(parsed, 'tool_name'),
    filePath,
    prompt: stringField(parsed, 'prompt'),
  };
}

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

export function hasExcludedSuffix(filePath: string, suffixes: string[]): boolean {
  const lower = filePath.toLowerCase();
  return suffixes.some((s) => lower.endsWith(s.toLowerCase()));
}

/** Absolute session cache root for a project. */
export function getCacheRoot(config: PluginConfig, projectRoot: string): string {
  return join(projectRoot, resolveTrackerConfig(config).cacheDir);
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

/**
 * Filter one event and, if it qualifies, record it.
 *
 * Nothing touches the filesystem until every filter has passed. After that
 * each store step runs regardless of whether the previous one failed.
 */
export function handlePostToolUse(
  input: HookInput,
  config: PluginConfig,
  options: PostToolUseOptions = {}
): TrackOutcome {
  const logger = options.logger ?? silentLogger;
  const skip = (reason: SkipReason): TrackOutcome => {
    logger.log('filter', 'event skipped', { reason, toolName: input.toolName });
    return { tracked: false, reason };
  };

  if (config.features?.buildTracking === false) return skip('disabled');

  const tracker = resolveTrackerConfig(config);
  if (!input.toolName || !tracker.mutatingTools.includes(input.toolName)) {
    return skip('non-mutating-tool');
  }

  const filePath = input.filePath;
  if (!filePath) return skip('no-file-path');

  if (hasExcludedSuffix(filePath, tracker.excludedSuffixes)) {
    return skip('excluded-suffix');
  }

  const projectRoot = config.projectRoot;
  if (!projectRoot) return skip('no-project-root');

  const names = tracker.repoNames;
  const repoId = classify(filePath, projectRoot, names);
  if (repoId === UNKNOWN_REPO) return skip('unknown-repo');

  const sessionId = sanitizeSessionId(input.sessionId);
  const store = new SessionStore(join(projectRoot, tracker.cacheDir));
  const timestamp = (options.now ?? unixNow)();

  logger.log('io', 'tracking edit', { sessionId, filePath, repoId });

  const steps: TrackedStep[] = [];
  steps.push({ step: 'ensure', result: store.ensure(sessionId) });
  steps.push({
    step: 'recordEdit',
    result: store.recordEdit(sessionId, { timestamp, filePath, repoId }),
  });
  steps.push({ step: 'markAffected', result: store.markAffected(sessionId, repoId) });

  const commands = resolveCommands(repoId, projectRoot, names);
  logger.log('resolve', 'commands resolved', { repoId, ...commands });
  steps.push({
    step: 'recordCommands',
    result: store.recordCommands(sessionId, repoId, commands),
  });

  for (const { step, result } of steps) {
    if (!result.success) {
      logger.log('state', 'step failed', { step, path: result.path, error: result.error });
    }
  }

  return { tracked: true, sessionId, repoId, commands, steps };
}

/**
 * Hook boundary: parse, track, and always continue.
 */
export function runPostToolUseHook(
  raw: string,
  config: PluginConfig,
  options: PostToolUseOptions = {}
): HookOutput {
  const logger = options.logger ?? silentLogger;
  try {
    const input = parseHookInput(raw);
    if (!input) {
      logger.log('filter', 'malformed payload');
      return { continue: true };
    }
    handlePostToolUse(input, config, options);
  } catch (err: unknown) {
    // The logger may be what threw, so report on stderr directly
    if (config.debug) {
      console.error(`[build-impact-tracker] tracker failed: ${errorMessage(err)}`);
    }
  }
  return { continue: true };
}
