/**
 * Shared types for build-impact-tracker
 *
 * These types define the hook contract with the agent host.
 * The host sends a JSON payload via stdin, we respond with HookOutput via stdout.
 */

// ---------------------------------------------------------------------------
// Hook Contract Types
// ---------------------------------------------------------------------------

/**
 * Hook input after parsing the raw snake_case payload.
 * Different hook events populate different fields.
 */
export interface HookInput {
  /** Unique session identifier */
  sessionId?: string;
  /** Tool being used (PostToolUse) */
  toolName?: string;
  /** Target file of the tool (PostToolUse, from tool_input.file_path) */
  filePath?: string;
  /** User's prompt text (UserPromptSubmit) */
  prompt?: string;
}

/**
 * Base output for most hooks (written to stdout as JSON).
 * - continue: true  → the host proceeds normally
 * - continue: false → the host blocks the operation
 */
export interface HookOutput {
  /** Whether to continue with the operation */
  continue: boolean;
  /** Optional message to inject into conversation context */
  message?: string;
  /** Reason for blocking (when continue is false) */
  reason?: string;
}

/**
 * UserPromptSubmit hook output — injects context before the model sees the prompt.
 */
export interface UserPromptSubmitOutput {
  continue: boolean;
  hookSpecificOutput?: {
    hookEventName: 'UserPromptSubmit';
    /** Text appended to the conversation context */
    additionalContext: string;
  };
}

// ---------------------------------------------------------------------------
// Tracker Types
// ---------------------------------------------------------------------------

/** Sentinel for files at the project root. */
export const ROOT_REPO = 'root';
/** Sentinel for paths that should not be tracked. */
export const UNKNOWN_REPO = 'unknown';

/**
 * Logical key grouping a project subdirectory, e.g. "backend",
 * "packages/ui" or the sentinels "root" / "unknown".
 */
export type RepoId = string;

/** The three fixed first-segment name lists used by the classifier. */
export interface RepoNameLists {
  frontend: string[];
  backend: string[];
  database: string[];
}

export type CommandKind = 'build' | 'typecheck';

/** Commands resolved for one repo. Either may be absent. */
export interface ResolvedCommands {
  build?: string;
  typecheck?: string;
}

export interface ValidationCommand {
  repoId: RepoId;
  kind: CommandKind;
  commandLine: string;
}

export interface EditRecord {
  /** Unix timestamp in seconds */
  timestamp: number;
  filePath: string;
  repoId: RepoId;
}

/** Outcome of a single session store mutation. */
export interface StoreResult {
  /** Whether the operation succeeded */
  success: boolean;
  /** File or directory the operation targeted */
  path: string;
  /** Error message if it failed */
  error?: string;
}

// ---------------------------------------------------------------------------
// Skill Activation Types
// ---------------------------------------------------------------------------

export type SkillPriority = 'critical' | 'high' | 'medium' | 'low';

/**
 * A skill rule from skill-rules.json.
 * A rule fires when any keyword or intent pattern matches the prompt.
 */
export interface SkillRule {
  type: 'domain' | 'guardrail';
  enforcement: 'suggest' | 'warn' | 'block';
  priority: SkillPriority;
  description?: string;
  promptTriggers?: {
    /** Case-insensitive substrings */
    keywords?: string[];
    /** Case-insensitive regular expressions */
    intentPatterns?: string[];
  };
}

export interface SkillRules {
  version: string;
  skills: Record<string, SkillRule>;
}

/** A rule that matched, with how it matched. */
export interface SkillMatch {
  name: string;
  rule: SkillRule;
  matchType: 'keyword' | 'intent';
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

/**
 * Plugin configuration.
 *
 * Every property is optional. Defaults are defined in config/loader.ts.
 * The config is built by merging: defaults → user config → project config → env vars.
 */
export interface PluginConfig {
  /** Absolute project root. Only read from CLAUDE_PROJECT_DIR; absent disables tracking. */
  projectRoot?: string;

  /** Feature toggles */
  features?: {
    /** Track edits and derive validation commands (default: true) */
    buildTracking?: boolean;
    /** Match prompts against skill-rules.json (default: true) */
    skillActivation?: boolean;
  };

  tracker?: {
    /** Session cache directory, relative to the project root */
    cacheDir?: string;
    /** Tool names that mutate files */
    mutatingTools?: string[];
    /** File suffixes that are never tracked */
    excludedSuffixes?: string[];
    /** First-segment names recognised as repos */
    repoNames?: Partial<RepoNameLists>;
  };

  /** Skill rules file, relative to the project root */
  skillRulesFile?: string;

  /** Keyword overrides per skill name */
  skillKeywords?: Record<string, string[]>;

  /** Write debug events to stderr */
  debug?: boolean;
}
