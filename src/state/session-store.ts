/**
 * Session Store
 *
 * File-based persistence of what a session has touched. Each session gets
 * its own directory under the cache root:
 *
 *   <cacheRoot>/<sessionId>/
 *     edited-files.log     <unixTimestamp>:<filePath>:<repoId>   append-only
 *     affected-repos.txt   <repoId>                               append-only, may repeat
 *     commands.txt         <repoId>:<build|tsc>:<commandLine>     sorted, unique, atomic rewrite
 *     commands.txt.tmp     buffer for commands.txt                 append, then deleted
 *
 * Invocations run as separate processes and may interleave. Appends are a
 * single write each, so lines never tear. affected-repos.txt can gain
 * duplicates; readers deduplicate. commands.txt is only ever replaced by
 * rename, so readers see the old or the new file, never a partial one.
 *
 * All operations are synchronous and return a StoreResult instead of throwing.
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { errorMessage } from '../shared/logger.js';
import type {
  CommandKind,
  EditRecord,
  RepoId,
  ResolvedCommands,
  StoreResult,
  ValidationCommand,
} from '../shared/types.js';

export const EDIT_LOG_FILE = 'edited-files.log';
export const AFFECTED_REPOS_FILE = 'affected-repos.txt';
export const COMMANDS_FILE = 'commands.txt';
export const COMMANDS_BUFFER_FILE = 'commands.txt.tmp';

/** On-disk names of the command kinds. */
const KIND_TAGS: Record<CommandKind, string> = {
  build: 'build',
  typecheck: 'tsc',
};

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

/**
 * Reduce a session id to characters that are safe as a directory name.
 * Empty or dot-only ids become "default".
 */
export function sanitizeSessionId(sessionId: string | undefined): string {
  const cleaned = (sessionId ?? '').replace(/[^A-Za-z0-9._-]/g, '');
  if (cleaned === '' || cleaned === '.' || cleaned === '..') return 'default';
  return cleaned;
}

export function getSessionDir(cacheRoot: string, sessionId: string): string {
  return join(cacheRoot, sanitizeSessionId(sessionId));
}

export function getSessionPath(
  cacheRoot: string,
  sessionId: string,
  fileName: string
): string {
  return join(getSessionDir(cacheRoot, sessionId), fileName);
}

// ---------------------------------------------------------------------------
// Line files
// ---------------------------------------------------------------------------

/** Non-empty lines of a file. Missing file → []. */
function readLines(path: string): string[] {
  if (!existsSync(path)) return [];
  return readFileSync(path, 'utf-8')
    .split('\n')
    .filter((line) => line.length > 0);
}

function appendLines(path: string, lines: string[]): StoreResult {
  try {
    appendFileSync(path, lines.map((l) => `${l}\n`).join(''), 'utf-8');
    return { success: true, path };
  } catch (err: unknown) {
    return { success: false, path, error: errorMessage(err) };
  }
}

/**
 * Replace a file by writing a uniquely named sibling and renaming it over
 * the target.
 */
export function writeFileAtomically(path: string, content: string): void {
  const tempPath = `${path}.${process.pid}-${randomUUID()}.swap`;
  try {
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, path);
  } catch (err) {
    rmSync(tempPath, { force: true });
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

/**
 * Make sure the session directory exists.
 */
export function ensureSession(cacheRoot: string, sessionId: string): StoreResult {
  const dir = getSessionDir(cacheRoot, sessionId);
  try {
    mkdirSync(dir, { recursive: true });
    return { success: true, path: dir };
  } catch (err: unknown) {
    return { success: false, path: dir, error: errorMessage(err) };
  }
}

export function formatEditRecord(record: EditRecord): string {
  return `${record.timestamp}:${record.filePath}:${record.repoId}`;
}

/**
 * Append one edit record to the session's edit log.
 */
export function recordEdit(
  cacheRoot: string,
  sessionId: string,
  record: EditRecord
): StoreResult {
  const path = getSessionPath(cacheRoot, sessionId, EDIT_LOG_FILE);
  return appendLines(path, [formatEditRecord(record)]);
}

/**
 * Add a repo to the affected set unless it is already listed.
 *
 * Read-then-append is not atomic: two concurrent calls can both append
 * the same repo.
 */
export function markAffected(
  cacheRoot: string,
  sessionId: string,
  repoId: RepoId
): StoreResult {
  const path = getSessionPath(cacheRoot, sessionId, AFFECTED_REPOS_FILE);
  try {
    if (readLines(path).includes(repoId)) {
      return { success: true, path };
    }
  } catch (err: unknown) {
    return { success: false, path, error: errorMessage(err) };
  }
  return appendLines(path, [repoId]);
}

export function formatCommand(command: ValidationCommand): string {
  return `${command.repoId}:${KIND_TAGS[command.kind]}:${command.commandLine}`;
}

/** Flatten resolved commands into ValidationCommands, build first. */
export function toValidationCommands(
  repoId: RepoId,
  commands: ResolvedCommands
): ValidationCommand[] {
  const result: ValidationCommand[] = [];
  if (commands.build) {
    result.push({ repoId, kind: 'build', commandLine: commands.build });
  }
  if (commands.typecheck) {
    result.push({ repoId, kind: 'typecheck', commandLine: commands.typecheck });
  }
  return result;
}

/** Deduplicate by exact line and sort by code unit order. */
export function compactLines(lines: string[]): string[] {
  return [...new Set(lines)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Record a repo's commands: append them to the buffer, then fold the
 * buffer into commands.txt and drop the buffer.
 *
 * Nothing is written when there are no commands.
 */
export function recordCommands(
  cacheRoot: string,
  sessionId: string,
  repoId: RepoId,
  commands: ResolvedCommands
): StoreResult {
  const canonicalPath = getSessionPath(cacheRoot, sessionId, COMMANDS_FILE);
  const bufferPath = getSessionPath(cacheRoot, sessionId, COMMANDS_BUFFER_FILE);

  const lines = toValidationCommands(repoId, commands).map(formatCommand);
  if (lines.length === 0) {
    return { success: true, path: canonicalPath };
  }

  const appended = appendLines(bufferPath, lines);
  if (!appended.success) return appended;

  try {
    // This call's own lines are kept even if another invocation already
    // folded in and removed the buffer
    const merged = compactLines([
      ...readLines(canonicalPath),
      ...readLines(bufferPath),
      ...lines,
    ]);
    writeFileAtomically(canonicalPath, merged.map((l) => `${l}\n`).join(''));
    rmSync(bufferPath, { force: true });
    return { success: true, path: canonicalPath };
  } catch (err: unknown) {
    return { success: false, path: canonicalPath, error: errorMessage(err) };
  }
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

/**
 * Parse an edit log line. The timestamp ends at the first colon and the
 * repo starts after the last, so file paths may contain colons.
 */
export function parseEditRecord(line: string): EditRecord | null {
  const first = line.indexOf(':');
  const last = line.lastIndexOf(':');
  if (first <= 0 || last <= first) return null;

  const timestamp = Number(line.slice(0, first));
  const filePath = line.slice(first + 1, last);
  const repoId = line.slice(last + 1);
  if (!Number.isInteger(timestamp) || filePath === '' || repoId === '') {
    return null;
  }
  return { timestamp, filePath, repoId };
}

/** Edit records in log order. Malformed lines are skipped. */
export function readEdits(cacheRoot: string, sessionId: string): EditRecord[] {
  try {
    return readLines(getSessionPath(cacheRoot, sessionId, EDIT_LOG_FILE))
      .map(parseEditRecord)
      .filter((r): r is EditRecord => r !== null);
  } catch {
    return [];
  }
}

/** Affected repos, deduplicated, in first-seen order. */
export function readAffectedRepos(cacheRoot: string, sessionId: string): RepoId[] {
  try {
    const lines = readLines(getSessionPath(cacheRoot, sessionId, AFFECTED_REPOS_FILE));
    return [...new Set(lines.map((l) => l.trim()).filter((l) => l.length > 0))];
  } catch {
    return [];
  }
}

export function parseCommand(line: string): ValidationCommand | null {
  const match = /^([^:]+):(build|tsc):(.+)$/.exec(line);
  if (!match) return null;
  const [, repoId, tag, commandLine] = match;
  return {
    repoId,
    kind: tag === 'tsc' ? 'typecheck' : 'build',
    commandLine,
  };
}

/** Canonical commands as stored. Malformed lines are skipped. */
export function readCommands(cacheRoot: string, sessionId: string): ValidationCommand[] {
  try {
    return readLines(getSessionPath(cacheRoot, sessionId, COMMANDS_FILE))
      .map(parseCommand)
      .filter((c): c is ValidationCommand => c !== null);
  } catch {
    return [];
  }
}

// ---------------------------------------------------------------------------
// SessionStore class (convenience wrapper)
// ---------------------------------------------------------------------------

/**
 * Object-oriented wrapper bound to one cache root.
 *
 * Usage:
 *   const store = new SessionStore(join(projectRoot, '.claude', 'tsc-cache'));
 *   store.ensure(sessionId);
 *   store.recordEdit(sessionId, { timestamp, filePath, repoId });
 *   store.markAffected(sessionId, repoId);
 *   store.recordCommands(sessionId, repoId, resolveCommands(repoId, projectRoot));
 */
export class SessionStore {
  constructor(private readonly cacheRoot: string) {}

  ensure(sessionId: string): StoreResult {
    return ensureSession(this.cacheRoot, sessionId);
  }

  recordEdit(sessionId: string, record: EditRecord): StoreResult {
    return recordEdit(this.cacheRoot, sessionId, record);
  }

  markAffected(sessionId: string, repoId: RepoId): StoreResult {
    return markAffected(this.cacheRoot, sessionId, repoId);
  }

  recordCommands(sessionId: string, repoId: RepoId, commands: ResolvedCommands): StoreResult {
    return recordCommands(this.cacheRoot, sessionId, repoId, commands);
  }

  readEdits(sessionId: string): EditRecord[] {
    return readEdits(this.cacheRoot, sessionId);
  }

  readAffectedRepos(sessionId: string): RepoId[] {
    return readAffectedRepos(this.cacheRoot, sessionId);
  }

  readCommands(sessionId: string): ValidationCommand[] {
    return readCommands(this.cacheRoot, sessionId);
  }

  /** Directory for a session (useful for debugging). */
  dir(sessionId: string): string {
    return getSessionDir(this.cacheRoot, sessionId);
  }
}
