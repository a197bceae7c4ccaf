/**
 * Command Resolver
 *
 * Looks at a repo's manifest, lockfiles and tsconfig to decide which
 * validation commands should run against it. Build and typecheck are
 * resolved independently; anything missing, unreadable or malformed
 * means that command is absent.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { DEFAULT_REPO_NAMES } from '../config/loader.js';
import { ROOT_REPO } from '../shared/types.js';
import type { RepoId, RepoNameLists, ResolvedCommands } from '../shared/types.js';

/**
 * Lockfile → build invocation, in priority order. The first lockfile
 * found wins.
 */
export const LOCKFILE_INVOCATIONS: ReadonlyArray<{ lockfile: string; build: string }> = [
  { lockfile: 'pnpm-lock.yaml', build: 'pnpm build' },
  { lockfile: 'yarn.lock', build: 'yarn build' },
  { lockfile: 'package-lock.json', build: 'npm run build' },
];

/** Used when no lockfile is present. */
export const FALLBACK_BUILD = 'npm run build';

const SCHEMA_LOCATIONS = ['schema.prisma', join('prisma', 'schema.prisma')];

/** Absolute directory of a repo. "root" is the project root itself. */
export function repoDir(repoId: RepoId, projectRoot: string): string {
  return repoId === ROOT_REPO ? projectRoot : join(projectRoot, repoId);
}

function isDatabaseRepo(repoId: RepoId, names: RepoNameLists): boolean {
  return names.database.includes(repoId) || repoId.includes('prisma');
}

/**
 * Whether package.json in dir declares a build script.
 * False if the manifest is missing, unreadable or not an object.
 */
export function hasBuildScript(dir: string): boolean {
  try {
    const manifestPath = join(dir, 'package.json');
    if (!existsSync(manifestPath)) return false;
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
    if (typeof manifest !== 'object' || manifest === null) return false;
    if (!('scripts' in manifest)) return false;
    const { scripts } = manifest;
    if (typeof scripts !== 'object' || scripts === null) return false;
    return 'build' in scripts && typeof scripts.build === 'string';
  } catch {
    return false;
  }
}

/** Build invocation for dir, chosen by lockfile. */
export function detectBuildInvocation(dir: string): string {
  const found = LOCKFILE_INVOCATIONS.find(({ lockfile }) =>
    existsSync(join(dir, lockfile))
  );
  return found?.build ?? FALLBACK_BUILD;
}

export function resolveBuildCommand(
  repoId: RepoId,
  projectRoot: string,
  names: RepoNameLists = DEFAULT_REPO_NAMES
): string | undefined {
  const dir = repoDir(repoId, projectRoot);

  // Schema generation replaces the manifest build for database repos
  if (
    isDatabaseRepo(repoId, names) &&
    SCHEMA_LOCATIONS.some((p) => existsSync(join(dir, p)))
  ) {
    return `cd ${dir} && npx prisma generate`;
  }

  if (!hasBuildScript(dir)) return undefined;
  return `cd ${dir} && ${detectBuildInvocation(dir)}`;
}

export function resolveTypecheckCommand(
  repoId: RepoId,
  projectRoot: string
): string | undefined {
  const dir = repoDir(repoId, projectRoot);
  if (!existsSync(join(dir, 'tsconfig.json'))) return undefined;

  if (existsSync(join(dir, 'tsconfig.app.json'))) {
    return `cd ${dir} && npx tsc --project tsconfig.app.json --noEmit`;
  }
  return `cd ${dir} && npx tsc --noEmit`;
}

/**
 * Resolve both commands for a repo. Absent commands are left out of the
 * result rather than set to undefined.
 */
export function resolveCommands(
  repoId: RepoId,
  projectRoot: string,
  names: RepoNameLists = DEFAULT_REPO_NAMES
): ResolvedCommands {
  const commands: ResolvedCommands = {};

  const build = resolveBuildCommand(repoId, projectRoot, names);
  if (build) commands.build = build;

  const typecheck = resolveTypecheckCommand(repoId, projectRoot);
  if (typecheck) commands.typecheck = typecheck;

  return commands;
}
