import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import {
  resolveCommands,
  resolveBuildCommand,
  resolveTypecheckCommand,
  detectBuildInvocation,
  hasBuildScript,
  repoDir,
} from '../tracker/commands.js';

let root: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'bit-commands-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

/** Create a repo directory with the given files. */
function makeRepo(repoId: string, files: Record<string, string>): string {
  const dir = repoId === 'root' ? root : join(root, repoId);
  mkdirSync(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    mkdirSync(join(dir, name, '..'), { recursive: true });
    writeFileSync(join(dir, name), content);
  }
  return dir;
}

const WITH_BUILD = JSON.stringify({ name: 'x', scripts: { build: 'tsc' } });

// ---------------------------------------------------------------------------
// Manifest and lockfile probing
// ---------------------------------------------------------------------------

describe('repoDir', () => {
  it('should map root to the project root', () => {
    expect(repoDir('root', '/p')).toBe('/p');
  });

  it('should join other repos onto the project root', () => {
    expect(repoDir('packages/ui', '/p')).toBe('/p/packages/ui');
  });
});

describe('hasBuildScript', () => {
  it('should detect a build script', () => {
    const dir = makeRepo('backend', { 'package.json': WITH_BUILD });
    expect(hasBuildScript(dir)).toBe(true);
  });

  it('should be false without a build script', () => {
    const dir = makeRepo('backend', {
      'package.json': JSON.stringify({ scripts: { test: 'vitest' } }),
    });
    expect(hasBuildScript(dir)).toBe(false);
  });

  it('should be false when "build" only appears outside scripts', () => {
    const dir = makeRepo('backend', {
      'package.json': JSON.stringify({ keywords: ['build'], build: 'x' }),
    });
    expect(hasBuildScript(dir)).toBe(false);
  });

  it('should be false for malformed JSON', () => {
    const dir = makeRepo('backend', { 'package.json': '{ "scripts": ' });
    expect(hasBuildScript(dir)).toBe(false);
  });

  it('should be false without a manifest', () => {
    const dir = makeRepo('backend', {});
    expect(hasBuildScript(dir)).toBe(false);
  });
});

describe('detectBuildInvocation', () => {
  it('should prefer pnpm', () => {
    const dir = makeRepo('web', {
      'pnpm-lock.yaml': '',
      'yarn.lock': '',
      'package-lock.json': '{}',
    });
    expect(detectBuildInvocation(dir)).toBe('pnpm build');
  });

  it('should pick yarn over npm', () => {
    const dir = makeRepo('web', { 'yarn.lock': '', 'package-lock.json': '{}' });
    expect(detectBuildInvocation(dir)).toBe('yarn build');
  });

  it('should pick npm with only package-lock.json', () => {
    const dir = makeRepo('web', { 'package-lock.json': '{}' });
    expect(detectBuildInvocation(dir)).toBe('npm run build');
  });

  it('should fall back to npm without a lockfile', () => {
    const dir = makeRepo('web', {});
    expect(detectBuildInvocation(dir)).toBe('npm run build');
  });
});

// ---------------------------------------------------------------------------
// Build command
// ---------------------------------------------------------------------------

describe('resolveBuildCommand', () => {
  it('should prefix with pnpm when only pnpm-lock.yaml exists', () => {
    const dir = makeRepo('backend', { 'package.json': WITH_BUILD, 'pnpm-lock.yaml': '' });
    expect(resolveBuildCommand('backend', root)).toBe(`cd ${dir} && pnpm build`);
  });

  it('should prefix with yarn when only yarn.lock exists', () => {
    const dir = makeRepo('backend', { 'package.json': WITH_BUILD, 'yarn.lock': '' });
    expect(resolveBuildCommand('backend', root)).toBe(`cd ${dir} && yarn build`);
  });

  it('should default to npm run build without a lockfile', () => {
    const dir = makeRepo('backend', { 'package.json': WITH_BUILD });
    expect(resolveBuildCommand('backend', root)).toBe(`cd ${dir} && npm run build`);
  });

  it('should be absent without a build script', () => {
    makeRepo('backend', { 'package.json': '{}', 'pnpm-lock.yaml': '' });
    expect(resolveBuildCommand('backend', root)).toBeUndefined();
  });

  it('should be absent when the repo directory does not exist', () => {
    expect(resolveBuildCommand('frontend', root)).toBeUndefined();
  });

  it('should resolve against the project root for root', () => {
    makeRepo('root', { 'package.json': WITH_BUILD, 'pnpm-lock.yaml': '' });
    expect(resolveBuildCommand('root', root)).toBe(`cd ${root} && pnpm build`);
  });

  it('should generate the schema for a database repo with schema.prisma', () => {
    const dir = makeRepo('database', {
      'package.json': WITH_BUILD,
      'schema.prisma': 'datasource db {}',
    });
    expect(resolveBuildCommand('database', root)).toBe(
      `cd ${dir} && npx prisma generate`
    );
  });

  it('should find the schema under prisma/', () => {
    const dir = makeRepo('database', { 'prisma/schema.prisma': '' });
    expect(resolveBuildCommand('database', root)).toBe(
      `cd ${dir} && npx prisma generate`
    );
  });

  it('should treat repos containing "prisma" as database repos', () => {
    const dir = makeRepo('packages/prisma-client', { 'schema.prisma': '' });
    expect(resolveBuildCommand('packages/prisma-client', root)).toBe(
      `cd ${dir} && npx prisma generate`
    );
  });

  it('should fall back to the manifest build for a database repo without a schema', () => {
    const dir = makeRepo('database', { 'package.json': WITH_BUILD });
    expect(resolveBuildCommand('database', root)).toBe(`cd ${dir} && npm run build`);
  });

  it('should ignore a schema in a non-database repo', () => {
    makeRepo('backend', { 'schema.prisma': '' });
    expect(resolveBuildCommand('backend', root)).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Typecheck command
// ---------------------------------------------------------------------------

describe('resolveTypecheckCommand', () => {
  it('should be absent without tsconfig.json', () => {
    makeRepo('frontend', { 'tsconfig.app.json': '{}' });
    expect(resolveTypecheckCommand('frontend', root)).toBeUndefined();
  });

  it('should target tsconfig.json with --noEmit', () => {
    const dir = makeRepo('frontend', { 'tsconfig.json': '{}' });
    expect(resolveTypecheckCommand('frontend', root)).toBe(
      `cd ${dir} && npx tsc --noEmit`
    );
  });

  it('should target tsconfig.app.json when both exist', () => {
    const dir = makeRepo('frontend', { 'tsconfig.json': '{}', 'tsconfig.app.json': '{}' });
    expect(resolveTypecheckCommand('frontend', root)).toBe(
      `cd ${dir} && npx tsc --project tsconfig.app.json --noEmit`
    );
  });
});

describe('resolveCommands', () => {
  it('should resolve both commands independently', () => {
    const dir = makeRepo('api', {
      'package.json': WITH_BUILD,
      'package-lock.json': '{}',
      'tsconfig.json': '{}',
    });
    expect(resolveCommands('api', root)).toEqual({
      build: `cd ${dir} && npm run build`,
      typecheck: `cd ${dir} && npx tsc --noEmit`,
    });
  });

  it('should return only the typecheck when the manifest is broken', () => {
    const dir = makeRepo('api', { 'package.json': 'nope', 'tsconfig.json': '{}' });
    expect(resolveCommands('api', root)).toEqual({
      typecheck: `cd ${dir} && npx tsc --noEmit`,
    });
  });

  it('should return an empty object when nothing applies', () => {
    makeRepo('api', {});
    expect(resolveCommands('api', root)).toEqual({});
  });
});
