/**
 * Path Classifier
 *
 * Maps an edited file to the logical repo it belongs to. Pure — no I/O.
 *
 *   <root>/backend/app.ts          → "backend"
 *   <root>/packages/ui/button.tsx  → "packages/ui"
 *   <root>/package.json            → "root"
 *   <root>/docs/guide/intro.ts     → "unknown"
 */

import { DEFAULT_REPO_NAMES } from '../config/loader.js';
import { ROOT_REPO, UNKNOWN_REPO } from '../shared/types.js';
import type { RepoId, RepoNameLists } from '../shared/types.js';

/** First segments that group several repos one level down. */
export const GROUP_MARKERS = ['packages', 'examples'] as const;

function isGroupMarker(segment: string): boolean {
  return GROUP_MARKERS.some((m) => m === segment);
}

/**
 * Path segments of filePath below projectRoot, or null if the file
 * is not inside it.
 */
export function relativeSegments(
  filePath: string,
  projectRoot: string
): string[] | null {
  const root = projectRoot.replace(/\/+$/, '');
  const prefix = `${root}/`;
  if (!filePath.startsWith(prefix)) return null;
  return filePath
    .slice(prefix.length)
    .split('/')
    .filter((s) => s.length > 0);
}

export function classify(
  filePath: string,
  projectRoot: string,
  names: RepoNameLists = DEFAULT_REPO_NAMES
): RepoId {
  const segments = relativeSegments(filePath, projectRoot);
  if (!segments || segments.length === 0) return UNKNOWN_REPO;

  const [first, second] = segments;

  if (
    names.frontend.includes(first) ||
    names.backend.includes(first) ||
    names.database.includes(first)
  ) {
    return first;
  }

  if (isGroupMarker(first)) {
    return second !== undefined ? `${first}/${second}` : first;
  }

  if (segments.length === 1) return ROOT_REPO;

  return UNKNOWN_REPO;
}
