/**
 * Tracker Module
 *
 * Path classification and validation command resolution. No session state.
 */

export { classify, relativeSegments, GROUP_MARKERS } from './classify.js';
export {
  resolveCommands,
  resolveBuildCommand,
  resolveTypecheckCommand,
  detectBuildInvocation,
  hasBuildScript,
  repoDir,
  LOCKFILE_INVOCATIONS,
  FALLBACK_BUILD,
} from './commands.js';
