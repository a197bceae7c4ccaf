export {
  sanitizeSessionId,
  getSessionDir,
  getSessionPath,
  ensureSession,
  recordEdit,
  markAffected,
  recordCommands,
  readEdits,
  readAffectedRepos,
  readCommands,
  formatEditRecord,
  parseEditRecord,
  formatCommand,
  parseCommand,
  toValidationCommands,
  compactLines,
  writeFileAtomically,
  SessionStore,
  EDIT_LOG_FILE,
  AFFECTED_REPOS_FILE,
  COMMANDS_FILE,
  COMMANDS_BUFFER_FILE,
} from './session-store.js';
