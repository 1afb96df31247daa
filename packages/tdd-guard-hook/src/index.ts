export { appendAudit } from "./audit.js";
export { candidateTestPaths, findMatchingTest, normalizePath } from "./candidates.js";
export { classifyFile, fileExtension, pathSegments } from "./classify.js";
export { defaultConfig, loadConfig, type TddGuardConfig } from "./config.js";
export {
  allow,
  block,
  enforce,
  evaluateWrite,
  testFirstReason,
  type EnforcementContext,
  type EnforcementOutcome,
  type HookDecision,
} from "./enforcer.js";
export { TddGuardError, asMessage, type TddGuardErrorKind } from "./errors.js";
export { resetSession, type ResetStatus } from "./lifecycle.js";
export { defaultLockOptions, withFileLock, type LockOptions } from "./lock.js";
export { exists, isErrnoCode, readJson } from "./jsonFile.js";
export { log } from "./log.js";
export {
  formatDecision,
  handleHookInput,
  parseHookRequest,
  readAllStdin,
  resolveTargetPath,
  resolveWorkingDirectory,
  type HookHandlerDeps,
  type HookRequest,
} from "./protocol.js";
export { defaultRules, type ClassificationRules, type FileRole } from "./rules.js";
export {
  FileSessionStore,
  MemorySessionStore,
  emptySessionState,
  type SessionState,
  type SessionStore,
} from "./sessionStore.js";
