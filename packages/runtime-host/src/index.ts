/**
 * @bulwark/runtime-host
 *
 * Side-effectful adapter implementations, persistence and session wiring.
 * Depends on @bulwark/kernel (interfaces); implements them with Node.js
 * built-ins. No kernel code imports from this package.
 */

// Adapter implementations
export type { NodeShellExecutorOptions } from './adapters/exec.js';
export { DEFAULT_KILL_GRACE_MS, DEFAULT_MAX_OUTPUT_BYTES, NodeShellExecutor } from './adapters/exec.js';
export { FsPathResolver, NodeWorkspaceFilesystem } from './adapters/fs.js';

// Configuration
export type { BulwarkConfig, ConfigFile, ConfigOverrides, Environment } from './config.js';
export {
  CONFIG_FILE,
  DEFAULT_CHECK_COMMANDS,
  DEFAULT_SHELL_TIMEOUT_MS,
  configFileSchema,
  parseBooleanFlag,
  readConfigFile,
  resolveConfig,
  resolveHome,
  resolveWorkspaceRoot,
} from './config.js';

// Risk rules
export { DEFAULT_RISK_RULES_PATH, loadRiskRules } from './policy/risk-rules.js';

// Logging
export { FileAuditSink, readAuditFile } from './logging/audit-file-sink.js';
export type { AuditReadResult, AuditReadStats, AuditSelection } from './logging/audit-reader.js';
export { readAuditLog, selectAuditEntries } from './logging/audit-reader.js';
export { PatternRedactor, REDACTED, compileRedactPatterns } from './logging/redactor.js';
export { decodeUlidTime, ulid } from './logging/ulid.js';

// Session-scoped state
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
export type { ActionHistory, SessionRecord } from './state/action-store.js';
export {
  ACTIONS_LOG,
  FileActionStore,
  SESSION_FILE,
  decodeActionLine,
  encodeActionLine,
  listSessions,
  readActionHistory,
  readSessionRecord,
  sessionDir,
  sessionRecordSchema,
} from './state/action-store.js';

// Sessions
export type { InvokeOptions, Session, SessionOptions } from './session.js';
export { createSession } from './session.js';
