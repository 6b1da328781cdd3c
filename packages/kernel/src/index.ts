/**
 * @bulwark/kernel
 *
 * Bulwark enforcement core: capability model, sandbox policy engine, risk
 * classifier, approval manager, command registry, execution pipeline,
 * action log, audit logger and adapter interfaces.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API. node:crypto is
 * used for hashing and identifiers; node:path for component-wise path
 * comparison.
 *
 * Concrete adapter implementations and persistence live in
 * @bulwark/runtime-host.
 */

// Types
export * from './types/index.js';

// Errors
export type { CommandErrorInfo } from './errors.js';
export { CommandError, ErrorKind, isNodeError, toErrorInfo } from './errors.js';

// Adapter interfaces (no implementations; those live in runtime-host)
export type {
  AtomicWriteOptions,
  KernelAdapters,
  PathResolver,
  ResolvedPath,
  ShellExecutor,
  ShellRunOptions,
  ShellRunResult,
  WorkspaceFilesystem,
} from './adapters/index.js';

// Policy
export type { CapabilityCheckOptions, PathCheckOptions, PathIntent } from './policy/sandbox.js';
export { checkCapability, checkPath, grantedCapabilities, isWithinRoot } from './policy/sandbox.js';
export type { PatternRule, RiskRules } from './policy/risk.js';
export { RiskClassifier, parseRiskRules, riskRulesSchema } from './policy/risk.js';

// Approval
export type { ApprovalManagerOptions, ApprovalPrompter, ApprovalRequestInput } from './approval/manager.js';
export { ApprovalManager, DEFAULT_APPROVAL_TIMEOUT_MS } from './approval/manager.js';

// Registry and pipeline
export type {
  BindResult,
  BoundCommand,
  CommandHandler,
  ExecutionControls,
  PreviewReader,
  RegisteredCommand,
} from './pipeline/registry.js';
export { CommandRegistry, defineCommand, formatZodError } from './pipeline/registry.js';
export type { CommandPipelineOptions } from './pipeline/pipeline.js';
export { CommandPipeline, describeAction } from './pipeline/pipeline.js';
export type { TerminalTransition, TransitionListener } from './pipeline/transition.js';
export {
  DEFAULT_ACTOR,
  OUTPUT_EXCERPT_LIMIT,
  projectToActionLog,
  projectToAudit,
  toAuditEvent,
} from './pipeline/transition.js';
export type { ReleaseLock } from './pipeline/path-lock.js';
export { PathLockManager, pathsOverlap } from './pipeline/path-lock.js';
export { canonicalJson, computeArgsHash } from './pipeline/hash.js';

// Action log
export type {
  ActionLogOptions,
  ActionLogSnapshot,
  ActionStore,
  RedoResult,
  UndoResult,
} from './action-log/action-log.js';
export { ActionLog, DEFAULT_ACTION_LOG_CAPACITY } from './action-log/action-log.js';
export { applyActionState } from './action-log/apply.js';

// Logging
export type { AuditSink, Redactor } from './logging/audit-sink.js';
export { IDENTITY_REDACTOR } from './logging/audit-sink.js';
export type { AuditEventInput, AuditLoggerOptions } from './logging/audit-logger.js';
export { AuditLogger, DEFAULT_AUDIT_QUEUE_CAPACITY } from './logging/audit-logger.js';
export type { Diagnostic, DiagnosticChannel, DiagnosticCode, DiagnosticLevel } from './logging/diagnostics.js';
export { CollectingDiagnostics, diagnostic } from './logging/diagnostics.js';
