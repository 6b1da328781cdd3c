/**
 * Bulwark Kernel — Type Exports
 *
 * Re-exports all kernel types from a single entry point.
 * No logic lives in this file.
 */

export type { CommandDescriptor } from './capability.js';
export {
  ALL_CAPABILITIES,
  Capability,
  PreviewMode,
  SANDBOX_LEVEL_ORDER,
  SANDBOX_LEVELS,
  SandboxLevel,
  missingCapabilities,
  parseSandboxLevel,
} from './capability.js';

export type { PolicyDecision } from './decision.js';
export {
  ALLOW,
  PolicyOutcome,
  aggregateDecisions,
  deny,
  describeDecision,
  requireApproval,
} from './decision.js';

export type { RiskAssessment } from './risk.js';
export { RISK_LEVEL_ORDER, RiskLevel, maxRisk } from './risk.js';

export type { ApprovalOutcome, ApprovalReason, ApprovalRequest } from './approval.js';
export { APPROVAL_MODES, ApprovalMode, ApprovalStatus, parseApprovalMode } from './approval.js';

export type { Action, ActionChange, ActionState, ActionStateKind } from './action.js';
export {
  contentHash,
  fileCreatedChange,
  fileDeletedChange,
  fileModifiedChange,
  fileMovedChange,
  isReversibleChange,
  opaqueChange,
  statePaths,
} from './action.js';

export type { AuditApprovalStatus, AuditEvent, AuditLogEntry, AuditOutcome } from './audit.js';

export type {
  CommandContext,
  CommandExecutionResult,
  CommandInvocation,
  CommandPlan,
  ExecutionMetadata,
  PreviewAction,
  RollbackStatus,
} from './command.js';
export { PipelineState } from './command.js';
