/**
 * Bulwark Kernel — Terminal Transitions
 *
 * The pipeline publishes one TerminalTransition per run, at Completed or
 * Failed. The Action Log and the Audit Logger are projections of this one
 * stream: neither is written from anywhere else in the pipeline.
 */

import type { Action } from '../types/action.js';
import type { AuditApprovalStatus } from '../types/audit.js';
import type { Capability } from '../types/capability.js';
import type { CommandExecutionResult, CommandInvocation, PipelineState } from '../types/command.js';
import type { RiskLevel } from '../types/risk.js';
import type { ActionLog } from '../action-log/action-log.js';
import type { AuditEventInput, AuditLogger } from '../logging/audit-logger.js';

export const DEFAULT_ACTOR = 'operator';

/** Output excerpts kept in audit events are cut to this many characters. */
export const OUTPUT_EXCERPT_LIMIT = 512;

export interface TerminalTransition {
  readonly invocation: CommandInvocation;
  readonly terminal_state: PipelineState.Completed | PipelineState.Failed;
  readonly result: CommandExecutionResult;
  /** Capabilities the command declared; empty when the command is unknown. */
  readonly capabilities: ReadonlyArray<Capability>;
  readonly risk_level: RiskLevel;
  readonly approval_status: AuditApprovalStatus;
  /** Canonical paths where resolved, requested paths otherwise. */
  readonly paths: ReadonlyArray<string>;
  readonly command_text: string | undefined;
  readonly args_hash: string;
  /** The Action to push, when the run produced one. */
  readonly action: Action | undefined;
  /** ISO-8601. */
  readonly finished_at: string;
}

export type TransitionListener = (transition: TerminalTransition) => Promise<void>;

/** Pushes the run's Action, if any, onto the session's action log. */
export function projectToActionLog(log: ActionLog): TransitionListener {
  return async (transition) => {
    if (transition.action !== undefined) {
      await log.push(transition.action);
    }
  };
}

/** Records exactly one audit event per terminal transition. */
export function projectToAudit(audit: AuditLogger): TransitionListener {
  return (transition) => audit.record(toAuditEvent(transition));
}

export function toAuditEvent(transition: TerminalTransition): AuditEventInput {
  const { invocation, result } = transition;
  const metadata = result.metadata;
  const outcome = !result.success ? 'failure' : metadata.dry_run ? 'dry-run' : 'success';
  const excerpt = result.output.slice(0, OUTPUT_EXCERPT_LIMIT);

  return {
    timestamp: transition.finished_at,
    session_id: metadata.session_id,
    actor: invocation.actor ?? DEFAULT_ACTOR,
    invocation_id: metadata.invocation_id,
    command: metadata.command,
    sandbox_level: invocation.context.sandbox_level,
    capabilities: transition.capabilities,
    risk_level: transition.risk_level,
    approval_status: transition.approval_status,
    outcome,
    terminal_state: transition.terminal_state,
    ...(result.error !== undefined ? { error_kind: result.error.kind, reason: result.error.reason } : {}),
    paths: transition.paths,
    ...(transition.command_text !== undefined ? { command_text: transition.command_text } : {}),
    args_hash: transition.args_hash,
    duration_ms: metadata.duration_ms,
    ...(excerpt !== '' ? { output_excerpt: excerpt } : {}),
  };
}
