/**
 * Bulwark Kernel — Command Invocation and Result Types
 *
 * A CommandInvocation comes in from the CLI layer; a CommandExecutionResult
 * goes back. Everything in between is owned by one pipeline run.
 */

import type { SandboxLevel } from './capability.js';
import type { PolicyDecision } from './decision.js';
import type { RiskLevel } from './risk.js';
import type { ApprovalOutcome } from './approval.js';
import type { CommandErrorInfo } from '../errors.js';

// ---------------------------------------------------------------------------
// Context and Invocation
// ---------------------------------------------------------------------------

/**
 * Per-invocation context. Created by the caller, owned exclusively by the
 * pipeline run it is passed to.
 */
export interface CommandContext {
  readonly session_id: string;
  /** Canonical (realpath) workspace root. */
  readonly workspace_root: string;
  readonly sandbox_level: SandboxLevel;
  readonly dry_run: boolean;
  /** Cooperative cancellation, observed only at pipeline checkpoints. */
  readonly signal: AbortSignal;
}

export interface CommandInvocation {
  /** Registered command id. */
  readonly command: string;
  /** Raw argument payload, validated against the command's schema. */
  readonly args: unknown;
  readonly context: CommandContext;
  /** Render the preview even for OnRequest commands. */
  readonly preview?: boolean;
  /**
   * Request a workspace-boundary bypass for this operation only. Honored at
   * FullAccess, and even there only behind a separate approval.
   */
  readonly boundary_override?: boolean;
  /** Who issued the invocation. Defaults to `operator`. */
  readonly actor?: string;
}

// ---------------------------------------------------------------------------
// Plans
// ---------------------------------------------------------------------------

/** A side effect a command intends to perform, as declared by its plan. */
export type PreviewAction =
  | { readonly kind: 'ReadFile'; readonly path: string }
  | { readonly kind: 'WriteFile'; readonly path: string }
  | { readonly kind: 'DeleteFile'; readonly path: string }
  | { readonly kind: 'MoveFile'; readonly from: string; readonly to: string }
  | { readonly kind: 'ExecuteShell'; readonly command: string };

export interface CommandPlan {
  /** One-line operation label used in approval prompts. */
  readonly summary: string;
  readonly actions: ReadonlyArray<PreviewAction>;
}

// ---------------------------------------------------------------------------
// Pipeline States
// ---------------------------------------------------------------------------

export enum PipelineState {
  Created = 'Created',
  Validated = 'Validated',
  PreviewGenerated = 'PreviewGenerated',
  PolicyChecked = 'PolicyChecked',
  ApprovalPending = 'ApprovalPending',
  Executing = 'Executing',
  Completed = 'Completed',
  Failed = 'Failed',
  Logged = 'Logged',
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/**
 * What happened to a partially-applied change after execution failed.
 * `not-reversible` means the change was Opaque and nothing could be undone.
 */
export type RollbackStatus = 'not-needed' | 'succeeded' | 'failed' | 'not-reversible';

export interface ExecutionMetadata {
  readonly invocation_id: string;
  readonly command: string;
  readonly session_id: string;
  /** Every state the run passed through, in order. */
  readonly states: ReadonlyArray<PipelineState>;
  /** Aggregate policy decision; absent if the run failed before policy. */
  readonly decision?: PolicyDecision;
  readonly risk_level?: RiskLevel;
  readonly approval?: ApprovalOutcome;
  readonly action_id?: string;
  readonly rollback: RollbackStatus;
  readonly duration_ms: number;
  readonly dry_run: boolean;
}

export interface CommandExecutionResult {
  readonly success: boolean;
  readonly output: string;
  readonly error?: CommandErrorInfo;
  /** Rendered preview, when one was generated. */
  readonly preview?: string;
  readonly metadata: ExecutionMetadata;
}
