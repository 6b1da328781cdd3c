/**
 * Bulwark Kernel — Audit Event Types
 *
 * One AuditEvent is emitted per terminal pipeline transition. Events are
 * immutable once written; the log is append-only.
 */

import type { Capability, SandboxLevel } from './capability.js';
import type { RiskLevel } from './risk.js';
import type { ErrorKind } from '../errors.js';
import type { PipelineState } from './command.js';

/** Approval status as recorded: NotRequired when policy allowed outright. */
export type AuditApprovalStatus = 'NotRequired' | 'Approved' | 'Denied';

export type AuditOutcome = 'success' | 'failure' | 'dry-run';

export interface AuditEvent {
  /** Monotonic per-logger sequence number. */
  readonly sequence: number;
  /** ISO-8601 time of the terminal transition. */
  readonly timestamp: string;
  readonly session_id: string;
  readonly actor: string;
  readonly invocation_id: string;
  readonly command: string;
  readonly sandbox_level: SandboxLevel;
  readonly capabilities: ReadonlyArray<Capability>;
  readonly risk_level: RiskLevel;
  readonly approval_status: AuditApprovalStatus;
  readonly outcome: AuditOutcome;
  readonly terminal_state: PipelineState;
  readonly error_kind?: ErrorKind;
  readonly reason?: string;
  readonly paths: ReadonlyArray<string>;
  readonly command_text?: string;
  /** SHA-256 of the canonical JSON of the argument payload. */
  readonly args_hash: string;
  readonly duration_ms: number;
  readonly output_excerpt?: string;
}

/** An AuditEvent as persisted by a sink, which assigns the event id. */
export interface AuditLogEntry extends AuditEvent {
  /** ULID assigned at write time. */
  readonly event_id: string;
}
