/**
 * Bulwark Kernel — Approval Types
 */

import type { RiskLevel } from './risk.js';

export enum ApprovalMode {
  Interactive = 'interactive',
  /** Approves Safe requests without prompting; everything else is interactive. */
  AutoApproveLowRisk = 'auto-approve-low-risk',
  /** Denies every request. Default for unattended runs. */
  NonInteractive = 'non-interactive',
}

export const APPROVAL_MODES: ReadonlyArray<ApprovalMode> = Object.values(ApprovalMode);

export function parseApprovalMode(raw: string): ApprovalMode | null {
  const value = raw.trim().toLowerCase();
  return APPROVAL_MODES.find((mode) => mode === value) ?? null;
}

export enum ApprovalStatus {
  Approved = 'Approved',
  Denied = 'Denied',
  Pending = 'Pending',
}

export type ApprovalReason =
  | 'auto-approved'
  | 'user'
  | 'non-interactive'
  | 'timeout'
  | 'cancelled'
  | 'prompt-failed';

export interface ApprovalRequest {
  readonly id: string;
  readonly command_id: string;
  /** Short operation label, e.g. `create notes.md` or `run: npm test`. */
  readonly operation: string;
  readonly risk_level: RiskLevel;
  /** Why approval is required (the policy reason). */
  readonly description: string;
  /** Preview lines shown on request (diff, shell invocation, paths). */
  readonly details: ReadonlyArray<string>;
  readonly created_at: string;
}

/** A settled request. Pending never appears here. */
export interface ApprovalOutcome {
  readonly request_id: string;
  readonly status: ApprovalStatus.Approved | ApprovalStatus.Denied;
  readonly reason: ApprovalReason;
  readonly decided_at: string;
}
