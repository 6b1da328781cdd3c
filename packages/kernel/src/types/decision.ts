/**
 * Bulwark Kernel — Policy Decision Types
 *
 * A PolicyDecision is ephemeral: recomputed on every check, never cached
 * across invocations.
 *
 * Aggregation is worst-case: Deny > RequireApproval > Allow. One Deny among
 * the individual capability and path decisions denies the whole command.
 */

import { ErrorKind } from '../errors.js';

export enum PolicyOutcome {
  Allow = 'Allow',
  Deny = 'Deny',
  RequireApproval = 'RequireApproval',
}

export type PolicyDecision =
  | { readonly outcome: PolicyOutcome.Allow }
  | {
      readonly outcome: PolicyOutcome.Deny;
      readonly reason: string;
      readonly kind: ErrorKind.PolicyDenied | ErrorKind.PathTraversal;
    }
  | { readonly outcome: PolicyOutcome.RequireApproval; readonly reason: string };

export const ALLOW: PolicyDecision = { outcome: PolicyOutcome.Allow };

export function deny(
  reason: string,
  kind: ErrorKind.PolicyDenied | ErrorKind.PathTraversal = ErrorKind.PolicyDenied,
): PolicyDecision {
  return { outcome: PolicyOutcome.Deny, reason, kind };
}

export function requireApproval(reason: string): PolicyDecision {
  return { outcome: PolicyOutcome.RequireApproval, reason };
}

const OUTCOME_SEVERITY: Readonly<Record<PolicyOutcome, number>> = {
  [PolicyOutcome.Allow]: 0,
  [PolicyOutcome.RequireApproval]: 1,
  [PolicyOutcome.Deny]: 2,
};

/**
 * Fold individual decisions into one by worst-case precedence.
 *
 * The first decision of the most severe class wins, so its reason is the
 * one reported. An empty list is Allow.
 */
export function aggregateDecisions(decisions: ReadonlyArray<PolicyDecision>): PolicyDecision {
  let worst: PolicyDecision = ALLOW;
  for (const decision of decisions) {
    if (OUTCOME_SEVERITY[decision.outcome] > OUTCOME_SEVERITY[worst.outcome]) {
      worst = decision;
    }
  }
  return worst;
}

/** Human-readable one-liner for logs and the CLI. */
export function describeDecision(decision: PolicyDecision): string {
  return decision.outcome === PolicyOutcome.Allow
    ? 'Allow'
    : `${decision.outcome}: ${decision.reason}`;
}
