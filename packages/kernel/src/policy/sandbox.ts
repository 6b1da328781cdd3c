/**
 * Bulwark Kernel — Sandbox Policy Engine
 *
 * Pure functions mapping (sandbox level, capability) and (sandbox level,
 * resolved path, intent) to a PolicyDecision. No hidden state: every
 * decision is reproducible from its arguments alone.
 *
 * Decision matrix (RA = RequireApproval when `requireApproval` is set):
 *
 *   capability      ReadOnly   WorkspaceWrite            FullAccess
 *   ReadFile        Allow      Allow                     Allow
 *   WriteFile       Deny       Allow | RA                Allow | RA
 *   ExecuteShell    Deny       Deny (opt-in: always RA)  Allow | RA
 *   NetworkAccess   Deny       Deny                      Allow | RA
 *   ProviderAccess  Deny       Deny                      Allow | RA
 *
 * Boundary invariant: at ReadOnly and WorkspaceWrite no path may resolve
 * outside the workspace root. That Deny is never overridable by approval.
 * At FullAccess an escape is still Deny unless the operation explicitly
 * requests a boundary override, which then requires its own approval.
 */

import { isAbsolute, relative, sep } from 'node:path';
import type { ResolvedPath } from '../adapters/index.js';
import { ALL_CAPABILITIES, Capability, SandboxLevel } from '../types/capability.js';
import type { PolicyDecision } from '../types/decision.js';
import { ALLOW, PolicyOutcome, deny, requireApproval } from '../types/decision.js';
import { ErrorKind } from '../errors.js';

export type PathIntent = 'read' | 'write';

export interface CapabilityCheckOptions {
  /** Bound by `--ask-for-approval`: every non-read Allow becomes RA. */
  readonly requireApproval?: boolean;
  /** The descriptor's narrow opt-in to shell execution at WorkspaceWrite. */
  readonly workspaceShellOptIn?: boolean;
}

export interface PathCheckOptions {
  /** Canonical workspace root. */
  readonly workspaceRoot: string;
  readonly requireApproval?: boolean;
  /** Per-operation boundary bypass request. Honored only at FullAccess. */
  readonly boundaryOverride?: boolean;
}

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

export function checkCapability(
  level: SandboxLevel,
  capability: Capability,
  options: CapabilityCheckOptions = {},
): PolicyDecision {
  if (capability === Capability.ReadFile) return ALLOW;

  const gated = (): PolicyDecision =>
    options.requireApproval === true
      ? requireApproval(`${capability} requires approval (--ask-for-approval)`)
      : ALLOW;

  switch (level) {
    case SandboxLevel.ReadOnly:
      return deny(`${capability} is not permitted in the read-only sandbox`);

    case SandboxLevel.WorkspaceWrite:
      if (capability === Capability.WriteFile) return gated();
      if (capability === Capability.ExecuteShell && options.workspaceShellOptIn === true) {
        return requireApproval('shell execution in the workspace-write sandbox requires approval');
      }
      return deny(`${capability} is not permitted in the workspace-write sandbox`);

    case SandboxLevel.FullAccess:
      return gated();
  }
}

/**
 * Capabilities a level can grant at all (anything not Deny).
 * A command is runnable iff its required set is a subset of this.
 */
export function grantedCapabilities(
  level: SandboxLevel,
  options: CapabilityCheckOptions = {},
): ReadonlySet<Capability> {
  return new Set(
    ALL_CAPABILITIES.filter(
      (capability) => checkCapability(level, capability, options).outcome !== PolicyOutcome.Deny,
    ),
  );
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/**
 * Component-wise containment: `/ws/a` is within `/ws`, `/ws-evil` is not.
 * The root itself counts as within only when `allowRoot` is set.
 */
export function isWithinRoot(root: string, candidate: string, allowRoot = false): boolean {
  const rel = relative(root, candidate);
  if (rel === '') return allowRoot;
  if (isAbsolute(rel)) return false;
  return rel !== '..' && !rel.startsWith(`..${sep}`);
}

export function checkPath(
  level: SandboxLevel,
  resolved: ResolvedPath,
  intent: PathIntent,
  options: PathCheckOptions,
): PolicyDecision {
  if (resolved.canonical === null) {
    const detail = resolved.error !== undefined ? `: ${resolved.error}` : '';
    return deny(`cannot canonicalize ${resolved.requested}${detail}`, ErrorKind.PathTraversal);
  }

  const canonical = resolved.canonical;
  const inside = isWithinRoot(options.workspaceRoot, canonical, intent === 'read');

  if (!inside) {
    if (canonical === options.workspaceRoot) {
      return deny('cannot write the workspace root itself', ErrorKind.PathTraversal);
    }
    if (level === SandboxLevel.FullAccess && options.boundaryOverride === true) {
      return requireApproval(`${canonical} is outside the workspace; boundary override requested`);
    }
    return deny(`${resolved.requested} resolves outside the workspace root`, ErrorKind.PathTraversal);
  }

  if (intent === 'read') return ALLOW;

  if (level === SandboxLevel.ReadOnly) {
    return deny(`writing ${resolved.requested} is not permitted in the read-only sandbox`);
  }
  return options.requireApproval === true
    ? requireApproval(`writing ${resolved.requested} requires approval (--ask-for-approval)`)
    : ALLOW;
}
