/**
 * Bulwark Kernel — Sandbox Policy Engine Tests
 *
 *   SP-U1: decision matrix per level and capability
 *   SP-U2: monotonicity: Allow at a lower level is never Deny at a higher one
 *   SP-U3: --ask-for-approval turns non-read Allow into RequireApproval
 *   SP-U4: workspace shell opt-in is RequireApproval, never Allow
 *   SP-U5: paths outside the root are Deny(PathTraversal) at ReadOnly and WorkspaceWrite
 *   SP-U6: boundary override is honored only at FullAccess, and only behind approval
 *   SP-U7: component-wise prefix check (/ws does not contain /ws-evil)
 *   SP-U8: failed canonicalization is Deny(PathTraversal) at every level
 *   SP-U9: aggregation is worst-case and keeps the first reason of the winning class
 */

import { describe, it, expect } from 'vitest';
import type { PolicyDecision, ResolvedPath } from '../src/index.js';
import {
  ALL_CAPABILITIES,
  ALLOW,
  Capability,
  ErrorKind,
  PolicyOutcome,
  SANDBOX_LEVELS,
  SANDBOX_LEVEL_ORDER,
  SandboxLevel,
  aggregateDecisions,
  checkCapability,
  checkPath,
  deny,
  grantedCapabilities,
  isWithinRoot,
  requireApproval,
} from '../src/index.js';

const ROOT = '/ws';

function resolved(canonical: string | null, requested = canonical ?? 'x'): ResolvedPath {
  return {
    requested,
    absolute: canonical ?? `${ROOT}/${requested}`,
    canonical,
    exists: false,
  };
}

const OPTION_COMBOS = [
  {},
  { requireApproval: true },
  { workspaceShellOptIn: true },
  { requireApproval: true, workspaceShellOptIn: true },
];

// ---------------------------------------------------------------------------
// SP-U1: decision matrix
// ---------------------------------------------------------------------------

describe('SP-U1: capability decision matrix', () => {
  it('ReadOnly allows only ReadFile', () => {
    for (const capability of ALL_CAPABILITIES) {
      const outcome = checkCapability(SandboxLevel.ReadOnly, capability).outcome;
      expect(outcome).toBe(capability === Capability.ReadFile ? PolicyOutcome.Allow : PolicyOutcome.Deny);
    }
  });

  it('WorkspaceWrite allows ReadFile and WriteFile and denies the rest', () => {
    expect(checkCapability(SandboxLevel.WorkspaceWrite, Capability.ReadFile).outcome).toBe(PolicyOutcome.Allow);
    expect(checkCapability(SandboxLevel.WorkspaceWrite, Capability.WriteFile).outcome).toBe(PolicyOutcome.Allow);
    expect(checkCapability(SandboxLevel.WorkspaceWrite, Capability.ExecuteShell).outcome).toBe(PolicyOutcome.Deny);
    expect(checkCapability(SandboxLevel.WorkspaceWrite, Capability.NetworkAccess).outcome).toBe(PolicyOutcome.Deny);
    expect(checkCapability(SandboxLevel.WorkspaceWrite, Capability.ProviderAccess).outcome).toBe(PolicyOutcome.Deny);
  });

  it('FullAccess allows every capability', () => {
    for (const capability of ALL_CAPABILITIES) {
      expect(checkCapability(SandboxLevel.FullAccess, capability)).toEqual(ALLOW);
    }
  });

  it('denials carry PolicyDenied and a reason naming the capability', () => {
    const decision = checkCapability(SandboxLevel.ReadOnly, Capability.WriteFile);
    expect(decision).toEqual({
      outcome: PolicyOutcome.Deny,
      kind: ErrorKind.PolicyDenied,
      reason: 'WriteFile is not permitted in the read-only sandbox',
    });
  });

  it('grantedCapabilities lists every non-denied capability', () => {
    expect([...grantedCapabilities(SandboxLevel.ReadOnly)]).toEqual([Capability.ReadFile]);
    expect([...grantedCapabilities(SandboxLevel.WorkspaceWrite)]).toEqual([
      Capability.ReadFile,
      Capability.WriteFile,
    ]);
    expect(grantedCapabilities(SandboxLevel.FullAccess).size).toBe(ALL_CAPABILITIES.length);
  });
});

// ---------------------------------------------------------------------------
// SP-U2: monotonicity
// ---------------------------------------------------------------------------

describe('SP-U2: monotonicity', () => {
  it.each(OPTION_COMBOS)('no capability goes from Allow to Deny as the level rises (%o)', (options) => {
    for (const lower of SANDBOX_LEVELS) {
      for (const higher of SANDBOX_LEVELS) {
        if (SANDBOX_LEVEL_ORDER[higher] <= SANDBOX_LEVEL_ORDER[lower]) continue;
        for (const capability of ALL_CAPABILITIES) {
          const low = checkCapability(lower, capability, options);
          const high = checkCapability(higher, capability, options);
          if (low.outcome !== PolicyOutcome.Deny) {
            expect(high.outcome, `${capability}: ${lower} -> ${higher}`).not.toBe(PolicyOutcome.Deny);
          }
        }
      }
    }
  });

  it('no in-workspace path goes from non-Deny to Deny as the level rises', () => {
    const inside = resolved(`${ROOT}/src/a.ts`, 'src/a.ts');
    for (const intent of ['read', 'write'] as const) {
      for (const lower of SANDBOX_LEVELS) {
        for (const higher of SANDBOX_LEVELS) {
          if (SANDBOX_LEVEL_ORDER[higher] <= SANDBOX_LEVEL_ORDER[lower]) continue;
          const low = checkPath(lower, inside, intent, { workspaceRoot: ROOT });
          const high = checkPath(higher, inside, intent, { workspaceRoot: ROOT });
          if (low.outcome !== PolicyOutcome.Deny) {
            expect(high.outcome).not.toBe(PolicyOutcome.Deny);
          }
        }
      }
    }
  });
});

// ---------------------------------------------------------------------------
// SP-U3 / SP-U4: approval-gated capabilities
// ---------------------------------------------------------------------------

describe('SP-U3: requireApproval', () => {
  it('turns WriteFile into RequireApproval at WorkspaceWrite and FullAccess', () => {
    for (const level of [SandboxLevel.WorkspaceWrite, SandboxLevel.FullAccess]) {
      const decision = checkCapability(level, Capability.WriteFile, { requireApproval: true });
      expect(decision.outcome).toBe(PolicyOutcome.RequireApproval);
    }
  });

  it('leaves ReadFile as Allow', () => {
    expect(checkCapability(SandboxLevel.FullAccess, Capability.ReadFile, { requireApproval: true })).toEqual(ALLOW);
  });

  it('turns in-workspace writes into RequireApproval', () => {
    const decision = checkPath(SandboxLevel.WorkspaceWrite, resolved(`${ROOT}/a.txt`, 'a.txt'), 'write', {
      workspaceRoot: ROOT,
      requireApproval: true,
    });
    expect(decision).toEqual({
      outcome: PolicyOutcome.RequireApproval,
      reason: 'writing a.txt requires approval (--ask-for-approval)',
    });
  });
});

describe('SP-U4: workspace shell opt-in', () => {
  it('is RequireApproval at WorkspaceWrite even without --ask-for-approval', () => {
    const decision = checkCapability(SandboxLevel.WorkspaceWrite, Capability.ExecuteShell, {
      workspaceShellOptIn: true,
    });
    expect(decision.outcome).toBe(PolicyOutcome.RequireApproval);
  });

  it('does not widen ReadOnly', () => {
    const decision = checkCapability(SandboxLevel.ReadOnly, Capability.ExecuteShell, { workspaceShellOptIn: true });
    expect(decision.outcome).toBe(PolicyOutcome.Deny);
  });

  it('does not extend to NetworkAccess', () => {
    const decision = checkCapability(SandboxLevel.WorkspaceWrite, Capability.NetworkAccess, {
      workspaceShellOptIn: true,
    });
    expect(decision.outcome).toBe(PolicyOutcome.Deny);
  });
});

// ---------------------------------------------------------------------------
// SP-U5 / SP-U6 / SP-U7 / SP-U8: paths
// ---------------------------------------------------------------------------

describe('SP-U5: boundary at ReadOnly and WorkspaceWrite', () => {
  const outside = resolved('/etc/passwd', '../../etc/passwd');

  it.each([SandboxLevel.ReadOnly, SandboxLevel.WorkspaceWrite])('%s denies reads and writes outside', (level) => {
    for (const intent of ['read', 'write'] as const) {
      const decision = checkPath(level, outside, intent, { workspaceRoot: ROOT });
      expect(decision).toEqual({
        outcome: PolicyOutcome.Deny,
        kind: ErrorKind.PathTraversal,
        reason: '../../etc/passwd resolves outside the workspace root',
      });
    }
  });

  it.each([SandboxLevel.ReadOnly, SandboxLevel.WorkspaceWrite])('%s ignores the boundary override', (level) => {
    const decision = checkPath(level, outside, 'read', { workspaceRoot: ROOT, boundaryOverride: true });
    expect(decision.outcome).toBe(PolicyOutcome.Deny);
  });

  it('a symlink that canonicalizes outside is judged by its canonical path', () => {
    const viaLink: ResolvedPath = {
      requested: 'link/secret',
      absolute: `${ROOT}/link/secret`,
      canonical: '/home/user/secret',
      exists: true,
    };
    const decision = checkPath(SandboxLevel.WorkspaceWrite, viaLink, 'read', { workspaceRoot: ROOT });
    expect(decision.outcome).toBe(PolicyOutcome.Deny);
  });
});

describe('SP-U6: boundary override at FullAccess', () => {
  const outside = resolved('/tmp/out.txt', '/tmp/out.txt');

  it('is Deny without an override', () => {
    expect(checkPath(SandboxLevel.FullAccess, outside, 'write', { workspaceRoot: ROOT }).outcome).toBe(
      PolicyOutcome.Deny,
    );
  });

  it('is RequireApproval (never Allow) with an override', () => {
    const decision = checkPath(SandboxLevel.FullAccess, outside, 'write', {
      workspaceRoot: ROOT,
      boundaryOverride: true,
    });
    expect(decision).toEqual({
      outcome: PolicyOutcome.RequireApproval,
      reason: '/tmp/out.txt is outside the workspace; boundary override requested',
    });
  });
});

describe('SP-U7: component-wise prefix', () => {
  it('isWithinRoot compares whole components', () => {
    expect(isWithinRoot('/ws', '/ws/a')).toBe(true);
    expect(isWithinRoot('/ws', '/ws-evil/a')).toBe(false);
    expect(isWithinRoot('/ws', '/ws/..foo')).toBe(true);
    expect(isWithinRoot('/ws', '/')).toBe(false);
    expect(isWithinRoot('/ws', '/ws')).toBe(false);
    expect(isWithinRoot('/ws', '/ws', true)).toBe(true);
  });

  it('denies a sibling directory sharing the root as a string prefix', () => {
    const sibling = resolved('/ws-evil/x', '../ws-evil/x');
    expect(checkPath(SandboxLevel.FullAccess, sibling, 'read', { workspaceRoot: ROOT }).outcome).toBe(
      PolicyOutcome.Deny,
    );
  });

  it('allows reading the root itself but not writing it', () => {
    const root = resolved(ROOT, '.');
    expect(checkPath(SandboxLevel.WorkspaceWrite, root, 'read', { workspaceRoot: ROOT })).toEqual(ALLOW);
    expect(checkPath(SandboxLevel.WorkspaceWrite, root, 'write', { workspaceRoot: ROOT })).toEqual({
      outcome: PolicyOutcome.Deny,
      kind: ErrorKind.PathTraversal,
      reason: 'cannot write the workspace root itself',
    });
  });
});

describe('SP-U8: canonicalization failure', () => {
  it.each(SANDBOX_LEVELS)('is Deny(PathTraversal) at %s', (level) => {
    const broken: ResolvedPath = {
      requested: 'bad\0name',
      absolute: `${ROOT}/bad`,
      canonical: null,
      exists: false,
      error: 'path contains a null byte',
    };
    const decision = checkPath(level, broken, 'read', { workspaceRoot: ROOT, boundaryOverride: true });
    expect(decision).toEqual({
      outcome: PolicyOutcome.Deny,
      kind: ErrorKind.PathTraversal,
      reason: 'cannot canonicalize bad\0name: path contains a null byte',
    });
  });
});

// ---------------------------------------------------------------------------
// SP-U9: aggregation
// ---------------------------------------------------------------------------

describe('SP-U9: aggregateDecisions', () => {
  it('is Allow for an empty list', () => {
    expect(aggregateDecisions([])).toEqual(ALLOW);
  });

  it('prefers Deny over RequireApproval over Allow', () => {
    const decisions: PolicyDecision[] = [ALLOW, requireApproval('ask'), deny('no'), requireApproval('ask again')];
    expect(aggregateDecisions(decisions)).toEqual(deny('no'));
    expect(aggregateDecisions([ALLOW, requireApproval('ask')])).toEqual(requireApproval('ask'));
  });

  it('keeps the first reason of the winning class', () => {
    const decisions = [deny('first', ErrorKind.PathTraversal), deny('second')];
    expect(aggregateDecisions(decisions)).toEqual(deny('first', ErrorKind.PathTraversal));
  });
});
