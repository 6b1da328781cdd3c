/**
 * Bulwark CLI — Output Formatting Tests
 *
 *   OUT-U1: audit entries render one aligned line; read problems are noted
 *   OUT-U2: action history marks non-reversible and undone actions
 *   OUT-U3: diagnostics render as one stderr line
 *   OUT-U4: the audit view scroll window keeps the selection visible
 *   OUT-U5: the shell prompt names the workspace and level, and flags non-default gating
 *
 * Compared without color.
 */

import { describe, it, expect } from 'vitest';
import { stripVTControlCharacters } from 'node:util';
import type { Action, AuditLogEntry } from '@bulwark/kernel';
import { ApprovalMode, Capability, PipelineState, RiskLevel, SandboxLevel, diagnostic } from '@bulwark/kernel';
import type { AuditReadStats, BulwarkConfig } from '@bulwark/runtime-host';
import { StderrDiagnostics, formatDiagnostic } from '../src/diagnostics.js';
import { visibleWindow } from '../src/tui/audit/window.js';
import { auditSubject, formatAuditEntry, formatAuditLog } from '../src/tui/output/audit.js';
import { formatActions } from '../src/tui/output/result.js';
import { buildPS1 } from '../src/tui/prompt.js';

const plain = stripVTControlCharacters;

const TS = '2026-01-01T00:00:00.000Z';

function entry(overrides: Partial<AuditLogEntry> = {}): AuditLogEntry {
  return {
    event_id: '01HZZZZZZZZZZZZZZZZZZZZZZZ',
    sequence: 1,
    timestamp: TS,
    session_id: 'session-1',
    actor: 'operator',
    invocation_id: 'inv-1',
    command: 'run',
    sandbox_level: SandboxLevel.FullAccess,
    capabilities: [Capability.ExecuteShell],
    risk_level: RiskLevel.Moderate,
    approval_status: 'Denied',
    outcome: 'failure',
    terminal_state: PipelineState.Failed,
    paths: [],
    command_text: 'make',
    args_hash: 'a'.repeat(64),
    duration_ms: 3,
    reason: 'approval denied\nby operator',
    ...overrides,
  };
}

const CLEAN_STATS: AuditReadStats = {
  totalLines: 1,
  parsedEvents: 1,
  duplicates: 0,
  parseErrors: 0,
  partialTrailingLine: false,
  outOfOrder: false,
};

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

describe('audit output', () => {
  it('OUT-U1: one line per entry with the first line of the reason', () => {
    expect(plain(formatAuditEntry(entry()))).toBe(
      `  ${TS}  ✕ failure  run     make  Moderate  Denied  approval denied`,
    );
  });

  it('OUT-U1: the subject falls back to paths', () => {
    const write = entry({ command: 'rename', command_text: undefined, paths: ['a.txt', 'b.txt'] });

    expect(auditSubject(write)).toBe('a.txt, b.txt');
  });

  it('OUT-U1: an empty log says so', () => {
    expect(plain(formatAuditLog([], CLEAN_STATS))).toBe('\n  no audit entries\n');
  });

  it('OUT-U1: duplicates and unreadable lines are noted under the entries', () => {
    const out = plain(formatAuditLog([entry()], { ...CLEAN_STATS, duplicates: 1, parseErrors: 2 }));

    expect(out.endsWith('\n  2 unreadable line(s) skipped · 1 duplicate(s) dropped\n')).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

describe('action history', () => {
  const opaque: Action = {
    id: 'act-1',
    command: 'run',
    timestamp: TS,
    state_before: { kind: 'Opaque', description: 'x' },
    state_after: { kind: 'Opaque', description: 'x' },
    reversible: false,
    description: 'x',
  };

  it('OUT-U2: non-reversible actions are flagged', () => {
    expect(plain(formatActions([opaque]))).toBe(`\n  ● ${TS}  run      x  not reversible\n`);
  });

  it('OUT-U2: actions past the cursor are shown as undone', () => {
    const created: Action = {
      ...opaque,
      id: 'act-2',
      command: 'create',
      state_before: { kind: 'FileDeleted', path: 'a.txt', content: new Uint8Array(0) },
      state_after: { kind: 'FileCreated', path: 'a.txt', content: new Uint8Array([97]) },
      reversible: true,
      description: 'create a.txt',
    };

    expect(plain(formatActions([created], 0))).toBe(`\n  ○ ${TS}  create   create a.txt  undone\n`);
  });
});

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

describe('diagnostics', () => {
  it('OUT-U3: level, code and message on one line', () => {
    const report = diagnostic('warning', 'AuditWriteFailed', 'disk full');

    expect(plain(formatDiagnostic(report))).toBe('[bulwark] warning AuditWriteFailed: disk full');
  });

  it('OUT-U3: StderrDiagnostics writes one newline-terminated line per report', () => {
    const written: string[] = [];
    const channel = new StderrDiagnostics((text) => written.push(plain(text)));

    channel.report(diagnostic('error', 'RollbackFailed', 'could not restore a.txt'));

    expect(written).toEqual(['[bulwark] error RollbackFailed: could not restore a.txt\n']);
  });
});

// ---------------------------------------------------------------------------
// Scroll window
// ---------------------------------------------------------------------------

describe('visibleWindow', () => {
  it('OUT-U4: short lists are drawn whole', () => {
    expect(visibleWindow(3, 1, 5)).toEqual({ start: 0, end: 3 });
  });

  it('OUT-U4: the window follows the selection and stops at either end', () => {
    expect(visibleWindow(10, 0, 4)).toEqual({ start: 0, end: 4 });
    expect(visibleWindow(10, 5, 4)).toEqual({ start: 3, end: 7 });
    expect(visibleWindow(10, 9, 4)).toEqual({ start: 6, end: 10 });
  });
});

describe('OUT-U5: shell prompt', () => {
  const config: BulwarkConfig = {
    home: '/home/dev/.bulwark',
    workspaceRoot: '/home/dev/my-project',
    sandboxLevel: SandboxLevel.WorkspaceWrite,
    approvalMode: ApprovalMode.Interactive,
    requireApproval: false,
    auditEnabled: true,
    auditPath: '/home/dev/.bulwark/audit/audit.jsonl',
    actionLogMaxSize: 100,
    approvalTimeoutMs: 120_000,
    shellTimeoutMs: 30_000,
    checkCommands: ['npm test'],
    redactPatterns: [],
    riskRulesPath: undefined,
  };

  it('defaults show only the workspace and the level', () => {
    expect(plain(buildPS1(config))).toBe('my-project workspace-write ❯ ');
  });

  it('flags --ask-for-approval, a non-interactive mode and a disabled audit log', () => {
    const ps1 = buildPS1({
      ...config,
      sandboxLevel: SandboxLevel.FullAccess,
      requireApproval: true,
      approvalMode: ApprovalMode.AutoApproveLowRisk,
      auditEnabled: false,
    });

    expect(plain(ps1)).toBe('my-project full-access +ask auto-approve-low-risk -audit ❯ ');
  });
});
