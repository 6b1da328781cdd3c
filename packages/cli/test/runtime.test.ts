/**
 * Bulwark CLI — Runtime Wiring Tests
 *
 *   CLI-U4: global flags map onto config overrides; absent flags stay unset
 *   CLI-U5: the catalog holds every first-party command, configured from config
 *   CLI-U6: unattended runs never wait on a prompt
 *   CLI-U7: exec releases its SIGINT hook when the runtime fails to build
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ApprovalRequest } from '@bulwark/kernel';
import { ApprovalMode, RiskLevel } from '@bulwark/kernel';
import { resolveConfig } from '@bulwark/runtime-host';
import { runExec } from '../src/commands/exec.js';
import { UnattendedPrompter, buildCommands, toOverrides, unattendedConfig } from '../src/commands/runtime.js';

function config(approvalMode: string) {
  const home = mkdtempSync(join(tmpdir(), 'bulwark-cli-home-'));
  const ws = realpathSync(mkdtempSync(join(tmpdir(), 'bulwark-cli-ws-')));
  return resolveConfig({ home, approvalMode, auditEnabled: false }, {}, ws);
}

// ---------------------------------------------------------------------------
// toOverrides
// ---------------------------------------------------------------------------

describe('toOverrides', () => {
  it('CLI-U4: maps every global flag', () => {
    expect(
      toOverrides({
        sandbox: 'read-only',
        askForApproval: true,
        cd: '/work',
        approvalMode: 'interactive',
        auditPath: '/logs/audit.jsonl',
        audit: false,
        home: '/state',
      }),
    ).toEqual({
      home: '/state',
      workspaceRoot: '/work',
      sandbox: 'read-only',
      approvalMode: 'interactive',
      requireApproval: true,
      auditPath: '/logs/audit.jsonl',
      auditEnabled: false,
    });
  });

  it('CLI-U4: defaults from Commander leave lower layers in charge', () => {
    const overrides = toOverrides({ audit: true });

    expect(overrides.auditEnabled).toBeUndefined();
    expect(overrides.requireApproval).toBeUndefined();
    expect(overrides.sandbox).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// buildCommands
// ---------------------------------------------------------------------------

describe('buildCommands', () => {
  it('CLI-U5: registers the filesystem and shell commands', () => {
    const ids = buildCommands(config('non-interactive')).map((command) => command.descriptor.id);

    expect(ids).toEqual(['read', 'create', 'write', 'edit', 'delete', 'rename', 'run', 'check']);
  });
});

// ---------------------------------------------------------------------------
// Unattended runs
// ---------------------------------------------------------------------------

describe('unattended runs', () => {
  it('CLI-U6: interactive mode becomes non-interactive', () => {
    expect(unattendedConfig(config('interactive')).approvalMode).toBe(ApprovalMode.NonInteractive);
  });

  it('CLI-U6: other modes are kept', () => {
    const auto = config('auto-approve-low-risk');
    expect(unattendedConfig(auto)).toBe(auto);
  });

  it('CLI-U6: the unattended prompter declines and says why', async () => {
    const lines: string[] = [];
    const prompter = new UnattendedPrompter((text) => lines.push(text));
    const request: ApprovalRequest = {
      id: 'req-1',
      command_id: 'run',
      operation: 'run: make',
      risk_level: RiskLevel.Moderate,
      description: 'ExecuteShell requires approval',
      details: [],
      created_at: '2026-01-01T00:00:00.000Z',
    };

    await expect(prompter.prompt(request)).resolves.toBe(false);
    expect(lines).toEqual(['[bulwark] declined run: make: no terminal to ask for approval\n']);
  });
});

// ---------------------------------------------------------------------------
// runExec
// ---------------------------------------------------------------------------

describe('runExec', () => {
  it('CLI-U7: a runtime that fails to build leaves no SIGINT listener behind', async () => {
    const before = process.listenerCount('SIGINT');
    const failing = (): never => {
      throw new Error('config file is not valid TOML');
    };

    await expect(runExec('read', { path: 'a.md' }, {}, {}, failing)).rejects.toThrow('config file is not valid TOML');
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
