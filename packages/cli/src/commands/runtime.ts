/**
 * Runtime context builders shared by every subcommand and the shell.
 *
 * Turns the program's global flags into config overrides, builds the
 * first-party command catalog from the resolved config, and opens a
 * session wired to the CLI's diagnostics and approval prompter.
 */

import type { ApprovalPrompter, ApprovalRequest, RegisteredCommand } from '@bulwark/kernel';
import { ApprovalMode } from '@bulwark/kernel';
import type { BulwarkConfig, ConfigOverrides, Environment, Session } from '@bulwark/runtime-host';
import { createSession, resolveConfig } from '@bulwark/runtime-host';
import { FILESYSTEM_COMMANDS } from '@bulwark/command-filesystem';
import { createShellCommands } from '@bulwark/command-shell';
import { StderrDiagnostics } from '../diagnostics.js';

/** Options registered on the root program, read with `optsWithGlobals()`. */
export type GlobalOptions = {
  sandbox?: string;
  askForApproval?: boolean;
  cd?: string;
  approvalMode?: string;
  auditPath?: string;
  /** Commander's negatable `--no-audit`: true unless the flag was given. */
  audit?: boolean;
  home?: string;
};

export function toOverrides(options: GlobalOptions): ConfigOverrides {
  return {
    home: options.home,
    workspaceRoot: options.cd,
    sandbox: options.sandbox,
    approvalMode: options.approvalMode,
    requireApproval: options.askForApproval === true ? true : undefined,
    auditPath: options.auditPath,
    auditEnabled: options.audit === false ? false : undefined,
  };
}

// ---------------------------------------------------------------------------
// First-party catalog
// ---------------------------------------------------------------------------

export function buildCommands(config: BulwarkConfig): ReadonlyArray<RegisteredCommand> {
  return [
    ...FILESYSTEM_COMMANDS,
    ...createShellCommands({ defaultTimeoutMs: config.shellTimeoutMs, allowed: config.checkCommands }),
  ];
}

// ---------------------------------------------------------------------------
// Unattended runs
// ---------------------------------------------------------------------------

/**
 * Without a terminal nobody can answer a prompt. Interactive mode becomes
 * non-interactive; auto-approve-low-risk keeps approving Safe requests.
 */
export function unattendedConfig(config: BulwarkConfig): BulwarkConfig {
  return config.approvalMode === ApprovalMode.Interactive
    ? { ...config, approvalMode: ApprovalMode.NonInteractive }
    : config;
}

/** Declines whatever reaches it, noting why on stderr. */
export class UnattendedPrompter implements ApprovalPrompter {
  constructor(private readonly write: (text: string) => void = (text) => process.stderr.write(text)) {}

  prompt(request: ApprovalRequest): Promise<boolean> {
    this.write(`[bulwark] declined ${request.operation}: no terminal to ask for approval\n`);
    return Promise.resolve(false);
  }
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export interface RuntimeOptions {
  /** Set when a terminal is attached; otherwise the run is unattended. */
  readonly prompter?: ApprovalPrompter | undefined;
  readonly env?: Environment | undefined;
  readonly cwd?: string | undefined;
}

export function loadConfig(options: GlobalOptions, runtime: RuntimeOptions = {}): BulwarkConfig {
  return resolveConfig(toOverrides(options), runtime.env ?? process.env, runtime.cwd ?? process.cwd());
}

export function buildRuntime(options: GlobalOptions, runtime: RuntimeOptions = {}): Session {
  const resolved = loadConfig(options, runtime);
  const config = runtime.prompter === undefined ? unattendedConfig(resolved) : resolved;
  return createSession(config, {
    commands: buildCommands(config),
    diagnostics: new StderrDiagnostics(),
    prompter: runtime.prompter ?? new UnattendedPrompter(),
  });
}
