/**
 * Bulwark Runtime Host — Configuration Resolution
 *
 * Resolves the effective configuration using the following precedence:
 *
 *   1. Explicit overrides (CLI flags)
 *   2. Environment: BULWARK_SANDBOX, BULWARK_APPROVAL_MODE,
 *      BULWARK_ASK_FOR_APPROVAL, BULWARK_AUDIT_PATH, BULWARK_AUDIT_ENABLED
 *   3. <home>/config.json
 *   4. Defaults
 *
 * The home directory itself resolves from the `home` override, then
 * BULWARK_HOME, then `~/.bulwark`. All session state lives under it:
 *
 *   <home>/
 *     config.json
 *     audit/audit.jsonl
 *     sessions/<session_id>/state/session.json
 *     sessions/<session_id>/logs/actions.jsonl
 *
 * An invalid value anywhere in the chain raises InvalidArguments naming
 * where it came from; nothing is silently replaced by a default.
 */

import { readFileSync, realpathSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import {
  ApprovalMode,
  CommandError,
  DEFAULT_ACTION_LOG_CAPACITY,
  DEFAULT_APPROVAL_TIMEOUT_MS,
  ErrorKind,
  SandboxLevel,
  formatZodError,
  isNodeError,
  parseApprovalMode,
  parseSandboxLevel,
} from '@bulwark/kernel';

export const DEFAULT_SHELL_TIMEOUT_MS = 30_000;
export const DEFAULT_CHECK_COMMANDS: ReadonlyArray<string> = ['npm test'];
export const CONFIG_FILE = 'config.json';

export interface BulwarkConfig {
  readonly home: string;
  /** Canonical (realpath) workspace root. */
  readonly workspaceRoot: string;
  readonly sandboxLevel: SandboxLevel;
  readonly approvalMode: ApprovalMode;
  /** `--ask-for-approval`: every write and shell operation needs approval. */
  readonly requireApproval: boolean;
  readonly auditEnabled: boolean;
  readonly auditPath: string;
  readonly actionLogMaxSize: number;
  readonly approvalTimeoutMs: number;
  readonly shellTimeoutMs: number;
  /** Scripts the `check` command may run. */
  readonly checkCommands: ReadonlyArray<string>;
  readonly redactPatterns: ReadonlyArray<string>;
  /** Replaces the bundled risk rules when set. */
  readonly riskRulesPath: string | undefined;
}

export interface ConfigOverrides {
  readonly home?: string | undefined;
  readonly workspaceRoot?: string | undefined;
  readonly sandbox?: string | undefined;
  readonly approvalMode?: string | undefined;
  readonly requireApproval?: boolean | undefined;
  readonly auditPath?: string | undefined;
  readonly auditEnabled?: boolean | undefined;
}

export type Environment = Readonly<Record<string, string | undefined>>;

// ---------------------------------------------------------------------------
// config.json
// ---------------------------------------------------------------------------

export const configFileSchema = z
  .object({
    sandbox: z.nativeEnum(SandboxLevel),
    approval_mode: z.nativeEnum(ApprovalMode),
    ask_for_approval: z.boolean(),
    audit_path: z.string().min(1),
    audit_enabled: z.boolean(),
    action_log_max_size: z.number().int().positive(),
    approval_timeout_ms: z.number().int().positive(),
    shell_timeout_ms: z.number().int().positive(),
    check_commands: z.array(z.string().min(1)),
    redact_patterns: z.array(z.string().min(1)),
    risk_rules_path: z.string().min(1),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Parsed `<home>/config.json`; an empty object when the file is absent. */
export function readConfigFile(home: string): ConfigFile {
  const path = join(home, CONFIG_FILE);
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return {};
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CommandError(ErrorKind.InvalidArguments, `${path} is not valid JSON: ${message}`, { cause: err });
  }
  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CommandError(ErrorKind.InvalidArguments, `${path}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Value parsing
// ---------------------------------------------------------------------------

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

function sandboxFrom(raw: string, source: string): SandboxLevel {
  const level = parseSandboxLevel(raw);
  if (level === null) {
    throw new CommandError(
      ErrorKind.InvalidArguments,
      `${source}: unknown sandbox level '${raw}' (expected read-only, workspace-write or full-access)`,
    );
  }
  return level;
}

function approvalModeFrom(raw: string, source: string): ApprovalMode {
  const mode = parseApprovalMode(raw);
  if (mode === null) {
    throw new CommandError(
      ErrorKind.InvalidArguments,
      `${source}: unknown approval mode '${raw}' (expected interactive, auto-approve-low-risk or non-interactive)`,
    );
  }
  return mode;
}

/** Accepts 1/true/yes and 0/false/no, case-insensitively. */
export function parseBooleanFlag(raw: string, source: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  throw new CommandError(ErrorKind.InvalidArguments, `${source}: expected a boolean, got '${raw}'`);
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export function resolveHome(override?: string, env: Environment = process.env): string {
  const chosen = nonEmpty(override) ?? nonEmpty(env['BULWARK_HOME']);
  return chosen !== undefined ? resolve(chosen) : join(homedir(), '.bulwark');
}

/** Realpath of an existing directory, or InvalidArguments. */
export function resolveWorkspaceRoot(requested: string): string {
  const absolute = resolve(requested);
  let canonical: string;
  try {
    canonical = realpathSync(absolute);
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      throw new CommandError(ErrorKind.InvalidArguments, `workspace root ${absolute} does not exist`);
    }
    throw err;
  }
  if (!statSync(canonical).isDirectory()) {
    throw new CommandError(ErrorKind.InvalidArguments, `workspace root ${absolute} is not a directory`);
  }
  return canonical;
}

export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: Environment = process.env,
  cwd: string = process.cwd(),
): BulwarkConfig {
  const home = resolveHome(overrides.home, env);
  const file = readConfigFile(home);

  const sandboxRaw = nonEmpty(overrides.sandbox);
  const sandboxEnv = nonEmpty(env['BULWARK_SANDBOX']);
  const sandboxLevel =
    sandboxRaw !== undefined
      ? sandboxFrom(sandboxRaw, '--sandbox')
      : sandboxEnv !== undefined
        ? sandboxFrom(sandboxEnv, 'BULWARK_SANDBOX')
        : file.sandbox ?? SandboxLevel.WorkspaceWrite;

  const modeRaw = nonEmpty(overrides.approvalMode);
  const modeEnv = nonEmpty(env['BULWARK_APPROVAL_MODE']);
  const approvalMode =
    modeRaw !== undefined
      ? approvalModeFrom(modeRaw, '--approval-mode')
      : modeEnv !== undefined
        ? approvalModeFrom(modeEnv, 'BULWARK_APPROVAL_MODE')
        : file.approval_mode ?? ApprovalMode.Interactive;

  const askEnv = nonEmpty(env['BULWARK_ASK_FOR_APPROVAL']);
  const requireApproval =
    overrides.requireApproval ??
    (askEnv !== undefined ? parseBooleanFlag(askEnv, 'BULWARK_ASK_FOR_APPROVAL') : file.ask_for_approval ?? false);

  const auditEnv = nonEmpty(env['BULWARK_AUDIT_ENABLED']);
  const auditEnabled =
    overrides.auditEnabled ??
    (auditEnv !== undefined ? parseBooleanFlag(auditEnv, 'BULWARK_AUDIT_ENABLED') : file.audit_enabled ?? true);

  // Paths from flags and environment are relative to the current directory;
  // paths in config.json are relative to home.
  const auditFlag = nonEmpty(overrides.auditPath) ?? nonEmpty(env['BULWARK_AUDIT_PATH']);
  const auditPath =
    auditFlag !== undefined ? resolve(cwd, auditFlag) : resolve(home, file.audit_path ?? join('audit', 'audit.jsonl'));

  return {
    home,
    workspaceRoot: resolveWorkspaceRoot(nonEmpty(overrides.workspaceRoot) ?? cwd),
    sandboxLevel,
    approvalMode,
    requireApproval,
    auditEnabled,
    auditPath,
    actionLogMaxSize: file.action_log_max_size ?? DEFAULT_ACTION_LOG_CAPACITY,
    approvalTimeoutMs: file.approval_timeout_ms ?? DEFAULT_APPROVAL_TIMEOUT_MS,
    shellTimeoutMs: file.shell_timeout_ms ?? DEFAULT_SHELL_TIMEOUT_MS,
    checkCommands: file.check_commands ?? DEFAULT_CHECK_COMMANDS,
    redactPatterns: file.redact_patterns ?? [],
    riskRulesPath: file.risk_rules_path !== undefined ? resolve(home, file.risk_rules_path) : undefined,
  };
}
