/**
 * @bulwark/cli
 *
 * Operator command-line interface: the Commander program (`exec`, `audit`,
 * `history`, `status`), the interactive readline shell and the Ink audit
 * view. The executable is src/bin/bulwark.ts.
 *
 * Usage:
 *   bulwark                                   (TTY: interactive shell)
 *   bulwark status
 *   bulwark exec <command> [args-json] [--dry-run] [--preview] [--json]
 *   bulwark audit [--session <id>] [--limit <n>] [--json] [--view]
 *   bulwark history [--session <id>]
 */

export type { ProgramOptions } from './commands/index.js';
export { buildProgram } from './commands/index.js';
export type { GlobalOptions, RuntimeOptions } from './commands/runtime.js';
export { UnattendedPrompter, buildCommands, buildRuntime, loadConfig, toOverrides, unattendedConfig } from './commands/runtime.js';
export { StderrDiagnostics, formatDiagnostic } from './diagnostics.js';
export type { Questioner } from './tui/approval.js';
export { ReadlinePrompter } from './tui/approval.js';
export type { ShellReply } from './tui/controller.js';
export { ShellController } from './tui/controller.js';
