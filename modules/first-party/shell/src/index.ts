/**
 * @bulwark/command-shell
 *
 * First-party shell commands: `run` (full-access only) and `check` (the
 * workspace-write opt-in for allowlisted project scripts).
 */

export type { CheckArgs, RunArgs } from './manifest.js';
export { CHECK_DESCRIPTOR, RUN_DESCRIPTOR, checkArgsSchema, runArgsSchema } from './manifest.js';
export type { CheckCommandOptions, ShellCommandOptions } from './execute.js';
export { STDERR_TAIL_LINES, createCheckCommand, createRunCommand, createShellCommands } from './execute.js';
