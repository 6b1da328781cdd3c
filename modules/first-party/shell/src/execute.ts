/**
 * Bulwark Shell Commands — Handlers
 *
 * Both commands run through the shell view the pipeline hands to
 * `execute`, which refuses any text other than the planned one and binds
 * the invocation's cancellation signal. The working directory is always
 * the workspace root.
 *
 * A shell run cannot be undone: the declared change is Opaque, so the
 * action log records it as non-reversible and a failed run reports
 * rollback `not-reversible`.
 */

import type { CommandContext, ExecutionControls, RegisteredCommand, ShellRunResult } from '@bulwark/kernel';
import { CommandError, ErrorKind, defineCommand, opaqueChange } from '@bulwark/kernel';
import type { RunArgs } from './manifest.js';
import { CHECK_DESCRIPTOR, RUN_DESCRIPTOR, checkArgsSchema, runArgsSchema } from './manifest.js';

/** Lines of stderr carried into a failure reason. */
export const STDERR_TAIL_LINES = 20;

export interface ShellCommandOptions {
  readonly defaultTimeoutMs: number;
}

export interface CheckCommandOptions extends ShellCommandOptions {
  /** Scripts `check` may run, verbatim. */
  readonly allowed: ReadonlyArray<string>;
}

interface ShellRequest {
  readonly id: string;
  readonly command: string;
  readonly timeoutMs: number;
  readonly env?: Readonly<Record<string, string>> | undefined;
}

function renderInvocation(request: ShellRequest, context: CommandContext): string {
  const lines = [`$ ${request.command}`, `  cwd: ${context.workspace_root}`, `  timeout: ${request.timeoutMs} ms`];
  const names = Object.keys(request.env ?? {});
  if (names.length > 0) lines.push(`  env: ${names.join(', ')}`);
  return lines.join('\n');
}

function tail(text: string, count: number): string {
  const lines = text.trimEnd().split('\n');
  return lines.slice(Math.max(0, lines.length - count)).join('\n');
}

function combinedOutput(result: ShellRunResult): string {
  if (result.stderr === '') return result.stdout;
  const separator = result.stdout === '' || result.stdout.endsWith('\n') ? '' : '\n';
  return `${result.stdout}${separator}[stderr]\n${result.stderr}`;
}

async function runShell(
  request: ShellRequest,
  context: CommandContext,
  controls: ExecutionControls,
): Promise<string> {
  controls.begin(opaqueChange(`${request.id}: ${request.command} (effects not reversible)`));
  const result = await controls.shell.run(request.command, {
    cwd: context.workspace_root,
    env: request.env,
    timeoutMs: request.timeoutMs,
  });

  const output = combinedOutput(result);
  if (result.cancelled) {
    throw new CommandError(ErrorKind.Cancelled, `${request.command} was cancelled`, { output });
  }
  if (result.timedOut) {
    const reason = `${request.command} timed out after ${request.timeoutMs} ms`;
    throw new CommandError(ErrorKind.ExecutionFailed, reason, { output });
  }
  if (result.exitCode === null) {
    throw new CommandError(ErrorKind.ExecutionFailed, `${request.command} was terminated by a signal`, { output });
  }
  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim() === '' ? '' : `\n${tail(result.stderr, STDERR_TAIL_LINES)}`;
    const reason = `${request.command} exited with code ${result.exitCode}${stderr}`;
    throw new CommandError(ErrorKind.ExecutionFailed, reason, { code: result.exitCode, output });
  }
  return output;
}

export function createRunCommand(options: ShellCommandOptions): RegisteredCommand {
  const request = (args: RunArgs): ShellRequest => ({
    id: RUN_DESCRIPTOR.id,
    command: args.command,
    timeoutMs: args.timeout_ms ?? options.defaultTimeoutMs,
    env: args.env,
  });

  return defineCommand({
    descriptor: RUN_DESCRIPTOR,
    argsSchema: runArgsSchema,
    plan: (args) => ({
      summary: `run: ${args.command}`,
      actions: [{ kind: 'ExecuteShell', command: args.command }],
    }),
    render: async (args, context) => renderInvocation(request(args), context),
    execute: (args, context, controls) => runShell(request(args), context, controls),
  });
}

export function createCheckCommand(options: CheckCommandOptions): RegisteredCommand {
  const request = (script: string): ShellRequest => ({
    id: CHECK_DESCRIPTOR.id,
    command: script,
    timeoutMs: options.defaultTimeoutMs,
  });

  return defineCommand({
    descriptor: CHECK_DESCRIPTOR,
    argsSchema: checkArgsSchema(options.allowed),
    plan: (args) => ({
      summary: `check: ${args.script}`,
      actions: [{ kind: 'ExecuteShell', command: args.script }],
    }),
    render: async (args, context) => renderInvocation(request(args.script), context),
    execute: (args, context, controls) => runShell(request(args.script), context, controls),
  });
}

/** Both shell commands, configured from the session's settings. */
export function createShellCommands(options: CheckCommandOptions): ReadonlyArray<RegisteredCommand> {
  return [createRunCommand(options), createCheckCommand(options)];
}
