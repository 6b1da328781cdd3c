/**
 * bulwark exec — Run one command through the execution pipeline
 *
 *   bulwark exec read '{"path":"README.md"}'
 *   bulwark exec write '{"path":"notes.md","content":"hi\n"}' --dry-run
 *   bulwark --sandbox full-access exec run '{"command":"npm test"}'
 *
 * With a terminal attached, approval prompts appear inline on stderr.
 * Without one the run is unattended (see buildRuntime). Exit code is 0 on
 * success and 1 otherwise.
 */

import { Command } from 'commander';
import * as readline from 'node:readline/promises';
import { stdin as input, stderr } from 'node:process';
import type { Session } from '@bulwark/runtime-host';
import { ReadlinePrompter } from '../tui/approval.js';
import { formatResult } from '../tui/output/result.js';
import { parseArgsJson } from './args.js';
import type { GlobalOptions } from './runtime.js';
import { buildRuntime } from './runtime.js';

export interface ExecOptions {
  dryRun?: boolean;
  preview?: boolean;
  overrideBoundary?: boolean;
  json?: boolean;
}

/**
 * Invokes one command and writes its result. The SIGINT hooks and the
 * readline interface are released on every path, including a runtime that
 * fails to build.
 */
export async function runExec(
  id: string,
  args: Record<string, unknown>,
  options: ExecOptions,
  globals: GlobalOptions,
  build: typeof buildRuntime = buildRuntime,
): Promise<number> {
  const rl = input.isTTY ? readline.createInterface({ input, output: stderr }) : undefined;
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  rl?.on('SIGINT', onSigint);
  process.once('SIGINT', onSigint);

  let session: Session | undefined;
  try {
    session = build(globals, {
      prompter: rl === undefined ? undefined : new ReadlinePrompter(rl, (text) => stderr.write(text)),
    });
    const result = await session.invoke(id, args, {
      dryRun: options.dryRun === true,
      preview: options.preview === true,
      boundaryOverride: options.overrideBoundary === true,
      signal: controller.signal,
    });

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ session_id: session.id, ...result }, null, 2));
    } else if (result.success) {
      process.stdout.write(formatResult(result));
    } else {
      process.stderr.write(formatResult(result));
    }
    return result.success ? 0 : 1;
  } finally {
    process.off('SIGINT', onSigint);
    rl?.close();
    await session?.close();
  }
}

export const execCommand = new Command('exec')
  .description('Run one command (read, create, write, edit, delete, rename, run, check)')
  .argument('<command>', 'Command id')
  .argument('[args-json]', 'Arguments as a JSON object', '{}')
  .option('--dry-run', 'Render the preview and stop before any side effect')
  .option('--preview', 'Render the preview even when the command only previews on request')
  .option('--override-boundary', 'Ask for approval instead of refusing paths outside the workspace (full-access only)')
  .option('--json', 'Output the full result as JSON')
  .action(async (id: string, argsJson: string, options: ExecOptions, command: Command) => {
    const args = parseArgsJson(argsJson);
    if (!args.ok) {
      process.stderr.write(`[bulwark exec] ${args.message}\n`);
      process.exit(1);
    }
    process.exitCode = await runExec(id, args.value, options, command.optsWithGlobals<GlobalOptions>());
  });
