/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * Global flags are declared here and read by every subcommand through
 * `optsWithGlobals()`. With no subcommand, an interactive terminal gets the
 * readline shell under the same flags (`bulwark --sandbox read-only`);
 * anything else gets the help text.
 */

import { Command } from 'commander'
import { auditCommand } from './audit.js'
import { execCommand } from './exec.js'
import { historyCommand } from './history.js'
import type { GlobalOptions } from './runtime.js'
import { statusCommand } from './status.js'

export interface ProgramOptions {
  /** A TTY is attached and BULWARK_NO_TUI is unset. */
  readonly interactive: boolean
}

export function buildProgram({ interactive }: ProgramOptions): Command {
  const program = new Command()

  program
    .name('bulwark')
    .description(
      'Bulwark — sandboxed, approval-gated command execution for coding agents.\n' +
      'Every operation is checked against the sandbox, risk-classified, audited and undoable.',
    )
    .version('0.1.0')
    .option('--sandbox <level>', 'Sandbox level: read-only, workspace-write or full-access')
    .option('--ask-for-approval', 'Require approval for every write and shell operation')
    .option('--cd <path>', 'Workspace root (default: current directory)')
    .option('--approval-mode <mode>', 'interactive, auto-approve-low-risk or non-interactive')
    .option('--audit-path <path>', 'Audit log file (NDJSON)')
    .option('--no-audit', 'Do not write audit entries')
    .option('--home <dir>', 'State directory (default: $BULWARK_HOME or ~/.bulwark)')

  program.addCommand(execCommand)
  program.addCommand(auditCommand)
  program.addCommand(historyCommand)
  program.addCommand(statusCommand)

  program.action(async (options: GlobalOptions) => {
    if (!interactive) {
      program.help()
    }
    // Deferred so scripted runs never load readline or Ink.
    const { launchShell } = await import('../tui/shell.js')
    await launchShell(options)
  })

  return program
}
