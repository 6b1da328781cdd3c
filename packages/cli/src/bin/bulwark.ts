#!/usr/bin/env node
/**
 * bin/bulwark.ts — TTY-aware entry point for the `bulwark` CLI command.
 *
 * In a TTY with BULWARK_NO_TUI unset, `bulwark` with no subcommand launches
 * the interactive readline shell. Subcommands always run through Commander.
 *
 * BULWARK_NO_TUI=1 bulwark     → help text
 * bulwark (in TTY)             → interactive shell
 */

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.env['BULWARK_NO_TUI'] === undefined

const { buildProgram } = await import('../commands/index.js')

try {
  await buildProgram({ interactive: isInteractive }).parseAsync()
} catch (err: unknown) {
  process.stderr.write(`[bulwark] ${err instanceof Error ? err.message : String(err)}\n`)
  process.exit(1)
}
