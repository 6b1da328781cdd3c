/**
 * shell.ts — Bulwark interactive readline shell.
 *
 * Architecture: three strictly separated layers.
 *
 * LAYER 1 — READLINE (keystroke hot path)
 *   Node.js readline in raw mode. Handles prompt display, line editing,
 *   history, submit on Enter, Ctrl+C. Approval prompts are readline
 *   questions, so the answer line never reaches the command router.
 *
 * LAYER 2 — STDOUT OUTPUT (command results)
 *   Direct process.stdout.write() with chalk coloring. Append-only.
 *   Everything a line produces comes from ShellController.
 *
 * LAYER 3 — INK FULL-SCREEN VIEW (audit log)
 *   Ink mounts ONLY for /audit-view. readline is paused while it runs and
 *   resumes on exit.
 */

import * as readline from 'node:readline/promises'
import React from 'react'
import { render } from 'ink'
import type { Session } from '@bulwark/runtime-host'
import { loadAudit } from '../commands/audit.js'
import type { GlobalOptions } from '../commands/runtime.js'
import { buildRuntime } from '../commands/runtime.js'
import { ReadlinePrompter } from './approval.js'
import { ShellController } from './controller.js'
import { formatHeader } from './output/header.js'
import { buildPS1 } from './prompt.js'
import { t } from './theme.js'

function mountAuditView(rl: readline.Interface, session: Session, ps1: string): void {
  // Ink owns raw mode while mounted; pausing readline is enough to stop it
  // consuming stdin.
  rl.pause()

  // Ink unrefs stdin during cleanup. The interval holds the event loop
  // open until readline owns the process again.
  const keepAlive = setInterval(() => { /* keep event loop alive */ }, 60_000)

  const restore = (): void => {
    process.stdin.ref()
    clearInterval(keepAlive)
    process.stdin.setRawMode(true)
    rl.resume()
    process.stdout.write('\n' + ps1)
  }

  import('./audit/AuditView.js')
    .then(({ AuditView }) => {
      const path = session.config.auditPath
      const { waitUntilExit } = render(
        React.createElement(AuditView, {
          load: () => loadAudit(path),
          source: path,
          onExit: () => { /* teardown is Ink's */ },
        }),
      )
      waitUntilExit().then(restore, restore)
    })
    .catch((err: unknown) => {
      process.stdout.write('\n  ' + t.red('audit view error: ' + String(err)) + '\n')
      restore()
    })
}

/**
 * launchShell — entry point for the interactive TTY shell.
 *
 * Called from the program's default action when a TTY is attached and
 * BULWARK_NO_TUI is not set.
 */
export async function launchShell(options: GlobalOptions): Promise<void> {
  const rl = readline.createInterface({
    input:       process.stdin,
    output:      process.stdout,
    terminal:    true,
    historySize: 50,
  })

  // 1. Open the session; approval prompts are asked on this readline.
  const session = buildRuntime(options, {
    prompter: new ReadlinePrompter(rl, text => process.stdout.write(text)),
  })
  const controller = new ShellController(session)

  // 2. Startup header and prompt.
  process.stdout.write(formatHeader(session.config, session.id))
  const ps1 = buildPS1(session.config)
  process.stdin.setRawMode(true)
  rl.setPrompt(ps1)

  // Written directly rather than via rl.prompt(): readline's cursor model
  // desyncs after external stdout writes.
  const showPrompt = (): void => {
    process.stdout.write('\n' + ps1)
  }

  const shutdown = async (): Promise<void> => {
    rl.close()
    await session.close()
    process.stdout.write('\n')
    process.exit(0)
  }

  showPrompt()

  // 3. Command routing
  rl.on('line', (line: string) => {
    controller.handle(line)
      .then(reply => {
        switch (reply.kind) {
          case 'output':
            process.stdout.write(reply.text)
            showPrompt()
            return
          case 'audit-view':
            // The restore path redraws the prompt.
            mountAuditView(rl, session, ps1)
            return
          case 'exit':
            return shutdown()
        }
      })
      .catch((err: unknown) => {
        process.stdout.write('\n  ' + t.red(err instanceof Error ? err.message : String(err)) + '\n')
        showPrompt()
      })
  })

  // 4. Ctrl+C cancels the running command; at an idle prompt it exits.
  rl.on('SIGINT', () => {
    if (controller.cancel()) {
      process.stdout.write('\n  ' + t.amber('cancelling…') + '\n')
      return
    }
    shutdown().catch((err: unknown) => {
      process.stderr.write(`[bulwark] ${err instanceof Error ? err.message : String(err)}\n`)
      process.exit(1)
    })
  })
}
