import type { BulwarkConfig } from '@bulwark/runtime-host'
import { sandboxColor, t } from '../theme.js'

/**
 * formatHeader — the startup banner.
 *
 * Two parts: the shield mark with wordmark and tagline, then the active
 * workspace line.
 */
export function formatHeader(config: BulwarkConfig, sessionId: string): string {

  // ── Part 1: Brand block ──────────────────────────────────────────────────

  const d = [
    '    ' + t.blueDim('▄▄▄▄▄▄▄'),
    '    ' + t.blueDim('█') + ' ' + t.blue('▓▓▓▓▓') + t.blueDim('█') +
      '      ' + t.blue.bold('B U L W A R K'),
    '    ' + t.blueDim('█') + ' ' + t.blue('▓') + t.white.bold('◈') + t.blue('▓▓▓') + t.blueDim('█') +
      '      ' + t.muted('Sandboxed command execution for coding agents'),
    '     ' + t.blueDim('▀▄') + t.blue('▓▓') + t.blueDim('▄▀'),
    '       ' + t.blueDim('▀▀'),
  ]

  let out = '\n'
  for (const line of d) out += line + '\n'

  // ── Part 2: Workspace ────────────────────────────────────────────────────

  out += '\n  ' + t.dim('─'.repeat(60)) + '\n\n'
  out += (
    '  ' + t.muted('workspace') + '  ' + t.blue(config.workspaceRoot) +
    '  ' + t.dim('·') + '  ' + sandboxColor(config.sandboxLevel)(config.sandboxLevel) +
    '  ' + t.dim('·') + '  ' + t.text(config.approvalMode) + '\n'
  )
  out += '  ' + t.dim(`  session ${sessionId}  ·  type 'help' for commands`) + '\n'

  return out
}
