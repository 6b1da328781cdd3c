import type { Action, CommandExecutionResult, RedoResult, UndoResult } from '@bulwark/kernel'
import { t } from '../theme.js'

const indent = (text: string, pad = '    '): string =>
  text.split('\n').map(line => pad + line).join('\n')

/**
 * formatResult — one invocation's outcome for the shell and `exec`.
 *
 *   ✓ write  12ms
 *     wrote notes.md (6 bytes)
 *
 *   ✕ write  PolicyDenied
 *     WriteFile is not permitted in the read-only sandbox
 */
export function formatResult(result: CommandExecutionResult): string {
  const { metadata } = result
  const timing = t.dim(`${metadata.duration_ms}ms`)
  let out = '\n'

  if (result.preview !== undefined && !metadata.dry_run) {
    out += indent(t.muted(result.preview), '  ') + '\n\n'
  }

  if (result.success) {
    const mark = metadata.dry_run ? t.blue('◇ dry run') : t.green('✓')
    out += '  ' + mark + ' ' + t.white(metadata.command) + '  ' + timing + '\n'
    if (result.output !== '') out += indent(t.text(result.output.replace(/\n$/, ''))) + '\n'
    return out
  }

  const kind = result.error?.kind ?? 'failed'
  out += '  ' + t.red('✕') + ' ' + t.white(metadata.command) + '  ' + t.red(kind) + '  ' + timing + '\n'
  if (result.error !== undefined) out += indent(t.text(result.error.reason)) + '\n'
  if (metadata.rollback !== 'not-needed') out += '    ' + t.amber(`rollback: ${metadata.rollback}`) + '\n'
  return out
}

function describe(action: Action): string {
  return t.white(action.command) + '  ' + t.text(action.description)
}

export function formatUndo(result: UndoResult): string {
  return result.status === 'undone'
    ? '\n  ' + t.green('↶ undone') + '  ' + describe(result.action) + '\n'
    : '\n  ' + t.muted('nothing to undo') + '\n'
}

export function formatRedo(result: RedoResult): string {
  return result.status === 'redone'
    ? '\n  ' + t.green('↷ redone') + '  ' + describe(result.action) + '\n'
    : '\n  ' + t.muted('nothing to redo') + '\n'
}

/**
 * formatActions — an action history with the undo cursor.
 * Entries at or past `cursor` are undone and would be redone next.
 */
export function formatActions(actions: ReadonlyArray<Action>, cursor = actions.length): string {
  if (actions.length === 0) return '\n  ' + t.muted('no actions recorded') + '\n'

  let out = '\n'
  actions.forEach((action, i) => {
    const applied = i < cursor
    const mark = applied ? t.green('●') : t.dim('○')
    const flag = action.reversible ? '' : '  ' + t.amber('not reversible')
    const state = applied ? '' : '  ' + t.dim('undone')
    out += (
      '  ' + mark + ' ' +
      t.dim(action.timestamp) + '  ' +
      t.white(action.command.padEnd(8)) + ' ' +
      t.text(action.description) +
      flag + state + '\n'
    )
  })
  return out
}
