import type { CommandDescriptor } from '@bulwark/kernel'
import { t } from '../theme.js'

/**
 * formatHelp — shell commands grouped by category.
 */
export function formatHelp(commands: ReadonlyArray<CommandDescriptor>): string {
  const section = (label: string) =>
    '\n  ' + t.dim('─── ') + t.blue(label) + '\n'

  const cmd = (name: string, desc: string) => {
    const pad = ' '.repeat(Math.max(1, 30 - name.length))
    return '  ' + t.white(name) + t.dim(pad + desc) + '\n'
  }

  let out = '\n'

  out += section('commands')
  for (const descriptor of commands) {
    out += cmd(`${descriptor.id} <args-json>`, descriptor.description)
  }
  out += cmd('dry-run <command> <args-json>', 'preview without touching anything')

  out += section('session')
  out += cmd('undo',                    'revert the most recent applied action')
  out += cmd('redo',                    're-apply the most recently undone action')
  out += cmd('history',                 'actions recorded this session')
  out += cmd('pending',                 'approval requests waiting for an answer')
  out += cmd('status',                  'sandbox, approval mode and available commands')

  out += section('navigation')
  out += cmd('/audit-view  /av',        'open the audit log (Ink view)')

  out += section('system')
  out += cmd('help',                    'show this help')
  out += cmd('exit  Ctrl+C',            'close the session and exit')

  out += '\n  ' + t.dim(`example: write {"path":"notes.md","content":"hello\\n"}`) + '\n'

  return out
}
