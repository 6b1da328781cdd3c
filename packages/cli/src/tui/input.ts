import { parseArgsJson } from '../commands/args.js'

export const BUILTINS = ['undo', 'redo', 'history', 'pending', 'status', 'help', 'exit', 'audit-view'] as const

export type Builtin = (typeof BUILTINS)[number]

export type ShellInput =
  | { kind: 'empty' }
  | { kind: 'builtin'; name: Builtin }
  | { kind: 'invoke'; command: string; args: Record<string, unknown>; dryRun: boolean }
  | { kind: 'error'; message: string }

const ALIASES: Readonly<Record<string, Builtin>> = {
  quit: 'exit',
  '/audit-view': 'audit-view',
  '/av': 'audit-view',
}

function isBuiltin(word: string): word is Builtin {
  return BUILTINS.some(name => name === word)
}

function splitHead(input: string): [string, string] {
  const space = input.indexOf(' ')
  return space === -1 ? [input, ''] : [input.slice(0, space), input.slice(space + 1).trim()]
}

/**
 * parseShellLine — route one line typed at the shell prompt.
 *
 *   undo | redo | history | pending | status | help | exit
 *   <command> [args-json]
 *   dry-run <command> [args-json]
 */
export function parseShellLine(line: string): ShellInput {
  const input = line.trim()
  if (input === '') return { kind: 'empty' }

  const [head, rest] = splitHead(input)
  const alias = ALIASES[head]
  if (alias !== undefined && rest === '') return { kind: 'builtin', name: alias }
  if (isBuiltin(head) && rest === '') return { kind: 'builtin', name: head }

  if (head === 'dry-run') {
    if (rest === '') return { kind: 'error', message: 'usage: dry-run <command> [args-json]' }
    const [command, payload] = splitHead(rest)
    return invocation(command, payload, true)
  }
  return invocation(head, rest, false)
}

function invocation(command: string, payload: string, dryRun: boolean): ShellInput {
  const args = parseArgsJson(payload)
  if (!args.ok) return { kind: 'error', message: args.message }
  return { kind: 'invoke', command, args: args.value, dryRun }
}
