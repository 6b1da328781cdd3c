import type { ApprovalRequest } from '@bulwark/kernel'
import { ErrorKind, toErrorInfo } from '@bulwark/kernel'
import type { Session } from '@bulwark/runtime-host'
import { parseShellLine } from './input.js'
import type { Builtin } from './input.js'
import { formatHelp } from './output/help.js'
import { formatActions, formatRedo, formatResult, formatUndo } from './output/result.js'
import { formatStatus } from './output/status.js'
import { riskColor, t } from './theme.js'

export type ShellReply =
  | { kind: 'output'; text: string }
  | { kind: 'exit' }
  | { kind: 'audit-view' }

const output = (text: string): ShellReply => ({ kind: 'output', text })

const failure = (err: unknown): ShellReply => {
  const info = toErrorInfo(err, ErrorKind.ExecutionFailed)
  return output('\n  ' + t.red('✕ ' + info.kind) + '  ' + t.text(info.reason) + '\n')
}

export function formatPending(requests: ReadonlyArray<ApprovalRequest>): string {
  if (requests.length === 0) return '\n  ' + t.muted('no pending approvals') + '\n'
  let out = '\n'
  for (const request of requests) {
    out += (
      '  ' + t.dim(request.created_at) + '  ' +
      t.white(request.operation) + '  ' +
      riskColor(request.risk_level)(request.risk_level) + '  ' +
      t.muted(request.description) + '\n'
    )
  }
  return out
}

/**
 * ShellController — everything the shell does with a line, minus the
 * terminal. One invocation runs at a time; `cancel()` aborts it.
 */
export class ShellController {
  private current: AbortController | undefined

  constructor(private readonly session: Session) {}

  get busy(): boolean {
    return this.current !== undefined
  }

  /** Aborts the running invocation. False when nothing is running. */
  cancel(): boolean {
    if (this.current === undefined) return false
    this.current.abort()
    return true
  }

  async handle(line: string): Promise<ShellReply> {
    const input = parseShellLine(line)
    switch (input.kind) {
      case 'empty':
        return output('')
      case 'error':
        return output('\n  ' + t.red(input.message) + '\n')
      case 'builtin':
        return this.builtin(input.name)
      case 'invoke':
        return this.invoke(input.command, input.args, input.dryRun)
    }
  }

  private async builtin(name: Builtin): Promise<ShellReply> {
    const { session } = this
    const descriptors = session.registry.list().map(entry => entry.descriptor)

    switch (name) {
      case 'undo':
        try {
          return output(formatUndo(await session.undo()))
        } catch (err: unknown) {
          return failure(err)
        }
      case 'redo':
        try {
          return output(formatRedo(await session.redo()))
        } catch (err: unknown) {
          return failure(err)
        }
      case 'history': {
        const snapshot = session.actionLog.snapshot()
        return output(formatActions(snapshot.actions, snapshot.cursor))
      }
      case 'pending':
        return output(formatPending(session.approvals.listPending()))
      case 'status':
        return output(formatStatus({
          config: session.config,
          commands: descriptors,
          sessionId: session.id,
          pendingApprovals: session.approvals.pendingCount,
          actions: { size: session.actionLog.size, position: session.actionLog.position },
        }))
      case 'help':
        return output(formatHelp(descriptors))
      case 'exit':
        return { kind: 'exit' }
      case 'audit-view':
        return { kind: 'audit-view' }
    }
  }

  private async invoke(command: string, args: Record<string, unknown>, dryRun: boolean): Promise<ShellReply> {
    if (this.current !== undefined) {
      return output('\n  ' + t.amber('busy: wait for the running command, or Ctrl+C to cancel it') + '\n')
    }
    const controller = new AbortController()
    this.current = controller
    try {
      return output(formatResult(await this.session.invoke(command, args, { dryRun, signal: controller.signal })))
    } finally {
      this.current = undefined
    }
  }
}
