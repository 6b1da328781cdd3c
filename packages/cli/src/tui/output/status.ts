import type { CommandDescriptor } from '@bulwark/kernel'
import { grantedCapabilities, missingCapabilities } from '@bulwark/kernel'
import type { BulwarkConfig } from '@bulwark/runtime-host'
import { sandboxColor, t } from '../theme.js'

export interface StatusView {
  readonly config: BulwarkConfig
  readonly commands: ReadonlyArray<CommandDescriptor>
  readonly sessionId?: string | undefined
  readonly pendingApprovals?: number | undefined
  /** Actions recorded this session and how many are currently applied. */
  readonly actions?: { readonly size: number; readonly position: number } | undefined
}

/** Whether a descriptor's capabilities can be granted at all at this level. */
export function isAvailable(config: BulwarkConfig, descriptor: CommandDescriptor): boolean {
  const granted = grantedCapabilities(config.sandboxLevel, {
    workspaceShellOptIn: descriptor.workspace_shell_opt_in,
  })
  return missingCapabilities(descriptor.required_capabilities, granted).length === 0
}

/**
 * formatStatus — effective policy, paths and the command catalog.
 */
export function formatStatus(view: StatusView): string {
  const { config } = view
  const labelW = 16
  const label = (s: string) => t.muted(s + ' '.repeat(Math.max(1, labelW - s.length)))

  let out = '\n'
  out += (
    '  ' + t.blue('◈ bulwark') + '  ' +
    sandboxColor(config.sandboxLevel)(config.sandboxLevel) + '  ' +
    t.dim('·') + '  ' + t.text(config.approvalMode) +
    (config.requireApproval ? '  ' + t.dim('·') + '  ' + t.amber('ask-for-approval') : '') +
    '\n\n'
  )

  out += '  ' + label('workspace') + t.white(config.workspaceRoot) + '\n'
  out += '  ' + label('home') + t.text(config.home) + '\n'
  out += '  ' + label('audit') + t.text(config.auditPath) + (config.auditEnabled ? '' : '  ' + t.amber('disabled')) + '\n'
  if (view.sessionId !== undefined) out += '  ' + label('session') + t.text(view.sessionId) + '\n'

  const capabilities = [...grantedCapabilities(config.sandboxLevel, { requireApproval: config.requireApproval })]
  out += '  ' + label('capabilities') + (capabilities.length > 0 ? t.white(capabilities.join(', ')) : t.muted('none')) + '\n'

  if (view.actions !== undefined) {
    out += '  ' + label('actions') + t.white(String(view.actions.position)) + t.dim(` / ${view.actions.size} applied`) + '\n'
  }
  if (view.pendingApprovals !== undefined) {
    out += '  ' + label('pending') + t.white(String(view.pendingApprovals)) + '\n'
  }

  out += '\n  ' + t.muted('commands') + '\n'
  for (const descriptor of view.commands) {
    const available = isAvailable(config, descriptor)
    const dot = available ? t.green('●') : t.dim('○')
    const name = available ? t.white(descriptor.id) : t.muted(descriptor.id)
    const pad = ' '.repeat(Math.max(1, 10 - descriptor.id.length))
    const approval = descriptor.requires_approval ? '  ' + t.amber('approval') : ''
    out += '    ' + dot + ' ' + name + pad + t.dim(descriptor.description) + approval + '\n'
  }

  return out
}
