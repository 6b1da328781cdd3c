import { basename } from 'node:path'
import { ApprovalMode } from '@bulwark/kernel'
import type { BulwarkConfig } from '@bulwark/runtime-host'
import { sandboxColor, t } from './theme.js'

/**
 * buildPS1 — the shell prompt: workspace name, sandbox level, then a flag
 * for each setting that changes how the next command is gated or recorded.
 *
 *   my-project workspace-write ❯
 *   my-project full-access +ask auto-approve-low-risk -audit ❯
 */
export function buildPS1(config: BulwarkConfig): string {
  const flags: string[] = []
  if (config.requireApproval) flags.push(t.amber('+ask'))
  if (config.approvalMode !== ApprovalMode.Interactive) flags.push(t.muted(config.approvalMode))
  if (!config.auditEnabled) flags.push(t.red('-audit'))

  const level = config.sandboxLevel
  return [t.blue.bold(basename(config.workspaceRoot)), sandboxColor(level)(level), ...flags].join(' ') + t.blueDim(' ❯ ')
}
