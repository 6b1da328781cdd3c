import type { AuditLogEntry } from '@bulwark/kernel'
import type { AuditReadStats } from '@bulwark/runtime-host'
import { outcomeColor, riskColor, t } from '../theme.js'

const OUTCOME_LABEL: Record<AuditLogEntry['outcome'], string> = {
  'success': '✓ success',
  'failure': '✕ failure',
  'dry-run': '◇ dry-run',
}

export const outcomeLabel = (outcome: AuditLogEntry['outcome']): string => OUTCOME_LABEL[outcome]

/** The subject of an entry: its shell text, else its paths, else nothing. */
export function auditSubject(entry: AuditLogEntry): string {
  if (entry.command_text !== undefined) return entry.command_text
  return entry.paths.join(', ')
}

/**
 * formatAuditEntry — one line per entry.
 *
 * Format: timestamp | outcome | command subject | risk | approval | reason
 */
export function formatAuditEntry(entry: AuditLogEntry): string {
  const label = OUTCOME_LABEL[entry.outcome]
  const subject = auditSubject(entry)
  const reason = entry.reason !== undefined ? '  ' + t.muted(entry.reason.split('\n')[0] ?? '') : ''
  return (
    '  ' + t.dim(entry.timestamp) + '  ' +
    outcomeColor(entry.outcome)(label.padEnd(10)) + ' ' +
    t.white(entry.command.padEnd(7)) + ' ' +
    t.text(subject) + '  ' +
    riskColor(entry.risk_level)(entry.risk_level) + '  ' +
    t.muted(entry.approval_status) +
    reason
  )
}

export function formatAuditLog(entries: ReadonlyArray<AuditLogEntry>, stats: AuditReadStats): string {
  if (entries.length === 0) return '\n  ' + t.muted('no audit entries') + '\n'

  let out = '\n' + entries.map(formatAuditEntry).join('\n') + '\n'

  const notes: string[] = []
  if (stats.parseErrors > 0) notes.push(`${stats.parseErrors} unreadable line(s) skipped`)
  if (stats.duplicates > 0) notes.push(`${stats.duplicates} duplicate(s) dropped`)
  if (stats.partialTrailingLine) notes.push('partial trailing line ignored')
  if (stats.outOfOrder) notes.push('timestamps out of order')
  if (notes.length > 0) out += '\n  ' + t.amber(notes.join(' · ')) + '\n'
  return out
}
