import React from 'react'
import { Box, Text } from 'ink'
import type { AuditLogEntry } from '@bulwark/kernel'
import { Panel } from './Panel.js'
import { hex, outcomeHex, riskHex } from '../theme.js'

interface AuditDetailPanelProps {
  entry: AuditLogEntry | undefined
  isFocused: boolean
}

function Field({ name, value, color = hex.text }: { name: string; value: string; color?: string }): React.ReactElement {
  return (
    <Box>
      <Box width={14}><Text color={hex.muted}>{name}</Text></Box>
      <Text color={color}>{value}</Text>
    </Box>
  )
}

/**
 * AuditDetailPanel — every field of the selected entry.
 */
export function AuditDetailPanel({ entry, isFocused }: AuditDetailPanelProps): React.ReactElement {
  if (entry === undefined) {
    return <Panel title="entry" focused={isFocused} placeholder="nothing selected" />
  }

  return (
    <Panel title="entry" meta={entry.event_id} focused={isFocused} accent={outcomeHex(entry.outcome)}>
      <Field name="outcome" value={entry.outcome} color={outcomeHex(entry.outcome)} />
      <Field name="command" value={entry.command} />
      {entry.command_text !== undefined && <Field name="shell" value={entry.command_text} />}
      {entry.paths.length > 0 && <Field name="paths" value={entry.paths.join(', ')} />}
      <Field name="risk" value={entry.risk_level} color={riskHex(entry.risk_level)} />
      <Field name="approval" value={entry.approval_status} />
      <Field name="sandbox" value={entry.sandbox_level} />
      <Field name="capabilities" value={entry.capabilities.join(', ') || '—'} />
      <Field name="state" value={entry.terminal_state} />
      {entry.error_kind !== undefined && <Field name="error" value={entry.error_kind} color={hex.red} />}
      {entry.reason !== undefined && <Field name="reason" value={entry.reason} />}
      <Field name="duration" value={`${entry.duration_ms} ms`} />
      <Field name="session" value={entry.session_id} />
      <Field name="actor" value={entry.actor} />
      <Field name="args hash" value={entry.args_hash.slice(0, 16)} />
      {entry.output_excerpt !== undefined && (
        <Box marginTop={1}><Text color={hex.dim} wrap="truncate-end">{entry.output_excerpt}</Text></Box>
      )}
    </Panel>
  )
}
