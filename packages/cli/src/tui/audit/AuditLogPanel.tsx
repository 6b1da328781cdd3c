import React from 'react'
import { Box, Text } from 'ink'
import type { AuditLogEntry } from '@bulwark/kernel'
import { Panel } from './Panel.js'
import { visibleWindow } from './window.js'
import { auditSubject, outcomeLabel } from '../output/audit.js'
import { hex, outcomeHex } from '../theme.js'

interface AuditLogPanelProps {
  entries: ReadonlyArray<AuditLogEntry>
  /** Index into `entries` of the highlighted row. */
  selected: number
  /** Rows that fit; the window scrolls to keep `selected` visible. */
  height: number
  isFocused: boolean
}

/**
 * AuditLogPanel — audit entries, newest last.
 *
 * Format: timestamp | outcome colored | command | subject dim
 */
export function AuditLogPanel({ entries, selected, height, isFocused }: AuditLogPanelProps): React.ReactElement {
  const { start, end } = visibleWindow(entries.length, selected, height)

  return (
    <Panel
      title="audit log"
      meta={`${entries.length} entries`}
      focused={isFocused}
      grow={2}
      placeholder={entries.length === 0 ? 'no audit entries' : undefined}
    >
      {entries.slice(start, end).map((entry, i) => {
        const isSelected = start + i === selected
        return (
          <Box key={entry.event_id} gap={2}>
            <Text color={isSelected ? hex.blue : hex.dim}>{isSelected ? '›' : ' '}</Text>
            <Text color={hex.dim}>{entry.timestamp}</Text>
            <Text color={outcomeHex(entry.outcome)}>{outcomeLabel(entry.outcome)}</Text>
            <Text color={hex.text}>{entry.command}</Text>
            <Box flexGrow={1}><Text color={hex.muted} wrap="truncate-end">{auditSubject(entry)}</Text></Box>
          </Box>
        )
      })}
    </Panel>
  )
}
