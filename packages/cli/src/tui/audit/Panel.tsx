import React from 'react'
import { Box, Text } from 'ink'
import { hex } from '../theme.js'

interface PanelProps {
  title: string
  /** Right of the title: entry count, event id. */
  meta?: string
  focused: boolean
  /** Border and title color while focused. */
  accent?: string
  /** Replaces the body when there is nothing to list. */
  placeholder?: string
  grow?: number
  children?: React.ReactNode
}

/**
 * Panel — one pane of the audit view. The focused pane gets a bold border
 * in its accent color; the detail pane passes the selected entry's outcome
 * color.
 */
export function Panel({
  title,
  meta,
  focused,
  accent = hex.blue,
  placeholder,
  grow = 1,
  children,
}: PanelProps): React.ReactElement {
  return (
    <Box
      flexGrow={grow}
      flexDirection="column"
      borderStyle={focused ? 'bold' : 'single'}
      borderColor={focused ? accent : hex.border}
      paddingX={1}
    >
      <Box justifyContent="space-between">
        <Text color={focused ? accent : hex.muted} bold={focused}>{title}</Text>
        {meta !== undefined && <Text color={hex.dim}>{meta}</Text>}
      </Box>
      {placeholder !== undefined ? <Text color={hex.muted}>{placeholder}</Text> : children}
    </Box>
  )
}
