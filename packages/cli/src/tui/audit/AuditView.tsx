import React, { useEffect, useReducer, useState } from 'react'
import { Box, Text, useApp, useInput, useStdout } from 'ink'
import chalk from 'chalk'
import type { AuditLogEntry } from '@bulwark/kernel'
import type { AuditReadStats } from '@bulwark/runtime-host'
import { AuditLogPanel } from './AuditLogPanel.js'
import { AuditDetailPanel } from './AuditDetailPanel.js'
import { hex } from '../theme.js'

// ─── State ───────────────────────────────────────────────────────────────────

export interface AuditData {
  entries: ReadonlyArray<AuditLogEntry>
  stats: AuditReadStats
}

type AuditState =
  | { phase: 'loading' }
  | { phase: 'ready'; data: AuditData }
  | { phase: 'error'; message: string }

type AuditAction =
  | { type: 'LOADED'; data: AuditData }
  | { type: 'ERROR'; message: string }
  | { type: 'RELOAD' }

function reducer(_prev: AuditState, action: AuditAction): AuditState {
  switch (action.type) {
    case 'LOADED': return { phase: 'ready', data: action.data }
    case 'ERROR':  return { phase: 'error', message: action.message }
    case 'RELOAD': return { phase: 'loading' }
  }
}

const PANEL_COUNT = 2

// ─── Component ───────────────────────────────────────────────────────────────

export interface AuditViewProps {
  /** Reads the audit file; called on mount and on 'r'. */
  load: () => Promise<AuditData>
  /** Shown in the status bar. */
  source: string
  onExit: () => void
}

/**
 * AuditView — full-screen Ink view of the audit log.
 *
 * Keyboard:
 *   q / Escape  → exit
 *   ↑ / ↓       → select entry
 *   Tab         → switch panel
 *   r           → re-read the file
 */
export function AuditView({ load, source, onExit }: AuditViewProps): React.ReactElement {
  const { exit: inkExit } = useApp()
  const [state, dispatch] = useReducer(reducer, { phase: 'loading' })
  const [activePanel, setActivePanel] = useState(0)
  const [selected, setSelected] = useState(0)
  const [refreshKey, setRefreshKey] = useState(0)
  const { stdout } = useStdout()

  useEffect(() => {
    let cancelled = false

    dispatch({ type: 'RELOAD' })
    load()
      .then(data => {
        if (cancelled) return
        dispatch({ type: 'LOADED', data })
        setSelected(Math.max(0, data.entries.length - 1))
      })
      .catch((err: unknown) => {
        if (!cancelled) dispatch({ type: 'ERROR', message: err instanceof Error ? err.message : String(err) })
      })

    return () => { cancelled = true }
  }, [refreshKey, load])

  const total = state.phase === 'ready' ? state.data.entries.length : 0

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      onExit()
      inkExit()
      return
    }
    if (key.tab) {
      setActivePanel(p => (p + (key.shift ? PANEL_COUNT - 1 : 1)) % PANEL_COUNT)
      return
    }
    if (key.upArrow) {
      setSelected(s => Math.max(0, s - 1))
      return
    }
    if (key.downArrow) {
      setSelected(s => Math.min(Math.max(0, total - 1), s + 1))
      return
    }
    if (input === 'r') {
      setRefreshKey(k => k + 1)
    }
  })

  // ─── Loading ─────────────────────────────────────────────────────────────

  if (state.phase === 'loading') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={hex.blue}>◈ BULWARK</Text>
        <Text color={hex.dim}>loading…</Text>
      </Box>
    )
  }

  if (state.phase === 'error') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={hex.red}>error reading audit log: {state.message}</Text>
        <Text color={hex.dim}>press q to exit</Text>
      </Box>
    )
  }

  const { data } = state
  const cols = stdout.columns ?? 80
  const rows = stdout.rows ?? 24

  const failures = data.entries.filter(entry => entry.outcome === 'failure').length
  const slLeft  = ` ◈ audit · ${source} · ${data.entries.length} entries · ${failures} failed`
  const slRight = `q quit · ↑↓ select · r reload · tab panels `
  const slFill  = ' '.repeat(Math.max(0, cols - slLeft.length - slRight.length))
  const slLine  = chalk.bgHex('#0277BD').white(slLeft + slFill + slRight)

  // ─── Layout ──────────────────────────────────────────────────────────────

  return (
    <Box flexDirection="column">
      <Box flexDirection="row">
        <AuditLogPanel
          entries={data.entries}
          selected={selected}
          height={Math.max(5, rows - 6)}
          isFocused={activePanel === 0}
        />
        <AuditDetailPanel entry={data.entries[selected]} isFocused={activePanel === 1} />
      </Box>

      <Box>
        <Text>{slLine}</Text>
      </Box>
    </Box>
  )
}
