import chalk, { type ChalkInstance } from 'chalk'
import { RiskLevel, SandboxLevel } from '@bulwark/kernel'
import type { AuditOutcome, DiagnosticLevel } from '@bulwark/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _riskColors: Record<RiskLevel, ChalkInstance> = {
  [RiskLevel.Safe]:      t.green,
  [RiskLevel.Moderate]:  t.text,
  [RiskLevel.Dangerous]: t.amber,
  [RiskLevel.Blocked]:   t.red,
}

export const riskColor = (level: RiskLevel): ChalkInstance => _riskColors[level]

const _sandboxColors: Record<SandboxLevel, ChalkInstance> = {
  [SandboxLevel.ReadOnly]:       t.green,
  [SandboxLevel.WorkspaceWrite]: t.amber,
  [SandboxLevel.FullAccess]:     t.red,
}

export const sandboxColor = (level: SandboxLevel): ChalkInstance => _sandboxColors[level]

const _outcomeColors: Record<AuditOutcome, ChalkInstance> = {
  'success': t.green,
  'failure': t.red,
  'dry-run': t.blue,
}

export const outcomeColor = (outcome: AuditOutcome): ChalkInstance => _outcomeColors[outcome]

const _diagnosticColors: Record<DiagnosticLevel, ChalkInstance> = {
  info:    t.muted,
  warning: t.amber,
  error:   t.red,
}

export const diagnosticColor = (level: DiagnosticLevel): ChalkInstance => _diagnosticColors[level]

/** Hex values for Ink `<Text color>`, which takes strings rather than chalk. */
export const hex = {
  blue:   '#4FC3F7',
  border: '#242424',
  text:   '#C8C8C0',
  dim:    '#444444',
  muted:  '#666666',
  amber:  '#D4880A',
  green:  '#81C784',
  red:    '#CF6679',
} as const

const _outcomeHex: Record<AuditOutcome, string> = {
  'success': hex.green,
  'failure': hex.red,
  'dry-run': hex.blue,
}

export const outcomeHex = (outcome: AuditOutcome): string => _outcomeHex[outcome]

const _riskHex: Record<RiskLevel, string> = {
  [RiskLevel.Safe]:      hex.green,
  [RiskLevel.Moderate]:  hex.text,
  [RiskLevel.Dangerous]: hex.amber,
  [RiskLevel.Blocked]:   hex.red,
}

export const riskHex = (level: RiskLevel): string => _riskHex[level]
