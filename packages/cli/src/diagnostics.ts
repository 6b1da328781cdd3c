/**
 * Bulwark CLI — Stderr Diagnostics
 *
 * The CLI's DiagnosticChannel: one colored line per report on stderr, so
 * command output on stdout (and `--json` documents) stay clean.
 */

import type { Diagnostic, DiagnosticChannel } from '@bulwark/kernel';
import { diagnosticColor, t } from './tui/theme.js';

export function formatDiagnostic(entry: Diagnostic): string {
  return `${t.dim('[bulwark]')} ${diagnosticColor(entry.level)(entry.level)} ${t.muted(entry.code)}: ${entry.message}`;
}

export class StderrDiagnostics implements DiagnosticChannel {
  constructor(private readonly write: (text: string) => void = (text) => process.stderr.write(text)) {}

  report(entry: Diagnostic): void {
    this.write(`${formatDiagnostic(entry)}\n`);
  }
}
