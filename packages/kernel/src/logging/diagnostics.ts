/**
 * Bulwark Kernel — Diagnostic Channel
 *
 * Out-of-band reports that must not change a command's result: audit sink
 * failures, action-log eviction, rollback failures, listener errors.
 *
 * The kernel owns the contract; the CLI supplies a stderr implementation.
 */

export type DiagnosticLevel = 'info' | 'warning' | 'error';

export type DiagnosticCode =
  | 'AuditWriteFailed'
  | 'ActionLogEviction'
  | 'ActionStoreWriteFailed'
  | 'RollbackFailed'
  | 'ListenerFailed';

export interface Diagnostic {
  readonly level: DiagnosticLevel;
  readonly code: DiagnosticCode;
  readonly message: string;
  /** ISO-8601. */
  readonly timestamp: string;
}

export interface DiagnosticChannel {
  report(diagnostic: Diagnostic): void;
}

export function diagnostic(level: DiagnosticLevel, code: DiagnosticCode, message: string): Diagnostic {
  return { level, code, message, timestamp: new Date().toISOString() };
}

/** Keeps every report in memory. Used by tests and `--json` output. */
export class CollectingDiagnostics implements DiagnosticChannel {
  readonly reports: Diagnostic[] = [];

  report(entry: Diagnostic): void {
    this.reports.push(entry);
  }

  byCode(code: DiagnosticCode): Diagnostic[] {
    return this.reports.filter((entry) => entry.code === code);
  }

  clear(): void {
    this.reports.length = 0;
  }
}

