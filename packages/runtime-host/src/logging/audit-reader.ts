/**
 * Bulwark Runtime Host — Audit Reader
 *
 * Pure function for reading the NDJSON audit log with dedupe-on-read.
 *
 * Guarantees:
 *   - lines that are not JSON or not audit entries are dropped and counted
 *   - entries are de-duplicated by event_id; the first occurrence wins
 *   - content not ending in '\n' is a partial trailing line: dropped, flagged
 *   - more than one timestamp regression in file order flags `outOfOrder`
 *     (a single regression is tolerated as clock skew)
 *   - output is sorted by timestamp, then event_id
 *
 * No I/O. Callers obtain the raw content with `readAuditFile()`.
 */

import { z } from 'zod';
import type { AuditLogEntry } from '@bulwark/kernel';
import { Capability, ErrorKind, PipelineState, RiskLevel, SandboxLevel } from '@bulwark/kernel';

const auditEntrySchema = z.object({
  event_id: z.string().min(1),
  sequence: z.number().int(),
  timestamp: z.string(),
  session_id: z.string(),
  actor: z.string(),
  invocation_id: z.string(),
  command: z.string(),
  sandbox_level: z.nativeEnum(SandboxLevel),
  capabilities: z.array(z.nativeEnum(Capability)),
  risk_level: z.nativeEnum(RiskLevel),
  approval_status: z.enum(['NotRequired', 'Approved', 'Denied']),
  outcome: z.enum(['success', 'failure', 'dry-run']),
  terminal_state: z.nativeEnum(PipelineState),
  error_kind: z.nativeEnum(ErrorKind).optional(),
  reason: z.string().optional(),
  paths: z.array(z.string()),
  command_text: z.string().optional(),
  args_hash: z.string(),
  duration_ms: z.number(),
  output_excerpt: z.string().optional(),
});

export interface AuditReadStats {
  /** Non-empty complete lines processed. */
  totalLines: number;
  /** Entries kept after de-duplication. */
  parsedEvents: number;
  duplicates: number;
  parseErrors: number;
  partialTrailingLine: boolean;
  outOfOrder: boolean;
}

export interface AuditReadResult {
  readonly entries: ReadonlyArray<AuditLogEntry>;
  readonly stats: AuditReadStats;
}

function parseEntry(line: string): AuditLogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
  const result = auditEntrySchema.safeParse(parsed);
  return result.success ? result.data : null;
}

function compareEntries(a: AuditLogEntry, b: AuditLogEntry): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
  if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
  return 0;
}

export function readAuditLog(raw: string): AuditReadResult {
  const partialTrailingLine = raw.length > 0 && !raw.endsWith('\n');
  const lines = raw.split('\n');
  // The element after the last '\n' is either '' or the partial line.
  const complete = lines.slice(0, -1).filter((line) => line.length > 0);

  const stats: AuditReadStats = {
    totalLines: complete.length,
    parsedEvents: 0,
    duplicates: 0,
    parseErrors: 0,
    partialTrailingLine,
    outOfOrder: false,
  };

  const seen = new Set<string>();
  const inFileOrder: AuditLogEntry[] = [];
  for (const line of complete) {
    const entry = parseEntry(line);
    if (entry === null) {
      stats.parseErrors++;
      continue;
    }
    if (seen.has(entry.event_id)) {
      stats.duplicates++;
      continue;
    }
    seen.add(entry.event_id);
    inFileOrder.push(entry);
  }
  stats.parsedEvents = inFileOrder.length;

  let regressions = 0;
  let previous: string | undefined;
  for (const entry of inFileOrder) {
    if (previous !== undefined && entry.timestamp < previous) regressions++;
    previous = entry.timestamp;
  }
  stats.outOfOrder = regressions > 1;

  return { entries: [...inFileOrder].sort(compareEntries), stats };
}

export interface AuditSelection {
  readonly sessionId?: string | undefined;
  /** Keep only the most recent `limit` entries. */
  readonly limit?: number | undefined;
}

export function selectAuditEntries(
  entries: ReadonlyArray<AuditLogEntry>,
  selection: AuditSelection,
): AuditLogEntry[] {
  const scoped =
    selection.sessionId === undefined ? [...entries] : entries.filter((e) => e.session_id === selection.sessionId);
  return selection.limit === undefined || selection.limit >= scoped.length
    ? scoped
    : scoped.slice(scoped.length - selection.limit);
}
