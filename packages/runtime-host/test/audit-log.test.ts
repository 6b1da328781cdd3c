/**
 * Bulwark Runtime Host — Audit Sink and Reader Tests
 *
 *   AUD-U1: the file sink appends one JSON line per event with a ULID event_id
 *   AUD-U2: the reader drops malformed lines and non-audit objects
 *   AUD-U3: duplicate event_ids are dropped, first occurrence wins
 *   AUD-U4: a partial trailing line is dropped and flagged
 *   AUD-U5: more than one timestamp regression flags outOfOrder
 *   AUD-U6: output is sorted by timestamp, then event_id
 *   AUD-U7: selection by session and limit keeps the most recent entries
 *
 * Reader tests are pure. Sink tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AuditEvent, AuditLogEntry } from '@bulwark/kernel';
import { Capability, PipelineState, RiskLevel, SandboxLevel } from '@bulwark/kernel';
import { FileAuditSink, readAuditFile } from '../src/logging/audit-file-sink.js';
import { readAuditLog, selectAuditEntries } from '../src/logging/audit-reader.js';
import { decodeUlidTime } from '../src/logging/ulid.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeEvent(sequence: number, overrides: Partial<AuditEvent> = {}): AuditEvent {
  return {
    sequence,
    timestamp: '2026-03-01T10:00:00.000Z',
    session_id: 'session-1',
    actor: 'operator',
    invocation_id: `inv-${sequence}`,
    command: 'write',
    sandbox_level: SandboxLevel.WorkspaceWrite,
    capabilities: [Capability.WriteFile],
    risk_level: RiskLevel.Safe,
    approval_status: 'Approved',
    outcome: 'success',
    terminal_state: PipelineState.Completed,
    paths: ['/ws/notes.md'],
    args_hash: 'hash',
    duration_ms: 4,
    ...overrides,
  };
}

function line(id: string, timestamp: string, overrides: Partial<AuditEvent> = {}): string {
  const entry: AuditLogEntry = { event_id: id, ...makeEvent(1, { timestamp, ...overrides }) };
  return JSON.stringify(entry);
}

const T1 = '2026-03-01T10:00:01.000Z';
const T2 = '2026-03-01T10:00:02.000Z';
const T3 = '2026-03-01T10:00:03.000Z';
const T4 = '2026-03-01T10:00:04.000Z';

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

describe('FileAuditSink', () => {
  it('AUD-U1: appends one line per event under a created directory', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'bulwark-audit-u1-'));
    const path = join(dir, 'nested', 'audit.jsonl');
    const sink = new FileAuditSink(path);

    await sink.append(makeEvent(1));
    await sink.append(makeEvent(2, { outcome: 'failure' }));

    const raw = await readAuditFile(path);
    expect(raw.endsWith('\n')).toBe(true);
    const { entries, stats } = readAuditLog(raw);
    expect(stats.parsedEvents).toBe(2);
    expect(entries.map((e) => e.sequence)).toEqual([1, 2]);
    expect(entries[1]?.outcome).toBe('failure');
    for (const entry of entries) {
      expect(decodeUlidTime(entry.event_id)).not.toBeNull();
    }
  });

  it('AUD-U1: reading a missing file yields empty content', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'bulwark-audit-u1b-'));
    expect(await readAuditFile(join(dir, 'absent.jsonl'))).toBe('');
  });
});

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

describe('readAuditLog', () => {
  it('returns zero stats for empty input', () => {
    expect(readAuditLog('')).toEqual({
      entries: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
        outOfOrder: false,
      },
    });
  });

  it('AUD-U2: drops malformed lines and objects that are not audit entries', () => {
    const raw = [line('A', T1), 'not json', JSON.stringify({ event_id: 'B' }), '', line('C', T2)].join('\n') + '\n';

    const { entries, stats } = readAuditLog(raw);

    expect(stats.totalLines).toBe(4);
    expect(stats.parseErrors).toBe(2);
    expect(entries.map((e) => e.event_id)).toEqual(['A', 'C']);
  });

  it('AUD-U3: first occurrence of an event_id wins', () => {
    const raw = [line('A', T1, { command: 'first' }), line('A', T2, { command: 'second' })].join('\n') + '\n';

    const { entries, stats } = readAuditLog(raw);

    expect(stats.duplicates).toBe(1);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.command).toBe('first');
  });

  it('AUD-U4: a partial trailing line is dropped and flagged', () => {
    const raw = line('A', T1) + '\n' + line('B', T2).slice(0, 20);

    const { entries, stats } = readAuditLog(raw);

    expect(stats.partialTrailingLine).toBe(true);
    expect(stats.totalLines).toBe(1);
    expect(entries.map((e) => e.event_id)).toEqual(['A']);
  });

  it('AUD-U5: one regression is tolerated, two flag outOfOrder', () => {
    const once = [line('A', T2), line('B', T1), line('C', T3)].join('\n') + '\n';
    const twice = [line('A', T2), line('B', T1), line('C', T4), line('D', T3)].join('\n') + '\n';

    expect(readAuditLog(once).stats.outOfOrder).toBe(false);
    expect(readAuditLog(twice).stats.outOfOrder).toBe(true);
  });

  it('AUD-U6: sorts by timestamp, breaking ties by event_id', () => {
    const raw = [line('C', T2), line('B', T1), line('A', T2)].join('\n') + '\n';

    expect(readAuditLog(raw).entries.map((e) => e.event_id)).toEqual(['B', 'A', 'C']);
  });
});

describe('selectAuditEntries', () => {
  const { entries } = readAuditLog(
    [
      line('A', T1, { session_id: 's1' }),
      line('B', T2, { session_id: 's2' }),
      line('C', T3, { session_id: 's1' }),
      line('D', T4, { session_id: 's1' }),
    ].join('\n') + '\n',
  );

  it('AUD-U7: filters by session', () => {
    expect(selectAuditEntries(entries, { sessionId: 's1' }).map((e) => e.event_id)).toEqual(['A', 'C', 'D']);
  });

  it('AUD-U7: limit keeps the most recent entries', () => {
    expect(selectAuditEntries(entries, { limit: 2 }).map((e) => e.event_id)).toEqual(['C', 'D']);
    expect(selectAuditEntries(entries, { sessionId: 's1', limit: 10 })).toHaveLength(3);
  });
});
