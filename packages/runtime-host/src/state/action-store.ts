/**
 * Bulwark Runtime Host — Action Store
 *
 * Persists every Action pushed onto a session's action log as one NDJSON
 * record in `<home>/sessions/<session_id>/logs/actions.jsonl`. File content
 * carried by action states is base64-encoded.
 *
 * Each session directory also holds `state/session.json`, written once when
 * the session starts, so `bulwark history` can list past sessions.
 */

import { readdirSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { Action, ActionState, ActionStore } from '@bulwark/kernel';
import { SandboxLevel, isNodeError } from '@bulwark/kernel';
import type { StateIO } from './state-io.js';
import { FileStateIO } from './state-io.js';

export const ACTIONS_LOG = 'actions.jsonl';
export const SESSION_FILE = 'session.json';

export function sessionDir(home: string, sessionId: string): string {
  return join(home, 'sessions', sessionId);
}

// ---------------------------------------------------------------------------
// Wire format
// ---------------------------------------------------------------------------

const base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'expected base64');

const stateRecordSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('FileCreated'), path: z.string(), content: base64 }),
  z.object({ kind: z.literal('FileModified'), path: z.string(), content: base64, content_hash: z.string() }),
  z.object({ kind: z.literal('FileDeleted'), path: z.string(), content: base64 }),
  z.object({ kind: z.literal('FileMoved'), from: z.string(), to: z.string() }),
  z.object({ kind: z.literal('Opaque'), description: z.string() }),
]);

type StateRecord = z.infer<typeof stateRecordSchema>;

const actionRecordSchema = z.object({
  session_id: z.string(),
  id: z.string(),
  command: z.string(),
  timestamp: z.string(),
  state_before: stateRecordSchema,
  state_after: stateRecordSchema,
  reversible: z.boolean(),
  description: z.string(),
});

function encodeState(state: ActionState): StateRecord {
  switch (state.kind) {
    case 'FileCreated':
    case 'FileDeleted':
      return { kind: state.kind, path: state.path, content: Buffer.from(state.content).toString('base64') };
    case 'FileModified':
      return {
        kind: state.kind,
        path: state.path,
        content: Buffer.from(state.content).toString('base64'),
        content_hash: state.content_hash,
      };
    case 'FileMoved':
    case 'Opaque':
      return state;
  }
}

function decodeBytes(encoded: string): Uint8Array {
  const buffer = Buffer.from(encoded, 'base64');
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

function decodeState(record: StateRecord): ActionState {
  switch (record.kind) {
    case 'FileCreated':
    case 'FileDeleted':
      return { kind: record.kind, path: record.path, content: decodeBytes(record.content) };
    case 'FileModified':
      return {
        kind: record.kind,
        path: record.path,
        content: decodeBytes(record.content),
        content_hash: record.content_hash,
      };
    case 'FileMoved':
    case 'Opaque':
      return record;
  }
}

export function encodeActionLine(sessionId: string, action: Action): string {
  return JSON.stringify({
    session_id: sessionId,
    id: action.id,
    command: action.command,
    timestamp: action.timestamp,
    state_before: encodeState(action.state_before),
    state_after: encodeState(action.state_after),
    reversible: action.reversible,
    description: action.description,
  });
}

/** Decode one record; null for a malformed line. */
export function decodeActionLine(line: string): Action | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
  const result = actionRecordSchema.safeParse(parsed);
  if (!result.success) return null;
  const record = result.data;
  return {
    id: record.id,
    command: record.command,
    timestamp: record.timestamp,
    state_before: decodeState(record.state_before),
    state_after: decodeState(record.state_after),
    reversible: record.reversible,
    description: record.description,
  };
}

export interface ActionHistory {
  readonly actions: ReadonlyArray<Action>;
  /** Lines that could not be decoded, including a partial trailing line. */
  readonly skipped: number;
}

export function readActionHistory(raw: string): ActionHistory {
  const actions: Action[] = [];
  let skipped = 0;
  for (const line of raw.split('\n')) {
    if (line.length === 0) continue;
    const action = decodeActionLine(line);
    if (action === null) {
      skipped++;
    } else {
      actions.push(action);
    }
  }
  return { actions, skipped };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class FileActionStore implements ActionStore {
  constructor(private readonly io: StateIO) {}

  append(sessionId: string, action: Action): Promise<void> {
    this.io.appendLine(ACTIONS_LOG, encodeActionLine(sessionId, action));
    return Promise.resolve();
  }

  clear(): Promise<void> {
    this.io.truncateLog(ACTIONS_LOG);
    return Promise.resolve();
  }

  history(): ActionHistory {
    return readActionHistory(this.io.readLogRaw(ACTIONS_LOG));
  }
}

// ---------------------------------------------------------------------------
// Session records
// ---------------------------------------------------------------------------

export const sessionRecordSchema = z.object({
  session_id: z.string().min(1),
  workspace_root: z.string(),
  sandbox_level: z.nativeEnum(SandboxLevel),
  started_at: z.string(),
});

export type SessionRecord = z.infer<typeof sessionRecordSchema>;

export function readSessionRecord(io: StateIO): SessionRecord | null {
  return io.readJson<SessionRecord | null>(SESSION_FILE, sessionRecordSchema.nullable(), null);
}

/** Sessions recorded under `home`, most recently started first. */
export function listSessions(home: string): SessionRecord[] {
  let entries: string[];
  try {
    entries = readdirSync(join(home, 'sessions'));
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return [];
    throw err;
  }
  const records: SessionRecord[] = [];
  for (const entry of entries) {
    const record = readSessionRecord(new FileStateIO(sessionDir(home, entry)));
    if (record !== null) records.push(record);
  }
  return records.sort((a, b) => (a.started_at < b.started_at ? 1 : a.started_at > b.started_at ? -1 : 0));
}
