/**
 * Bulwark Runtime Host — File Audit Sink
 *
 * Appends one JSON line per audit event to an NDJSON file, assigning each
 * event a ULID `event_id` at write time. Parent directories are created on
 * the first write.
 *
 * The kernel's AuditLogger drains its queue through a single writer, so
 * appends from one logger never interleave.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { AuditEvent, AuditLogEntry, AuditSink } from '@bulwark/kernel';
import { isNodeError } from '@bulwark/kernel';
import { ulid } from './ulid.js';

export class FileAuditSink implements AuditSink {
  private dirReady = false;

  constructor(readonly path: string) {}

  async append(event: AuditEvent): Promise<void> {
    if (!this.dirReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.dirReady = true;
    }
    const entry: AuditLogEntry = { event_id: ulid(), ...event };
    await appendFile(this.path, JSON.stringify(entry) + '\n', 'utf-8');
  }
}

/** Raw audit file content; '' when the file does not exist yet. */
export async function readAuditFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return '';
    throw err;
  }
}
