/**
 * Bulwark Runtime Host — StateIO
 *
 * A directory-scoped, injectable I/O abstraction for reading/writing JSON
 * state files and appending to NDJSON log files. Each session gets its own
 * StateIO bound to `<home>/sessions/<session_id>/`, so two sessions never
 * read or write each other's records.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded use
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { isNodeError } from '@bulwark/kernel';

/**
 * Layout:
 *   <dir>/state/<filename>   JSON documents (readJson / writeJson)
 *   <dir>/logs/<logfile>     NDJSON logs (appendLine / readLogRaw)
 */
export interface StateIO {
  /**
   * Read and validate a JSON document. Returns `fallback` when the file is
   * absent, is not JSON, or does not match the schema.
   */
  readJson<T>(filename: string, schema: ZodType<T, ZodTypeDef, unknown>, fallback: T): T;

  /** Creates the state directory on demand and overwrites the file. */
  writeJson(filename: string, value: unknown): void;

  /** Appends `line` plus a newline, creating the logs directory on demand. */
  appendLine(logfilename: string, line: string): void;

  /** Raw content of a log file; '' when it does not exist. */
  readLogRaw(logfilename: string): string;

  /** Empties a log file, creating it if needed. */
  truncateLog(logfilename: string): void;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Synchronous I/O matches the CLI's one-command-at-a-time use of session
 * records. ENOENT and unparseable documents are recoverable; other I/O
 * errors are rethrown for the operator to address.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly baseDir: string) {}

  readJson<T>(filename: string, schema: ZodType<T, ZodTypeDef, unknown>, fallback: T): T {
    const filePath = join(this.baseDir, 'state', filename);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return fallback;
      throw err;
    }
    return parseDocument(raw, schema, fallback);
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.baseDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.baseDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  truncateLog(logfilename: string): void {
    const logsDir = join(this.baseDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    writeFileSync(join(logsDir, logfilename), '', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.baseDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * Documents are stored as serialized JSON so reads go through the same
 * parse-and-validate path as FileStateIO.
 */
export class MemoryStateIO implements StateIO {
  private readonly documents = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson<T>(filename: string, schema: ZodType<T, ZodTypeDef, unknown>, fallback: T): T {
    const raw = this.documents.get(filename);
    return raw === undefined ? fallback : parseDocument(raw, schema, fallback);
  }

  writeJson(filename: string, value: unknown): void {
    this.documents.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended to a log file. Not part of StateIO; for tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  truncateLog(logfilename: string): void {
    this.logs.set(logfilename, []);
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }
}

function parseDocument<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>, fallback: T): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return fallback;
    throw err;
  }
  const result = schema.safeParse(parsed);
  return result.success ? result.data : fallback;
}
