/**
 * Bulwark Kernel — Audit Sink and Redactor Interfaces
 *
 * The kernel owns these contracts and the AuditLogger. Concrete
 * implementations live in the runtime host and are injected at
 * construction time; the kernel never writes to disk directly.
 */

import type { AuditEvent } from '../types/audit.js';

/**
 * Receives and persists audit events.
 *
 * `append` resolves once the event is durable. A rejection is reported by
 * the AuditLogger as AuditWriteFailed and never reaches the command result.
 * Implementations must not silently discard events.
 */
export interface AuditSink {
  append(event: AuditEvent): Promise<void>;
}

/**
 * Scrubs secrets from free text. Applied to paths, command text, reasons
 * and output excerpts before an event is queued.
 */
export interface Redactor {
  redact(text: string): string;
}

export const IDENTITY_REDACTOR: Redactor = { redact: (text) => text };
