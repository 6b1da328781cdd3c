/**
 * Bulwark Kernel — Audit Logger
 *
 * Append-only record of every terminal pipeline transition.
 *
 * Events pass through the injected Redactor, then a bounded queue drained
 * by a single writer. A full queue makes `record()` wait for space rather
 * than drop the event. A sink failure is reported on the diagnostic channel
 * as AuditWriteFailed and counted; it never propagates to the caller, so a
 * committed side effect is never rolled back because of the audit log.
 *
 * Sequence numbers are assigned as events enter the queue, so they match
 * the order in which the sink receives them.
 */

import type { AuditEvent } from '../types/audit.js';
import type { AuditSink, Redactor } from './audit-sink.js';
import { IDENTITY_REDACTOR } from './audit-sink.js';
import type { DiagnosticChannel } from './diagnostics.js';
import { diagnostic } from './diagnostics.js';

export const DEFAULT_AUDIT_QUEUE_CAPACITY = 256;

export type AuditEventInput = Omit<AuditEvent, 'sequence'>;

export interface AuditLoggerOptions {
  readonly diagnostics: DiagnosticChannel;
  /** Without a sink, `record()` is a no-op. */
  readonly sink?: AuditSink | undefined;
  readonly redactor?: Redactor | undefined;
  readonly capacity?: number | undefined;
  readonly enabled?: boolean | undefined;
}

export class AuditLogger {
  readonly enabled: boolean;
  private readonly sink: AuditSink | undefined;
  private readonly redactor: Redactor;
  private readonly diagnostics: DiagnosticChannel;
  private readonly capacity: number;

  private readonly queue: AuditEvent[] = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private draining: Promise<void> | null = null;
  private sequence = 0;
  private writtenCount = 0;
  private failureCount = 0;

  constructor(options: AuditLoggerOptions) {
    this.sink = options.sink;
    this.enabled = (options.enabled ?? true) && options.sink !== undefined;
    this.redactor = options.redactor ?? IDENTITY_REDACTOR;
    this.diagnostics = options.diagnostics;
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_AUDIT_QUEUE_CAPACITY);
  }

  /**
   * Queue an event. Resolves once the event is queued (not written); waits
   * while the queue is full.
   */
  async record(input: AuditEventInput): Promise<void> {
    if (!this.enabled) return;

    while (this.queue.length >= this.capacity || this.spaceWaiters.length > 0) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
      if (this.queue.length < this.capacity) break;
    }

    this.sequence += 1;
    this.queue.push(this.redactEvent({ ...input, sequence: this.sequence }));
    this.startDrain();
  }

  /** Resolves once every queued event has been handed to the sink. */
  async flush(): Promise<void> {
    while (this.draining !== null) {
      await this.draining;
    }
  }

  /** Events successfully written by the sink. */
  get written(): number {
    return this.writtenCount;
  }

  /** Events the sink failed to write. */
  get failures(): number {
    return this.failureCount;
  }

  get queued(): number {
    return this.queue.length;
  }

  private startDrain(): void {
    if (this.draining !== null) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      // An event queued after the loop's last shift still needs a writer.
      if (this.queue.length > 0) this.startDrain();
    });
  }

  private async drain(): Promise<void> {
    const sink = this.sink;
    if (sink === undefined) return;

    for (let event = this.queue.shift(); event !== undefined; event = this.queue.shift()) {
      this.spaceWaiters.shift()?.();
      try {
        await sink.append(event);
        this.writtenCount += 1;
      } catch (err) {
        this.failureCount += 1;
        this.diagnostics.report(
          diagnostic(
            'error',
            'AuditWriteFailed',
            `audit event ${event.sequence} (${event.command}, ${event.invocation_id}) not written: ${
              err instanceof Error ? err.message : String(err)
            }`,
          ),
        );
      }
    }
  }

  private redactEvent(event: AuditEvent): AuditEvent {
    const redact = (text: string): string => this.redactor.redact(text);
    return {
      ...event,
      paths: event.paths.map(redact),
      ...(event.command_text !== undefined ? { command_text: redact(event.command_text) } : {}),
      ...(event.reason !== undefined ? { reason: redact(event.reason) } : {}),
      ...(event.output_excerpt !== undefined ? { output_excerpt: redact(event.output_excerpt) } : {}),
    };
  }
}
