/**
 * Bulwark Kernel — Approval Manager
 *
 * Resolves a RequireApproval decision into an ApprovalOutcome.
 *
 * Modes:
 * - non-interactive: every request is Denied without prompting.
 * - auto-approve-low-risk: Safe requests are Approved without prompting;
 *   everything else takes the interactive path.
 * - interactive: the request is registered as pending and settled by the
 *   injected prompter, by an external `respond()` call, by the timeout
 *   (Denied/timeout) or by the invocation's cancellation signal
 *   (Denied/cancelled).
 *
 * A request is settled exactly once. Nothing is left Pending: the timer
 * guarantees every registered request settles.
 *
 * Only the issuing pipeline waits on its request; other invocations keep
 * running while a prompt is open.
 */

import { randomUUID } from 'node:crypto';
import type { ApprovalOutcome, ApprovalReason, ApprovalRequest } from '../types/approval.js';
import { ApprovalMode, ApprovalStatus } from '../types/approval.js';
import { RiskLevel } from '../types/risk.js';

/** Default time an interactive request may stay pending (2 minutes). */
export const DEFAULT_APPROVAL_TIMEOUT_MS = 120_000;

/**
 * Surfaces a request to the operator (e.g. the CLI's readline prompt).
 *
 * `signal` aborts once the request is settled some other way (timeout,
 * cancellation, external respond), so the prompter can tear down its UI.
 * A rejection settles the request as Denied/prompt-failed.
 */
export interface ApprovalPrompter {
  prompt(request: ApprovalRequest, signal: AbortSignal): Promise<boolean>;
}

export interface ApprovalManagerOptions {
  readonly mode: ApprovalMode;
  readonly prompter?: ApprovalPrompter | undefined;
  readonly timeoutMs?: number | undefined;
}

/** Input to `requestApproval`; the manager assigns id and creation time. */
export type ApprovalRequestInput = Omit<ApprovalRequest, 'id' | 'created_at'>;

type PendingEntry = {
  readonly request: ApprovalRequest;
  settle: (approved: boolean, reason: ApprovalReason) => void;
};

export class ApprovalManager {
  readonly mode: ApprovalMode;
  private readonly prompter: ApprovalPrompter | undefined;
  private readonly timeoutMs: number;
  private readonly pending = new Map<string, PendingEntry>();

  constructor(options: ApprovalManagerOptions) {
    this.mode = options.mode;
    this.prompter = options.prompter;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_APPROVAL_TIMEOUT_MS;
  }

  /**
   * Resolve a request to Approved or Denied. Never rejects.
   */
  requestApproval(input: ApprovalRequestInput, signal?: AbortSignal): Promise<ApprovalOutcome> {
    const request: ApprovalRequest = {
      ...input,
      id: randomUUID(),
      created_at: new Date().toISOString(),
    };

    if (this.mode === ApprovalMode.NonInteractive) {
      return Promise.resolve(outcome(request, false, 'non-interactive'));
    }
    if (this.mode === ApprovalMode.AutoApproveLowRisk && request.risk_level === RiskLevel.Safe) {
      return Promise.resolve(outcome(request, true, 'auto-approved'));
    }
    if (signal?.aborted === true) {
      return Promise.resolve(outcome(request, false, 'cancelled'));
    }
    return this.register(request, signal);
  }

  /**
   * Settle a pending request from outside the prompter.
   * Returns false if no such request is pending.
   */
  respond(requestId: string, approved: boolean): boolean {
    const entry = this.pending.get(requestId);
    if (entry === undefined) return false;
    entry.settle(approved, 'user');
    return true;
  }

  listPending(): ApprovalRequest[] {
    return [...this.pending.values()].map((entry) => entry.request);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private register(request: ApprovalRequest, signal: AbortSignal | undefined): Promise<ApprovalOutcome> {
    return new Promise<ApprovalOutcome>((resolve) => {
      const promptController = new AbortController();
      let settled = false;

      const onAbort = (): void => settle(false, 'cancelled');

      const timer = setTimeout(() => settle(false, 'timeout'), this.timeoutMs);

      const settle = (approved: boolean, reason: ApprovalReason): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.pending.delete(request.id);
        promptController.abort();
        resolve(outcome(request, approved, reason));
      };

      this.pending.set(request.id, { request, settle });
      signal?.addEventListener('abort', onAbort, { once: true });

      if (this.prompter !== undefined) {
        this.prompter.prompt(request, promptController.signal).then(
          (approved) => settle(approved, 'user'),
          () => settle(false, 'prompt-failed'),
        );
      }
    });
  }
}

function outcome(request: ApprovalRequest, approved: boolean, reason: ApprovalReason): ApprovalOutcome {
  return {
    request_id: request.id,
    status: approved ? ApprovalStatus.Approved : ApprovalStatus.Denied,
    reason,
    decided_at: new Date().toISOString(),
  };
}
