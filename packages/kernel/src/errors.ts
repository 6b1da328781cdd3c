/**
 * Bulwark Kernel — Error Taxonomy
 *
 * Every user-visible failure carries a machine-readable kind and a
 * human-readable reason. Terminal kinds (InvalidArguments, PolicyDenied,
 * PathTraversal, ApprovalDenied, ApprovalTimedOut, Cancelled) are returned
 * in a CommandExecutionResult, never thrown out of the pipeline.
 */

export enum ErrorKind {
  InvalidArguments = 'InvalidArguments',
  PolicyDenied = 'PolicyDenied',
  PathTraversal = 'PathTraversal',
  ApprovalDenied = 'ApprovalDenied',
  ApprovalTimedOut = 'ApprovalTimedOut',
  ExecutionFailed = 'ExecutionFailed',
  NotReversible = 'NotReversible',
  AuditWriteFailed = 'AuditWriteFailed',
  Cancelled = 'Cancelled',
}

/** Serializable error shape carried by results and audit events. */
export interface CommandErrorInfo {
  readonly kind: ErrorKind;
  readonly reason: string;
  /** Process exit code or errno-style code, when one exists. */
  readonly code?: number | undefined;
}

/**
 * Error thrown inside the core and by command handlers.
 *
 * The pipeline converts it to a CommandErrorInfo at the terminal transition.
 */
export class CommandError extends Error {
  readonly kind: ErrorKind;
  readonly reason: string;
  readonly code: number | undefined;
  /** Whatever the command produced before it failed (partial shell output). */
  readonly output: string | undefined;

  constructor(
    kind: ErrorKind,
    reason: string,
    options?: {
      readonly code?: number | undefined;
      readonly output?: string | undefined;
      readonly cause?: unknown;
    },
  ) {
    super(`${kind}: ${reason}`, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CommandError';
    this.kind = kind;
    this.reason = reason;
    this.code = options?.code;
    this.output = options?.output;
  }

  toInfo(): CommandErrorInfo {
    return this.code !== undefined
      ? { kind: this.kind, reason: this.reason, code: this.code }
      : { kind: this.kind, reason: this.reason };
  }
}

/**
 * Normalize anything thrown into a CommandErrorInfo.
 *
 * CommandError keeps its own kind; any other value is attributed to
 * `fallbackKind` with its message as the reason.
 */
export function toErrorInfo(err: unknown, fallbackKind: ErrorKind): CommandErrorInfo {
  if (err instanceof CommandError) return err.toInfo();
  if (err instanceof Error) return { kind: fallbackKind, reason: err.message };
  return { kind: fallbackKind, reason: String(err) };
}

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    err.code === code
  );
}
