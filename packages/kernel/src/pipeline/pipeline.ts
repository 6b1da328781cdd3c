/**
 * Bulwark Kernel — Command Execution Pipeline
 *
 * The orchestrating state machine every command passes through:
 *
 *   Created → Validated → PreviewGenerated → PolicyChecked
 *     → [ApprovalPending →] Executing → (Completed | Failed) → Logged
 *
 * - Created → Validated: the command exists and its arguments pass the
 *   handler's schema; otherwise Failed(InvalidArguments).
 * - Validated → PreviewGenerated: the side-effect free plan is computed and
 *   its paths canonicalized; the preview is rendered unless the command's
 *   preview mode is Never (or OnRequest without a request).
 * - PreviewGenerated → PolicyChecked: every required capability and every
 *   touched path is checked; decisions fold by Deny > RequireApproval >
 *   Allow. Blocked risk forces Deny; Dangerous risk escalates Allow to
 *   RequireApproval. Deny is terminal.
 * - ApprovalPending: entered only for RequireApproval.
 * - Executing: writers hold a path-prefix lock. A failure after a mutation
 *   started re-applies the declared change's prior state.
 *
 * Every terminal transition is published exactly once to the transition
 * listeners (action log and audit projections), then the run is Logged.
 * Listener failures go to the diagnostic channel and never change the
 * result. The pipeline never throws for a user-visible failure; it returns
 * `success: false` with the error kind and reason.
 *
 * Cancellation is checked only at checkpoints: before preview, before and
 * after approval, and wherever the handler calls `controls.checkpoint()`
 * (including just before an atomic write commits).
 */

import { randomUUID } from 'node:crypto';
import type {
  AtomicWriteOptions,
  KernelAdapters,
  ResolvedPath,
  ShellExecutor,
  ShellRunOptions,
  WorkspaceFilesystem,
} from '../adapters/index.js';
import type { ApprovalManager } from '../approval/manager.js';
import { applyActionState } from '../action-log/apply.js';
import { CommandError, ErrorKind, toErrorInfo } from '../errors.js';
import type { CommandErrorInfo } from '../errors.js';
import type { DiagnosticChannel } from '../logging/diagnostics.js';
import { diagnostic } from '../logging/diagnostics.js';
import type { RiskClassifier } from '../policy/risk.js';
import type { PathIntent } from '../policy/sandbox.js';
import { checkCapability, checkPath, grantedCapabilities, isWithinRoot } from '../policy/sandbox.js';
import type { Action, ActionChange } from '../types/action.js';
import { isReversibleChange } from '../types/action.js';
import type { ApprovalOutcome, ApprovalReason } from '../types/approval.js';
import { ApprovalStatus } from '../types/approval.js';
import type { AuditApprovalStatus } from '../types/audit.js';
import type { CommandDescriptor } from '../types/capability.js';
import { Capability, PreviewMode, missingCapabilities } from '../types/capability.js';
import type {
  CommandExecutionResult,
  CommandInvocation,
  CommandPlan,
  PreviewAction,
  RollbackStatus,
} from '../types/command.js';
import { PipelineState } from '../types/command.js';
import type { PolicyDecision } from '../types/decision.js';
import { PolicyOutcome, aggregateDecisions, deny, requireApproval } from '../types/decision.js';
import type { RiskAssessment } from '../types/risk.js';
import { RiskLevel, maxRisk } from '../types/risk.js';
import { computeArgsHash } from './hash.js';
import type { PathLockManager, ReleaseLock } from './path-lock.js';
import type { BoundCommand, CommandRegistry, ExecutionControls, PreviewReader } from './registry.js';
import type { TerminalTransition, TransitionListener } from './transition.js';

export interface CommandPipelineOptions {
  readonly registry: CommandRegistry;
  readonly adapters: KernelAdapters;
  readonly risk: RiskClassifier;
  readonly approvals: ApprovalManager;
  readonly diagnostics: DiagnosticChannel;
  readonly locks: PathLockManager;
  /** Bound by `--ask-for-approval`. */
  readonly requireApproval?: boolean | undefined;
  readonly listeners?: ReadonlyArray<TransitionListener> | undefined;
}

/** A planned path after canonicalization, with the intent it was planned for. */
interface PlannedPath {
  readonly resolved: ResolvedPath;
  readonly intent: PathIntent;
}

/** Mutable state of one run, accumulated as it moves through the machine. */
interface RunState {
  readonly invocationId: string;
  readonly startedAt: number;
  readonly states: PipelineState[];
  readonly argsHash: string;
  descriptor?: CommandDescriptor;
  paths: PlannedPath[];
  shellTexts: string[];
  preview?: string;
  decision?: PolicyDecision;
  risk: RiskLevel;
  approval?: ApprovalOutcome;
  change?: ActionChange;
  mutated: boolean;
  rollback: RollbackStatus;
}

const APPROVAL_ERROR_KIND: Readonly<Record<ApprovalReason, ErrorKind>> = {
  'auto-approved': ErrorKind.ApprovalDenied,
  user: ErrorKind.ApprovalDenied,
  'non-interactive': ErrorKind.ApprovalDenied,
  'prompt-failed': ErrorKind.ApprovalDenied,
  timeout: ErrorKind.ApprovalTimedOut,
  cancelled: ErrorKind.Cancelled,
};

export class CommandPipeline {
  private readonly registry: CommandRegistry;
  private readonly adapters: KernelAdapters;
  private readonly risk: RiskClassifier;
  private readonly approvals: ApprovalManager;
  private readonly diagnostics: DiagnosticChannel;
  private readonly locks: PathLockManager;
  private readonly requireApproval: boolean;
  private readonly listeners: TransitionListener[];

  constructor(options: CommandPipelineOptions) {
    this.registry = options.registry;
    this.adapters = options.adapters;
    this.risk = options.risk;
    this.approvals = options.approvals;
    this.diagnostics = options.diagnostics;
    this.locks = options.locks;
    this.requireApproval = options.requireApproval ?? false;
    this.listeners = [...(options.listeners ?? [])];
  }

  addListener(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  /**
   * Run one invocation through the state machine. Never rejects for a
   * user-visible failure.
   */
  async execute(invocation: CommandInvocation): Promise<CommandExecutionResult> {
    const run: RunState = {
      invocationId: randomUUID(),
      startedAt: Date.now(),
      states: [PipelineState.Created],
      argsHash: computeArgsHash(invocation.command, invocation.args),
      paths: [],
      shellTexts: [],
      risk: RiskLevel.Safe,
      mutated: false,
      rollback: 'not-needed',
    };

    let terminal: { output: string; error?: CommandErrorInfo };
    try {
      terminal = { output: await this.advance(invocation, run) };
    } catch (err) {
      const partial = err instanceof CommandError ? err.output ?? '' : '';
      terminal = { output: partial, error: toErrorInfo(err, ErrorKind.ExecutionFailed) };
    }
    return this.finish(invocation, run, terminal.output, terminal.error);
  }

  // -------------------------------------------------------------------------
  // State machine
  // -------------------------------------------------------------------------

  private async advance(invocation: CommandInvocation, run: RunState): Promise<string> {
    const context = invocation.context;

    // Created → Validated
    const registered = this.registry.get(invocation.command);
    if (registered === undefined) {
      throw new CommandError(ErrorKind.InvalidArguments, `unknown command '${invocation.command}'`);
    }
    const descriptor = registered.descriptor;
    run.descriptor = descriptor;
    if (context.dry_run && !descriptor.supports_dry_run) {
      throw new CommandError(ErrorKind.InvalidArguments, `'${descriptor.id}' does not support dry run`);
    }
    const bound = registered.bind(invocation.args, context);
    if (!bound.ok) {
      throw new CommandError(ErrorKind.InvalidArguments, bound.reason);
    }
    run.states.push(PipelineState.Validated);

    // Validated → PreviewGenerated
    checkpoint(context.signal, 'before preview');
    const plan = bound.command.plan();
    await this.resolvePlan(plan, context.workspace_root, run);
    const wantsPreview =
      context.dry_run ||
      descriptor.preview_mode === PreviewMode.Always ||
      (descriptor.preview_mode === PreviewMode.OnRequest && invocation.preview === true);
    if (wantsPreview) {
      run.preview = await this.renderPreview(bound.command, plan, context.workspace_root, run);
    }
    run.states.push(PipelineState.PreviewGenerated);

    // PreviewGenerated → PolicyChecked
    const decision = this.evaluatePolicy(invocation, descriptor, run);
    run.decision = decision;
    run.states.push(PipelineState.PolicyChecked);
    if (decision.outcome === PolicyOutcome.Deny) {
      throw new CommandError(decision.kind, decision.reason);
    }

    if (context.dry_run) {
      return run.preview ?? plan.summary;
    }

    // PolicyChecked → ApprovalPending
    if (decision.outcome === PolicyOutcome.RequireApproval) {
      run.states.push(PipelineState.ApprovalPending);
      checkpoint(context.signal, 'before approval');
      const approval = await this.approvals.requestApproval(
        {
          command_id: descriptor.id,
          operation: plan.summary,
          risk_level: run.risk,
          description: decision.reason,
          details: run.preview !== undefined ? run.preview.split('\n') : plan.actions.map(describeAction),
        },
        context.signal,
      );
      run.approval = approval;
      if (approval.status !== ApprovalStatus.Approved) {
        throw new CommandError(APPROVAL_ERROR_KIND[approval.reason], `approval denied (${approval.reason})`);
      }
      checkpoint(context.signal, 'after approval');
    }

    // → Executing
    const release = await this.acquireLocks(descriptor, context.workspace_root, run);
    run.states.push(PipelineState.Executing);
    try {
      return await bound.command.execute(this.createControls(invocation, run));
    } catch (err) {
      await this.rollback(run);
      throw err;
    } finally {
      release?.();
    }
  }

  private async resolvePlan(plan: CommandPlan, workspaceRoot: string, run: RunState): Promise<void> {
    const requests: Array<{ path: string; intent: PathIntent }> = [];
    for (const action of plan.actions) {
      switch (action.kind) {
        case 'ReadFile':
          requests.push({ path: action.path, intent: 'read' });
          break;
        case 'WriteFile':
        case 'DeleteFile':
          requests.push({ path: action.path, intent: 'write' });
          break;
        case 'MoveFile':
          requests.push({ path: action.from, intent: 'write' }, { path: action.to, intent: 'write' });
          break;
        case 'ExecuteShell':
          run.shellTexts.push(action.command);
          break;
      }
    }
    for (const request of requests) {
      const resolved = await this.adapters.paths.canonicalize(workspaceRoot, request.path);
      run.paths.push({ resolved, intent: request.intent });
    }
  }

  private async renderPreview(
    command: BoundCommand,
    plan: CommandPlan,
    workspaceRoot: string,
    run: RunState,
  ): Promise<string> {
    if (command.render === undefined) {
      return [plan.summary, ...plan.actions.map(describeAction)].join('\n');
    }
    const fs = this.adapters.fs;
    const reader: PreviewReader = {
      read: async (path) => {
        const planned = findPlanned(run.paths, path);
        const canonical = planned?.resolved.canonical ?? null;
        if (planned === undefined || canonical === null || !planned.resolved.exists) return null;
        if (!isWithinRoot(workspaceRoot, canonical) || (await fs.isDirectory(canonical))) return null;
        return fs.readFile(canonical);
      },
    };
    return command.render(reader);
  }

  private evaluatePolicy(
    invocation: CommandInvocation,
    descriptor: CommandDescriptor,
    run: RunState,
  ): PolicyDecision {
    const context = invocation.context;
    const level = context.sandbox_level;
    const capabilityOptions = {
      requireApproval: this.requireApproval,
      workspaceShellOptIn: descriptor.workspace_shell_opt_in,
    };

    const decisions: PolicyDecision[] = [];

    const missing = missingCapabilities(
      descriptor.required_capabilities,
      grantedCapabilities(level, capabilityOptions),
    );
    if (missing.length > 0) {
      decisions.push(deny(`${missing.join(', ')} not granted at sandbox level ${level}`));
    }
    for (const capability of descriptor.required_capabilities) {
      decisions.push(checkCapability(level, capability, capabilityOptions));
    }
    for (const planned of run.paths) {
      decisions.push(
        checkPath(level, planned.resolved, planned.intent, {
          workspaceRoot: context.workspace_root,
          requireApproval: this.requireApproval,
          boundaryOverride: invocation.boundary_override === true,
        }),
      );
    }
    if (descriptor.requires_approval) {
      decisions.push(requireApproval(`'${descriptor.id}' always requires approval`));
    }

    const assessments: RiskAssessment[] = [
      ...run.shellTexts.map((text) => this.risk.classifyCommand(text)),
      ...run.paths.map((planned) => this.risk.classifyPath(planned.resolved, planned.intent)),
    ];
    run.risk = maxRisk(assessments.map((assessment) => assessment.level));
    const rules = (level: RiskLevel): string =>
      assessments
        .filter((assessment) => assessment.level === level)
        .flatMap((assessment) => assessment.matched_rules)
        .join(', ');

    const aggregate = aggregateDecisions(decisions);
    // A boundary escape keeps its own kind even when the target is also a blocked location.
    if (aggregate.outcome === PolicyOutcome.Deny && aggregate.kind === ErrorKind.PathTraversal) {
      return aggregate;
    }
    if (run.risk === RiskLevel.Blocked) {
      return deny(`blocked by risk rules: ${rules(RiskLevel.Blocked)}`);
    }
    if (run.risk === RiskLevel.Dangerous && aggregate.outcome === PolicyOutcome.Allow) {
      return requireApproval(`dangerous operation: ${rules(RiskLevel.Dangerous)}`);
    }
    return aggregate;
  }

  private async acquireLocks(
    descriptor: CommandDescriptor,
    workspaceRoot: string,
    run: RunState,
  ): Promise<ReleaseLock | undefined> {
    const writes = descriptor.required_capabilities.includes(Capability.WriteFile);
    const shell = descriptor.required_capabilities.includes(Capability.ExecuteShell);
    if (!writes && !shell) return undefined;

    const keys = run.paths
      .filter((planned) => planned.intent === 'write')
      .map((planned) => planned.resolved.canonical ?? planned.resolved.absolute);
    if (shell) keys.push(workspaceRoot);
    return keys.length > 0 ? this.locks.acquire(keys) : undefined;
  }

  // -------------------------------------------------------------------------
  // Execution controls
  // -------------------------------------------------------------------------

  private createControls(invocation: CommandInvocation, run: RunState): ExecutionControls {
    const signal = invocation.context.signal;
    const inner = this.adapters;
    const canonicalOf = (intent?: PathIntent): Set<string> =>
      new Set(
        run.paths
          .filter((planned) => intent === undefined || planned.intent === intent)
          .map((planned) => planned.resolved.canonical)
          .filter((canonical): canonical is string => canonical !== null),
      );
    const readable = canonicalOf();
    const writable = canonicalOf('write');

    const requireBegun = (operation: string): void => {
      if (run.change === undefined) {
        throw new CommandError(ErrorKind.ExecutionFailed, `${operation} before the change was declared`);
      }
    };
    const requireReadable = (path: string): void => {
      if (!readable.has(path)) {
        throw new CommandError(ErrorKind.PolicyDenied, `${path} was not declared by the plan`);
      }
    };
    const requireWritable = (path: string): void => {
      if (!writable.has(path)) {
        throw new CommandError(ErrorKind.PolicyDenied, `${path} was not declared as a write target`);
      }
    };

    const fs: WorkspaceFilesystem = {
      readFile: async (path) => {
        requireReadable(path);
        return inner.fs.readFile(path);
      },
      exists: async (path) => {
        requireReadable(path);
        return inner.fs.exists(path);
      },
      isDirectory: async (path) => {
        requireReadable(path);
        return inner.fs.isDirectory(path);
      },
      writeFileAtomic: async (path: string, content: Uint8Array, options?: AtomicWriteOptions) => {
        requireBegun('write');
        requireWritable(path);
        await inner.fs.writeFileAtomic(path, content, {
          beforeCommit: () => {
            checkpoint(signal, 'before commit');
            options?.beforeCommit?.();
          },
        });
        run.mutated = true;
      },
      remove: async (path) => {
        requireBegun('remove');
        requireWritable(path);
        await inner.fs.remove(path);
        run.mutated = true;
      },
      rename: async (from, to) => {
        requireBegun('rename');
        requireWritable(from);
        requireWritable(to);
        await inner.fs.rename(from, to);
        run.mutated = true;
      },
    };

    const shell: ShellExecutor = {
      run: async (command: string, options: ShellRunOptions) => {
        requireBegun('shell');
        if (!run.shellTexts.includes(command)) {
          throw new CommandError(ErrorKind.PolicyDenied, 'shell command differs from the planned command');
        }
        run.mutated = true;
        return inner.shell.run(command, { ...options, signal });
      },
    };

    return {
      fs,
      shell,
      target: (path) => {
        const planned = findPlanned(run.paths, path);
        if (planned === undefined) {
          throw new CommandError(ErrorKind.PolicyDenied, `${path} was not declared by the plan`);
        }
        const canonical = planned.resolved.canonical;
        if (canonical === null) {
          throw new CommandError(ErrorKind.PathTraversal, `cannot canonicalize ${path}`);
        }
        return canonical;
      },
      begin: (change) => {
        if (run.change !== undefined) {
          throw new CommandError(ErrorKind.ExecutionFailed, 'change already declared for this invocation');
        }
        run.change = change;
      },
      checkpoint: () => checkpoint(signal, 'during execution'),
    };
  }

  private async rollback(run: RunState): Promise<void> {
    const change = run.change;
    if (!run.mutated || change === undefined) return;
    if (!isReversibleChange(change)) {
      run.rollback = 'not-reversible';
      return;
    }
    try {
      await applyActionState(this.adapters.fs, change.state_before);
      run.rollback = 'succeeded';
    } catch (err) {
      run.rollback = 'failed';
      this.diagnostics.report(
        diagnostic(
          'error',
          'RollbackFailed',
          `rollback of '${change.description}' (${run.invocationId}) failed: ${
            err instanceof Error ? err.message : String(err)
          }`,
        ),
      );
    }
  }

  // -------------------------------------------------------------------------
  // Terminal transition
  // -------------------------------------------------------------------------

  private async finish(
    invocation: CommandInvocation,
    run: RunState,
    output: string,
    error: CommandErrorInfo | undefined,
  ): Promise<CommandExecutionResult> {
    const terminalState = error === undefined ? PipelineState.Completed : PipelineState.Failed;
    run.states.push(terminalState);

    const action = this.actionFor(invocation, run, terminalState);
    const finishedAt = new Date();
    const metadata = {
      invocation_id: run.invocationId,
      command: invocation.command,
      session_id: invocation.context.session_id,
      states: [...run.states],
      ...(run.decision !== undefined ? { decision: run.decision } : {}),
      ...(run.descriptor !== undefined ? { risk_level: run.risk } : {}),
      ...(run.approval !== undefined ? { approval: run.approval } : {}),
      ...(action !== undefined ? { action_id: action.id } : {}),
      rollback: run.rollback,
      duration_ms: finishedAt.getTime() - run.startedAt,
      dry_run: invocation.context.dry_run,
    };
    const result: CommandExecutionResult = {
      success: error === undefined,
      output,
      ...(error !== undefined ? { error } : {}),
      ...(run.preview !== undefined ? { preview: run.preview } : {}),
      metadata,
    };

    const transition: TerminalTransition = {
      invocation,
      terminal_state: terminalState,
      result,
      capabilities: run.descriptor?.required_capabilities ?? [],
      risk_level: run.risk,
      approval_status: approvalStatus(run.approval),
      paths: run.paths.map((planned) => planned.resolved.canonical ?? planned.resolved.requested),
      command_text: run.shellTexts.length > 0 ? run.shellTexts.join('\n') : undefined,
      args_hash: run.argsHash,
      action,
      finished_at: finishedAt.toISOString(),
    };

    for (const listener of this.listeners) {
      try {
        await listener(transition);
      } catch (err) {
        this.diagnostics.report(
          diagnostic(
            'error',
            'ListenerFailed',
            `transition listener failed for ${run.invocationId}: ${err instanceof Error ? err.message : String(err)}`,
          ),
        );
      }
    }

    run.states.push(PipelineState.Logged);
    return { ...result, metadata: { ...metadata, states: [...run.states] } };
  }

  private actionFor(
    invocation: CommandInvocation,
    run: RunState,
    terminalState: PipelineState,
  ): Action | undefined {
    const change = run.change;
    if (change === undefined || invocation.context.dry_run) return undefined;

    const base = {
      id: randomUUID(),
      command: invocation.command,
      timestamp: new Date().toISOString(),
    };

    if (terminalState === PipelineState.Completed) {
      return {
        ...base,
        state_before: change.state_before,
        state_after: change.state_after,
        reversible: isReversibleChange(change),
        description: change.description,
      };
    }
    if (run.rollback === 'failed' || run.rollback === 'not-reversible') {
      const description = `${change.description} (failed; ${
        run.rollback === 'failed' ? 'rollback failed' : 'effects not reversible'
      })`;
      return {
        ...base,
        state_before: { kind: 'Opaque', description },
        state_after: { kind: 'Opaque', description },
        reversible: false,
        description,
      };
    }
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function checkpoint(signal: AbortSignal, where: string): void {
  if (signal.aborted) {
    throw new CommandError(ErrorKind.Cancelled, `cancelled ${where}`);
  }
}

function findPlanned(paths: ReadonlyArray<PlannedPath>, path: string): PlannedPath | undefined {
  return paths.find((planned) => planned.resolved.requested === path);
}

function approvalStatus(approval: ApprovalOutcome | undefined): AuditApprovalStatus {
  if (approval === undefined) return 'NotRequired';
  return approval.status === ApprovalStatus.Approved ? 'Approved' : 'Denied';
}

export function describeAction(action: PreviewAction): string {
  switch (action.kind) {
    case 'ReadFile':
      return `read ${action.path}`;
    case 'WriteFile':
      return `write ${action.path}`;
    case 'DeleteFile':
      return `delete ${action.path}`;
    case 'MoveFile':
      return `move ${action.from} -> ${action.to}`;
    case 'ExecuteShell':
      return `$ ${action.command}`;
  }
}
