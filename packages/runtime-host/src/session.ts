/**
 * Bulwark Runtime Host — Session Wiring
 *
 * A session binds one resolved configuration to one set of kernel services:
 * a sealed command registry, the Node adapters, the risk classifier, the
 * approval manager, the shared path-lock manager, the session's action log
 * (persisted under `<home>/sessions/<session_id>/`) and the audit logger
 * writing to the configured NDJSON file.
 *
 * The action log and the audit logger are attached as transition listeners;
 * neither is written from anywhere else.
 */

import { randomUUID } from 'node:crypto';
import type {
  ApprovalPrompter,
  CommandExecutionResult,
  DiagnosticChannel,
  KernelAdapters,
  RedoResult,
  RegisteredCommand,
  UndoResult,
} from '@bulwark/kernel';
import {
  ActionLog,
  ApprovalManager,
  AuditLogger,
  CommandPipeline,
  CommandRegistry,
  PathLockManager,
  RiskClassifier,
  projectToActionLog,
  projectToAudit,
} from '@bulwark/kernel';
import { NodeShellExecutor } from './adapters/exec.js';
import { FsPathResolver, NodeWorkspaceFilesystem } from './adapters/fs.js';
import type { BulwarkConfig } from './config.js';
import { FileAuditSink } from './logging/audit-file-sink.js';
import { PatternRedactor } from './logging/redactor.js';
import { loadRiskRules } from './policy/risk-rules.js';
import type { SessionRecord } from './state/action-store.js';
import { FileActionStore, SESSION_FILE, sessionDir } from './state/action-store.js';
import { FileStateIO } from './state/state-io.js';

export interface SessionOptions {
  readonly commands: ReadonlyArray<RegisteredCommand>;
  readonly diagnostics: DiagnosticChannel;
  readonly prompter?: ApprovalPrompter | undefined;
  readonly sessionId?: string | undefined;
  /** Replaces the Node adapters (tests). */
  readonly adapters?: KernelAdapters | undefined;
}

export interface InvokeOptions {
  readonly dryRun?: boolean | undefined;
  readonly preview?: boolean | undefined;
  readonly boundaryOverride?: boolean | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly actor?: string | undefined;
}

export interface Session {
  readonly id: string;
  readonly config: BulwarkConfig;
  readonly registry: CommandRegistry;
  readonly pipeline: CommandPipeline;
  readonly actionLog: ActionLog;
  readonly audit: AuditLogger;
  readonly approvals: ApprovalManager;
  readonly store: FileActionStore;
  invoke(command: string, args: unknown, options?: InvokeOptions): Promise<CommandExecutionResult>;
  undo(): Promise<UndoResult>;
  redo(): Promise<RedoResult>;
  /** Waits for queued audit events to reach the sink. */
  close(): Promise<void>;
}

export function createSession(config: BulwarkConfig, options: SessionOptions): Session {
  const id = options.sessionId ?? randomUUID();

  const registry = new CommandRegistry();
  for (const command of options.commands) registry.register(command);
  registry.seal();

  const adapters: KernelAdapters = options.adapters ?? {
    paths: new FsPathResolver(),
    fs: new NodeWorkspaceFilesystem(),
    shell: new NodeShellExecutor(),
  };

  const io = new FileStateIO(sessionDir(config.home, id));
  const record: SessionRecord = {
    session_id: id,
    workspace_root: config.workspaceRoot,
    sandbox_level: config.sandboxLevel,
    started_at: new Date().toISOString(),
  };
  io.writeJson(SESSION_FILE, record);
  const store = new FileActionStore(io);

  const locks = new PathLockManager();
  const actionLog = new ActionLog({
    sessionId: id,
    fs: adapters.fs,
    diagnostics: options.diagnostics,
    capacity: config.actionLogMaxSize,
    store,
    locks,
  });
  const audit = new AuditLogger({
    diagnostics: options.diagnostics,
    sink: new FileAuditSink(config.auditPath),
    redactor: new PatternRedactor(config.redactPatterns),
    enabled: config.auditEnabled,
  });
  const approvals = new ApprovalManager({
    mode: config.approvalMode,
    prompter: options.prompter,
    timeoutMs: config.approvalTimeoutMs,
  });

  const pipeline = new CommandPipeline({
    registry,
    adapters,
    risk: new RiskClassifier(loadRiskRules(config.riskRulesPath)),
    approvals,
    diagnostics: options.diagnostics,
    locks,
    requireApproval: config.requireApproval,
    listeners: [projectToActionLog(actionLog), projectToAudit(audit)],
  });

  return {
    id,
    config,
    registry,
    pipeline,
    actionLog,
    audit,
    approvals,
    store,
    invoke(command, args, invokeOptions = {}) {
      return pipeline.execute({
        command,
        args,
        context: {
          session_id: id,
          workspace_root: config.workspaceRoot,
          sandbox_level: config.sandboxLevel,
          dry_run: invokeOptions.dryRun ?? false,
          signal: invokeOptions.signal ?? new AbortController().signal,
        },
        preview: invokeOptions.preview ?? false,
        boundary_override: invokeOptions.boundaryOverride ?? false,
        ...(invokeOptions.actor !== undefined ? { actor: invokeOptions.actor } : {}),
      });
    },
    undo: () => actionLog.undo(),
    redo: () => actionLog.redo(),
    close: () => audit.flush(),
  };
}
