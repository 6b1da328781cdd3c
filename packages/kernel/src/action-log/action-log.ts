/**
 * Bulwark Kernel — Action Log (undo/redo)
 *
 * An ordered sequence of Actions plus a cursor separating applied history
 * from the redoable tail:
 *
 *   entries: [a0, a1, a2, a3]
 *   cursor:               ^ 3   (a0..a2 applied, a3 redoable)
 *
 * - push: truncate the redo tail at the cursor, append, advance
 * - undo: if cursor > 0, re-apply `state_before` of entries[cursor-1], then decrement
 * - redo: if cursor < length, re-apply `state_after` of entries[cursor], then increment
 * - clear: drop every entry and reset the cursor; the workspace is left as it is
 *
 * Every mutation runs through one serial queue, so a concurrent undo and a
 * new push are linearized, never interleaved. Failed undo/redo leaves the
 * cursor unchanged.
 *
 * The log is bounded; evicting the oldest entries is reported as an
 * ActionLogEviction warning.
 */

import type { WorkspaceFilesystem } from '../adapters/index.js';
import type { Action } from '../types/action.js';
import { statePaths } from '../types/action.js';
import { CommandError, ErrorKind } from '../errors.js';
import type { DiagnosticChannel } from '../logging/diagnostics.js';
import { diagnostic } from '../logging/diagnostics.js';
import type { PathLockManager } from '../pipeline/path-lock.js';
import { applyActionState } from './apply.js';

export const DEFAULT_ACTION_LOG_CAPACITY = 100;

/**
 * Persistence for pushed Actions, one record per Action, scoped by session.
 * Implementations live in the runtime host.
 */
export interface ActionStore {
  append(sessionId: string, action: Action): Promise<void>;
  /** Forget every persisted Action of the session. */
  clear(sessionId: string): Promise<void>;
}

export type UndoResult =
  | { readonly status: 'undone'; readonly action: Action }
  | { readonly status: 'nothing-to-undo' };

export type RedoResult =
  | { readonly status: 'redone'; readonly action: Action }
  | { readonly status: 'nothing-to-redo' };

export interface ActionLogOptions {
  readonly sessionId: string;
  readonly fs: WorkspaceFilesystem;
  readonly diagnostics: DiagnosticChannel;
  readonly capacity?: number | undefined;
  readonly store?: ActionStore | undefined;
  /** Shared with the pipeline so undo/redo never races an in-flight write. */
  readonly locks?: PathLockManager | undefined;
}

export interface ActionLogSnapshot {
  readonly actions: ReadonlyArray<Action>;
  readonly cursor: number;
}

export class ActionLog {
  private readonly sessionId: string;
  private readonly fs: WorkspaceFilesystem;
  private readonly diagnostics: DiagnosticChannel;
  private readonly capacity: number;
  private readonly store: ActionStore | undefined;
  private readonly locks: PathLockManager | undefined;

  private entries: Action[] = [];
  private cursor = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: ActionLogOptions) {
    this.sessionId = options.sessionId;
    this.fs = options.fs;
    this.diagnostics = options.diagnostics;
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_ACTION_LOG_CAPACITY);
    this.store = options.store;
    this.locks = options.locks;
  }

  /** Append at the cursor, discarding any redo tail beyond it. */
  push(action: Action): Promise<void> {
    return this.serialize(async () => {
      this.entries.splice(this.cursor);
      this.entries.push(action);

      const overflow = this.entries.length - this.capacity;
      if (overflow > 0) {
        const evicted = this.entries.splice(0, overflow);
        this.diagnostics.report(
          diagnostic(
            'warning',
            'ActionLogEviction',
            `action log full (${this.capacity}); evicted ${evicted.map((a) => a.id).join(', ')}`,
          ),
        );
      }
      this.cursor = this.entries.length;

      if (this.store !== undefined) {
        try {
          await this.store.append(this.sessionId, action);
        } catch (err) {
          this.diagnostics.report(
            diagnostic(
              'error',
              'ActionStoreWriteFailed',
              `action ${action.id} not persisted: ${err instanceof Error ? err.message : String(err)}`,
            ),
          );
        }
      }
    });
  }

  undo(): Promise<UndoResult> {
    return this.serialize(async (): Promise<UndoResult> => {
      const action = this.entries[this.cursor - 1];
      if (this.cursor === 0 || action === undefined) return { status: 'nothing-to-undo' };
      if (!action.reversible) {
        throw new CommandError(ErrorKind.NotReversible, `action ${action.id} (${action.description}) cannot be undone`);
      }
      await this.apply(action, 'before');
      this.cursor -= 1;
      return { status: 'undone', action };
    });
  }

  redo(): Promise<RedoResult> {
    return this.serialize(async (): Promise<RedoResult> => {
      const action = this.entries[this.cursor];
      if (action === undefined) return { status: 'nothing-to-redo' };
      if (!action.reversible) {
        throw new CommandError(ErrorKind.NotReversible, `action ${action.id} (${action.description}) cannot be redone`);
      }
      await this.apply(action, 'after');
      this.cursor += 1;
      return { status: 'redone', action };
    });
  }

  /** Empty the log, applied history and redo tail alike. Resolves to the number of entries dropped. */
  clear(): Promise<number> {
    return this.serialize(async () => {
      const dropped = this.entries.length;
      this.entries = [];
      this.cursor = 0;
      if (this.store !== undefined) {
        try {
          await this.store.clear(this.sessionId);
        } catch (err) {
          this.diagnostics.report(
            diagnostic(
              'error',
              'ActionStoreWriteFailed',
              `clearing session ${this.sessionId} not persisted: ${err instanceof Error ? err.message : String(err)}`,
            ),
          );
        }
      }
      return dropped;
    });
  }

  snapshot(): ActionLogSnapshot {
    return { actions: [...this.entries], cursor: this.cursor };
  }

  get size(): number {
    return this.entries.length;
  }

  get position(): number {
    return this.cursor;
  }

  get canUndo(): boolean {
    return this.cursor > 0;
  }

  get canRedo(): boolean {
    return this.cursor < this.entries.length;
  }

  private async apply(action: Action, side: 'before' | 'after'): Promise<void> {
    const state = side === 'before' ? action.state_before : action.state_after;
    const paths = [...statePaths(action.state_before), ...statePaths(action.state_after)];
    const release = this.locks !== undefined ? await this.locks.acquire(paths) : undefined;
    try {
      await applyActionState(this.fs, state);
    } catch (err) {
      if (err instanceof CommandError) throw err;
      throw new CommandError(
        ErrorKind.ExecutionFailed,
        `${side === 'before' ? 'undo' : 'redo'} of ${action.id} failed: ${
          err instanceof Error ? err.message : String(err)
        }`,
        { cause: err },
      );
    } finally {
      release?.();
    }
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // Failures reach the caller through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
