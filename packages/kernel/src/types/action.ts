/**
 * Bulwark Kernel — Action Types
 *
 * An Action is a recorded state transition produced by a completed command.
 * `state_before` and `state_after` describe what the workspace looks like on
 * either side of the transition: undo re-applies `state_before`, redo
 * re-applies `state_after`.
 *
 * Applying a state means "make the workspace match it":
 * - FileCreated / FileModified: the file exists with `content`
 * - FileDeleted: the file is absent (`content` keeps the bytes it had)
 * - FileMoved: the file lives at `to`, not at `from`
 * - Opaque: cannot be applied; the action is non-reversible
 */

import { createHash } from 'node:crypto';

export type ActionState =
  | { readonly kind: 'FileCreated'; readonly path: string; readonly content: Uint8Array }
  | {
      readonly kind: 'FileModified';
      readonly path: string;
      readonly content: Uint8Array;
      readonly content_hash: string;
    }
  | { readonly kind: 'FileDeleted'; readonly path: string; readonly content: Uint8Array }
  | { readonly kind: 'FileMoved'; readonly from: string; readonly to: string }
  | { readonly kind: 'Opaque'; readonly description: string };

export type ActionStateKind = ActionState['kind'];

export interface Action {
  readonly id: string;
  readonly command: string;
  /** ISO-8601. */
  readonly timestamp: string;
  readonly state_before: ActionState;
  readonly state_after: ActionState;
  readonly reversible: boolean;
  readonly description: string;
}

/**
 * The transition a command declares (via `controls.begin`) before it
 * mutates anything. The pipeline turns it into an Action on completion, or
 * re-applies `state_before` to roll back on failure.
 */
export interface ActionChange {
  readonly state_before: ActionState;
  readonly state_after: ActionState;
  readonly description: string;
}

const EMPTY = new Uint8Array(0);

export function contentHash(content: Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

export function fileCreatedChange(path: string, content: Uint8Array): ActionChange {
  return {
    state_before: { kind: 'FileDeleted', path, content: EMPTY },
    state_after: { kind: 'FileCreated', path, content },
    description: `create ${path}`,
  };
}

export function fileModifiedChange(path: string, prior: Uint8Array, next: Uint8Array): ActionChange {
  return {
    state_before: { kind: 'FileModified', path, content: prior, content_hash: contentHash(prior) },
    state_after: { kind: 'FileModified', path, content: next, content_hash: contentHash(next) },
    description: `modify ${path}`,
  };
}

export function fileDeletedChange(path: string, prior: Uint8Array): ActionChange {
  return {
    state_before: { kind: 'FileCreated', path, content: prior },
    state_after: { kind: 'FileDeleted', path, content: prior },
    description: `delete ${path}`,
  };
}

export function fileMovedChange(from: string, to: string): ActionChange {
  return {
    state_before: { kind: 'FileMoved', from: to, to: from },
    state_after: { kind: 'FileMoved', from, to },
    description: `move ${from} -> ${to}`,
  };
}

export function opaqueChange(description: string): ActionChange {
  const state: ActionState = { kind: 'Opaque', description };
  return { state_before: state, state_after: state, description };
}

/** A change can be reversed only if both of its states can be applied. */
export function isReversibleChange(change: ActionChange): boolean {
  return change.state_before.kind !== 'Opaque' && change.state_after.kind !== 'Opaque';
}

/** Paths a state touches, for locking and audit. */
export function statePaths(state: ActionState): string[] {
  switch (state.kind) {
    case 'FileMoved':
      return [state.from, state.to];
    case 'Opaque':
      return [];
    default:
      return [state.path];
  }
}
