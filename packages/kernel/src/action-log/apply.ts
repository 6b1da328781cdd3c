import type { WorkspaceFilesystem } from '../adapters/index.js';
import type { ActionState } from '../types/action.js';
import { CommandError, ErrorKind } from '../errors.js';

/**
 * Make the workspace match `state`. Idempotent: applying a state the
 * workspace already matches is a no-op, so rollback after a partial write
 * and a repeated undo are both safe.
 */
export async function applyActionState(fs: WorkspaceFilesystem, state: ActionState): Promise<void> {
  switch (state.kind) {
    case 'FileCreated':
    case 'FileModified':
      await fs.writeFileAtomic(state.path, state.content);
      return;

    case 'FileDeleted':
      await fs.remove(state.path);
      return;

    case 'FileMoved':
      if (await fs.exists(state.from)) {
        await fs.rename(state.from, state.to);
        return;
      }
      if (await fs.exists(state.to)) return;
      throw new CommandError(
        ErrorKind.ExecutionFailed,
        `cannot move ${state.from} to ${state.to}: neither path exists`,
      );

    case 'Opaque':
      throw new CommandError(ErrorKind.NotReversible, `cannot re-apply: ${state.description}`);
  }
}
