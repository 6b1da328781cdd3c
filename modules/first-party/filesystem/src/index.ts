/**
 * @bulwark/command-filesystem
 *
 * First-party file commands: read, create, write, edit, delete, rename.
 *
 * Exports the descriptors and schemas (manifest), the registered commands
 * (for a session's registry) and the line diff used by their previews.
 */

export type { CreateArgs, DeleteArgs, EditArgs, ReadArgs, RenameArgs, WriteArgs } from './manifest.js';
export {
  CREATE_DESCRIPTOR,
  DELETE_DESCRIPTOR,
  EDIT_DESCRIPTOR,
  PROTECTED_NAMES,
  READ_DESCRIPTOR,
  RENAME_DESCRIPTOR,
  WRITE_DESCRIPTOR,
  createArgsSchema,
  deleteArgsSchema,
  editArgsSchema,
  readArgsSchema,
  renameArgsSchema,
  writeArgsSchema,
} from './manifest.js';
export type { EditResult } from './execute.js';
export {
  FILESYSTEM_COMMANDS,
  applyEdit,
  createCommand,
  deleteCommand,
  editCommand,
  isProtectedPath,
  readCommand,
  renameCommand,
  writeCommand,
} from './execute.js';
export type { DiffLine, DiffOp } from './diff.js';
export { CONTEXT_LINES, MAX_DIFF_LINES, diffLines, renderUnifiedDiff, splitLines } from './diff.js';
