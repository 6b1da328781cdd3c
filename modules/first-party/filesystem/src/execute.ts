/**
 * Bulwark Filesystem Commands — Handlers
 *
 * Handler implementations for the file commands. All I/O flows through the
 * guarded filesystem view the pipeline hands to `execute`; this module
 * never imports node:fs. Every mutating handler declares its state
 * transition with `controls.begin()` before touching the workspace, so the
 * pipeline can roll it back on failure and the action log can undo it.
 *
 * Content is treated as UTF-8 text.
 */

import { basename } from 'node:path';
import type { ExecutionControls, PreviewReader, RegisteredCommand } from '@bulwark/kernel';
import {
  CommandError,
  ErrorKind,
  defineCommand,
  fileCreatedChange,
  fileDeletedChange,
  fileModifiedChange,
  fileMovedChange,
} from '@bulwark/kernel';
import { renderUnifiedDiff, splitLines } from './diff.js';
import type { EditArgs } from './manifest.js';
import {
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

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function failed(reason: string): CommandError {
  return new CommandError(ErrorKind.ExecutionFailed, reason);
}

/** Largest cut at or below `limit` that does not split a multi-byte UTF-8 character. */
function utf8Cut(content: Uint8Array, limit: number): number {
  let cut = limit;
  while (cut > 0 && cut < content.length && (content[cut] & 0xc0) === 0x80) cut -= 1;
  return cut;
}

async function previewText(reader: PreviewReader, path: string): Promise<string | null> {
  const content = await reader.read(path);
  return content === null ? null : decoder.decode(content);
}

/** Canonical target that must be an existing regular file. */
async function existingFile(controls: ExecutionControls, path: string): Promise<string> {
  const target = controls.target(path);
  if (!(await controls.fs.exists(target))) throw failed(`${path} does not exist`);
  if (await controls.fs.isDirectory(target)) throw failed(`${path} is a directory`);
  return target;
}

// ---------------------------------------------------------------------------
// read
// ---------------------------------------------------------------------------

export const readCommand = defineCommand({
  descriptor: READ_DESCRIPTOR,
  argsSchema: readArgsSchema,
  plan: (args) => ({ summary: `read ${args.path}`, actions: [{ kind: 'ReadFile', path: args.path }] }),
  async execute(args, _context, controls) {
    const content = await controls.fs.readFile(await existingFile(controls, args.path));
    if (args.max_bytes === undefined || content.length <= args.max_bytes) {
      return decoder.decode(content);
    }
    const cut = utf8Cut(content, args.max_bytes);
    return `${decoder.decode(content.subarray(0, cut))}\n[truncated: showing ${cut} of ${content.length} bytes]`;
  },
});

// ---------------------------------------------------------------------------
// create / write
// ---------------------------------------------------------------------------

export const createCommand = defineCommand({
  descriptor: CREATE_DESCRIPTOR,
  argsSchema: createArgsSchema,
  plan: (args) => ({ summary: `create ${args.path}`, actions: [{ kind: 'WriteFile', path: args.path }] }),
  render: async (args) => renderUnifiedDiff(args.path, null, args.content),
  async execute(args, _context, controls) {
    const target = controls.target(args.path);
    if (await controls.fs.exists(target)) throw failed(`${args.path} already exists`);

    const next = encoder.encode(args.content);
    controls.begin(fileCreatedChange(target, next));
    await controls.fs.writeFileAtomic(target, next);
    return `created ${args.path} (${next.length} bytes)`;
  },
});

export const writeCommand = defineCommand({
  descriptor: WRITE_DESCRIPTOR,
  argsSchema: writeArgsSchema,
  plan: (args) => ({ summary: `write ${args.path}`, actions: [{ kind: 'WriteFile', path: args.path }] }),
  render: async (args, _context, reader) =>
    renderUnifiedDiff(args.path, await previewText(reader, args.path), args.content),
  async execute(args, _context, controls) {
    const target = controls.target(args.path);
    const next = encoder.encode(args.content);
    if (await controls.fs.exists(target)) {
      if (await controls.fs.isDirectory(target)) throw failed(`${args.path} is a directory`);
      controls.begin(fileModifiedChange(target, await controls.fs.readFile(target), next));
    } else {
      controls.begin(fileCreatedChange(target, next));
    }
    await controls.fs.writeFileAtomic(target, next);
    return `wrote ${args.path} (${next.length} bytes)`;
  },
});

// ---------------------------------------------------------------------------
// edit
// ---------------------------------------------------------------------------

export interface EditResult {
  readonly content: string;
  readonly summary: string;
}

/**
 * Applies an edit to the current text. Search/replace replaces every
 * occurrence; a line range is 1-based and inclusive and is replaced by the
 * lines of `content` (none when it is empty); `content` alone replaces the
 * whole file.
 */
export function applyEdit(args: EditArgs, current: string): EditResult {
  if (args.search !== undefined) {
    const parts = current.split(args.search);
    const count = parts.length - 1;
    if (count === 0) throw failed(`'${args.search}' not found in ${args.path}`);
    return {
      content: parts.join(args.replace ?? ''),
      summary: `replaced ${count} ${count === 1 ? 'occurrence' : 'occurrences'}`,
    };
  }

  if (args.line_start !== undefined) {
    const lines = splitLines(current);
    const start = args.line_start;
    const end = args.line_end ?? start;
    for (const line of [start, end]) {
      if (line > lines.length) {
        throw failed(`line ${line} is beyond the end of ${args.path} (${lines.length} lines)`);
      }
    }
    const next = [...lines.slice(0, start - 1), ...splitLines(args.content ?? ''), ...lines.slice(end)];
    const trailing = current.endsWith('\n') && next.length > 0 ? '\n' : '';
    return {
      content: next.join('\n') + trailing,
      summary: start === end ? `replaced line ${start}` : `replaced lines ${start}-${end}`,
    };
  }

  return { content: args.content ?? '', summary: 'replaced entire content' };
}

export const editCommand = defineCommand({
  descriptor: EDIT_DESCRIPTOR,
  argsSchema: editArgsSchema,
  plan: (args) => ({ summary: `edit ${args.path}`, actions: [{ kind: 'WriteFile', path: args.path }] }),
  async render(args, _context, reader) {
    const current = await previewText(reader, args.path);
    if (current === null && !args.create_if_missing) {
      return `edit ${args.path}\n(current content is not readable for preview)`;
    }
    let edited: EditResult;
    try {
      edited = applyEdit(args, current ?? '');
    } catch (err: unknown) {
      // The same failure surfaces from execute, after policy has had its say.
      if (err instanceof CommandError) return `edit ${args.path}\n(${err.reason}; nothing to preview)`;
      throw err;
    }
    return renderUnifiedDiff(args.path, current, edited.content);
  },
  async execute(args, _context, controls) {
    const target = controls.target(args.path);
    const exists = await controls.fs.exists(target);
    if (!exists && !args.create_if_missing) {
      throw failed(`${args.path} does not exist (set create_if_missing to create it)`);
    }
    if (exists && (await controls.fs.isDirectory(target))) throw failed(`${args.path} is a directory`);

    const prior = exists ? await controls.fs.readFile(target) : null;
    const edit = applyEdit(args, prior === null ? '' : decoder.decode(prior));
    const next = encoder.encode(edit.content);

    controls.begin(prior === null ? fileCreatedChange(target, next) : fileModifiedChange(target, prior, next));
    await controls.fs.writeFileAtomic(target, next);
    return `edited ${args.path}: ${edit.summary}`;
  },
});

// ---------------------------------------------------------------------------
// delete / rename
// ---------------------------------------------------------------------------

export function isProtectedPath(path: string): boolean {
  return PROTECTED_NAMES.includes(basename(path)) || path.split(/[\\/]/).includes('.git');
}

function protectedPath(path: string): CommandError {
  return new CommandError(ErrorKind.PolicyDenied, `cannot delete protected path ${path}`);
}

export const deleteCommand = defineCommand({
  descriptor: DELETE_DESCRIPTOR,
  argsSchema: deleteArgsSchema,
  plan: (args) => ({ summary: `delete ${args.path}`, actions: [{ kind: 'DeleteFile', path: args.path }] }),
  async render(args, _context, reader) {
    if (isProtectedPath(args.path)) throw protectedPath(args.path);
    const current = await previewText(reader, args.path);
    return current === null ? `delete ${args.path}` : renderUnifiedDiff(args.path, current, null);
  },
  async execute(args, _context, controls) {
    const target = await existingFile(controls, args.path);
    if (isProtectedPath(args.path) || isProtectedPath(basename(target))) throw protectedPath(args.path);

    controls.begin(fileDeletedChange(target, await controls.fs.readFile(target)));
    await controls.fs.remove(target);
    return `deleted ${args.path}`;
  },
});

export const renameCommand = defineCommand({
  descriptor: RENAME_DESCRIPTOR,
  argsSchema: renameArgsSchema,
  plan: (args) => ({
    summary: `rename ${args.from} -> ${args.to}`,
    actions: [{ kind: 'MoveFile', from: args.from, to: args.to }],
  }),
  render: async (args) => `rename ${args.from}\n    -> ${args.to}`,
  async execute(args, _context, controls) {
    const from = await existingFile(controls, args.from);
    const to = controls.target(args.to);
    if (await controls.fs.exists(to)) throw failed(`${args.to} already exists`);

    controls.begin(fileMovedChange(from, to));
    await controls.fs.rename(from, to);
    return `renamed ${args.from} -> ${args.to}`;
  },
});

/** Every file command, in registration order. */
export const FILESYSTEM_COMMANDS: ReadonlyArray<RegisteredCommand> = [
  readCommand,
  createCommand,
  writeCommand,
  editCommand,
  deleteCommand,
  renameCommand,
];
