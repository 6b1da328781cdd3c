/**
 * Bulwark Filesystem Commands — Manifest
 *
 * Descriptors and argument schemas for the first-party file commands. The
 * descriptors are what the pipeline's policy engine sees: every mutating
 * command requires WriteFile and renders a preview before approval; `read`
 * is the only command available at the read-only sandbox level.
 *
 * Paths are workspace-relative (or absolute) as written by the caller; the
 * pipeline canonicalizes them before any check.
 */

import { z } from 'zod';
import type { CommandDescriptor } from '@bulwark/kernel';
import { Capability, PreviewMode } from '@bulwark/kernel';

/** File names `delete` refuses to remove. */
export const PROTECTED_NAMES: ReadonlyArray<string> = ['.git', '.gitignore', 'package.json', 'package-lock.json'];

const path = z.string().min(1, 'path must not be empty');

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

function descriptor(
  id: string,
  description: string,
  required_capabilities: ReadonlyArray<Capability>,
  preview_mode: PreviewMode,
): CommandDescriptor {
  return {
    id,
    description,
    required_capabilities,
    requires_approval: false,
    preview_mode,
    workspace_shell_opt_in: false,
    supports_dry_run: true,
  };
}

export const READ_DESCRIPTOR = descriptor(
  'read',
  'Read a file from the workspace',
  [Capability.ReadFile],
  PreviewMode.Never,
);

export const CREATE_DESCRIPTOR = descriptor(
  'create',
  'Create a new file; fails if it already exists',
  [Capability.WriteFile],
  PreviewMode.Always,
);

export const WRITE_DESCRIPTOR = descriptor(
  'write',
  'Write a file, creating or overwriting it',
  [Capability.WriteFile],
  PreviewMode.Always,
);

export const EDIT_DESCRIPTOR = descriptor(
  'edit',
  'Edit a file by search/replace, line range or full replacement',
  [Capability.ReadFile, Capability.WriteFile],
  PreviewMode.Always,
);

export const DELETE_DESCRIPTOR = descriptor(
  'delete',
  'Delete a file',
  [Capability.WriteFile],
  PreviewMode.Always,
);

export const RENAME_DESCRIPTOR = descriptor(
  'rename',
  'Move a file to a path that does not exist yet',
  [Capability.WriteFile],
  PreviewMode.Always,
);

// ---------------------------------------------------------------------------
// Argument schemas
// ---------------------------------------------------------------------------

export const readArgsSchema = z
  .object({
    path,
    max_bytes: z.number().int().positive().optional(),
  })
  .strict();

export const createArgsSchema = z
  .object({
    path,
    content: z.string().default(''),
  })
  .strict();

export const writeArgsSchema = z
  .object({
    path,
    content: z.string(),
  })
  .strict();

export const editArgsSchema = z
  .object({
    path,
    search: z.string().min(1, 'search must not be empty').optional(),
    replace: z.string().optional(),
    line_start: z.number().int().positive().optional(),
    line_end: z.number().int().positive().optional(),
    content: z.string().optional(),
    create_if_missing: z.boolean().default(false),
  })
  .strict()
  .superRefine((args, ctx) => {
    if ((args.search === undefined) !== (args.replace === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'search and replace must be given together' });
    }
    if (args.search !== undefined && args.line_start !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'search/replace and a line range are exclusive' });
    }
    if (args.line_end !== undefined && args.line_start === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['line_end'], message: 'line_end requires line_start' });
    }
    if (args.line_start !== undefined && args.line_end !== undefined && args.line_end < args.line_start) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['line_end'],
        message: `line_end ${args.line_end} is before line_start ${args.line_start}`,
      });
    }
    if (args.content === undefined && args.search === undefined && args.line_start === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'specify content, search/replace, or a line range' });
    }
  });

export const deleteArgsSchema = z.object({ path }).strict();

export const renameArgsSchema = z
  .object({
    from: path,
    to: path,
  })
  .strict();

export type ReadArgs = z.infer<typeof readArgsSchema>;
export type CreateArgs = z.infer<typeof createArgsSchema>;
export type WriteArgs = z.infer<typeof writeArgsSchema>;
export type EditArgs = z.infer<typeof editArgsSchema>;
export type DeleteArgs = z.infer<typeof deleteArgsSchema>;
export type RenameArgs = z.infer<typeof renameArgsSchema>;
